import type { ProgressEvent } from "./types.js";

export type ProbeErrorKind = "probe.not_found" | "probe.unsupported" | "probe.backend_missing";
export type ConversionErrorKind =
  | "conversion.backend_missing"
  | "conversion.backend_failed"
  | "conversion.unsupported_input";
export type EngineErrorKind =
  | "engine.model_not_found"
  | "engine.model_load_failed"
  | "engine.session_closed";
export type StreamErrorKind = "stream.unreadable";

export type ErrorKind =
  | ProbeErrorKind
  | ConversionErrorKind
  | EngineErrorKind
  | StreamErrorKind
  | "unexpected";

export class PipelineError<K extends ErrorKind = ErrorKind> extends Error {
  constructor(
    readonly kind: K,
    message: string,
    readonly detail?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ProbeError extends PipelineError<ProbeErrorKind> {}
export class ConversionError extends PipelineError<ConversionErrorKind> {}
export class EngineError extends PipelineError<EngineErrorKind> {}
export class StreamError extends PipelineError<StreamErrorKind> {}

/**
 * Thrown by runCommand. `spawnFailed` is set when the executable could not
 * be started at all (missing binary, no execute permission).
 */
export class CommandError extends Error {
  constructor(
    message: string,
    readonly exitCode: number,
    readonly stderr: string,
    readonly stdout: string,
    readonly spawnFailed: boolean
  ) {
    super(message);
    this.name = "CommandError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function toErrorEvent(error: unknown): Extract<ProgressEvent, { type: "error" }> {
  if (error instanceof PipelineError) {
    return error.detail
      ? { type: "error", kind: error.kind, message: error.message, detail: error.detail }
      : { type: "error", kind: error.kind, message: error.message };
  }
  return { type: "error", kind: "unexpected", message: errorMessage(error) };
}
