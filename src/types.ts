import type { ErrorKind } from "./errors.js";

export interface AudioSpec {
  sampleRate: number; // Hz
  channels: number;
  sampleWidthBytes: number;
}

/** A probed input; `pcmWave` is false for any container the streamer cannot read. */
export interface ProbedAudio extends AudioSpec {
  pcmWave: boolean;
}

export interface TranscriptionJob {
  readonly inputPath: string;
  readonly modelDirPath: string;
  readonly outputPath: string;
  readonly chunkSizeBytes: number;
}

export type ProgressEvent =
  | { type: "status"; message: string; fraction?: number }
  | { type: "partial"; text: string }
  | { type: "final"; text: string }
  | { type: "error"; kind: ErrorKind; message: string; detail?: string }
  | { type: "done"; transcript: string };

export type TerminalEvent = Extract<ProgressEvent, { type: "error" | "done" }>;

export type PartialResult =
  | { type: "in_progress"; text: string }
  | { type: "segment_final"; text: string };

export interface FinalResult {
  text: string;
}

export interface StreamChunk {
  chunk: Buffer;
  fraction: number; // cumulative, 0..1
}

// Payload of a queued job; paths are resolved on the worker host.
export interface QueuedJobData {
  jobId: string;
  job: TranscriptionJob;
}

export function isTerminalEvent(event: ProgressEvent): event is TerminalEvent {
  return event.type === "error" || event.type === "done";
}
