import path from "node:path";
import { stat } from "node:fs/promises";
import { EngineError, errorMessage } from "../errors.js";
import { REQUIRED_MODEL_PARTS, TARGET_AUDIO_SPEC } from "../constants.js";
import { createLogger } from "../logger.js";
import type { FinalResult, PartialResult } from "../types.js";
import type { Recognizer, RecognizerBackend, RecognizerModel } from "./backend.js";
import { VoskBackend } from "./vosk.js";

const log = createLogger("engine:session");

/** In-progress hypothesis plus the segments finalized so far. */
export interface RecognitionState {
  readonly hypothesis: string;
  readonly segments: readonly string[];
}

export const EMPTY_RECOGNITION_STATE: RecognitionState = Object.freeze({
  hypothesis: "",
  segments: Object.freeze([]),
});

function clean(text: string | undefined): string {
  return (text ?? "").trim();
}

export function appendSegment(state: RecognitionState, text: string): RecognitionState {
  return { hypothesis: "", segments: text ? [...state.segments, text] : state.segments };
}

export function withHypothesis(state: RecognitionState, hypothesis: string): RecognitionState {
  return { hypothesis, segments: state.segments };
}

export class TranscriptionSession {
  private recognition: RecognitionState = EMPTY_RECOGNITION_STATE;
  private closed = false;

  constructor(
    private readonly model: RecognizerModel,
    private readonly recognizer: Recognizer
  ) {}

  get state(): RecognitionState {
    return this.recognition;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  feed(chunk: Buffer): PartialResult {
    if (this.closed) {
      throw new EngineError("engine.session_closed", "Cannot feed audio to a finished session");
    }
    if (this.recognizer.acceptWaveform(chunk)) {
      const text = clean(this.recognizer.result().text);
      this.recognition = appendSegment(this.recognition, text);
      return { type: "segment_final", text };
    }
    const text = clean(this.recognizer.partialResult().partial);
    this.recognition = withHypothesis(this.recognition, text);
    return { type: "in_progress", text };
  }

  /** Flushes residual audio and releases the recognizer and model. */
  finish(): FinalResult {
    if (this.closed) {
      return { text: "" };
    }
    try {
      const text = clean(this.recognizer.finalResult().text);
      this.recognition = appendSegment(this.recognition, text);
      return { text };
    } finally {
      this.release();
    }
  }

  /** Releases without flushing. Safe to call more than once. */
  close(): void {
    if (!this.closed) {
      this.release();
    }
  }

  private release(): void {
    this.closed = true;
    try {
      this.recognizer.free();
    } finally {
      this.model.free();
    }
  }
}

export class TranscriptionEngine {
  constructor(
    private readonly backend: RecognizerBackend = new VoskBackend(),
    private readonly sampleRate: number = TARGET_AUDIO_SPEC.sampleRate
  ) {}

  async begin(modelDirPath: string): Promise<TranscriptionSession> {
    await assertModelLayout(modelDirPath);

    let model: RecognizerModel;
    try {
      model = await this.backend.loadModel(modelDirPath);
    } catch (err) {
      log.error({ err, modelDirPath }, "model load failed");
      throw new EngineError("engine.model_load_failed", `Failed to load model from ${modelDirPath}: ${errorMessage(err)}`, undefined, { cause: err });
    }

    try {
      const recognizer = this.backend.createRecognizer(model, this.sampleRate);
      log.info({ modelDirPath, backend: this.backend.name }, "session opened");
      return new TranscriptionSession(model, recognizer);
    } catch (err) {
      model.free();
      throw new EngineError("engine.model_load_failed", `Failed to create recognizer: ${errorMessage(err)}`, undefined, { cause: err });
    }
  }
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isFile();
  } catch {
    return false;
  }
}

export async function assertModelLayout(modelDirPath: string): Promise<void> {
  if (!(await isDirectory(modelDirPath))) {
    throw new EngineError("engine.model_not_found", `Model path is not a valid directory: ${modelDirPath}`);
  }
  for (const parts of REQUIRED_MODEL_PARTS) {
    const required = path.join(modelDirPath, ...parts);
    if (!(await isFile(required))) {
      throw new EngineError("engine.model_not_found", `Model directory seems incomplete. Missing: ${required}`);
    }
  }
}
