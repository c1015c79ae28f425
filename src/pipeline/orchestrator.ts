import path from "node:path";
import { mkdir, writeFile } from "node:fs/promises";
import {
  STATUS_CONVERTING,
  STATUS_LOADING_MODEL,
  STATUS_PROBING,
  STATUS_PROGRESS,
  TARGET_AUDIO_SPEC,
  describeSpec,
  specsEqual,
} from "../constants.js";
import { toErrorEvent } from "../errors.js";
import { createLogger } from "../logger.js";
import type { ServiceConfig } from "../config.js";
import { TranscriptionEngine, type TranscriptionSession } from "../engine/session.js";
import type { AudioSpec, ProgressEvent, StreamChunk, TerminalEvent, TranscriptionJob } from "../types.js";
import { isTerminalEvent } from "../types.js";
import { FfmpegAudioConverter, type AudioConverter, type ConvertedAudio } from "./convert.js";
import { DefaultFormatProber, type FormatProber } from "./probe.js";
import { streamWaveform } from "./stream.js";

const log = createLogger("pipeline:orchestrator");

export interface PipelineDeps {
  prober: FormatProber;
  converter: AudioConverter;
  engine: Pick<TranscriptionEngine, "begin">;
  stream?: (wavePath: string, chunkSizeBytes: number) => AsyncIterable<StreamChunk>;
  targetSpec?: AudioSpec;
}

export function createPipelineDeps(cfg: ServiceConfig): PipelineDeps {
  return {
    prober: new DefaultFormatProber(cfg.ffprobeCmd),
    converter: new FfmpegAudioConverter({ ffmpegCmd: cfg.ffmpegCmd, tempDir: cfg.tempDir }),
    engine: new TranscriptionEngine(),
  };
}

function status(message: string, fraction?: number): ProgressEvent {
  return fraction === undefined ? { type: "status", message } : { type: "status", message, fraction };
}

async function writeTranscript(outputPath: string, transcript: string): Promise<void> {
  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, transcript, "utf-8");
}

/**
 * Runs one job and yields its progress. The last event is always exactly one
 * `done` or `error`. Leaving the loop early closes the session and removes the
 * converted file before control returns.
 */
export async function* runTranscription(
  job: TranscriptionJob,
  deps: PipelineDeps
): AsyncGenerator<ProgressEvent, void, undefined> {
  const target = deps.targetSpec ?? TARGET_AUDIO_SPEC;
  const stream = deps.stream ?? streamWaveform;
  const jobLog = log.child({ inputPath: job.inputPath });

  let converted: ConvertedAudio | undefined;
  let session: TranscriptionSession | undefined;

  const cleanup = async () => {
    if (session) {
      const open = session;
      session = undefined;
      try {
        open.close();
      } catch (err) {
        jobLog.warn({ err }, "failed to close recognition session");
      }
    }
    if (converted) {
      const file = converted;
      converted = undefined;
      await file.dispose();
    }
  };

  try {
    yield status(STATUS_PROBING);
    let workingPath = job.inputPath;
    try {
      const probed = await deps.prober.probe(job.inputPath);
      jobLog.info({ spec: describeSpec(probed), pcmWave: probed.pcmWave }, "probed input");

      if (!probed.pcmWave || !specsEqual(probed, target)) {
        yield status(STATUS_CONVERTING);
        converted = await deps.converter.convert(job.inputPath, target);
        workingPath = converted.path;
      }
    } catch (err) {
      jobLog.warn({ err }, "input preparation failed");
      await cleanup();
      yield toErrorEvent(err);
      return;
    }

    try {
      yield status(STATUS_LOADING_MODEL);
      const active = await deps.engine.begin(job.modelDirPath);
      session = active;

      for await (const { chunk, fraction } of stream(workingPath, job.chunkSizeBytes)) {
        const result = active.feed(chunk);
        if (result.type === "in_progress") {
          yield { type: "partial", text: result.text };
        } else if (result.text) {
          yield { type: "final", text: result.text };
        }
        yield status(STATUS_PROGRESS, fraction);
      }

      const residual = active.finish();
      if (residual.text) {
        yield { type: "final", text: residual.text };
      }
      const transcript = active.state.segments.join(" ");

      await cleanup();
      await writeTranscript(job.outputPath, transcript);
      jobLog.info({ outputPath: job.outputPath, chars: transcript.length }, "transcription complete");
      yield { type: "done", transcript };
    } catch (err) {
      jobLog.error({ err }, "transcription failed");
      await cleanup();
      yield toErrorEvent(err);
    }
  } finally {
    await cleanup();
  }
}

/**
 * Drains a run, handing every event to `onEvent`, and resolves with the
 * terminal event.
 */
export async function runToCompletion(
  job: TranscriptionJob,
  deps: PipelineDeps,
  onEvent?: (event: ProgressEvent) => void | Promise<void>
): Promise<TerminalEvent> {
  let terminal: TerminalEvent | undefined;
  for await (const event of runTranscription(job, deps)) {
    await onEvent?.(event);
    if (isTerminalEvent(event)) {
      terminal = event;
    }
  }
  if (!terminal) {
    throw new Error("Transcription ended without a terminal event");
  }
  return terminal;
}
