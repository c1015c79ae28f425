import path from "node:path";
import { mkdtemp, rm } from "node:fs/promises";
import { CommandError, ConversionError, errorMessage } from "../errors.js";
import { UNSUPPORTED_INPUT_PATTERNS, describeSpec } from "../constants.js";
import { createLogger } from "../logger.js";
import type { AudioSpec } from "../types.js";
import { runCommand } from "../utils/process.js";

const log = createLogger("pipeline:convert");

/** A converted waveform whose directory lives until `dispose()`. */
export interface ConvertedAudio {
  readonly path: string;
  dispose(): Promise<void>;
}

export interface AudioConverter {
  convert(inputPath: string, target: AudioSpec): Promise<ConvertedAudio>;
}

export interface FfmpegConverterOptions {
  ffmpegCmd: string;
  tempDir: string;
  timeoutMs?: number;
}

function safeBaseName(inputPath: string): string {
  const base = path.basename(inputPath, path.extname(inputPath));
  return base.replace(/[^\w\- ]+/g, "").trim() || "audio";
}

function stderrTail(stderr: string): string {
  return stderr.trim().split("\n").slice(-10).join("\n");
}

export function buildFfmpegArgs(inputPath: string, outputPath: string, target: AudioSpec): string[] {
  return [
    "-y",
    "-hide_banner",
    "-nostdin",
    "-i", inputPath,
    "-vn",
    "-ac", String(target.channels),
    "-ar", String(target.sampleRate),
    "-c:a", pcmCodecFor(target.sampleWidthBytes),
    "-f", "wav",
    outputPath,
  ];
}

function pcmCodecFor(sampleWidthBytes: number): string {
  switch (sampleWidthBytes) {
    case 1:
      return "pcm_u8";
    case 2:
      return "pcm_s16le";
    case 3:
      return "pcm_s24le";
    case 4:
      return "pcm_s32le";
    default:
      throw new RangeError(`Unsupported sample width: ${sampleWidthBytes} bytes`);
  }
}

export class FfmpegAudioConverter implements AudioConverter {
  private verified = false;

  constructor(private readonly options: FfmpegConverterOptions) {}

  /** Confirms the ffmpeg executable can be started. */
  async ensureAvailable(): Promise<void> {
    if (this.verified) return;
    try {
      await runCommand(this.options.ffmpegCmd, ["-hide_banner", "-version"], { timeoutMs: 15_000 });
      this.verified = true;
    } catch (err) {
      throw new ConversionError(
        "conversion.backend_missing",
        `FFmpeg not found or not executable (${this.options.ffmpegCmd}). Install FFmpeg or set FFMPEG_CMD.`,
        err instanceof CommandError ? stderrTail(err.stderr) : errorMessage(err),
        { cause: err }
      );
    }
  }

  async convert(inputPath: string, target: AudioSpec): Promise<ConvertedAudio> {
    await this.ensureAvailable();

    const workDir = await mkdtemp(path.join(this.options.tempDir, "job-"));
    const outputPath = path.join(workDir, `${safeBaseName(inputPath)}_converted.wav`);
    const dispose = createDisposer(workDir);

    log.info({ inputPath, outputPath, target: describeSpec(target) }, "converting audio");
    try {
      await runCommand(this.options.ffmpegCmd, buildFfmpegArgs(inputPath, outputPath, target), {
        timeoutMs: this.options.timeoutMs,
      });
    } catch (err) {
      await dispose();
      throw classifyFailure(inputPath, err);
    }

    return { path: outputPath, dispose };
  }
}

function createDisposer(workDir: string): () => Promise<void> {
  let disposed: Promise<void> | undefined;
  return () => {
    disposed ??= rm(workDir, { recursive: true, force: true }).then(
      () => log.debug({ workDir }, "removed conversion directory"),
      (err: unknown) => log.warn({ err, workDir }, "failed to remove conversion directory")
    );
    return disposed;
  };
}

function classifyFailure(inputPath: string, err: unknown): ConversionError {
  if (!(err instanceof CommandError)) {
    return new ConversionError("conversion.backend_failed", `Audio conversion failed: ${errorMessage(err)}`, undefined, { cause: err });
  }
  if (err.spawnFailed) {
    return new ConversionError("conversion.backend_missing", "FFmpeg could not be started", err.message, { cause: err });
  }
  const detail = stderrTail(err.stderr);
  if (UNSUPPORTED_INPUT_PATTERNS.some((re) => re.test(err.stderr))) {
    return new ConversionError(
      "conversion.unsupported_input",
      `Could not decode audio file: ${path.basename(inputPath)}`,
      detail,
      { cause: err }
    );
  }
  log.warn({ inputPath, exitCode: err.exitCode, detail }, "ffmpeg failed");
  return new ConversionError(
    "conversion.backend_failed",
    `FFmpeg exited with code ${err.exitCode}: ${detail || "no diagnostic output"}`,
    detail,
    { cause: err }
  );
}
