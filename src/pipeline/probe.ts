import { open, type FileHandle } from "node:fs/promises";
import { z } from "zod";
import { CommandError, ProbeError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import type { ProbedAudio } from "../types.js";
import { runCommand } from "../utils/process.js";
import { readWavLayout } from "./wav.js";

const log = createLogger("pipeline:probe");

export interface FormatProber {
  probe(filePath: string): Promise<ProbedAudio>;
}

// Only the fields we read from `ffprobe -show_streams`
const FfprobeStreamSchema = z.object({
  codec_type: z.string().optional(),
  sample_rate: z.coerce.number().int().positive(),
  channels: z.number().int().positive(),
  bits_per_sample: z.number().int().nonnegative().optional(),
  bits_per_raw_sample: z.coerce.number().int().nonnegative().optional(),
  sample_fmt: z.string().optional(),
});

const FfprobeOutputSchema = z.object({
  streams: z.array(FfprobeStreamSchema),
});

const SAMPLE_FMT_BYTES: Record<string, number> = {
  u8: 1,
  u8p: 1,
  s16: 2,
  s16p: 2,
  s32: 4,
  s32p: 4,
  s64: 8,
  s64p: 8,
  flt: 4,
  fltp: 4,
  dbl: 8,
  dblp: 8,
};

type FfprobeStream = z.infer<typeof FfprobeStreamSchema>;

function sampleWidthOf(stream: FfprobeStream): number {
  const bits = stream.bits_per_sample || stream.bits_per_raw_sample;
  if (bits) return Math.ceil(bits / 8);
  // Compressed codecs report no bit depth; use the decoder's sample format
  return (stream.sample_fmt && SAMPLE_FMT_BYTES[stream.sample_fmt]) || 0;
}

export class DefaultFormatProber implements FormatProber {
  private verified = false;

  constructor(private readonly ffprobeCmd: string) {}

  /** Confirms the ffprobe executable can be started. */
  async ensureAvailable(): Promise<void> {
    if (this.verified) return;
    try {
      await runCommand(this.ffprobeCmd, ["-hide_banner", "-version"], { timeoutMs: 15_000 });
      this.verified = true;
    } catch (err) {
      throw this.missingBackend(err);
    }
  }

  private missingBackend(err: unknown): ProbeError {
    return new ProbeError(
      "probe.backend_missing",
      `FFprobe not found or not executable (${this.ffprobeCmd}). Install FFmpeg or set FFPROBE_CMD.`,
      err instanceof CommandError ? err.stderr.trim() : errorMessage(err),
      { cause: err }
    );
  }

  async probe(filePath: string): Promise<ProbedAudio> {
    let handle: FileHandle;
    try {
      handle = await open(filePath, "r");
    } catch (err) {
      throw new ProbeError("probe.not_found", `Input audio file not found or unreadable: ${filePath}`, errorMessage(err), { cause: err });
    }

    try {
      const wav = await readWavLayout(handle);
      if (wav && wav.audioFormat === 1) {
        log.debug({ filePath, wav }, "probed WAV header");
        return {
          sampleRate: wav.sampleRate,
          channels: wav.channels,
          sampleWidthBytes: Math.ceil(wav.bitsPerSample / 8),
          pcmWave: true,
        };
      }
    } catch (err) {
      throw new ProbeError("probe.not_found", `Could not read input audio file: ${filePath}`, errorMessage(err), { cause: err });
    } finally {
      await handle.close();
    }

    return this.probeWithFfprobe(filePath);
  }

  private async probeWithFfprobe(filePath: string): Promise<ProbedAudio> {
    let stdout: string;
    try {
      ({ stdout } = await runCommand(this.ffprobeCmd, [
        "-v", "error",
        "-select_streams", "a:0",
        "-show_streams",
        "-print_format", "json",
        filePath,
      ]));
    } catch (err) {
      if (err instanceof CommandError && err.spawnFailed) {
        log.error({ ffprobeCmd: this.ffprobeCmd }, "ffprobe could not be started");
        throw this.missingBackend(err);
      }
      const detail = err instanceof CommandError ? err.stderr.trim() : errorMessage(err);
      log.warn({ filePath, detail }, "ffprobe failed");
      throw new ProbeError("probe.unsupported", `Could not inspect audio container: ${filePath}`, detail, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch (err) {
      throw new ProbeError("probe.unsupported", `ffprobe returned unreadable output for ${filePath}`, stdout.slice(0, 300), { cause: err });
    }

    const parsed = FfprobeOutputSchema.safeParse(json);
    const stream = parsed.success ? parsed.data.streams[0] : undefined;
    if (!stream) {
      throw new ProbeError("probe.unsupported", `No audio stream found in ${filePath}`);
    }

    const spec: ProbedAudio = {
      sampleRate: stream.sample_rate,
      channels: stream.channels,
      sampleWidthBytes: sampleWidthOf(stream),
      pcmWave: false,
    };
    log.debug({ filePath, spec }, "probed with ffprobe");
    return spec;
  }
}
