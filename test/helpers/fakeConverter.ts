import { mkdtemp, rm } from "node:fs/promises";
import path from "node:path";
import type { AudioConverter, ConvertedAudio } from "../../src/pipeline/convert.js";
import type { AudioSpec } from "../../src/types.js";
import { writeWav } from "./wav.js";

/** Stands in for ffmpeg: writes a conformant WAV holding `payload`. */
export class FakeConverter implements AudioConverter {
  readonly calls: Array<{ inputPath: string; target: AudioSpec }> = [];
  readonly outputs: string[] = [];
  failWith?: Error;

  constructor(
    private readonly tempRoot: string,
    private readonly payload: Buffer
  ) {}

  async convert(inputPath: string, target: AudioSpec): Promise<ConvertedAudio> {
    this.calls.push({ inputPath, target });
    if (this.failWith) throw this.failWith;

    const workDir = await mkdtemp(path.join(this.tempRoot, "job-"));
    const outputPath = await writeWav(workDir, "converted.wav", this.payload, target);
    this.outputs.push(outputPath);
    return {
      path: outputPath,
      dispose: () => rm(workDir, { recursive: true, force: true }),
    };
  }
}
