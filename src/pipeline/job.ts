import { z } from "zod";
import { DEFAULT_CHUNK_SIZE_BYTES, TARGET_AUDIO_SPEC } from "../constants.js";
import type { TranscriptionJob } from "../types.js";

export const BYTES_PER_FRAME = TARGET_AUDIO_SPEC.channels * TARGET_AUDIO_SPEC.sampleWidthBytes;

export function isFrameAligned(chunkSizeBytes: number): boolean {
  return chunkSizeBytes % BYTES_PER_FRAME === 0;
}

// Chunks never end inside a sample frame
export const ChunkSizeSchema = z
  .number()
  .int()
  .positive()
  .refine(isFrameAligned, { message: `chunkSizeBytes must be a multiple of ${BYTES_PER_FRAME}` });

export const TranscriptionJobSchema = z.object({
  inputPath: z.string().min(1),
  modelDirPath: z.string().min(1),
  outputPath: z.string().min(1),
  chunkSizeBytes: ChunkSizeSchema.default(DEFAULT_CHUNK_SIZE_BYTES),
});

export type TranscriptionJobInput = z.input<typeof TranscriptionJobSchema>;

/** Validates and freezes a job; a job is never mutated after this. */
export function createJob(input: TranscriptionJobInput): TranscriptionJob {
  return Object.freeze(TranscriptionJobSchema.parse(input));
}
