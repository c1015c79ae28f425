import { open, type FileHandle } from "node:fs/promises";
import { StreamError, errorMessage } from "../errors.js";
import type { StreamChunk } from "../types.js";
import { readWavLayout } from "./wav.js";

function clampFraction(consumed: number, total: number): number {
  if (total <= 0) return 1;
  return Math.min(1, Math.max(0, consumed / total));
}

async function readFully(handle: FileHandle, position: number, length: number): Promise<Buffer> {
  const buf = Buffer.alloc(length);
  let filled = 0;
  while (filled < length) {
    const { bytesRead } = await handle.read(buf, filled, length - filled, position + filled);
    if (bytesRead === 0) break;
    filled += bytesRead;
  }
  return buf.subarray(0, filled);
}

/**
 * Yields the sample payload of a WAV file in `chunkSizeBytes` slices.
 * Every call reopens the file and starts from the first sample.
 */
export async function* streamWaveform(
  wavePath: string,
  chunkSizeBytes: number
): AsyncGenerator<StreamChunk, void, undefined> {
  if (!Number.isInteger(chunkSizeBytes) || chunkSizeBytes < 1) {
    throw new RangeError(`chunkSizeBytes must be a positive integer, got ${chunkSizeBytes}`);
  }

  let handle: FileHandle;
  try {
    handle = await open(wavePath, "r");
  } catch (err) {
    throw new StreamError("stream.unreadable", `Converted audio could not be opened: ${wavePath}`, errorMessage(err), { cause: err });
  }

  try {
    const layout = await readWavLayout(handle);
    if (!layout) {
      throw new StreamError("stream.unreadable", `No PCM payload found in ${wavePath}`);
    }

    const total = layout.dataSize;
    if (total === 0) {
      yield { chunk: Buffer.alloc(0), fraction: 1 };
      return;
    }

    let consumed = 0;
    while (consumed < total) {
      const length = Math.min(chunkSizeBytes, total - consumed);
      const chunk = await readFully(handle, layout.dataOffset + consumed, length);
      if (chunk.length < length) {
        throw new StreamError("stream.unreadable", `Unexpected end of audio payload in ${wavePath}`);
      }
      consumed += length;
      yield { chunk, fraction: clampFraction(consumed, total) };
    }
  } finally {
    await handle.close();
  }
}
