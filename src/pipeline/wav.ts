import type { FileHandle } from "node:fs/promises";

export interface WavLayout {
  audioFormat: number; // 1 = integer PCM
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
  dataOffset: number;
  dataSize: number; // clamped to the bytes actually present
}

const RIFF_HEADER_SIZE = 12;
const CHUNK_HEADER_SIZE = 8;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

async function readAt(handle: FileHandle, position: number, length: number): Promise<Buffer> {
  const buf = Buffer.alloc(length);
  const { bytesRead } = await handle.read(buf, 0, length, position);
  return buf.subarray(0, bytesRead);
}

export async function isRiffWave(handle: FileHandle): Promise<boolean> {
  const head = await readAt(handle, 0, RIFF_HEADER_SIZE);
  return (
    head.length === RIFF_HEADER_SIZE &&
    head.toString("ascii", 0, 4) === "RIFF" &&
    head.toString("ascii", 8, 12) === "WAVE"
  );
}

/**
 * Walks the RIFF chunk list up to the `data` chunk. Returns null when the
 * file is not a WAVE file or lacks a `fmt ` or `data` chunk.
 */
export async function readWavLayout(handle: FileHandle): Promise<WavLayout | null> {
  if (!(await isRiffWave(handle))) {
    return null;
  }
  const { size: fileSize } = await handle.stat();

  let fmt: Omit<WavLayout, "dataOffset" | "dataSize"> | null = null;
  let offset = RIFF_HEADER_SIZE;

  while (offset + CHUNK_HEADER_SIZE <= fileSize) {
    const header = await readAt(handle, offset, CHUNK_HEADER_SIZE);
    if (header.length < CHUNK_HEADER_SIZE) break;
    const chunkId = header.toString("ascii", 0, 4);
    const chunkSize = header.readUInt32LE(4);
    const bodyOffset = offset + CHUNK_HEADER_SIZE;

    if (chunkId === "fmt ") {
      const body = await readAt(handle, bodyOffset, Math.min(chunkSize, 40));
      if (body.length < 16) return null;
      let audioFormat = body.readUInt16LE(0);
      if (audioFormat === WAVE_FORMAT_EXTENSIBLE && body.length >= 26) {
        // Sub-format GUID starts with the actual format tag
        audioFormat = body.readUInt16LE(24);
      }
      fmt = {
        audioFormat,
        channels: body.readUInt16LE(2),
        sampleRate: body.readUInt32LE(4),
        bitsPerSample: body.readUInt16LE(14),
      };
    } else if (chunkId === "data") {
      if (!fmt) return null;
      const available = Math.max(0, fileSize - bodyOffset);
      return { ...fmt, dataOffset: bodyOffset, dataSize: Math.min(chunkSize, available) };
    }

    offset = bodyOffset + chunkSize + (chunkSize % 2);
  }
  return null;
}
