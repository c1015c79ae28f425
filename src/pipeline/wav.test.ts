import { open, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildWav, makePayload, makeTempDir } from "../../test/helpers/wav.js";
import { readWavLayout } from "./wav.js";

const MONO_16K = { sampleRate: 16000, channels: 1, sampleWidthBytes: 2 };

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function layoutOf(bytes: Buffer) {
  const file = path.join(dir, "input.wav");
  await writeFile(file, bytes);
  const handle = await open(file, "r");
  try {
    return await readWavLayout(handle);
  } finally {
    await handle.close();
  }
}

describe("readWavLayout", () => {
  it("reads the format and locates the payload after a 44-byte header", async () => {
    const layout = await layoutOf(buildWav(makePayload(10), MONO_16K));
    expect(layout).toEqual({
      audioFormat: 1,
      channels: 1,
      sampleRate: 16000,
      bitsPerSample: 16,
      dataOffset: 44,
      dataSize: 10,
    });
  });

  it("skips chunks between fmt and data, including odd-sized ones", async () => {
    const wav = buildWav(makePayload(4), { sampleRate: 44100, channels: 2, sampleWidthBytes: 2 }, {
      extraChunks: [{ id: "LIST", body: Buffer.from("abc") }],
    });
    const layout = await layoutOf(wav);
    // 12 RIFF + 24 fmt + (8 + 3 + 1 pad) LIST + 8 data header
    expect(layout?.dataOffset).toBe(56);
    expect(layout?.sampleRate).toBe(44100);
    expect(layout?.channels).toBe(2);
  });

  it("clamps a declared data size larger than the file", async () => {
    const layout = await layoutOf(buildWav(makePayload(6), MONO_16K, { declaredDataSize: 0xffffffff }));
    expect(layout?.dataSize).toBe(6);
  });

  it("returns null for non-RIFF input", async () => {
    expect(await layoutOf(Buffer.from("ID3 not a wave file at all"))).toBeNull();
  });

  it("returns null when the data chunk is missing", async () => {
    const wav = buildWav(Buffer.alloc(0), MONO_16K);
    // drop the trailing data header
    expect(await layoutOf(wav.subarray(0, wav.length - 8))).toBeNull();
  });
});
