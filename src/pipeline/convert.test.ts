import { readdir, rm, stat } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../utils/process.js", () => ({
  runCommand: vi.fn(),
}));

import { TARGET_AUDIO_SPEC } from "../constants.js";
import { CommandError } from "../errors.js";
import { runCommand } from "../utils/process.js";
import { makeTempDir } from "../../test/helpers/wav.js";
import { FfmpegAudioConverter, buildFfmpegArgs } from "./convert.js";

const mockRunCommand = vi.mocked(runCommand);
const ok = { stdout: "", stderr: "", exitCode: 0 };

let tempDir: string;
let converter: FfmpegAudioConverter;

beforeEach(async () => {
  vi.clearAllMocks();
  tempDir = await makeTempDir();
  converter = new FfmpegAudioConverter({ ffmpegCmd: "ffmpeg-test", tempDir });
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe("buildFfmpegArgs", () => {
  it("requests mono 16 kHz signed 16-bit WAV", () => {
    expect(buildFfmpegArgs("/in/talk.mp3", "/out/talk.wav", TARGET_AUDIO_SPEC)).toEqual([
      "-y",
      "-hide_banner",
      "-nostdin",
      "-i", "/in/talk.mp3",
      "-vn",
      "-ac", "1",
      "-ar", "16000",
      "-c:a", "pcm_s16le",
      "-f", "wav",
      "/out/talk.wav",
    ]);
  });
});

describe("FfmpegAudioConverter", () => {
  it("writes into a job directory that dispose removes", async () => {
    mockRunCommand.mockResolvedValue(ok);

    const converted = await converter.convert("/music/My Song!.m4a", TARGET_AUDIO_SPEC);

    expect(path.basename(converted.path)).toBe("My Song_converted.wav");
    const jobDir = path.dirname(converted.path);
    expect(path.dirname(jobDir)).toBe(tempDir);
    expect((await stat(jobDir)).isDirectory()).toBe(true);
    expect(mockRunCommand).toHaveBeenNthCalledWith(1, "ffmpeg-test", ["-hide_banner", "-version"], { timeoutMs: 15_000 });
    expect(mockRunCommand).toHaveBeenNthCalledWith(
      2,
      "ffmpeg-test",
      buildFfmpegArgs("/music/My Song!.m4a", converted.path, TARGET_AUDIO_SPEC),
      { timeoutMs: undefined }
    );

    await converted.dispose();
    await converted.dispose();
    expect(await readdir(tempDir)).toEqual([]);
  });

  it("checks the backend only once", async () => {
    mockRunCommand.mockResolvedValue(ok);

    await converter.convert("/a.mp3", TARGET_AUDIO_SPEC);
    await converter.convert("/b.mp3", TARGET_AUDIO_SPEC);

    const versionCalls = mockRunCommand.mock.calls.filter(([, args]) => args.includes("-version"));
    expect(versionCalls).toHaveLength(1);
  });

  it("reports a missing ffmpeg as conversion.backend_missing", async () => {
    mockRunCommand.mockRejectedValue(new CommandError("spawn ffmpeg-test ENOENT", 1, "", "", true));

    await expect(converter.convert("/a.mp3", TARGET_AUDIO_SPEC)).rejects.toMatchObject({
      name: "ConversionError",
      kind: "conversion.backend_missing",
    });
    expect(await readdir(tempDir)).toEqual([]);
  });

  it("reports undecodable input as conversion.unsupported_input and cleans up", async () => {
    mockRunCommand
      .mockResolvedValueOnce(ok)
      .mockRejectedValueOnce(new CommandError("failed", 1, "a.xyz: Invalid data found when processing input\n", "", false));

    await expect(converter.convert("/a.xyz", TARGET_AUDIO_SPEC)).rejects.toMatchObject({
      kind: "conversion.unsupported_input",
      message: "Could not decode audio file: a.xyz",
    });
    expect(await readdir(tempDir)).toEqual([]);
  });

  it("reports other ffmpeg failures as conversion.backend_failed with the stderr tail", async () => {
    mockRunCommand
      .mockResolvedValueOnce(ok)
      .mockRejectedValueOnce(new CommandError("failed", 1, "Conversion failed!\n", "", false));

    await expect(converter.convert("/a.mp3", TARGET_AUDIO_SPEC)).rejects.toMatchObject({
      kind: "conversion.backend_failed",
      message: "FFmpeg exited with code 1: Conversion failed!",
      detail: "Conversion failed!",
    });
    expect(await readdir(tempDir)).toEqual([]);
  });
});
