import type { AudioSpec } from "./types.js";

/**
 * The only format ever fed to the recognizer.
 * Vosk models are trained on 16 kHz mono 16-bit PCM.
 */
export const TARGET_AUDIO_SPEC: Readonly<AudioSpec> = Object.freeze({
  sampleRate: 16000,
  channels: 1,
  sampleWidthBytes: 2,
});

export const DEFAULT_CHUNK_SIZE_BYTES = 8000;

// Files whose presence marks a directory as a loadable Vosk model
export const REQUIRED_MODEL_PARTS = [
  ["am", "final.mdl"],
  ["conf", "model.conf"],
] as const;

export const STATUS_PROBING = "probing input";
export const STATUS_CONVERTING = "converting audio";
export const STATUS_LOADING_MODEL = "loading model";
export const STATUS_PROGRESS = "progress";

// ffmpeg stderr fragments that mean the input itself was rejected,
// as opposed to the tool failing for another reason
export const UNSUPPORTED_INPUT_PATTERNS = [
  /Invalid data found when processing input/i,
  /could not find codec parameters/i,
  /Decoder \S+ not found/i,
  /does not contain any stream/i,
] as const;

export function specsEqual(a: AudioSpec, b: AudioSpec): boolean {
  return (
    a.sampleRate === b.sampleRate &&
    a.channels === b.channels &&
    a.sampleWidthBytes === b.sampleWidthBytes
  );
}

export function describeSpec(spec: AudioSpec): string {
  return `${spec.sampleRate}Hz/${spec.channels}ch/${spec.sampleWidthBytes * 8}bit`;
}
