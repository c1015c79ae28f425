import "dotenv/config";
import path from "node:path";
import fs from "node:fs";
import os from "node:os";
import ffmpegInstaller from "@ffmpeg-installer/ffmpeg";
import ffprobeInstaller from "@ffprobe-installer/ffprobe";
import { DEFAULT_CHUNK_SIZE_BYTES } from "./constants.js";
import { isFrameAligned } from "./pipeline/job.js";

export interface ServiceConfig {
  port: number;
  host: string;
  ffmpegCmd: string;
  ffprobeCmd: string;
  tempDir: string; // parent of per-job conversion directories
  outputDir: string; // default location for transcripts
  modelDir?: string; // used when a request names no model
  chunkSizeBytes: number;
  redisHost: string;
  redisPort: number;
  webhookUrl?: string;
  apiKey?: string;
}

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = parseInt(raw || "", 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function chunkSize(raw: string | undefined): number {
  const n = positiveInt(raw, DEFAULT_CHUNK_SIZE_BYTES);
  return isFrameAligned(n) ? n : DEFAULT_CHUNK_SIZE_BYTES;
}

export const rootDir = path.resolve(process.cwd());

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  // Bundled binaries come from npm; the env overrides them
  const ffmpegCmd = env.FFMPEG_CMD || ffmpegInstaller.path || "ffmpeg";
  const ffprobeCmd = env.FFPROBE_CMD || ffprobeInstaller.path || "ffprobe";

  const tempDir = env.TEMP_DIR || path.join(os.tmpdir(), "offline-transcriber");
  const outputDir = env.OUTPUT_DIR || path.join(rootDir, "transcripts");

  ensureDir(tempDir);

  return {
    port: positiveInt(env.PORT, 5688),
    host: env.HOST || "0.0.0.0",
    ffmpegCmd,
    ffprobeCmd,
    tempDir,
    outputDir,
    modelDir: env.MODEL_DIR || undefined,
    chunkSizeBytes: chunkSize(env.CHUNK_SIZE_BYTES),
    redisHost: env.REDIS_HOST || "localhost",
    redisPort: positiveInt(env.REDIS_PORT, 6379),
    webhookUrl: env.WEBHOOK_URL || undefined,
    apiKey: env.API_KEY || undefined,
  };
}
