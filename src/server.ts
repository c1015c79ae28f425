import { Redis } from "ioredis";
import { buildApp, type BackendReport, type BackendStatus } from "./app.js";
import { BullJobQueue, createTranscriptionQueue } from "./async/queue.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { FfmpegAudioConverter } from "./pipeline/convert.js";
import { createPipelineDeps } from "./pipeline/orchestrator.js";
import { DefaultFormatProber } from "./pipeline/probe.js";
import { RedisResultStore } from "./store/resultStore.js";

const cfg = loadConfig();
const redis = new Redis(cfg.redisPort, cfg.redisHost, { maxRetriesPerRequest: null });
const queue = createTranscriptionQueue(cfg);
const converter = new FfmpegAudioConverter({ ffmpegCmd: cfg.ffmpegCmd, tempDir: cfg.tempDir });
const prober = new DefaultFormatProber(cfg.ffprobeCmd);

async function check(command: string, ensureAvailable: () => Promise<void>): Promise<BackendStatus> {
  try {
    await ensureAvailable();
    return { available: true, command };
  } catch (err) {
    return { available: false, command, detail: errorMessage(err) };
  }
}

async function checkBackends(): Promise<BackendReport> {
  const [ffmpeg, ffprobe] = await Promise.all([
    check(cfg.ffmpegCmd, () => converter.ensureAvailable()),
    check(cfg.ffprobeCmd, () => prober.ensureAvailable()),
  ]);
  return { ffmpeg, ffprobe };
}

const app = buildApp({
  cfg,
  pipeline: { ...createPipelineDeps(cfg), prober, converter },
  queue: new BullJobQueue(queue),
  results: new RedisResultStore(redis),
  checkBackends,
});

const start = async () => {
  try {
    const backends = await checkBackends();
    if (!backends.ffmpeg.available) {
      app.log.warn(backends.ffmpeg, "FFmpeg not found; audio conversion will fail");
    }
    if (!backends.ffprobe.available) {
      app.log.warn(backends.ffprobe, "FFprobe not found; only WAV input can be inspected");
    }
    await app.listen({ port: cfg.port, host: cfg.host });
  } catch (err) {
    app.log.error({ err }, "failed to start");
    process.exit(1);
  }
};

async function shutdown(): Promise<void> {
  await app.close();
  await queue.close();
  redis.disconnect();
  process.exit(0);
}

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());

void start();
