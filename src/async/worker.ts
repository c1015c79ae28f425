import { Worker } from "bullmq";
import { loadConfig } from "../config.js";
import { createLogger } from "../logger.js";
import type { QueuedJobData, TerminalEvent } from "../types.js";
import { createDefaultProcessor } from "./processor.js";
import { QUEUE_NAME } from "./queue.js";

const cfg = loadConfig();
const log = createLogger("async:worker");

// One job at a time: a loaded model is owned by a single session
const worker = new Worker<QueuedJobData, TerminalEvent>(QUEUE_NAME, createDefaultProcessor(), {
  connection: {
    host: cfg.redisHost,
    port: cfg.redisPort,
  },
  concurrency: 1,
});

log.info({ queue: QUEUE_NAME }, "worker started");

worker.on("completed", (job) => {
  log.info({ jobId: job.id }, "job completed");
});

worker.on("failed", (job, err) => {
  log.warn({ jobId: job?.id, reason: err.message }, "job failed");
});

async function shutdown(): Promise<void> {
  await worker.close();
  process.exit(0);
}

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());
