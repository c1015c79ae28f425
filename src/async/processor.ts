import type { Job } from "bullmq";
import { Redis } from "ioredis";
import { request } from "undici";
import { loadConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { createPipelineDeps, runToCompletion, type PipelineDeps } from "../pipeline/orchestrator.js";
import { RedisResultStore, type ResultStore } from "../store/resultStore.js";
import type { QueuedJobData, TerminalEvent } from "../types.js";

const log = createLogger("async:processor");

export interface ProcessorDeps {
  pipeline: PipelineDeps;
  results: ResultStore;
  webhookUrl?: string;
  postWebhook?: (url: string, payload: unknown) => Promise<void>;
}

export type ProcessableJob = Pick<Job<QueuedJobData>, "data" | "updateProgress">;

export type TranscriptionProcessor = (job: ProcessableJob) => Promise<TerminalEvent>;

export async function postJson(url: string, payload: unknown): Promise<void> {
  const res = await request(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload),
  });
  // Drain so the socket is released
  await res.body.dump();
  if (res.statusCode >= 400) {
    throw new Error(`Webhook responded with ${res.statusCode}`);
  }
}

export function createProcessor(deps: ProcessorDeps): TranscriptionProcessor {
  const postWebhook = deps.postWebhook ?? postJson;

  return async (job) => {
    const { jobId, job: transcriptionJob } = job.data;
    log.info({ jobId, inputPath: transcriptionJob.inputPath }, "processing job");

    const terminal = await runToCompletion(transcriptionJob, deps.pipeline, (event) =>
      job.updateProgress(event)
    );
    await deps.results.save(jobId, terminal);

    if (deps.webhookUrl) {
      const payload =
        terminal.type === "done"
          ? { jobId, status: "completed", result: terminal }
          : { jobId, status: "failed", error: terminal };
      try {
        await postWebhook(deps.webhookUrl, payload);
        log.info({ jobId }, "webhook sent");
      } catch (err) {
        log.error({ jobId, err: errorMessage(err) }, "failed to send webhook");
      }
    }

    if (terminal.type === "error") {
      // Marks the BullMQ job failed with the pipeline's diagnostic
      throw new Error(`${terminal.kind}: ${terminal.message}`);
    }
    return terminal;
  };
}

export function createDefaultProcessor(): TranscriptionProcessor {
  const cfg = loadConfig();
  return createProcessor({
    pipeline: createPipelineDeps(cfg),
    results: new RedisResultStore(new Redis(cfg.redisPort, cfg.redisHost, { maxRetriesPerRequest: null })),
    webhookUrl: cfg.webhookUrl,
  });
}
