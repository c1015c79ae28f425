import { Queue } from "bullmq";
import type { ServiceConfig } from "../config.js";
import type { QueuedJobData } from "../types.js";

export const QUEUE_NAME = "transcription";

export type TranscriptionQueue = Queue<QueuedJobData>;

export function createTranscriptionQueue(cfg: ServiceConfig): TranscriptionQueue {
  return new Queue<QueuedJobData>(QUEUE_NAME, {
    connection: {
      host: cfg.redisHost,
      port: cfg.redisPort,
    },
    defaultJobOptions: {
      // Failures are reported, never retried
      attempts: 1,
      removeOnComplete: { count: 100 },
      removeOnFail: { count: 500 },
    },
  });
}

export interface QueuedJobStatus {
  state: string;
  progress: unknown;
  timestamp: number;
}

/** The part of the queue the HTTP layer uses. */
export interface JobQueue {
  enqueue(data: QueuedJobData): Promise<void>;
  status(jobId: string): Promise<QueuedJobStatus | null>;
}

export class BullJobQueue implements JobQueue {
  constructor(private readonly queue: TranscriptionQueue) {}

  async enqueue(data: QueuedJobData): Promise<void> {
    await this.queue.add("transcribe", data, { jobId: data.jobId });
  }

  async status(jobId: string): Promise<QueuedJobStatus | null> {
    const job = await this.queue.getJob(jobId);
    if (!job) return null;
    return { state: await job.getState(), progress: job.progress, timestamp: job.timestamp };
  }
}
