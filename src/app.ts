import path from "node:path";
import crypto from "node:crypto";
import { Readable } from "node:stream";
import Fastify from "fastify";
import { z } from "zod";
import type { JobQueue } from "./async/queue.js";
import type { ServiceConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { rootLogger } from "./logger.js";
import { ChunkSizeSchema, createJob } from "./pipeline/job.js";
import { runTranscription, type PipelineDeps } from "./pipeline/orchestrator.js";
import type { ResultStore } from "./store/resultStore.js";
import type { ProgressEvent, TranscriptionJob } from "./types.js";

export interface BackendStatus {
  available: boolean;
  command: string;
  detail?: string;
}

export interface BackendReport {
  ffmpeg: BackendStatus;
  ffprobe: BackendStatus;
}

export interface AppDeps {
  cfg: ServiceConfig;
  pipeline: PipelineDeps;
  queue?: JobQueue;
  results?: ResultStore;
  checkBackends?: () => Promise<BackendReport>;
}

const TranscribeSchema = z.object({
  inputPath: z.string().min(1),
  modelDir: z.string().min(1).optional(),
  outputPath: z.string().min(1).optional(),
  chunkSizeBytes: ChunkSizeSchema.optional(),
});

type TranscribeBody = z.infer<typeof TranscribeSchema>;

function newJobId(): string {
  return crypto.randomUUID();
}

export function defaultOutputPath(cfg: ServiceConfig, inputPath: string): string {
  const base = path.basename(inputPath, path.extname(inputPath)) || "transcript";
  return path.join(cfg.outputDir, `${base}.txt`);
}

function jobFromBody(cfg: ServiceConfig, body: TranscribeBody): TranscriptionJob | string {
  const modelDirPath = body.modelDir || cfg.modelDir;
  if (!modelDirPath) {
    return "modelDir is required (no MODEL_DIR configured)";
  }
  return createJob({
    inputPath: path.resolve(body.inputPath),
    modelDirPath: path.resolve(modelDirPath),
    outputPath: path.resolve(body.outputPath || defaultOutputPath(cfg, body.inputPath)),
    chunkSizeBytes: body.chunkSizeBytes ?? cfg.chunkSizeBytes,
  });
}

async function* toNdjson(events: AsyncIterable<ProgressEvent>, onEnd: () => void): AsyncGenerator<string> {
  try {
    for await (const event of events) {
      yield `${JSON.stringify(event)}\n`;
    }
  } finally {
    onEnd();
  }
}

export function buildApp(deps: AppDeps) {
  const { cfg } = deps;
  const app = Fastify({ logger: rootLogger.child({ subsystem: "http" }) });

  // The engine holds one model for one job; in-process streams take turns
  let streamBusy = false;

  app.addHook("preHandler", async (request, reply) => {
    if (!cfg.apiKey || !request.url.startsWith("/v1/")) return;
    const apiKey = request.headers["x-api-key"];
    if (!apiKey || apiKey !== cfg.apiKey) {
      return reply.code(401).send({ error: "Unauthorized: Invalid or missing API key" });
    }
  });

  app.post("/v1/transcripts/stream", async (req, reply) => {
    const parsed = TranscribeSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const job = jobFromBody(cfg, parsed.data);
    if (typeof job === "string") {
      return reply.code(400).send({ error: job });
    }
    if (streamBusy) {
      return reply.code(409).send({ error: "A transcription is already running" });
    }

    streamBusy = true;
    let released = false;
    const release = () => {
      if (released) return;
      released = true;
      streamBusy = false;
    };

    req.log.info({ inputPath: job.inputPath }, "streaming transcription");
    const body = Readable.from(toNdjson(runTranscription(job, deps.pipeline), release));
    // Fires after the generator has returned, or when it was never started
    body.on("close", release);
    return reply.type("application/x-ndjson").send(body);
  });

  app.post("/v1/async/transcripts", async (req, reply) => {
    if (!deps.queue) {
      return reply.code(503).send({ error: "Job queue not configured" });
    }
    const parsed = TranscribeSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const job = jobFromBody(cfg, parsed.data);
    if (typeof job === "string") {
      return reply.code(400).send({ error: job });
    }

    const jobId = newJobId();
    await deps.queue.enqueue({ jobId, job });

    return reply.code(202).send({
      jobId,
      message: "Job accepted for processing.",
      statusUrl: `http://${req.hostname}/v1/async/transcripts/status/${jobId}`,
    });
  });

  app.get("/v1/async/transcripts/status/:jobId", async (req, reply) => {
    if (!deps.queue) {
      return reply.code(503).send({ error: "Job queue not configured" });
    }
    const { jobId } = z.object({ jobId: z.string().min(1) }).parse(req.params);
    const status = await deps.queue.status(jobId);
    if (!status) {
      return reply.code(404).send({ error: "Job not found." });
    }
    const stored = deps.results ? await deps.results.load(jobId) : { result: null, error: null };

    return reply.code(200).send({
      jobId,
      state: status.state,
      progress: status.progress,
      result: stored.result,
      error: stored.error,
      timestamp: new Date(status.timestamp).toISOString(),
    });
  });

  app.get("/v1/backends", async (_req, reply) => {
    if (!deps.checkBackends) {
      return reply.code(503).send({ error: "Backend check not configured" });
    }
    return reply.send(await deps.checkBackends());
  });

  app.get("/healthz", async () => ({ ok: true }));

  app.setErrorHandler((err, req, reply) => {
    req.log.error({ err }, "request failed");
    return reply.code(err.statusCode ?? 500).send({ error: errorMessage(err) });
  });

  return app;
}
