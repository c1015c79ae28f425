import { mkdir, rm } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TARGET_AUDIO_SPEC } from "../constants.js";
import { TranscriptionEngine } from "../engine/session.js";
import { createJob } from "../pipeline/job.js";
import { DefaultFormatProber } from "../pipeline/probe.js";
import type { PipelineDeps } from "../pipeline/orchestrator.js";
import { MemoryResultStore } from "../store/resultStore.js";
import type { QueuedJobData } from "../types.js";
import { FakeBackend } from "../../test/helpers/fakeBackend.js";
import { FakeConverter } from "../../test/helpers/fakeConverter.js";
import { makeModelDir, makePayload, makeTempDir, writeWav } from "../../test/helpers/wav.js";
import { createProcessor } from "./processor.js";

let dir: string;
let pipeline: PipelineDeps;

beforeEach(async () => {
  dir = await makeTempDir();
  await mkdir(path.join(dir, "tmp"));
  pipeline = {
    prober: new DefaultFormatProber("ffprobe-unused"),
    converter: new FakeConverter(path.join(dir, "tmp"), makePayload(4)),
    engine: new TranscriptionEngine(new FakeBackend([{ final: true, text: "queued words" }])),
  };
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function fakeJob(data: QueuedJobData) {
  const progress: unknown[] = [];
  return {
    progress,
    job: {
      data,
      updateProgress: vi.fn(async (value: unknown) => {
        progress.push(value);
      }),
    },
  };
}

describe("createProcessor", () => {
  it("reports progress, stores the result and calls the webhook", async () => {
    const input = await writeWav(dir, "speech.wav", makePayload(4), TARGET_AUDIO_SPEC);
    const results = new MemoryResultStore();
    const postWebhook = vi.fn(async (_url: string, _payload: unknown) => {});
    const processor = createProcessor({ pipeline, results, webhookUrl: "http://hooks.test/done", postWebhook });
    const { job, progress } = fakeJob({
      jobId: "job-1",
      job: createJob({ inputPath: input, modelDirPath: await makeModelDir(dir), outputPath: path.join(dir, "out.txt") }),
    });

    const terminal = await processor(job);

    expect(terminal).toEqual({ type: "done", transcript: "queued words" });
    expect(progress).toMatchObject([
      { type: "status", message: "probing input" },
      { type: "status", message: "loading model" },
      { type: "final", text: "queued words" },
      { type: "status", message: "progress", fraction: 1 },
      { type: "done", transcript: "queued words" },
    ]);
    expect(await results.load("job-1")).toEqual({ result: terminal, error: null });
    expect(postWebhook).toHaveBeenCalledWith("http://hooks.test/done", {
      jobId: "job-1",
      status: "completed",
      result: terminal,
    });
  });

  it("stores the error and fails the job when the pipeline fails", async () => {
    const input = await writeWav(dir, "speech.wav", makePayload(4), TARGET_AUDIO_SPEC);
    const results = new MemoryResultStore();
    const missingModel = path.join(dir, "missing-model");
    const processor = createProcessor({ pipeline, results });
    const { job } = fakeJob({
      jobId: "job-2",
      job: createJob({ inputPath: input, modelDirPath: missingModel, outputPath: path.join(dir, "out.txt") }),
    });

    await expect(processor(job)).rejects.toThrow(
      `engine.model_not_found: Model path is not a valid directory: ${missingModel}`
    );
    expect((await results.load("job-2")).error).toEqual({
      type: "error",
      kind: "engine.model_not_found",
      message: `Model path is not a valid directory: ${missingModel}`,
    });
  });

  it("does not fail the job when the webhook is unreachable", async () => {
    const input = await writeWav(dir, "speech.wav", makePayload(4), TARGET_AUDIO_SPEC);
    const processor = createProcessor({
      pipeline,
      results: new MemoryResultStore(),
      webhookUrl: "http://hooks.test/down",
      postWebhook: async () => {
        throw new Error("connect ECONNREFUSED");
      },
    });
    const { job } = fakeJob({
      jobId: "job-3",
      job: createJob({ inputPath: input, modelDirPath: await makeModelDir(dir), outputPath: path.join(dir, "out.txt") }),
    });

    await expect(processor(job)).resolves.toEqual({ type: "done", transcript: "queued words" });
  });
});
