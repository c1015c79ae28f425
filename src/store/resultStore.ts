import type { Redis } from "ioredis";
import type { TerminalEvent } from "../types.js";

const RESULT_TTL_SECONDS = 60 * 60 * 24;

export interface StoredOutcome {
  result: Extract<TerminalEvent, { type: "done" }> | null;
  error: Extract<TerminalEvent, { type: "error" }> | null;
}

/** Where finished runs leave their terminal event for status lookups. */
export interface ResultStore {
  save(jobId: string, event: TerminalEvent): Promise<void>;
  load(jobId: string): Promise<StoredOutcome>;
}

function keyFor(jobId: string, event: TerminalEvent["type"]): string {
  return event === "done" ? `job:${jobId}:result` : `job:${jobId}:error`;
}

function parseStored<T extends TerminalEvent["type"]>(
  raw: string | null,
  type: T
): Extract<TerminalEvent, { type: T }> | null {
  if (!raw) return null;
  const value: unknown = JSON.parse(raw);
  return isEventOfType(value, type) ? value : null;
}

function isEventOfType<T extends TerminalEvent["type"]>(
  value: unknown,
  type: T
): value is Extract<TerminalEvent, { type: T }> {
  return typeof value === "object" && value !== null && "type" in value && value.type === type;
}

export class RedisResultStore implements ResultStore {
  constructor(private readonly redis: Redis) {}

  async save(jobId: string, event: TerminalEvent): Promise<void> {
    await this.redis.set(keyFor(jobId, event.type), JSON.stringify(event), "EX", RESULT_TTL_SECONDS);
  }

  async load(jobId: string): Promise<StoredOutcome> {
    const [result, error] = await Promise.all([
      this.redis.get(keyFor(jobId, "done")),
      this.redis.get(keyFor(jobId, "error")),
    ]);
    return { result: parseStored(result, "done"), error: parseStored(error, "error") };
  }
}

export class MemoryResultStore implements ResultStore {
  private readonly entries = new Map<string, string>();

  async save(jobId: string, event: TerminalEvent): Promise<void> {
    this.entries.set(keyFor(jobId, event.type), JSON.stringify(event));
  }

  async load(jobId: string): Promise<StoredOutcome> {
    return {
      result: parseStored(this.entries.get(keyFor(jobId, "done")) ?? null, "done"),
      error: parseStored(this.entries.get(keyFor(jobId, "error")) ?? null, "error"),
    };
  }
}
