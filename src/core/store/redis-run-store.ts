/**
 * RedisRunStore - run history persisted in Redis.
 *
 * Each run is one JSON value under `<prefix><runId>` with a TTL, so history
 * is shared across processes and expires on its own.
 */

import Redis from "ioredis";
import { z } from "zod";
import { RunRecord, RunStore, newestFirst } from "./run-store";
import { TradeAction } from "../models/market";

/**
 * The subset of the ioredis client this store uses.
 */
export interface RedisRunStoreClient {
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  get(key: string): Promise<string | null>;
  keys(pattern: string): Promise<string[]>;
}

export interface RedisRunStoreConfig {
  client: RedisRunStoreClient;
  /** Key prefix (default "stock-analyst:run:") */
  prefix?: string;
  /** Record TTL in seconds (default 24 hours) */
  ttlSeconds?: number;
}

const RunRecordSchema = z.object({
  runId: z.string(),
  symbol: z.string(),
  market: z.string(),
  status: z.enum(["completed", "failed", "cancelled"]),
  stage: z.string().nullable(),
  errorCode: z
    .enum([
      "CAPABILITY_UNAVAILABLE",
      "INVALID_INPUT",
      "STAGE_CONTRACT_VIOLATION",
      "STAGE_EXECUTION_FAILED",
      "PIPELINE_CONFIGURATION",
    ])
    .nullable(),
  errorMessage: z.string().nullable(),
  action: z.nativeEnum(TradeAction).nullable(),
  startedAt: z.string(),
  finishedAt: z.string(),
});

/**
 * Create an ioredis client with the connection policy used across the app.
 */
export function createRedisClient(redisUrl: string): Redis {
  console.log("[Redis] Connecting to Redis...");
  const client = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => Math.min(times * 50, 2000),
  });

  client.on("connect", () => {
    console.log("[Redis] Connected successfully");
  });

  client.on("error", (err) => {
    console.error("[Redis] Connection error:", err);
  });

  return client;
}

export class RedisRunStore implements RunStore {
  private client: RedisRunStoreClient;
  private readonly prefix: string;
  private readonly ttlSeconds: number;

  constructor(config: RedisRunStoreConfig) {
    this.client = config.client;
    this.prefix = config.prefix ?? "stock-analyst:run:";
    this.ttlSeconds = config.ttlSeconds ?? 3600 * 24;
  }

  async save(record: RunRecord): Promise<void> {
    await this.client.setex(this.prefix + record.runId, this.ttlSeconds, JSON.stringify(record));
  }

  async get(runId: string): Promise<RunRecord | undefined> {
    const raw = await this.client.get(this.prefix + runId);
    return raw === null ? undefined : this.parse(runId, raw);
  }

  async list(limit?: number): Promise<RunRecord[]> {
    const sorted = newestFirst(await this.loadAll());
    return limit === undefined ? sorted : sorted.slice(0, limit);
  }

  async listBySymbol(symbol: string): Promise<RunRecord[]> {
    return newestFirst((await this.loadAll()).filter((r) => r.symbol === symbol));
  }

  private async loadAll(): Promise<RunRecord[]> {
    const keys = await this.client.keys(this.prefix + "*");
    const records: RunRecord[] = [];
    for (const key of keys) {
      const raw = await this.client.get(key);
      // Expired between KEYS and GET
      if (raw === null) continue;
      const record = this.parse(key.slice(this.prefix.length), raw);
      if (record) records.push(record);
    }
    return records;
  }

  private parse(runId: string, raw: string): RunRecord | undefined {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      console.warn(`[RedisRunStore] Ignoring unreadable record ${runId}:`, err);
      return undefined;
    }
    const parsed = RunRecordSchema.safeParse(data);
    if (!parsed.success) {
      console.warn(`[RedisRunStore] Ignoring malformed record ${runId}: ${parsed.error.message}`);
      return undefined;
    }
    return parsed.data;
  }
}
