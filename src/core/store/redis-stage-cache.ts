/**
 * RedisStageCache - StageCache persisted in Redis so entries survive across runs.
 *
 * Opt-in: the default cache is in-memory and run-scoped.
 */

import Redis from "ioredis";
import { z } from "zod";
import { CacheEntry, StageCache } from "./stage-cache";

/**
 * The Redis commands this cache relies on.
 */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  quit(): Promise<unknown>;
}

export interface RedisStageCacheOptions {
  /** Entry lifetime in seconds (default: 7 days) */
  ttlSeconds?: number;
  keyPrefix?: string;
}

const storedEntrySchema = z.object({
  key: z.string(),
  stageName: z.string(),
  output: z.string(),
  createdAt: z.string(),
});

type StoredEntry = z.infer<typeof storedEntrySchema>;

export class RedisStageCache implements StageCache {
  private readonly ttlSeconds: number;
  private readonly prefix: string;

  constructor(
    private readonly redis: RedisCacheClient,
    options: RedisStageCacheOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? 3600 * 24 * 7;
    this.prefix = options.keyPrefix ?? "stageline:";
  }

  async lookup(key: string): Promise<CacheEntry | undefined> {
    const raw = await this.redis.get(this.entryKey(key));
    return raw ? this.decode(raw) : undefined;
  }

  async store(key: string, stageName: string, output: string): Promise<CacheEntry> {
    const entry: CacheEntry = { key, stageName, output, createdAt: new Date() };
    const stored: StoredEntry = { ...entry, createdAt: entry.createdAt.toISOString() };
    await this.redis.setex(this.entryKey(key), this.ttlSeconds, JSON.stringify(stored));
    await this.redis.setex(this.latestKey(stageName), this.ttlSeconds, key);
    return entry;
  }

  async latestFor(stageName: string): Promise<CacheEntry | undefined> {
    const key = await this.redis.get(this.latestKey(stageName));
    return key ? this.lookup(key) : undefined;
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  private entryKey(key: string): string {
    return `${this.prefix}cache:${key}`;
  }

  private latestKey(stageName: string): string {
    return `${this.prefix}latest:${stageName}`;
  }

  private decode(raw: string): CacheEntry | undefined {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      console.warn(`[RedisStageCache] Discarding unreadable cache entry:`, err);
      return undefined;
    }
    const parsed = storedEntrySchema.safeParse(json);
    if (!parsed.success) {
      console.warn(`[RedisStageCache] Discarding malformed cache entry: ${parsed.error.message}`);
      return undefined;
    }
    return { ...parsed.data, createdAt: new Date(parsed.data.createdAt) };
  }
}

/**
 * Connect to Redis and wrap the client in a RedisStageCache.
 */
export function createRedisStageCache(
  redisUrl: string,
  options?: RedisStageCacheOptions
): RedisStageCache {
  console.log("[RedisStageCache] Connecting to Redis...");
  const client = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => Math.min(times * 50, 2000),
  });

  client.on("connect", () => {
    console.log("[RedisStageCache] Connected successfully");
  });

  client.on("error", (err) => {
    console.error("[RedisStageCache] Connection error:", err);
  });

  return new RedisStageCache(client, options);
}
