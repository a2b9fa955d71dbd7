/**
 * Redis-backed stores
 *
 * Shares tracked signatures and rate counters across every process of a
 * deployment. Tracked signatures live in one hash; each rate counter is a
 * plain key carrying its own EX expiry, so an idle window resets itself.
 */

import { createClient } from 'redis';
import type { Logger } from 'pino';
import type { Clock } from '../types/report.js';
import type { DedupStore, RateCounterStore } from './types.js';

export type RedisClient = ReturnType<typeof createClient>;

/**
 * The handful of commands the stores issue, with replies normalized to
 * strings and numbers.
 */
export interface RedisCommandClient {
  hGet(key: string, field: string): Promise<string | null>;
  hSet(key: string, field: string, value: string): Promise<void>;
  hGetAll(key: string): Promise<Record<string, string>>;
  del(key: string): Promise<void>;
  /** DEL then HSET in one MULTI; an empty map only deletes */
  replaceHash(key: string, values: Record<string, string>): Promise<void>;
  get(key: string): Promise<string | null>;
  setEx(key: string, value: string, ttlSeconds: number): Promise<void>;
  /** Seconds to live; negative when the key is missing or has no expiry */
  ttl(key: string): Promise<number>;
}

/**
 * Adapt a node-redis client to the command surface the stores use.
 */
export function createRedisCommandClient(client: RedisClient): RedisCommandClient {
  return {
    async hGet(key, field) {
      const value = await client.hGet(key, field);
      return value == null ? null : String(value);
    },
    async hSet(key, field, value) {
      await client.hSet(key, field, value);
    },
    async hGetAll(key) {
      const raw = await client.hGetAll(key);
      const result: Record<string, string> = {};
      for (const [field, value] of Object.entries(raw)) {
        result[field] = String(value);
      }
      return result;
    },
    async del(key) {
      await client.del(key);
    },
    async replaceHash(key, values) {
      const transaction = client.multi().del(key);
      if (Object.keys(values).length > 0) {
        transaction.hSet(key, values);
      }
      await transaction.exec();
    },
    async get(key) {
      const value = await client.get(key);
      return value == null ? null : String(value);
    },
    async setEx(key, value, ttlSeconds) {
      await client.setEx(key, ttlSeconds, value);
    },
    async ttl(key) {
      return Number(await client.ttl(key));
    },
  };
}

/**
 * Create and connect a node-redis client.
 *
 * Connection errors after startup are logged; the stores surface command
 * failures to their callers, which degrade to permissive defaults.
 */
export async function connectRedis(url: string, logger?: Logger): Promise<RedisClient> {
  const client = createClient({ url });

  client.on('error', (error: unknown) => {
    logger?.warn({ err: error }, 'Redis client error');
  });

  await client.connect();
  logger?.info({ url }, 'Redis connected');
  return client;
}

function parseInteger(raw: string | null): number | undefined {
  if (raw === null) {
    return undefined;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

export class RedisDedupStore implements DedupStore {
  private readonly hashKey: string;

  constructor(
    private readonly redis: RedisCommandClient,
    options: { keyPrefix?: string } = {}
  ) {
    this.hashKey = `${options.keyPrefix ?? 'faultline'}:tracked_errors`;
  }

  public async get(signature: string): Promise<number | undefined> {
    return parseInteger(await this.redis.hGet(this.hashKey, signature));
  }

  public async set(signature: string, reportedAt: number): Promise<void> {
    await this.redis.hSet(this.hashKey, signature, String(reportedAt));
  }

  public async getAll(): Promise<Record<string, number>> {
    const raw = await this.redis.hGetAll(this.hashKey);
    const entries: Record<string, number> = {};

    for (const [signature, value] of Object.entries(raw)) {
      const reportedAt = parseInteger(value);
      if (reportedAt !== undefined) {
        entries[signature] = reportedAt;
      }
    }

    return entries;
  }

  public async deleteAll(): Promise<void> {
    await this.redis.del(this.hashKey);
  }

  public async replaceAll(entries: Record<string, number>): Promise<void> {
    const values: Record<string, string> = {};
    for (const [signature, reportedAt] of Object.entries(entries)) {
      values[signature] = String(reportedAt);
    }
    await this.redis.replaceHash(this.hashKey, values);
  }
}

export class RedisRateCounterStore implements RateCounterStore {
  private readonly keyPrefix: string;
  private readonly now: Clock;

  constructor(
    private readonly redis: RedisCommandClient,
    options: { keyPrefix?: string; now?: Clock } = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? 'faultline';
    this.now = options.now ?? (() => Date.now());
  }

  public async get(key: string): Promise<number> {
    const value = parseInteger(await this.redis.get(this.redisKey(key)));
    return value !== undefined && value > 0 ? value : 0;
  }

  public async set(key: string, value: number, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) {
      await this.redis.del(this.redisKey(key));
      return;
    }
    await this.redis.setEx(this.redisKey(key), String(value), ttlSeconds);
  }

  public async delete(key: string): Promise<void> {
    await this.redis.del(this.redisKey(key));
  }

  public async getExpiry(key: string): Promise<number> {
    const ttl = await this.redis.ttl(this.redisKey(key));
    if (ttl <= 0) {
      return 0;
    }
    return Math.floor(this.now() / 1000) + ttl;
  }

  private redisKey(key: string): string {
    return `${this.keyPrefix}:${key}`;
  }
}
