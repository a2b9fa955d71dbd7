/**
 * In-process stand-ins for the reporter's collaborators.
 */

import { vi } from 'vitest';
import type { DeliverySink } from '../../src/core/delivery-sink.js';
import type { RedisCommandClient } from '../../src/storage/redis-store.js';
import type { DedupStore, RateCounterStore } from '../../src/storage/types.js';
import type { ReportPayload } from '../../src/types/report.js';

/** 2023-11-14T22:13:20.000Z */
export const START_MS = 1_700_000_000_000;
export const START_SECONDS = START_MS / 1000;

export interface FakeClock {
  now: () => number;
  advanceSeconds: (seconds: number) => void;
}

export function createClock(startMs: number = START_MS): FakeClock {
  let current = startMs;
  return {
    now: () => current,
    advanceSeconds: (seconds) => {
      current += seconds * 1000;
    },
  };
}

export function createSink(accept: boolean = true) {
  const sent: ReportPayload[] = [];
  const send = vi.fn(async (payload: ReportPayload): Promise<boolean> => {
    sent.push(payload);
    return accept;
  });
  const sink: DeliverySink = { send };
  return { sink, send, sent };
}

export class FailingDedupStore implements DedupStore {
  public async get(): Promise<number | undefined> {
    throw new Error('dedup store offline');
  }

  public async set(): Promise<void> {
    throw new Error('dedup store offline');
  }

  public async getAll(): Promise<Record<string, number>> {
    throw new Error('dedup store offline');
  }

  public async deleteAll(): Promise<void> {
    throw new Error('dedup store offline');
  }

  public async replaceAll(): Promise<void> {
    throw new Error('dedup store offline');
  }
}

export class FailingRateCounterStore implements RateCounterStore {
  public async get(): Promise<number> {
    throw new Error('rate store offline');
  }

  public async set(): Promise<void> {
    throw new Error('rate store offline');
  }

  public async delete(): Promise<void> {
    throw new Error('rate store offline');
  }

  public async getExpiry(): Promise<number> {
    throw new Error('rate store offline');
  }
}

/**
 * Map-backed Redis with clock-driven key expiry.
 */
export class FakeRedis implements RedisCommandClient {
  public readonly hashes = new Map<string, Map<string, string>>();
  public readonly strings = new Map<string, { value: string; expiresAtMs: number }>();

  constructor(private readonly now: () => number) {}

  public async hGet(key: string, field: string): Promise<string | null> {
    return this.hashes.get(key)?.get(field) ?? null;
  }

  public async hSet(key: string, field: string, value: string): Promise<void> {
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    hash.set(field, value);
    this.hashes.set(key, hash);
  }

  public async hGetAll(key: string): Promise<Record<string, string>> {
    return Object.fromEntries(this.hashes.get(key) ?? []);
  }

  public async del(key: string): Promise<void> {
    this.hashes.delete(key);
    this.strings.delete(key);
  }

  public async replaceHash(key: string, values: Record<string, string>): Promise<void> {
    this.hashes.delete(key);
    if (Object.keys(values).length > 0) {
      this.hashes.set(key, new Map(Object.entries(values)));
    }
  }

  public async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  public async setEx(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.strings.set(key, { value, expiresAtMs: this.now() + ttlSeconds * 1000 });
  }

  public async ttl(key: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) {
      return -2;
    }
    return Math.ceil((entry.expiresAtMs - this.now()) / 1000);
  }

  private live(key: string): { value: string; expiresAtMs: number } | undefined {
    const entry = this.strings.get(key);
    if (entry && entry.expiresAtMs <= this.now()) {
      this.strings.delete(key);
      return undefined;
    }
    return entry;
  }
}
