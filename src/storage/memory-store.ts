/**
 * In-process stores.
 *
 * Default backend for single-process hosts and tests. Expiry is lazy: an
 * entry past its TTL is dropped the next time it is read, so no cleanup timer
 * keeps the process alive.
 */

import type { Clock } from '../types/report.js';
import type { DedupStore, RateCounterStore } from './types.js';

const systemClock: Clock = () => Date.now();

export class MemoryDedupStore implements DedupStore {
  private readonly entries = new Map<string, number>();

  public async get(signature: string): Promise<number | undefined> {
    return this.entries.get(signature);
  }

  public async set(signature: string, reportedAt: number): Promise<void> {
    this.entries.set(signature, reportedAt);
  }

  public async getAll(): Promise<Record<string, number>> {
    return Object.fromEntries(this.entries);
  }

  public async deleteAll(): Promise<void> {
    this.entries.clear();
  }

  public async replaceAll(entries: Record<string, number>): Promise<void> {
    this.entries.clear();
    for (const [signature, reportedAt] of Object.entries(entries)) {
      this.entries.set(signature, reportedAt);
    }
  }

  public get size(): number {
    return this.entries.size;
  }
}

interface CounterEntry {
  value: number;
  /** Unix seconds */
  expiresAt: number;
}

export class MemoryRateCounterStore implements RateCounterStore {
  private readonly counters = new Map<string, CounterEntry>();
  private readonly now: Clock;

  constructor(options: { now?: Clock } = {}) {
    this.now = options.now ?? systemClock;
  }

  public async get(key: string): Promise<number> {
    return this.live(key)?.value ?? 0;
  }

  public async set(key: string, value: number, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) {
      this.counters.delete(key);
      return;
    }

    this.counters.set(key, {
      value,
      expiresAt: this.nowSeconds() + ttlSeconds,
    });
  }

  public async delete(key: string): Promise<void> {
    this.counters.delete(key);
  }

  public async getExpiry(key: string): Promise<number> {
    return this.live(key)?.expiresAt ?? 0;
  }

  private live(key: string): CounterEntry | undefined {
    const entry = this.counters.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.nowSeconds() >= entry.expiresAt) {
      this.counters.delete(key);
      return undefined;
    }

    return entry;
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }
}
