/**
 * Duplicate Filter
 *
 * Suppresses repeat reports of the same underlying bug within a tracking
 * window. Reports are keyed by a short signature of their identity fields.
 *
 * Architecture:
 * - DedupStore maps signature → last-reported unix seconds
 * - The tracked map is loaded once per pipeline run and memoized until
 *   resetCache(); loading drops expired entries (read-path compaction)
 * - A write that pushes the map past maxTracked drops expired entries,
 *   then the oldest ones down to the low watermark, and rewrites the store
 *   in one batch; the next compaction is at least (cap - watermark) writes
 *   away
 * - Store failures fail open: a lookup error reports "not a duplicate"
 */

import type { Logger } from 'pino';
import { DEDUP } from '../config/defaults.js';
import type { DedupStore } from '../storage/types.js';
import type { Clock, SignatureFields } from '../types/report.js';
import { attempt, type DegradationHandler } from '../utils/fail-safe.js';
import { shortHash } from '../utils/hashing.js';
import { lazyLog } from '../utils/logger-helpers.js';

export interface DuplicateFilterOptions {
  store: DedupStore;

  /** Tracking window in seconds (default: 7 days) */
  ttlSeconds?: number;

  /** Tracked entries before a write compacts (default: 1000) */
  maxTracked?: number;

  /** Release tag joined into every signature */
  versionTag?: string;

  now?: Clock;
  logger?: Logger;
  onDegraded?: DegradationHandler;
}

/**
 * Deterministic signature of a report's identity fields.
 */
export function computeSignature(fields: SignatureFields, versionTag?: string): string {
  const components = [fields.message, fields.file, String(fields.line), String(fields.code)];
  if (versionTag) {
    components.push(versionTag);
  }
  return shortHash(components.join('|'), DEDUP.SIGNATURE_LENGTH);
}

export class DuplicateFilter {
  private readonly store: DedupStore;
  private readonly ttlSeconds: number;
  private readonly maxTracked: number;
  private readonly lowWatermark: number;
  private readonly versionTag?: string;
  private readonly now: Clock;
  private readonly logger?: Logger;
  private readonly onDegraded?: DegradationHandler;

  private cache: Map<string, number> | null = null;

  constructor(options: DuplicateFilterOptions) {
    this.store = options.store;
    this.ttlSeconds = options.ttlSeconds ?? DEDUP.TRACK_DURATION_SECONDS;
    this.maxTracked = options.maxTracked ?? DEDUP.MAX_TRACKED_ENTRIES;
    this.lowWatermark = Math.max(1, Math.floor(this.maxTracked * DEDUP.COMPACT_RATIO));
    this.versionTag = options.versionTag;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger;
    this.onDegraded = options.onDegraded;
  }

  public signature(fields: SignatureFields): string {
    return computeSignature(fields, this.versionTag);
  }

  /**
   * True when the report's signature was marked within the tracking window.
   */
  public async isDuplicate(fields: SignatureFields): Promise<boolean> {
    return attempt(
      async () => {
        const signature = this.signature(fields);
        const tracked = await this.load();
        const reportedAt = tracked.get(signature);

        if (reportedAt === undefined) {
          return false;
        }

        const age = this.nowSeconds() - reportedAt;
        lazyLog(this.logger, 'debug', () => ({ signature, age }), 'Tracked signature found');
        return age < this.ttlSeconds;
      },
      {
        operation: 'dedup.isDuplicate',
        code: 'StorageError',
        fallback: false,
        logger: this.logger,
        onDegraded: this.onDegraded,
      }
    );
  }

  /**
   * Record the report's signature as reported now.
   *
   * @returns false when the store could not be updated
   */
  public async markReported(fields: SignatureFields): Promise<boolean> {
    return attempt(
      async () => {
        const signature = this.signature(fields);
        const tracked = await this.load();
        const reportedAt = this.nowSeconds();

        tracked.set(signature, reportedAt);

        if (tracked.size > this.maxTracked) {
          this.dropExpired(tracked);
          this.evictOldest(tracked);
          await this.rewrite(tracked);
          this.logger?.info(
            { remaining: tracked.size, maxTracked: this.maxTracked },
            'Compacted tracked errors'
          );
        } else {
          await this.store.set(signature, reportedAt);
        }

        return true;
      },
      {
        operation: 'dedup.markReported',
        code: 'StorageError',
        fallback: false,
        logger: this.logger,
        onDegraded: this.onDegraded,
      }
    );
  }

  /**
   * Forget every tracked signature.
   */
  public async clearAll(): Promise<boolean> {
    this.cache = null;
    return attempt(
      async () => {
        await this.store.deleteAll();
        return true;
      },
      {
        operation: 'dedup.clearAll',
        code: 'StorageError',
        fallback: false,
        logger: this.logger,
        onDegraded: this.onDegraded,
      }
    );
  }

  /**
   * Number of live tracked signatures.
   */
  public async getCount(): Promise<number> {
    return attempt(async () => (await this.load()).size, {
      operation: 'dedup.getCount',
      code: 'StorageError',
      fallback: 0,
      logger: this.logger,
      onDegraded: this.onDegraded,
    });
  }

  /**
   * Drop the memoized map so the next call reloads from the store.
   */
  public resetCache(): void {
    this.cache = null;
  }

  private async load(): Promise<Map<string, number>> {
    if (this.cache) {
      return this.cache;
    }

    const stored = await this.store.getAll();
    const tracked = new Map<string, number>(Object.entries(stored));
    const before = tracked.size;

    this.dropExpired(tracked);

    if (tracked.size !== before) {
      await this.rewrite(tracked);
      lazyLog(
        this.logger,
        'debug',
        () => ({ dropped: before - tracked.size, remaining: tracked.size }),
        'Dropped expired tracked errors'
      );
    }

    this.cache = tracked;
    return tracked;
  }

  private dropExpired(tracked: Map<string, number>): void {
    const now = this.nowSeconds();
    for (const [signature, reportedAt] of tracked) {
      if (now - reportedAt >= this.ttlSeconds) {
        tracked.delete(signature);
      }
    }
  }

  /**
   * Evict the oldest live entries down to the low watermark.
   */
  private evictOldest(tracked: Map<string, number>): void {
    const excess = tracked.size - this.lowWatermark;
    if (excess <= 0) {
      return;
    }

    const oldest = [...tracked.entries()].sort((a, b) => a[1] - b[1]).slice(0, excess);
    for (const [signature] of oldest) {
      tracked.delete(signature);
    }

    this.logger?.warn(
      { evicted: excess, maxTracked: this.maxTracked, lowWatermark: this.lowWatermark },
      'Tracked errors at capacity, evicted oldest'
    );
  }

  private async rewrite(tracked: Map<string, number>): Promise<void> {
    await this.store.replaceAll(Object.fromEntries(tracked));
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }
}
