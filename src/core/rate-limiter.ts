/**
 * Rate Limiter
 *
 * Fixed-window counter capping reports per tenant, independent of how many
 * distinct bugs are firing.
 *
 * The counter lives in a RateCounterStore entry whose TTL equals the window,
 * so an idle window expires on its own. Later increments keep the window's
 * original expiry. Bursts of up to twice the cap across a window boundary
 * are accepted.
 */

import type { Logger } from 'pino';
import { RATE_LIMIT } from '../config/defaults.js';
import type { RateCounterStore } from '../storage/types.js';
import type { Clock } from '../types/report.js';
import { attempt, type DegradationHandler } from '../utils/fail-safe.js';
import { shortHash } from '../utils/hashing.js';

export interface RateLimiterOptions {
  store: RateCounterStore;

  /** Tenant the counter is scoped to (e.g. site id) */
  tenantId: string;

  /** Window length in seconds (default: 600) */
  windowSeconds?: number;

  /** Reports admitted per window (default: 5) */
  maxPerWindow?: number;

  /** When false, canSend() always admits */
  enabled?: boolean;

  keyPrefix?: string;
  now?: Clock;
  logger?: Logger;
  onDegraded?: DegradationHandler;
}

/**
 * Counter key for a tenant.
 */
export function rateKeyFor(tenantId: string, prefix: string = RATE_LIMIT.KEY_PREFIX): string {
  return `${prefix}_${shortHash(tenantId, 12)}`;
}

export class RateLimiter {
  private readonly store: RateCounterStore;
  private readonly key: string;
  private readonly windowSeconds: number;
  private readonly maxPerWindow: number;
  private readonly enabled: boolean;
  private readonly now: Clock;
  private readonly logger?: Logger;
  private readonly onDegraded?: DegradationHandler;

  constructor(options: RateLimiterOptions) {
    this.store = options.store;
    this.key = rateKeyFor(options.tenantId, options.keyPrefix);
    this.windowSeconds = options.windowSeconds ?? RATE_LIMIT.WINDOW_SECONDS;
    this.maxPerWindow = options.maxPerWindow ?? RATE_LIMIT.MAX_REPORTS_PER_WINDOW;
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger;
    this.onDegraded = options.onDegraded;
  }

  /**
   * Whether another report fits in the current window. Fails open.
   */
  public async canSend(): Promise<boolean> {
    if (!this.enabled) {
      return true;
    }

    return attempt(async () => (await this.currentCount()) < this.maxPerWindow, {
      operation: 'rate.canSend',
      code: 'StorageError',
      fallback: true,
      logger: this.logger,
      onDegraded: this.onDegraded,
    });
  }

  /**
   * Count one report against the current window.
   */
  public async increment(): Promise<void> {
    await attempt(
      async () => {
        const current = await this.currentCount();
        const expiresAt = await this.store.getExpiry(this.key);
        const remainingTtl = expiresAt - this.nowSeconds();

        // First report of a window opens it; later ones keep its expiry
        const ttl = current > 0 && remainingTtl > 0 ? remainingTtl : this.windowSeconds;
        await this.store.set(this.key, current + 1, ttl);
      },
      {
        operation: 'rate.increment',
        code: 'StorageError',
        fallback: undefined,
        logger: this.logger,
        onDegraded: this.onDegraded,
      }
    );
  }

  /**
   * Drop the current window entirely.
   */
  public async reset(): Promise<boolean> {
    return attempt(
      async () => {
        await this.store.delete(this.key);
        this.logger?.info({ key: this.key }, 'Rate limit window reset');
        return true;
      },
      {
        operation: 'rate.reset',
        code: 'StorageError',
        fallback: false,
        logger: this.logger,
        onDegraded: this.onDegraded,
      }
    );
  }

  /**
   * Reports still admitted in the current window.
   */
  public async getRemaining(): Promise<number> {
    return attempt(async () => Math.max(0, this.maxPerWindow - (await this.currentCount())), {
      operation: 'rate.getRemaining',
      code: 'StorageError',
      fallback: this.maxPerWindow,
      logger: this.logger,
      onDegraded: this.onDegraded,
    });
  }

  /**
   * Unix seconds when the current window ends, 0 when none is open.
   */
  public async getWindowExpires(): Promise<number> {
    return attempt(() => this.store.getExpiry(this.key), {
      operation: 'rate.getWindowExpires',
      code: 'StorageError',
      fallback: 0,
      logger: this.logger,
      onDegraded: this.onDegraded,
    });
  }

  public getKey(): string {
    return this.key;
  }

  private async currentCount(): Promise<number> {
    const value = await this.store.get(this.key);
    return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }
}
