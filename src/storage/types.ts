/**
 * Storage contracts consumed by the duplicate filter and rate limiter.
 *
 * Both stores are shared, process-external state in production. Timestamps
 * and expiries are unix seconds.
 */

/**
 * Signature → last-reported time.
 */
export interface DedupStore {
  get(signature: string): Promise<number | undefined>;
  set(signature: string, reportedAt: number): Promise<void>;
  getAll(): Promise<Record<string, number>>;
  deleteAll(): Promise<void>;
  /** Swap the whole map in one batch */
  replaceAll(entries: Record<string, number>): Promise<void>;
}

/**
 * Integer counters with their own expiry.
 */
export interface RateCounterStore {
  /** Current value, 0 when absent or expired */
  get(key: string): Promise<number>;
  set(key: string, value: number, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** Expiry time, 0 when absent or expired */
  getExpiry(key: string): Promise<number>;
}
