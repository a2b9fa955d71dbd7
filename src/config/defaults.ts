/**
 * Default Configuration Constants
 *
 * All tunable limits centralized here. The YAML config and constructor
 * options override these.
 */

/**
 * Duplicate Filter Configuration
 */
export const DEDUP = {
  /** Tracked signatures before a write triggers compaction */
  MAX_TRACKED_ENTRIES: 1_000,

  /** Share of the cap kept after a compaction */
  COMPACT_RATIO: 0.9,

  /** How long a reported signature suppresses repeats (s) */
  TRACK_DURATION_SECONDS: 604_800, // 7 days

  /** Hex characters kept from the signature digest */
  SIGNATURE_LENGTH: 16,
} as const;

/**
 * Rate Limiter Configuration
 */
export const RATE_LIMIT = {
  /** Fixed window length (s) */
  WINDOW_SECONDS: 600, // 10 minutes

  /** Reports admitted per window per tenant */
  MAX_REPORTS_PER_WINDOW: 5,

  /** Counter key prefix; the hashed tenant id is appended */
  KEY_PREFIX: 'error_report_rate',
} as const;

/**
 * Log Tail Configuration
 */
export const LOG_TAIL = {
  /** Lines attached to each report */
  LINES: 100,

  /** Bytes per backward read */
  CHUNK_BYTES: 8_192,

  /** Read ceiling per tail (bytes) */
  MAX_BYTES: 5_242_880, // 5MB
} as const;

/**
 * Report Validation
 */
export const VALIDATION = {
  REQUIRED_FIELDS: ['message', 'code', 'file', 'line'] as const,
} as const;

/**
 * Enrichment
 */
export const ENRICHMENT = {
  /** Hex characters in the reference id quoted to maintainers */
  REFERENCE_ID_LENGTH: 8,

  /** Placeholder prefix for environment facts whose probe failed */
  PROBE_PLACEHOLDER: 'unavailable',
} as const;
