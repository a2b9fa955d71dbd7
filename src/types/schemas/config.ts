/**
 * Reporter Configuration Schemas
 *
 * Zod schemas for validating reporter.yaml, with cross-field validation.
 *
 * @module schemas/config
 */

import { z } from 'zod';

/**
 * Fields a report may be required to carry.
 */
export const ReportFieldSchema = z.enum(['message', 'code', 'file', 'line', 'stackTrace']);

/**
 * Duplicate Filter Configuration
 */
export const DedupConfigSchema = z.object({
  max_tracked_entries: z.number().int().positive('Max tracked entries must be positive'),
  track_duration_seconds: z.number().int().positive('Track duration must be positive'),
  version_tag: z.string().min(1).nullable(),
});

/**
 * Rate Limiter Configuration
 */
export const RateLimitConfigSchema = z.object({
  enabled: z.boolean(),
  window_seconds: z.number().int().positive('Window must be positive'),
  max_reports_per_window: z.number().int().min(0, 'must be >= 0'),
  key_prefix: z.string().min(1, 'Key prefix cannot be empty'),
});

/**
 * Log Tail Configuration
 */
export const LogTailConfigSchema = z.object({
  enabled: z.boolean(),
  path: z.string().min(1).nullable(),
  lines: z.number().int().min(1, 'must be >= 1').max(1000, 'must be <= 1000'),
  chunk_bytes: z.number().int().min(4096, 'must be >= 4096').max(65536, 'must be <= 65536'),
  max_bytes: z.number().int().positive('Max bytes must be positive'),
}).refine(
  (data) => data.max_bytes >= data.chunk_bytes,
  {
    message: 'must be >= chunk_bytes',
    path: ['max_bytes'],
  }
);

/**
 * Validation Configuration
 */
export const ValidationConfigSchema = z.object({
  required_fields: z.array(ReportFieldSchema).min(1, 'At least one required field'),
});

/**
 * Site Configuration
 */
export const SiteConfigSchema = z.object({
  id: z.string().min(1, 'Site id cannot be empty'),
  url: z.string().url().nullable(),
  project_root: z.string().min(1).nullable(),
});

/**
 * Application facts reported in the environment snapshot
 */
export const AppConfigSchema = z.object({
  version: z.string().min(1),
  host_version: z.string().min(1).nullable(),
  integrations: z.array(z.string()),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
});

/**
 * Reporter Configuration Schema
 */
export const ReporterConfigSchema = z.object({
  dedup: DedupConfigSchema,
  rate_limit: RateLimitConfigSchema,
  log_tail: LogTailConfigSchema,
  validation: ValidationConfigSchema,
  site: SiteConfigSchema,
  app: AppConfigSchema,
  logging: LoggingConfigSchema,
});

/**
 * Type inference for ReporterConfig
 */
export type ReporterConfig = z.infer<typeof ReporterConfigSchema>;

export type ReportField = z.infer<typeof ReportFieldSchema>;
