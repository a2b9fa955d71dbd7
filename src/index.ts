export { ErrorReporter, createErrorReporter, type ErrorReporterOptions } from './api/reporter.js';
export {
  ReporterError,
  toReporterError,
  isReporterError,
  createValidationError,
  createRateLimitedError,
  type ReporterErrorCode,
  type ReporterErrorShape,
} from './api/errors.js';
export * from './api/validators.js';
export type * from './api/events.js';

export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  resolveLogLevel,
  toReporterOptions,
  getDefaultConfigPath,
  type Config,
  type ConfigEnvironment,
  type ReporterComponentOptions,
} from './config/loader.js';

export { LogTailReader, type LogTailReaderOptions, type LogTailReadStats } from './core/log-tail-reader.js';
export { DuplicateFilter, computeSignature, type DuplicateFilterOptions } from './core/duplicate-filter.js';
export { RateLimiter, rateKeyFor, type RateLimiterOptions } from './core/rate-limiter.js';
export {
  EnvironmentCollector,
  createDefaultProbes,
  type EnvironmentProbe,
  type EnvironmentCollectorOptions,
  type AppFacts,
} from './core/environment-collector.js';
export {
  ReportingPipeline,
  relativeFilePath,
  createReferenceId,
  type ReportingPipelineDependencies,
  type ReportingPipelineOptions,
  type ReportPredicate,
  type PayloadTransform,
} from './core/reporting-pipeline.js';
export { classifySeverity } from './core/severity.js';
export type { DeliverySink } from './core/delivery-sink.js';

export { MemoryDedupStore, MemoryRateCounterStore } from './storage/memory-store.js';
export {
  RedisDedupStore,
  RedisRateCounterStore,
  createRedisCommandClient,
  connectRedis,
  type RedisClient,
  type RedisCommandClient,
} from './storage/redis-store.js';
export type { DedupStore, RateCounterStore } from './storage/types.js';

export { attempt, type DegradationHandler, type AttemptOptions } from './utils/fail-safe.js';
export { parseTopFrame, type StackLocation } from './utils/stack-frames.js';

export type * from './types/report.js';
export type { ReporterConfig, ReportField } from './types/schemas/config.js';
