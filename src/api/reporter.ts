import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { pino } from 'pino';
import type { ReporterEvents } from './events.js';
import { createRequiredFieldsValidator, type ReportValidator } from './validators.js';
import {
  initializeConfig,
  resolveLogLevel,
  toReporterOptions,
  type Config,
  type ConfigEnvironment,
} from '../config/loader.js';
import type { DeliverySink } from '../core/delivery-sink.js';
import { DuplicateFilter } from '../core/duplicate-filter.js';
import {
  EnvironmentCollector,
  createDefaultProbes,
  type EnvironmentProbe,
} from '../core/environment-collector.js';
import { LogTailReader } from '../core/log-tail-reader.js';
import { RateLimiter } from '../core/rate-limiter.js';
import {
  ReportingPipeline,
  type PayloadTransform,
  type ReportPredicate,
} from '../core/reporting-pipeline.js';
import { MemoryDedupStore, MemoryRateCounterStore } from '../storage/memory-store.js';
import type { DedupStore, RateCounterStore } from '../storage/types.js';
import type {
  Clock,
  ErrorReportInput,
  ReportOutcome,
  ReporterStats,
} from '../types/report.js';
import type { DegradationHandler } from '../utils/fail-safe.js';
import { parseTopFrame } from '../utils/stack-frames.js';

export interface ErrorReporterOptions {
  /** Where accepted reports go */
  sink: DeliverySink;

  /** Validated configuration; loaded from YAML when omitted */
  config?: Config;
  configPath?: string;
  environment?: ConfigEnvironment;

  /** Default: in-process stores */
  dedupStore?: DedupStore;
  rateCounterStore?: RateCounterStore;

  /** Default: createDefaultProbes() for the configured app */
  probes?: EnvironmentProbe[];

  /** Default: required-field check from config */
  validator?: ReportValidator;
  bypassDuplicate?: ReportPredicate;
  forceRateReset?: ReportPredicate;
  transformPayload?: PayloadTransform;

  now?: Clock;
}

interface ErrorReporterDependencies {
  logger?: Logger;
}

/**
 * Caller-facing entry point of the error reporting subsystem.
 *
 * Wires configuration, stores, probes and the delivery sink into a
 * ReportingPipeline and publishes every outcome as an event.
 *
 * @example
 * ```typescript
 * const reporter = createErrorReporter({ sink: mailer });
 * reporter.on('failed', ({ outcome }) => console.warn(outcome.error?.message));
 *
 * await reporter.report({ message: 'Fatal: null pointer', code: 500, file: 'app.ts', line: 10 });
 * ```
 */
export class ErrorReporter extends EventEmitter<ReporterEvents> {
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly now: Clock;
  private readonly duplicateFilter: DuplicateFilter;
  private readonly rateLimiter: RateLimiter;
  private readonly pipeline: ReportingPipeline;

  constructor(options: ErrorReporterOptions, dependencies: ErrorReporterDependencies = {}) {
    super();

    this.config = options.config ?? initializeConfig(options.configPath, options.environment);
    this.logger = dependencies.logger ?? pino({ level: resolveLogLevel(this.config) });
    this.now = options.now ?? (() => Date.now());

    const settings = toReporterOptions(this.config);
    const now = this.now;
    const logger = this.logger;
    const onDegraded: DegradationHandler = (error, operation) => {
      this.emit('degraded', { error, operation, timestamp: now() });
    };

    this.duplicateFilter = new DuplicateFilter({
      store: options.dedupStore ?? new MemoryDedupStore(),
      ttlSeconds: settings.dedup.ttlSeconds,
      maxTracked: settings.dedup.maxTracked,
      versionTag: settings.dedup.versionTag,
      now,
      logger,
      onDegraded,
    });

    this.rateLimiter = new RateLimiter({
      store: options.rateCounterStore ?? new MemoryRateCounterStore({ now }),
      tenantId: settings.rateLimit.tenantId,
      windowSeconds: settings.rateLimit.windowSeconds,
      maxPerWindow: settings.rateLimit.maxPerWindow,
      enabled: settings.rateLimit.enabled,
      keyPrefix: settings.rateLimit.keyPrefix,
      now,
      logger,
      onDegraded,
    });

    const environment = new EnvironmentCollector({
      probes: options.probes ?? createDefaultProbes(settings.app),
      logger,
      onDegraded,
    });

    const logTailReader = new LogTailReader({
      chunkBytes: settings.logTail.chunkBytes,
      maxBytes: settings.logTail.maxBytes,
      logger,
    });

    this.pipeline = new ReportingPipeline(
      {
        validator: options.validator ?? createRequiredFieldsValidator(settings.requiredFields),
        duplicateFilter: this.duplicateFilter,
        rateLimiter: this.rateLimiter,
        environment,
        sink: options.sink,
        logTailReader,
      },
      {
        site: settings.site,
        logTail: {
          enabled: settings.logTail.enabled,
          path: settings.logTail.path,
          lines: settings.logTail.lines,
        },
        bypassDuplicate: options.bypassDuplicate,
        forceRateReset: options.forceRateReset,
        transformPayload: options.transformPayload,
        now,
        logger,
        onDegraded,
      }
    );
  }

  /**
   * Report an incident.
   *
   * @returns true when the report was delivered or suppressed as a duplicate
   */
  public async report(data: ErrorReportInput): Promise<boolean> {
    const outcome = await this.process(data);
    return outcome.ok;
  }

  /**
   * Report an incident and return the full outcome.
   */
  public async process(data: ErrorReportInput): Promise<ReportOutcome> {
    const outcome = await this.pipeline.run(data);
    this.publish(outcome);
    return outcome;
  }

  /**
   * Report a thrown value.
   *
   * Message, code and location come from the error and its top stack frame.
   * `context` is attached under `extra.context`; its `file`, `line`, `code`
   * and `isCritical` keys override the derived values.
   */
  public async reportFromException(error: unknown, context: Record<string, unknown> = {}): Promise<boolean> {
    return this.report(this.fromException(error, context));
  }

  /**
   * Forget every tracked signature.
   */
  public async clearTrackedErrors(): Promise<boolean> {
    const cleared = await this.duplicateFilter.clearAll();
    this.logger.info({ cleared }, 'Tracked errors cleared');
    return cleared;
  }

  /**
   * Close the current rate window.
   */
  public async resetRateLimit(): Promise<boolean> {
    return this.rateLimiter.reset();
  }

  public async getStats(): Promise<ReporterStats> {
    this.duplicateFilter.resetCache();
    const [trackedErrors, rateLimitRemaining, windowExpires] = await Promise.all([
      this.duplicateFilter.getCount(),
      this.rateLimiter.getRemaining(),
      this.rateLimiter.getWindowExpires(),
    ]);

    return { trackedErrors, rateLimitRemaining, windowExpires };
  }

  public getConfig(): Config {
    return this.config;
  }

  private fromException(error: unknown, context: Record<string, unknown>): ErrorReportInput {
    let message: string;
    let code: string | number;
    let stackTrace: string | undefined;

    if (error instanceof Error) {
      message = error.message;
      code =
        'code' in error && (typeof error.code === 'string' || typeof error.code === 'number')
          ? error.code
          : error.name;
      stackTrace = error.stack;
    } else {
      message = typeof error === 'string' ? error : String(error);
      code = 'NonErrorThrown';
    }

    const location = parseTopFrame(stackTrace);

    return {
      message,
      code: typeof context.code === 'string' || typeof context.code === 'number' ? context.code : code,
      file: typeof context.file === 'string' ? context.file : location?.file,
      line: typeof context.line === 'number' ? context.line : location?.line,
      stackTrace,
      isCritical: typeof context.isCritical === 'boolean' ? context.isCritical : undefined,
      extra: { context },
    };
  }

  private publish(outcome: ReportOutcome): void {
    const event = { outcome, timestamp: this.now() };

    try {
      switch (outcome.state) {
        case 'delivered':
          this.emit('delivered', event);
          break;
        case 'skipped':
          this.emit('skipped', event);
          break;
        case 'rejected':
          this.emit('rejected', event);
          break;
        case 'failed':
          this.emit('failed', event);
          break;
      }
    } catch (listenerError) {
      this.logger.error({ state: outcome.state, err: listenerError }, 'Reporter event listener threw');
    }
  }
}

/**
 * Create a reporter with configuration loaded from YAML unless supplied.
 */
export function createErrorReporter(
  options: ErrorReporterOptions,
  dependencies: ErrorReporterDependencies = {}
): ErrorReporter {
  return new ErrorReporter(options, dependencies);
}
