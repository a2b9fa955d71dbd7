/**
 * Error Reporting Pipeline
 *
 * Sequences one report through
 *   received → validated → dedup_checked → rate_checked → enriched
 * and ends in exactly one of delivered, skipped, rejected or failed.
 *
 * Only validation may reject a report on its own merits. Every other
 * collaborator call degrades to a safe default (permissive gates,
 * placeholder data), and no exception escapes run().
 */

import type { Logger } from 'pino';
import {
  ReporterError,
  createRateLimitedError,
  createValidationError,
  toReporterError,
} from '../api/errors.js';
import { normalizeReport, sanitizeInput, type ReportValidator } from '../api/validators.js';
import { ENRICHMENT, LOG_TAIL } from '../config/defaults.js';
import type {
  Clock,
  ErrorReport,
  ErrorReportInput,
  PipelineState,
  RejectionReason,
  ReportOutcome,
  ReportPayload,
  Severity,
  TerminalState,
} from '../types/report.js';
import { attempt, type DegradationHandler } from '../utils/fail-safe.js';
import { shortHash } from '../utils/hashing.js';
import { lazyLog } from '../utils/logger-helpers.js';
import type { DeliverySink } from './delivery-sink.js';
import type { DuplicateFilter } from './duplicate-filter.js';
import type { EnvironmentCollector } from './environment-collector.js';
import type { LogTailReader } from './log-tail-reader.js';
import type { RateLimiter } from './rate-limiter.js';
import { classifySeverity } from './severity.js';

/**
 * Predicate deciding whether a report may skip a gate.
 */
export type ReportPredicate = (report: ErrorReport) => boolean;

/**
 * Last chance to rewrite the payload before delivery.
 */
export type PayloadTransform = (payload: ReportPayload, report: ErrorReport) => ReportPayload;

export interface ReportingPipelineDependencies {
  validator: ReportValidator;
  duplicateFilter: DuplicateFilter;
  rateLimiter: RateLimiter;
  environment: EnvironmentCollector;
  sink: DeliverySink;
  logTailReader?: LogTailReader;
}

export interface ReportingPipelineOptions {
  site: {
    id: string;
    url?: string;
    /** Prefix stripped from file paths in payloads */
    projectRoot?: string;
  };
  logTail?: {
    enabled: boolean;
    path?: string;
    lines?: number;
  };
  /** Default: report.isCritical */
  bypassDuplicate?: ReportPredicate;
  /** Default: report.isCritical */
  forceRateReset?: ReportPredicate;
  transformPayload?: PayloadTransform;
  now?: Clock;
  logger?: Logger;
  onDegraded?: DegradationHandler;
}

const isCritical: ReportPredicate = (report) => report.isCritical;

/**
 * File path relative to the project root, unchanged when outside it.
 */
export function relativeFilePath(file: string, projectRoot?: string): string {
  if (!projectRoot) {
    return file;
  }

  const root = projectRoot.replace(/[\\/]+$/, '');
  if (root.length > 0 && (file.startsWith(`${root}/`) || file.startsWith(`${root}\\`))) {
    return file.slice(root.length + 1);
  }

  return file;
}

/**
 * Short reference quoted between the report and the maintainer.
 */
export function createReferenceId(siteId: string, file: string, line: number, timestamp: number): string {
  return shortHash(`${siteId}|${file}|${line}|${timestamp}`, ENRICHMENT.REFERENCE_ID_LENGTH);
}

interface OutcomeDetails {
  reason?: RejectionReason;
  error?: ReporterError;
  issues?: string[];
  signature?: string;
  referenceId?: string;
  severity?: Severity;
}

export class ReportingPipeline {
  private readonly deps: ReportingPipelineDependencies;
  private readonly options: ReportingPipelineOptions;
  private readonly bypassDuplicate: ReportPredicate;
  private readonly forceRateReset: ReportPredicate;
  private readonly now: Clock;
  private readonly logger?: Logger;

  constructor(deps: ReportingPipelineDependencies, options: ReportingPipelineOptions) {
    this.deps = deps;
    this.options = options;
    this.bypassDuplicate = options.bypassDuplicate ?? isCritical;
    this.forceRateReset = options.forceRateReset ?? isCritical;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger;
  }

  /**
   * Process one incident. Never throws.
   */
  public async run(input: ErrorReportInput): Promise<ReportOutcome> {
    const trail: PipelineState[] = ['received'];

    // Memoized lookups are valid for a single run only
    this.deps.duplicateFilter.resetCache();
    this.deps.environment.reset();

    try {
      return await this.advance(input, trail);
    } catch (error) {
      const classified = toReporterError(error);
      this.logger?.error({ err: classified.message, trail }, 'Error reporting pipeline crashed');
      return this.finish('failed', trail, { error: classified });
    }
  }

  private async advance(input: ErrorReportInput, trail: PipelineState[]): Promise<ReportOutcome> {
    // received → validated
    const sanitized = sanitizeInput(input);
    const validation = this.validate(sanitized);
    if (!validation.valid) {
      lazyLog(this.logger, 'debug', () => ({ issues: validation.errors }), 'Report rejected by validation');
      return this.finish('rejected', trail, {
        reason: 'validation',
        error: createValidationError(validation.errors),
        issues: validation.errors,
      });
    }

    const report = normalizeReport(sanitized, this.now);
    const signature = this.deps.duplicateFilter.signature(report);
    trail.push('validated');

    // validated → dedup_checked
    const duplicate = await this.deps.duplicateFilter.isDuplicate(report);
    trail.push('dedup_checked');

    if (duplicate) {
      if (!this.bypassDuplicate(report)) {
        this.logger?.info({ signature, message: report.message }, 'Duplicate error skipped');
        return this.finish('skipped', trail, { signature });
      }
      lazyLog(this.logger, 'debug', () => ({ signature }), 'Duplicate check bypassed');
    }

    // dedup_checked → rate_checked
    const admitted = await this.deps.rateLimiter.canSend();
    if (!admitted) {
      if (!this.forceRateReset(report)) {
        const [remaining, windowExpires] = await Promise.all([
          this.deps.rateLimiter.getRemaining(),
          this.deps.rateLimiter.getWindowExpires(),
        ]);
        this.logger?.warn({ signature, windowExpires }, 'Error report rate limited');
        return this.finish('rejected', trail, {
          reason: 'rate_limited',
          error: createRateLimitedError(remaining, windowExpires),
          signature,
        });
      }

      await this.deps.rateLimiter.reset();
      this.logger?.info({ signature }, 'Rate limit reset for critical report');
    }
    trail.push('rate_checked');

    // rate_checked → enriched
    const payload = await this.enrich(report, signature);
    trail.push('enriched');

    const details: OutcomeDetails = {
      signature,
      referenceId: payload.referenceId,
      severity: payload.severity,
    };

    // enriched → delivered | failed
    const deliveryError = await this.deliver(payload);
    if (deliveryError) {
      this.logger?.warn(
        { signature, referenceId: payload.referenceId, err: deliveryError.message },
        'Error report failed to send'
      );
      return this.finish('failed', trail, { ...details, error: deliveryError });
    }

    await this.deps.duplicateFilter.markReported(report);
    await this.deps.rateLimiter.increment();

    this.logger?.info(
      { signature, referenceId: payload.referenceId, severity: payload.severity },
      'Error report sent successfully'
    );
    return this.finish('delivered', trail, details);
  }

  private validate(input: ErrorReportInput): { valid: boolean; errors: string[] } {
    try {
      return this.deps.validator(input);
    } catch (error) {
      return { valid: false, errors: [`Validator failed: ${toReporterError(error).message}`] };
    }
  }

  private async enrich(report: ErrorReport, signature: string): Promise<ReportPayload> {
    const { site } = this.options;
    const severity = classifySeverity(report.code, report.message);

    const environment = await this.deps.environment.collect();
    const logTail = await this.readLogTail();

    const payload: ReportPayload = {
      errorMessage: report.message,
      errorCode: report.code,
      errorFile: report.file,
      relativeFilePath: relativeFilePath(report.file, site.projectRoot),
      errorLine: report.line,
      severity,
      referenceId: createReferenceId(site.id, report.file, report.line, report.timestamp),
      signature,
      timestamp: new Date(report.timestamp).toISOString(),
      siteId: site.id,
      siteUrl: site.url,
      stackTrace: report.stackTrace,
      environment,
      logTail,
      extra: report.extra,
    };

    const transform = this.options.transformPayload;
    if (!transform) {
      return payload;
    }

    return attempt(() => transform(payload, report), {
      operation: 'payload.transform',
      code: 'UnknownError',
      fallback: payload,
      logger: this.logger,
      onDegraded: this.options.onDegraded,
    });
  }

  private async readLogTail(): Promise<string> {
    const config = this.options.logTail;
    const reader = this.deps.logTailReader;
    if (!config?.enabled || !config.path || !reader) {
      return '';
    }

    const path = config.path;
    return attempt(() => reader.readTail(path, config.lines ?? LOG_TAIL.LINES), {
      operation: 'logTail.read',
      code: 'StorageError',
      fallback: '',
      logger: this.logger,
      onDegraded: this.options.onDegraded,
    });
  }

  /**
   * Hand the payload to the sink.
   *
   * @returns the delivery error, or undefined when the sink accepted it
   */
  private async deliver(payload: ReportPayload): Promise<ReporterError | undefined> {
    try {
      const accepted = await this.deps.sink.send(payload);
      return accepted
        ? undefined
        : new ReporterError('DeliveryError', 'Delivery sink rejected the report', {
            referenceId: payload.referenceId,
          });
    } catch (error) {
      const cause = toReporterError(error, 'DeliveryError');
      return new ReporterError('DeliveryError', cause.message, {
        referenceId: payload.referenceId,
        ...cause.details,
      });
    }
  }

  private finish(state: TerminalState, trail: PipelineState[], details: OutcomeDetails = {}): ReportOutcome {
    trail.push(state);
    return {
      state,
      ok: state === 'delivered' || state === 'skipped',
      reason: details.reason,
      error: details.error,
      issues: details.issues ?? [],
      trail: [...trail],
      signature: details.signature,
      referenceId: details.referenceId,
      severity: details.severity,
    };
  }
}
