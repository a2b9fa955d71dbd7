/**
 * Reporter error utilities.
 *
 * Provides a consistent error type for every failure the pipeline classifies
 * and a helper to convert anything thrown by stores, probes or sinks into a
 * ReporterError instance callers can reason about.
 */

/**
 * Error codes surfaced on the outcome and the diagnostic channel.
 *
 * Only ValidationError is fatal to a report; every other code is a degraded
 * path the pipeline recovers from.
 */
export type ReporterErrorCode =
  | 'ValidationError'
  | 'DuplicateSkipped'
  | 'RateLimited'
  | 'StorageError'
  | 'DeliveryError'
  | 'ProbeError'
  | 'ConfigError'
  | 'UnknownError';

/**
 * Plain shape of a reporter error (for JSON logs and events).
 */
export interface ReporterErrorShape {
  code: ReporterErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class ReporterError extends Error implements ReporterErrorShape {
  public readonly code: ReporterErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ReporterErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ReporterError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape.
   */
  public toObject(): ReporterErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Map unknown errors into ReporterError instances.
 *
 * @param error - Anything thrown by a collaborator
 * @param fallbackCode - Code to use when the error is not already classified
 */
export function toReporterError(
  error: unknown,
  fallbackCode: ReporterErrorCode = 'UnknownError'
): ReporterError {
  if (error instanceof ReporterError) {
    return error;
  }

  if (error instanceof Error) {
    return new ReporterError(fallbackCode, error.message, { name: error.name });
  }

  if (typeof error === 'string' && error.length > 0) {
    return new ReporterError(fallbackCode, error);
  }

  return new ReporterError(fallbackCode, 'Unknown reporter error');
}

/**
 * Build the validation error for a rejected report.
 */
export function createValidationError(issues: string[]): ReporterError {
  return new ReporterError('ValidationError', `Invalid error data: ${issues.join(', ')}`, {
    issues,
  });
}

/**
 * Build the soft rejection for a report over the window limit.
 */
export function createRateLimitedError(remaining: number, windowExpires: number): ReporterError {
  return new ReporterError('RateLimited', 'Rate limit exceeded', {
    remaining,
    windowExpires,
  });
}

/**
 * Type guard for classified errors.
 */
export function isReporterError(error: unknown): error is ReporterError {
  return error instanceof ReporterError;
}
