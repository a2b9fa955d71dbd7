/**
 * Stage boundary for degradable operations.
 *
 * Every call into a store, probe or sink goes through `attempt()`: a throw is
 * classified into a ReporterError, logged, handed to the degradation hook and
 * replaced by the caller's fallback value.
 */

import type { Logger } from 'pino';
import { toReporterError, type ReporterError, type ReporterErrorCode } from '../api/errors.js';

/**
 * Receives every error the reporter recovered from.
 */
export type DegradationHandler = (error: ReporterError, operation: string) => void;

export interface AttemptOptions<T> {
  /** Short operation label used in logs and events */
  operation: string;
  /** Classification for anything thrown */
  code: ReporterErrorCode;
  /** Value returned when the operation throws */
  fallback: T;
  logger?: Logger;
  onDegraded?: DegradationHandler;
}

export async function attempt<T>(
  fn: () => Promise<T> | T,
  options: AttemptOptions<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    const classified = toReporterError(error, options.code);
    options.logger?.warn(
      { operation: options.operation, code: classified.code, err: classified.message },
      'Reporter operation failed, continuing with fallback'
    );
    notifyDegraded(options.onDegraded, classified, options.operation, options.logger);
    return options.fallback;
  }
}

/**
 * Invoke the degradation hook without letting a listener break the pipeline.
 */
export function notifyDegraded(
  handler: DegradationHandler | undefined,
  error: ReporterError,
  operation: string,
  logger?: Logger
): void {
  if (!handler) {
    return;
  }

  try {
    handler(error, operation);
  } catch (listenerError) {
    logger?.error({ operation, err: listenerError }, 'Degradation listener threw');
  }
}
