/**
 * Logger Helpers
 *
 * Lazy evaluation of log context objects: the context is only built when
 * the level is enabled, so the report hot path does not allocate debug
 * context in production.
 */

import type { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param level - Log level
 * @param contextBuilder - Builds the context object (only called if logging)
 * @param message - Log message string
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ signature, age }), 'Duplicate lookup');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger) {
    return;
  }

  if (!logger.isLevelEnabled(level)) {
    return;
  }

  const context = contextBuilder();
  logger[level](context, message);
}
