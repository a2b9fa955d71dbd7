/**
 * Reporter Event System
 *
 * Defines event types and payloads for the ErrorReporter class.
 */

import type { ReporterError } from './errors.js';
import type { ReportOutcome } from '../types/report.js';

/**
 * Event payload when the sink accepted a report
 */
export interface ReportDeliveredEvent {
  outcome: ReportOutcome;
  timestamp: number;
}

/**
 * Event payload when a duplicate was suppressed
 */
export interface ReportSkippedEvent {
  outcome: ReportOutcome;
  timestamp: number;
}

/**
 * Event payload when validation or the rate limit turned a report away
 */
export interface ReportRejectedEvent {
  outcome: ReportOutcome;
  timestamp: number;
}

/**
 * Event payload when delivery failed
 */
export interface ReportFailedEvent {
  outcome: ReportOutcome;
  timestamp: number;
}

/**
 * Event payload when a store, probe or hook failed and the pipeline
 * continued with a fallback
 */
export interface DegradedEvent {
  error: ReporterError;
  operation: string;
  timestamp: number;
}

/**
 * Map of all reporter events
 */
export interface ReporterEvents {
  'delivered': (event: ReportDeliveredEvent) => void;
  'skipped': (event: ReportSkippedEvent) => void;
  'rejected': (event: ReportRejectedEvent) => void;
  'failed': (event: ReportFailedEvent) => void;
  'degraded': (event: DegradedEvent) => void;
}

/**
 * Type-safe event emitter helpers
 */
export type ReporterEventName = keyof ReporterEvents;
export type ReporterEventHandler<T extends ReporterEventName> = ReporterEvents[T];
