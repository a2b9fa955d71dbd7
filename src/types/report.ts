/**
 * Error Report Types
 *
 * Shapes flowing through the reporting pipeline: the caller's incident data,
 * the payload handed to the delivery sink, and the outcome returned to the
 * caller.
 */

import type { ReporterError } from '../api/errors.js';

/**
 * Coarse triage bucket derived from error code and message.
 */
export type Severity = 'high' | 'medium' | 'low';

/**
 * Incident data supplied by the caller.
 *
 * Identity fields are optional at the type level because validation is the
 * pipeline's job; a report missing any required field is rejected.
 */
export interface ErrorReportInput {
  message?: string;
  code?: string | number;
  file?: string;
  line?: number;
  stackTrace?: string;
  /** Epoch milliseconds; defaults to the reporter clock */
  timestamp?: number;
  /** Bypass duplicate suppression and rate limiting (default predicates) */
  isCritical?: boolean;
  /** Free-form fields carried through to the payload */
  extra?: Record<string, unknown>;
}

/**
 * Normalized report after sanitization.
 */
export interface ErrorReport {
  message: string;
  code: string | number;
  file: string;
  line: number;
  stackTrace?: string;
  timestamp: number;
  isCritical: boolean;
  extra: Record<string, unknown>;
}

/**
 * Identity fields a signature is computed from.
 */
export type SignatureFields = Pick<ErrorReport, 'message' | 'file' | 'line' | 'code'>;

/**
 * Context map produced by the environment collector.
 */
export type EnvironmentSnapshot = Record<string, unknown>;

/**
 * Payload accepted by the delivery sink.
 */
export interface ReportPayload {
  errorMessage: string;
  errorCode: string | number;
  errorFile: string;
  relativeFilePath: string;
  errorLine: number;
  severity: Severity;
  referenceId: string;
  signature: string;
  /** ISO-8601 time of the incident */
  timestamp: string;
  siteId: string;
  siteUrl?: string;
  stackTrace?: string;
  environment: EnvironmentSnapshot;
  /** Debug log tail, lines joined by "\n" (empty when unavailable) */
  logTail: string;
  extra: Record<string, unknown>;
}

/**
 * Pipeline states. The last four are terminal.
 */
export type PipelineState =
  | 'received'
  | 'validated'
  | 'dedup_checked'
  | 'rate_checked'
  | 'enriched'
  | 'delivered'
  | 'skipped'
  | 'rejected'
  | 'failed';

export type TerminalState = Extract<PipelineState, 'delivered' | 'skipped' | 'rejected' | 'failed'>;

export type RejectionReason = 'validation' | 'rate_limited';

/**
 * Result of one pipeline invocation.
 */
export interface ReportOutcome {
  state: TerminalState;
  /** True for delivered and skipped */
  ok: boolean;
  reason?: RejectionReason;
  error?: ReporterError;
  /** Validation messages (empty unless rejected for validation) */
  issues: string[];
  /** Every state visited, in order */
  trail: PipelineState[];
  signature?: string;
  referenceId?: string;
  severity?: Severity;
}

/**
 * Administrative statistics.
 */
export interface ReporterStats {
  trackedErrors: number;
  rateLimitRemaining: number;
  /** Unix seconds, 0 when no window is open */
  windowExpires: number;
}

/**
 * Clock returning epoch milliseconds.
 */
export type Clock = () => number;
