import type { ReportPayload } from '../types/report.js';

/**
 * Final destination of a report (mailer, webhook, ticketing client).
 *
 * The sink owns rendering and transport, including any retry policy, and
 * answers only whether the report was accepted. Throwing counts as failure.
 */
export interface DeliverySink {
  send(payload: ReportPayload): Promise<boolean> | boolean;
}
