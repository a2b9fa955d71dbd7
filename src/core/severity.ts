import type { Severity } from '../types/report.js';

function numericCode(code: string | number): number | undefined {
  if (typeof code === 'number') {
    return Number.isFinite(code) ? code : undefined;
  }
  const trimmed = code.trim();
  return /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
}

/**
 * Triage bucket for a report. Numeric codes decide first (≥500 high,
 * ≥400 medium); otherwise keywords in the message do.
 */
export function classifySeverity(code: string | number, message: string): Severity {
  const numeric = numericCode(code);
  if (numeric !== undefined) {
    if (numeric >= 500) return 'high';
    if (numeric >= 400) return 'medium';
  }

  const lower = message.toLowerCase();

  if (lower.includes('fatal') || lower.includes('critical')) {
    return 'high';
  }

  if (lower.includes('warning')) {
    return 'medium';
  }

  if (lower.includes('notice')) {
    return 'low';
  }

  return 'medium';
}
