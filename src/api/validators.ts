/**
 * Report Validators
 *
 * Required-field validation and normalization of caller-supplied incident
 * data. Validation is the only stage allowed to reject a report outright.
 */

import { VALIDATION } from '../config/defaults.js';
import type { ReportField } from '../types/schemas/config.js';
import type { Clock, ErrorReport, ErrorReportInput } from '../types/report.js';

/**
 * Validation result type
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Pluggable report validator.
 */
export type ReportValidator = (input: ErrorReportInput) => ValidationResult;

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  if (typeof value === 'string') {
    return value.trim().length === 0;
  }
  if (typeof value === 'number') {
    return Number.isNaN(value);
  }
  return false;
}

/**
 * Check that every required field is present and non-empty.
 *
 * Blank strings and NaN count as missing; the number 0 is present.
 */
export function validateRequiredFields(
  input: ErrorReportInput,
  requiredFields: readonly ReportField[] = VALIDATION.REQUIRED_FIELDS
): ValidationResult {
  const errors: string[] = [];

  for (const field of requiredFields) {
    if (isEmpty(input[field])) {
      errors.push(`Required field '${field}' is missing`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Build the default validator for a set of required fields.
 */
export function createRequiredFieldsValidator(
  requiredFields: readonly ReportField[] = VALIDATION.REQUIRED_FIELDS
): ReportValidator {
  return (input) => validateRequiredFields(input, requiredFields);
}

/**
 * Strip markup and collapse whitespace in a single-line text field.
 */
export function sanitizeText(value: string): string {
  return value
    .replace(/<[^>]*>/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Sanitize the text fields of raw input, leaving absent fields absent.
 *
 * Validation runs on this form so markup-only values count as empty.
 */
export function sanitizeInput(input: ErrorReportInput): ErrorReportInput {
  return {
    ...input,
    message: input.message === undefined ? undefined : sanitizeText(input.message),
    code: typeof input.code === 'string' ? sanitizeText(input.code) : input.code,
    file: input.file === undefined ? undefined : input.file.trim(),
  };
}

/**
 * Normalize validated input into an ErrorReport.
 *
 * Fields left out by a custom validator fall back to neutral values so the
 * rest of the pipeline always sees the full shape.
 */
export function normalizeReport(input: ErrorReportInput, now: Clock): ErrorReport {
  const code = typeof input.code === 'string' ? sanitizeText(input.code) : input.code;

  return {
    message: sanitizeText(input.message ?? ''),
    code: code ?? '',
    file: (input.file ?? '').trim(),
    line: input.line ?? 0,
    stackTrace: input.stackTrace,
    timestamp:
      typeof input.timestamp === 'number' && Number.isFinite(input.timestamp) ? input.timestamp : now(),
    isCritical: input.isCritical === true,
    extra: input.extra ? { ...input.extra } : {},
  };
}
