/**
 * Error types
 *
 * Each error names the failure reason recorded in the batch error report.
 */

import type { FailureReason } from './types';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when a document cannot be split into sections at all.
 */
export class SegmentationError extends Error {
  readonly reason: FailureReason = 'parse_error';

  constructor(message: string, readonly sourceFile: string) {
    super(message);
    this.name = 'SegmentationError';
  }
}

export interface SchemaViolation {
  /** JSON pointer to the offending value */
  path: string;
  /** Name of the offending field */
  field: string;
  /** Schema keyword that failed (required, type, additionalProperties, ...) */
  constraint: string;
  message: string;
}

export class SchemaViolationError extends Error {
  readonly reason: FailureReason = 'schema_error';

  constructor(readonly violations: SchemaViolation[]) {
    super(
      `Schema validation failed (${violations.length} violation${violations.length === 1 ? '' : 's'})`
    );
    this.name = 'SchemaViolationError';
  }
}

export function formatViolation(violation: SchemaViolation): string {
  return `${violation.path || '/'}: ${violation.field} ${violation.message} [${violation.constraint}]`;
}
