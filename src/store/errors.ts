/**
 * Typed failures raised by the Record Store.
 *
 * Validation and not-found failures are expected and never leave the
 * in-memory collection changed. Persistence failures wrap the underlying
 * file system error.
 */

import type { ValidationIssue } from '../types/common.js';

export type RecordStoreErrorCode = 'VALIDATION_ERROR' | 'NOT_FOUND' | 'PERSISTENCE_ERROR';

/**
 * Base class for store failures.
 */
export class RecordStoreError extends Error {
  readonly code: RecordStoreErrorCode;
  readonly statusCode: number;

  constructor(code: RecordStoreErrorCode, message: string, statusCode: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RecordStoreError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * A required field is missing or empty, a field is malformed, or a
 * Flight reference does not resolve.
 */
export class ValidationError extends RecordStoreError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
    super('VALIDATION_ERROR', `Validation failed: ${summary}`, 400);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * No record with the given identifier exists.
 */
export class NotFoundError extends RecordStoreError {
  readonly recordId: number;

  constructor(recordId: number) {
    super('NOT_FOUND', `Record not found: ${recordId}`, 404);
    this.name = 'NotFoundError';
    this.recordId = recordId;
  }
}

/**
 * The record file could not be read or written.
 */
export class PersistenceError extends RecordStoreError {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('PERSISTENCE_ERROR', `${message} (${filePath}): ${detail}`, 500, { cause });
    this.name = 'PersistenceError';
    this.filePath = filePath;
  }
}
