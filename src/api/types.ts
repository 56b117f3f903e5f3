/**
 * Types for the HTTP API layer.
 *
 * These types define request/response structures for the REST API.
 * They MUST NOT contain validation logic or business rules.
 */

import type { TravelRecord } from '../types/records.js';
import type { RecordView } from '../store/views.js';
import type { ValidationIssue } from '../types/common.js';

// ============================================================================
// Error Response
// ============================================================================

export type ApiErrorCode =
  | 'BAD_REQUEST'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'PERSISTENCE_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: ApiErrorCode;
  /** Human-readable message */
  message: string;
  /** Field issues for validation failures */
  details?: ValidationIssue[];
}

// ============================================================================
// Record Endpoints
// ============================================================================

/**
 * Request to create a record.
 */
export interface CreateRecordRequest {
  /** Record kind: Client, Airline or Flight */
  kind: string;
  /** Editable fields of the new record */
  fields: unknown;
}

/**
 * Request to update a record.
 */
export interface UpdateRecordRequest {
  /** Fields to merge over the record's current values */
  fields: unknown;
}

/**
 * Query parameters for listing records.
 */
export interface ListRecordsQuery {
  /** Record kind to list */
  kind?: string;
  /** Case-insensitive search text */
  q?: string;
}

/**
 * Response for a single record.
 */
export interface RecordResponse {
  record: RecordView;
}

/**
 * Response for listing records.
 */
export interface ListRecordsResponse {
  records: RecordView[];
  total: number;
}

/**
 * Response for deleting a record: the target first, then any
 * Flights removed with it.
 */
export interface DeleteRecordResponse {
  removed: TravelRecord[];
}

// ============================================================================
// Reference Endpoints
// ============================================================================

export interface ReferenceListResponse {
  values: string[];
  total: number;
}

// ============================================================================
// Health Check
// ============================================================================

/**
 * Health check response.
 */
export interface HealthResponse {
  /** Status */
  status: 'ok' | 'degraded' | 'error';
  /** Timestamp */
  timestamp: string;
  /** Component statuses */
  components: {
    records: { loaded: number; path: string };
    reference: { countries: number; cities: number };
  };
}
