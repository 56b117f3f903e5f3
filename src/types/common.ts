/**
 * Common type definitions shared by the store, the API and the tools.
 */

/**
 * A single field-level validation failure.
 */
export interface ValidationIssue {
  /** Dotted path to the offending field (e.g., "name", "clientId") */
  path: string;
  /** Human-readable message */
  message: string;
}
