/**
 * MCP response helpers.
 *
 * Tool results are JSON text. Store failures become error results whose
 * text starts with the error code.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { RecordStoreError, ValidationError } from '../store/errors.js';

/**
 * Create a JSON content result.
 */
export function jsonResult(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

/**
 * Create an error result.
 */
export function errorResult(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

/**
 * Render a thrown error as a tool error result. Validation failures list
 * one issue per line after the summary.
 */
export function storeErrorResult(err: unknown): CallToolResult {
  if (err instanceof ValidationError) {
    const issues = err.issues.map((issue) => `- ${issue.path}: ${issue.message}`).join('\n');
    return errorResult(`${err.code}: ${err.message}\n${issues}`);
  }
  if (err instanceof RecordStoreError) {
    return errorResult(`${err.code}: ${err.message}`);
  }
  return errorResult(`Tool error: ${err instanceof Error ? err.message : String(err)}`);
}
