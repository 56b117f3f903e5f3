/**
 * Handler exports for the API layer.
 */

export * from './RecordHandlers.js';
export * from './ReferenceHandlers.js';
