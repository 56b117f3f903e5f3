/**
 * Validation module exports.
 */

export * from './recordSchemas.js';
