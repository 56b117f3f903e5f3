/**
 * Reference data module exports.
 */

export * from './errors.js';
export * from './csvCommon.js';
export * from './ReferenceData.js';
