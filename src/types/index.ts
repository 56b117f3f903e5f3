/**
 * Type exports for travel-records.
 */

export * from './common.js';
export * from './records.js';
