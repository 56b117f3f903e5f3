/**
 * Record Store module exports.
 */

export * from './types.js';
export * from './errors.js';
export * from './RecordCodec.js';
export * from './RecordFile.js';
export { RecordStoreImpl, createRecordStore } from './RecordStoreImpl.js';
export * from './views.js';
