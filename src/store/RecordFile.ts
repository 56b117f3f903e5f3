/**
 * RecordFile — Synchronous read and atomic rewrite of the record file.
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  unlinkSync,
  writeFileSync,
} from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { TravelRecord } from '../types/records.js';
import { parseRecords, serializeRecords, type DecodedRecords } from './RecordCodec.js';
import { PersistenceError } from './errors.js';

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read and decode the record file.
 *
 * @returns Decoded records, or null when the file does not exist
 * @throws PersistenceError when the file exists but cannot be read
 */
export function readRecordFile(filePath: string): DecodedRecords | null {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFileError(err)) {
      return null;
    }
    throw new PersistenceError('Failed to read records', filePath, err);
  }
  return parseRecords(content);
}

/**
 * Replace the record file with the given collection.
 *
 * Content goes to a temp file beside the target, is flushed to disk, and
 * is then renamed over the target, so readers never see a partial file.
 *
 * @throws PersistenceError when any step fails; the temp file is removed
 */
export function writeRecordFile(filePath: string, records: readonly TravelRecord[]): void {
  const tempPath = join(dirname(filePath), `.${basename(filePath)}.${randomUUID()}.tmp`);
  const content = serializeRecords(records);

  try {
    mkdirSync(dirname(filePath), { recursive: true });
    const fd = openSync(tempPath, 'w');
    try {
      writeFileSync(fd, content, 'utf-8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tempPath, filePath);
  } catch (err) {
    if (existsSync(tempPath)) {
      unlinkSync(tempPath);
    }
    throw new PersistenceError('Failed to write records', filePath, err);
  }
}
