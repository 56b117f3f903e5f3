/**
 * RecordStoreImpl — Implementation of RecordStore.
 *
 * This class owns:
 * - the authoritative in-memory collection (one list, all kinds)
 * - identifier assignment (one identifier space shared by all kinds)
 * - field validation (via recordSchemas) and Flight reference checks
 * - persistence after every mutation (via RecordFile)
 *
 * A mutation builds the next collection, writes it, and only then swaps
 * it in. A failed write leaves memory exactly as it was before the call.
 *
 * The highest id issued is kept in memory only, so ids are never reused
 * within one run. After a restart, the id of a deleted record can be
 * issued again unless a Flight still references it.
 *
 * Records handed out are copies; changing one does not touch the store.
 */

import type {
  AirlineRecord,
  ClientRecord,
  FlightRecord,
  RecordFields,
  RecordKind,
  RecordOfKind,
  ResolvedFlight,
  TravelRecord,
} from '../types/records.js';
import { RECORD_KINDS, isKind, isRecordKind } from '../types/records.js';
import type { ValidationIssue } from '../types/common.js';
import type { DeletePolicy, RecordInput, RecordStore, RecordStoreConfig } from './types.js';
import {
  airlineFieldsSchema,
  clientFieldsSchema,
  flightFieldsSchema,
  parseFields,
} from '../validation/recordSchemas.js';
import { readRecordFile, writeRecordFile } from './RecordFile.js';
import { NotFoundError, ValidationError } from './errors.js';

/**
 * Default configuration.
 */
const DEFAULT_CONFIG: Required<RecordStoreConfig> = {
  filePath: 'data/records.jsonl',
  onDelete: 'orphan',
};

function isFieldObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Current editable fields of a record.
 */
function editableFields(record: TravelRecord): Record<string, unknown> {
  switch (record.kind) {
    case 'Client': {
      const { id: _id, kind: _kind, ...fields } = record;
      return fields;
    }
    case 'Airline': {
      const { id: _id, kind: _kind, ...fields } = record;
      return fields;
    }
    case 'Flight': {
      const { id: _id, kind: _kind, ...fields } = record;
      return fields;
    }
  }
}

/**
 * RecordStoreImpl — Full implementation of RecordStore.
 */
export class RecordStoreImpl implements RecordStore {
  private readonly config: Required<RecordStoreConfig>;
  private records: TravelRecord[] = [];

  // Highest id handed out, loaded, or referenced by a loaded Flight
  private highestId = 0;

  constructor(config: RecordStoreConfig) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.load();
  }

  get filePath(): string {
    return this.config.filePath;
  }

  get deletePolicy(): DeletePolicy {
    return this.config.onDelete;
  }

  /**
   * Load the collection from disk. A missing file means an empty store.
   */
  private load(): void {
    const decoded = readRecordFile(this.config.filePath);
    if (!decoded) {
      this.records = [];
      return;
    }

    for (const line of decoded.skipped) {
      console.warn(`Skipping malformed record line ${line.lineNumber} in ${this.config.filePath}: ${line.error}`);
    }
    for (const line of decoded.renumbered) {
      const previous = line.previousId === null ? 'no ID' : `ID ${line.previousId}`;
      console.warn(`Record line ${line.lineNumber} in ${this.config.filePath} had ${previous}; loaded as ID ${line.id}`);
    }

    this.records = decoded.records;
    const referenced = this.ofKind('Flight').reduce(
      (max, flight) => Math.max(max, flight.clientId, flight.airlineId),
      0
    );
    this.highestId = Math.max(this.highestId, this.maxId(), referenced);
  }

  private maxId(): number {
    return this.records.reduce((max, record) => Math.max(max, record.id), 0);
  }

  private ofKind<K extends RecordKind>(kind: K): RecordOfKind<K>[] {
    return this.records.filter((record): record is RecordOfKind<K> => isKind(record, kind));
  }

  private nextId(): number {
    return Math.max(this.highestId, this.maxId()) + 1;
  }

  private find(id: number): TravelRecord | undefined {
    return this.records.find((record) => record.id === id);
  }

  /**
   * Write the next collection, then make it current.
   */
  private commit(next: TravelRecord[]): void {
    writeRecordFile(this.config.filePath, next);
    this.records = next;
  }

  /**
   * Validate fields for a kind and build the record.
   */
  private buildRecord(kind: RecordKind, id: number, fields: unknown): TravelRecord {
    switch (kind) {
      case 'Client':
        return { id, kind, ...parseFields(clientFieldsSchema, fields) };
      case 'Airline':
        return { id, kind, ...parseFields(airlineFieldsSchema, fields) };
      case 'Flight': {
        const parsed = parseFields(flightFieldsSchema, fields);
        this.checkReferences(parsed);
        return { id, kind, ...parsed };
      }
    }
  }

  /**
   * A Flight must reference an existing Client and an existing Airline.
   */
  private checkReferences(fields: RecordFields<'Flight'>): void {
    const issues: ValidationIssue[] = [];

    const client = this.find(fields.clientId);
    if (!client || client.kind !== 'Client') {
      issues.push({ path: 'clientId', message: `Client ${fields.clientId} does not exist` });
    }

    const airline = this.find(fields.airlineId);
    if (!airline || airline.kind !== 'Airline') {
      issues.push({ path: 'airlineId', message: `Airline ${fields.airlineId} does not exist` });
    }

    if (issues.length > 0) {
      throw new ValidationError(issues);
    }
  }

  private flightsReferencing(record: ClientRecord | AirlineRecord): FlightRecord[] {
    return this.ofKind('Flight').filter((flight) =>
      record.kind === 'Client' ? flight.clientId === record.id : flight.airlineId === record.id
    );
  }

  /**
   * Create a new record.
   */
  add<K extends RecordKind>(kind: K, fields: RecordInput<K>): RecordOfKind<K>;
  add(kind: string, fields: unknown): TravelRecord;
  add(kind: string, fields: unknown): TravelRecord {
    if (!isRecordKind(kind)) {
      throw new ValidationError([{ path: 'kind', message: `kind must be one of: ${RECORD_KINDS.join(', ')}` }]);
    }

    const id = this.nextId();
    const record = this.buildRecord(kind, id, fields);
    this.commit([...this.records, record]);
    this.highestId = id;
    return { ...record };
  }

  /**
   * Update an existing record.
   */
  update(id: number, fields: unknown): TravelRecord {
    const index = this.records.findIndex((record) => record.id === id);
    const existing = this.records[index];
    if (index < 0 || existing === undefined) {
      throw new NotFoundError(id);
    }

    if (!isFieldObject(fields)) {
      throw new ValidationError([{ path: '(root)', message: 'Fields must be an object' }]);
    }

    const identityIssues = (['id', 'kind'] as const)
      .filter((key) => key in fields)
      .map((key) => ({ path: key, message: `${key} cannot be changed` }));
    if (identityIssues.length > 0) {
      throw new ValidationError(identityIssues);
    }

    const updated = this.buildRecord(existing.kind, id, { ...editableFields(existing), ...fields });
    const next = [...this.records];
    next[index] = updated;
    this.commit(next);
    return { ...updated };
  }

  /**
   * Delete a record.
   */
  delete(id: number): TravelRecord[] {
    const target = this.find(id);
    if (!target) {
      throw new NotFoundError(id);
    }
    const dependents = target.kind === 'Flight' ? [] : this.flightsReferencing(target);

    if (dependents.length > 0 && this.config.onDelete === 'restrict') {
      const ids = dependents.map((flight) => flight.id).join(', ');
      throw new ValidationError([
        { path: 'id', message: `${target.kind} ${id} is referenced by flights: ${ids}` },
      ]);
    }

    const removed = this.config.onDelete === 'cascade' ? [target, ...dependents] : [target];
    const removedIds = new Set(removed.map((record) => record.id));
    this.commit(this.records.filter((record) => !removedIds.has(record.id)));
    return removed.map((record) => ({ ...record }));
  }

  /**
   * Get a record by ID.
   */
  get(id: number): TravelRecord {
    const record = this.find(id);
    if (!record) {
      throw new NotFoundError(id);
    }
    return { ...record };
  }

  /**
   * Check if a record exists.
   */
  exists(id: number): boolean {
    return this.find(id) !== undefined;
  }

  /**
   * List records of one kind.
   */
  list<K extends RecordKind>(kind: K): RecordOfKind<K>[] {
    return this.ofKind(kind).map((record) => ({ ...record }));
  }

  /**
   * Search records of one kind.
   */
  search<K extends RecordKind>(kind: K, query: string): RecordOfKind<K>[] {
    const records = this.list(kind);
    if (query.length === 0) {
      return records;
    }
    const needle = query.toLowerCase();
    return records.filter((record) =>
      this.searchableText(record).some((value) => value.toLowerCase().includes(needle))
    );
  }

  /**
   * Values a record can be found by: every field, including the kind tag.
   */
  private searchableText(record: TravelRecord): string[] {
    switch (record.kind) {
      case 'Client':
        return [
          String(record.id),
          record.kind,
          record.name,
          record.addressLine1,
          record.addressLine2,
          record.addressLine3,
          record.city,
          record.state,
          record.postalCode,
          record.country,
          record.phoneNumber,
        ];
      case 'Airline':
        return [String(record.id), record.kind, record.companyName];
      case 'Flight': {
        const { clientName, airlineName } = this.resolveFlight(record);
        return [
          String(record.id),
          record.kind,
          String(record.clientId),
          String(record.airlineId),
          record.date,
          record.origin,
          record.destination,
          clientName ?? '',
          airlineName ?? '',
        ];
      }
    }
  }

  /**
   * Join a flight with its client and airline names.
   */
  resolveFlight(flight: FlightRecord): ResolvedFlight {
    const client = this.find(flight.clientId);
    const airline = this.find(flight.airlineId);
    return {
      ...flight,
      clientName: client?.kind === 'Client' ? client.name : null,
      airlineName: airline?.kind === 'Airline' ? airline.companyName : null,
    };
  }

  /**
   * Count records.
   */
  count(kind?: RecordKind): number {
    return kind === undefined ? this.records.length : this.ofKind(kind).length;
  }

  /**
   * Re-read the record file.
   */
  reload(): void {
    this.load();
  }
}

/**
 * Create a new RecordStore instance.
 */
export function createRecordStore(config: RecordStoreConfig): RecordStoreImpl {
  return new RecordStoreImpl(config);
}
