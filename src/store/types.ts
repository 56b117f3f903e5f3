/**
 * Types for Record Store.
 *
 * The Record Store owns:
 * - the in-memory collection of travel records
 * - field validation (via recordSchemas) and Flight reference checks
 * - persistence of the whole collection (via RecordFile)
 *
 * All operations are synchronous and run to completion before returning.
 */

import type {
  RecordKind,
  RecordOfKind,
  RecordFields,
  TravelRecord,
  FlightRecord,
  ResolvedFlight,
} from '../types/records.js';

/**
 * What happens to Flights when the Client or Airline they reference is
 * deleted.
 *
 * - orphan: Flights stay; their reference no longer resolves
 * - restrict: the delete fails with ValidationError
 * - cascade: the Flights are deleted too
 */
export type DeletePolicy = 'orphan' | 'restrict' | 'cascade';

export const DELETE_POLICIES: readonly DeletePolicy[] = ['orphan', 'restrict', 'cascade'];

/**
 * Field input accepted by `add`: the editable fields, with optional
 * text fields allowed to be omitted.
 */
export type RecordInput<K extends RecordKind> = K extends 'Client'
  ? Omit<RecordFields<'Client'>, 'addressLine2' | 'addressLine3' | 'state'> &
      Partial<Pick<RecordFields<'Client'>, 'addressLine2' | 'addressLine3' | 'state'>>
  : RecordFields<K>;

/**
 * RecordStore interface.
 */
export interface RecordStore {
  /**
   * Create a record of the given kind and persist the collection.
   * An unknown kind fails validation like a bad field does.
   * @throws ValidationError, PersistenceError
   */
  add<K extends RecordKind>(kind: K, fields: RecordInput<K>): RecordOfKind<K>;
  add(kind: string, fields: unknown): TravelRecord;

  /**
   * Merge `fields` over the record's current fields and persist.
   * The record keeps its id and kind.
   * @throws NotFoundError, ValidationError, PersistenceError
   */
  update(id: number, fields: unknown): TravelRecord;

  /**
   * Remove a record and persist. Returns every removed record, the
   * target first, followed by any Flights removed by a cascade.
   * @throws NotFoundError, ValidationError (restrict policy), PersistenceError
   */
  delete(id: number): TravelRecord[];

  /**
   * Get a record by id.
   * @throws NotFoundError
   */
  get(id: number): TravelRecord;

  /**
   * Check if a record exists.
   */
  exists(id: number): boolean;

  /**
   * Records of one kind in insertion order.
   */
  list<K extends RecordKind>(kind: K): RecordOfKind<K>[];

  /**
   * Records of one kind containing `query` (case-insensitive, not
   * trimmed) in any field, the kind tag included. Flights also match on
   * their resolved client and airline names. An empty query matches all.
   */
  search<K extends RecordKind>(kind: K, query: string): RecordOfKind<K>[];

  /**
   * Join a flight with the names of its client and airline.
   */
  resolveFlight(flight: FlightRecord): ResolvedFlight;

  /**
   * Number of records, of one kind or in total.
   */
  count(kind?: RecordKind): number;

  /**
   * Discard the in-memory collection and read the file again.
   * @throws PersistenceError
   */
  reload(): void;
}

/**
 * Configuration for RecordStore.
 */
export interface RecordStoreConfig {
  /** Path of the JSON lines record file */
  filePath: string;
  /** Delete policy for referenced Clients and Airlines (default: 'orphan') */
  onDelete?: DeletePolicy;
}
