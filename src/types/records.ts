/**
 * Travel records — the three record kinds held by the Record Store.
 *
 * Records form a tagged union on `kind`. Every record carries a numeric
 * `id` drawn from one identifier space shared by all kinds.
 */

/**
 * Record kind discriminators, in display order.
 */
export const RECORD_KINDS = ['Client', 'Airline', 'Flight'] as const;

export type RecordKind = (typeof RECORD_KINDS)[number];

/**
 * A client of the agency.
 *
 * `addressLine2`, `addressLine3` and `state` may be empty strings.
 */
export interface ClientRecord {
  id: number;
  kind: 'Client';
  name: string;
  addressLine1: string;
  addressLine2: string;
  addressLine3: string;
  city: string;
  state: string;
  postalCode: string;
  country: string;
  phoneNumber: string;
}

/**
 * An airline company.
 */
export interface AirlineRecord {
  id: number;
  kind: 'Airline';
  companyName: string;
}

/**
 * A booked flight, linking one client to one airline.
 */
export interface FlightRecord {
  id: number;
  kind: 'Flight';
  /** Id of the booked Client */
  clientId: number;
  /** Id of the operating Airline */
  airlineId: number;
  /** ISO date, optionally with time: 2025-03-14 or 2025-03-14T09:30 */
  date: string;
  origin: string;
  destination: string;
}

export type TravelRecord = ClientRecord | AirlineRecord | FlightRecord;

/**
 * Maps a kind to its record type.
 */
export type RecordOfKind<K extends RecordKind> = Extract<TravelRecord, { kind: K }>;

/**
 * Editable fields of a record (everything but identity).
 */
export type RecordFields<K extends RecordKind> = Omit<RecordOfKind<K>, 'id' | 'kind'>;

/**
 * A flight joined with the display names of the records it references.
 * A name is null when its reference no longer resolves.
 */
export interface ResolvedFlight extends FlightRecord {
  clientName: string | null;
  airlineName: string | null;
}

/**
 * Type guard for a record kind string.
 */
export function isRecordKind(value: unknown): value is RecordKind {
  return typeof value === 'string' && (RECORD_KINDS as readonly string[]).includes(value);
}

/**
 * Narrow a record to a given kind.
 */
export function isKind<K extends RecordKind>(record: TravelRecord, kind: K): record is RecordOfKind<K> {
  return record.kind === kind;
}
