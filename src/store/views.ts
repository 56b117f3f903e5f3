/**
 * Presentation views of stored records.
 */

import type { AirlineRecord, ClientRecord, ResolvedFlight, TravelRecord } from '../types/records.js';
import type { RecordStore } from './types.js';

/**
 * A record as shown to callers: Flights carry the display names of the
 * Client and Airline they reference.
 */
export type RecordView = ClientRecord | AirlineRecord | ResolvedFlight;

export function toRecordView(store: RecordStore, record: TravelRecord): RecordView {
  return record.kind === 'Flight' ? store.resolveFlight(record) : record;
}
