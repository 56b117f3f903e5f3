/**
 * RecordCodec — Convert between JSON lines and TravelRecords.
 *
 * Each record is one self-contained JSON object on its own line. Field
 * names on disk keep the established file layout (`ID`, `Type`,
 * `Company_Name`, ...).
 *
 * Files written by earlier versions of the application number ids per
 * kind and store Flights without an `ID`. Such lines are loaded with a
 * fresh id, and Flight `Client_ID`/`Airline_ID` values are remapped to
 * follow the records they named.
 *
 * Decoding is tolerant: a bad line is reported and skipped, it never
 * aborts the load. Unknown extra fields are ignored.
 */

import { z } from 'zod';
import type { RecordKind, TravelRecord } from '../types/records.js';
import { convertZodIssues } from '../validation/recordSchemas.js';

const wireId = z.number().int().positive();

const clientLineSchema = z.object({
  ID: wireId,
  Type: z.literal('Client'),
  Name: z.string(),
  Address_Line_1: z.string(),
  Address_Line_2: z.string().default(''),
  Address_Line_3: z.string().default(''),
  City: z.string(),
  State: z.string().default(''),
  Zip_Code: z.string(),
  Country: z.string(),
  Phone_Number: z.string(),
});

const airlineLineSchema = z.object({
  ID: wireId,
  Type: z.literal('Airline'),
  Company_Name: z.string(),
});

const flightLineSchema = z.object({
  ID: wireId.optional(),
  Type: z.literal('Flight'),
  Client_ID: wireId,
  Airline_ID: wireId,
  Date: z.string(),
  Start_City: z.string(),
  End_City: z.string(),
});

const recordLineSchema = z.discriminatedUnion('Type', [
  clientLineSchema,
  airlineLineSchema,
  flightLineSchema,
]);

type RecordLine = z.infer<typeof recordLineSchema>;

/**
 * Result of decoding one line.
 */
export interface DecodeResult {
  /** Whether decoding succeeded */
  success: boolean;
  /** The decoded record (if successful) */
  record?: TravelRecord;
  /** Error message (if failed) */
  error?: string;
}

/**
 * A line that was skipped while reading a file.
 */
export interface SkippedLine {
  /** 1-based line number */
  lineNumber: number;
  /** Why the line was skipped */
  error: string;
}

/**
 * A line whose record was given a new id while reading a file.
 */
export interface RenumberedLine {
  /** 1-based line number */
  lineNumber: number;
  /** Id found on the line, or null when it had none */
  previousId: number | null;
  /** Id assigned on load */
  id: number;
}

/**
 * Result of decoding a whole file.
 */
export interface DecodedRecords {
  records: TravelRecord[];
  skipped: SkippedLine[];
  renumbered: RenumberedLine[];
}

type LineResult = { success: true; line: RecordLine } | { success: false; error: string };

interface DecodedLine {
  lineNumber: number;
  line: RecordLine;
  /** Id kept from the line; null when the record needs a fresh one */
  id: number | null;
}

// Id found on a line, per kind, to the id the record holds after loading
type IdMaps = Record<RecordKind, Map<number, number>>;

function toWire(record: TravelRecord): RecordLine {
  switch (record.kind) {
    case 'Client':
      return {
        ID: record.id,
        Type: 'Client',
        Name: record.name,
        Address_Line_1: record.addressLine1,
        Address_Line_2: record.addressLine2,
        Address_Line_3: record.addressLine3,
        City: record.city,
        State: record.state,
        Zip_Code: record.postalCode,
        Country: record.country,
        Phone_Number: record.phoneNumber,
      };
    case 'Airline':
      return {
        ID: record.id,
        Type: 'Airline',
        Company_Name: record.companyName,
      };
    case 'Flight':
      return {
        ID: record.id,
        Type: 'Flight',
        Client_ID: record.clientId,
        Airline_ID: record.airlineId,
        Date: record.date,
        Start_City: record.origin,
        End_City: record.destination,
      };
  }
}

function fromWire(line: RecordLine, id: number, refs?: IdMaps): TravelRecord {
  switch (line.Type) {
    case 'Client':
      return {
        id,
        kind: 'Client',
        name: line.Name,
        addressLine1: line.Address_Line_1,
        addressLine2: line.Address_Line_2,
        addressLine3: line.Address_Line_3,
        city: line.City,
        state: line.State,
        postalCode: line.Zip_Code,
        country: line.Country,
        phoneNumber: line.Phone_Number,
      };
    case 'Airline':
      return {
        id,
        kind: 'Airline',
        companyName: line.Company_Name,
      };
    case 'Flight':
      return {
        id,
        kind: 'Flight',
        clientId: refs?.Client.get(line.Client_ID) ?? line.Client_ID,
        airlineId: refs?.Airline.get(line.Airline_ID) ?? line.Airline_ID,
        date: line.Date,
        origin: line.Start_City,
        destination: line.End_City,
      };
  }
}

/**
 * Encode one record as a single JSON line (no trailing newline).
 */
export function encodeRecord(record: TravelRecord): string {
  return JSON.stringify(toWire(record));
}

function decodeLine(text: string): LineResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return {
      success: false,
      error: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const result = recordLineSchema.safeParse(parsed);
  if (!result.success) {
    const issues = convertZodIssues(result.error.issues);
    return {
      success: false,
      error: issues.map((issue) => `${issue.path}: ${issue.message}`).join('; '),
    };
  }

  return { success: true, line: result.data };
}

/**
 * Decode one JSON line into a record. The line must carry its `ID`.
 */
export function decodeRecord(line: string): DecodeResult {
  const result = decodeLine(line);
  if (!result.success) {
    return { success: false, error: result.error };
  }
  if (result.line.ID === undefined) {
    return { success: false, error: 'ID: Required' };
  }
  return { success: true, record: fromWire(result.line, result.line.ID) };
}

/**
 * Serialize a collection, one line per record, in collection order.
 */
export function serializeRecords(records: readonly TravelRecord[]): string {
  return records.map((record) => `${encodeRecord(record)}\n`).join('');
}

/**
 * Parse file content into records, in file order.
 *
 * Blank lines are ignored. A line that fails to decode, or that repeats
 * an id already loaded for the same kind, is skipped. A line without an
 * id, or whose id is held by a record of another kind, gets the next id
 * above every id kept from the file.
 */
export function parseRecords(content: string): DecodedRecords {
  const skipped: SkippedLine[] = [];
  const lines: DecodedLine[] = [];
  const seen: Record<RecordKind, Set<number>> = { Client: new Set(), Airline: new Set(), Flight: new Set() };
  const taken = new Set<number>();

  content.split(/\r?\n/).forEach((text, index) => {
    if (text.trim().length === 0) {
      return;
    }

    const lineNumber = index + 1;
    const result = decodeLine(text);
    if (!result.success) {
      skipped.push({ lineNumber, error: result.error });
      return;
    }

    const { line } = result;
    if (line.ID === undefined) {
      lines.push({ lineNumber, line, id: null });
      return;
    }

    if (seen[line.Type].has(line.ID)) {
      skipped.push({ lineNumber, error: `Duplicate ID: ${line.ID}` });
      return;
    }
    seen[line.Type].add(line.ID);

    if (taken.has(line.ID)) {
      lines.push({ lineNumber, line, id: null });
      return;
    }
    taken.add(line.ID);
    lines.push({ lineNumber, line, id: line.ID });
  });

  const refs: IdMaps = { Client: new Map(), Airline: new Map(), Flight: new Map() };
  const renumbered: RenumberedLine[] = [];
  let nextId = [...taken].reduce((max, id) => Math.max(max, id), 0) + 1;

  const assigned = lines.map((entry) => {
    const previousId = entry.line.ID ?? null;
    let id = entry.id;
    if (id === null) {
      id = nextId++;
      renumbered.push({ lineNumber: entry.lineNumber, previousId, id });
    }
    if (previousId !== null) {
      refs[entry.line.Type].set(previousId, id);
    }
    return { line: entry.line, id };
  });

  // References resolve only once every line has its id
  const records = assigned.map(({ line, id }) => fromWire(line, id, refs));
  return { records, skipped, renumbered };
}
