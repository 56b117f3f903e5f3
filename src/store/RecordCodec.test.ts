/**
 * Tests for the record codec and record file.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import {
  decodeRecord,
  encodeRecord,
  parseRecords,
  serializeRecords,
} from './RecordCodec.js';
import { readRecordFile, writeRecordFile } from './RecordFile.js';
import { PersistenceError } from './errors.js';
import type { TravelRecord } from '../types/records.js';

const records: TravelRecord[] = [
  {
    id: 1,
    kind: 'Client',
    name: 'Jane Doe',
    addressLine1: '12 Park Row',
    addressLine2: 'Flat 3',
    addressLine3: '',
    city: 'Leeds',
    state: '',
    postalCode: 'LS1 5HD',
    country: 'United Kingdom',
    phoneNumber: '0113 496 0000',
  },
  { id: 2, kind: 'Airline', companyName: 'Skyline Air' },
  {
    id: 3,
    kind: 'Flight',
    clientId: 1,
    airlineId: 2,
    date: '2025-03-14T09:30',
    origin: 'Leeds',
    destination: 'Lisbon',
  },
];

describe('RecordCodec', () => {
  describe('encodeRecord', () => {
    it('writes the established field names', () => {
      expect(encodeRecord({ id: 2, kind: 'Airline', companyName: 'Skyline Air' })).toBe(
        '{"ID":2,"Type":"Airline","Company_Name":"Skyline Air"}'
      );
    });

    it('maps flight fields', () => {
      const flight = records[2];
      expect(flight).toBeDefined();
      if (!flight) return;
      expect(JSON.parse(encodeRecord(flight))).toEqual({
        ID: 3,
        Type: 'Flight',
        Client_ID: 1,
        Airline_ID: 2,
        Date: '2025-03-14T09:30',
        Start_City: 'Leeds',
        End_City: 'Lisbon',
      });
    });
  });

  describe('decodeRecord', () => {
    it('decodes a client line and defaults missing optional fields', () => {
      const line = JSON.stringify({
        ID: 7,
        Type: 'Client',
        Name: 'Ana Reyes',
        Address_Line_1: '4 Calle Mayor',
        City: 'Madrid',
        Zip_Code: '28013',
        Country: 'Spain',
        Phone_Number: '+34 600 000 000',
      });

      const result = decodeRecord(line);

      expect(result.success).toBe(true);
      expect(result.record).toEqual({
        id: 7,
        kind: 'Client',
        name: 'Ana Reyes',
        addressLine1: '4 Calle Mayor',
        addressLine2: '',
        addressLine3: '',
        city: 'Madrid',
        state: '',
        postalCode: '28013',
        country: 'Spain',
        phoneNumber: '+34 600 000 000',
      });
    });

    it('ignores unknown extra fields', () => {
      const result = decodeRecord('{"ID":4,"Type":"Airline","Company_Name":"Polar Jet","Fleet":12}');

      expect(result.record).toEqual({ id: 4, kind: 'Airline', companyName: 'Polar Jet' });
    });

    it('fails on invalid JSON', () => {
      const result = decodeRecord('{"ID": 1,');

      expect(result.success).toBe(false);
      expect(result.error).toMatch(/^Invalid JSON: /);
    });

    it('fails on unknown record type', () => {
      const result = decodeRecord('{"ID":1,"Type":"Hotel","Name":"Grand"}');

      expect(result.success).toBe(false);
      expect(result.error).toContain('Type: Invalid discriminator value');
    });

    it('fails on missing ID', () => {
      const result = decodeRecord('{"Type":"Airline","Company_Name":"Polar Jet"}');

      expect(result.success).toBe(false);
      expect(result.error).toBe('ID: Required');
    });

    it('fails on a flight line without an ID', () => {
      const result = decodeRecord(
        '{"Type":"Flight","Client_ID":1,"Airline_ID":2,"Date":"2025-01-01","Start_City":"Oslo","End_City":"Rome"}'
      );

      expect(result).toEqual({ success: false, error: 'ID: Required' });
    });

    it('fails on a non-numeric reference', () => {
      const result = decodeRecord(
        '{"ID":5,"Type":"Flight","Client_ID":"1","Airline_ID":2,"Date":"2025-01-01","Start_City":"Oslo","End_City":"Rome"}'
      );

      expect(result.success).toBe(false);
      expect(result.error).toContain('Client_ID');
    });
  });

  describe('parseRecords', () => {
    it('round-trips a collection', () => {
      const decoded = parseRecords(serializeRecords(records));

      expect(decoded.records).toEqual(records);
      expect(decoded.skipped).toEqual([]);
    });

    it('serializes one line per record', () => {
      const content = serializeRecords(records);

      expect(content.split('\n')).toHaveLength(4);
      expect(content.endsWith('\n')).toBe(true);
      expect(serializeRecords([])).toBe('');
    });

    it('skips bad and duplicate lines and keeps the rest', () => {
      const content = [
        '{"ID":1,"Type":"Airline","Company_Name":"Skyline Air"}',
        '',
        'not json',
        '{"ID":1,"Type":"Airline","Company_Name":"Copy Air"}',
        '{"ID":2,"Type":"Airline","Company_Name":"Polar Jet"}',
        '',
      ].join('\n');

      const decoded = parseRecords(content);

      expect(decoded.records).toEqual([
        { id: 1, kind: 'Airline', companyName: 'Skyline Air' },
        { id: 2, kind: 'Airline', companyName: 'Polar Jet' },
      ]);
      expect(decoded.skipped).toHaveLength(2);
      expect(decoded.skipped[0]?.lineNumber).toBe(3);
      expect(decoded.skipped[1]).toEqual({ lineNumber: 4, error: 'Duplicate ID: 1' });
    });

    it('renumbers ids shared across kinds and remaps flight references', () => {
      const content = [
        '{"ID":1,"Type":"Airline","Company_Name":"Skyline Air"}',
        '{"Type":"Flight","Client_ID":1,"Airline_ID":1,"Date":"2025-01-01","Start_City":"Oslo","End_City":"Rome"}',
        '{"ID":1,"Type":"Client","Name":"Ana Reyes","Address_Line_1":"4 Calle Mayor","City":"Madrid","Zip_Code":"28013","Country":"Spain","Phone_Number":"+34 600 000 000"}',
        '{"ID":2,"Type":"Airline","Company_Name":"Polar Jet"}',
      ].join('\n');

      const decoded = parseRecords(content);

      expect(decoded.records.map((record) => [record.kind, record.id])).toEqual([
        ['Airline', 1],
        ['Flight', 3],
        ['Client', 4],
        ['Airline', 2],
      ]);
      expect(decoded.records[1]).toMatchObject({ clientId: 4, airlineId: 1 });
      expect(decoded.renumbered).toEqual([
        { lineNumber: 2, previousId: null, id: 3 },
        { lineNumber: 3, previousId: 1, id: 4 },
      ]);
      expect(decoded.skipped).toEqual([]);
    });

    it('keeps a flight reference that names no loaded record', () => {
      const content =
        '{"ID":3,"Type":"Flight","Client_ID":8,"Airline_ID":9,"Date":"2025-01-01","Start_City":"Oslo","End_City":"Rome"}\n';

      expect(parseRecords(content).records[0]).toMatchObject({ id: 3, clientId: 8, airlineId: 9 });
    });

    it('accepts CRLF line endings', () => {
      const content = '{"ID":1,"Type":"Airline","Company_Name":"Skyline Air"}\r\n';

      expect(parseRecords(content).records).toEqual([
        { id: 1, kind: 'Airline', companyName: 'Skyline Air' },
      ]);
    });
  });
});

describe('RecordFile', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `record-file-test-${randomUUID()}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('returns null for a missing file', () => {
    expect(readRecordFile(join(testDir, 'records.jsonl'))).toBeNull();
  });

  it('writes and reads back the same collection', () => {
    const filePath = join(testDir, 'nested', 'records.jsonl');

    writeRecordFile(filePath, records);

    expect(readRecordFile(filePath)).toEqual({ records, skipped: [], renumbered: [] });
  });

  it('leaves no temp file behind', () => {
    const filePath = join(testDir, 'records.jsonl');

    writeRecordFile(filePath, records);
    writeRecordFile(filePath, records.slice(0, 1));

    expect(readdirSync(testDir)).toEqual(['records.jsonl']);
    expect(readFileSync(filePath, 'utf-8').split('\n')).toHaveLength(2);
  });

  it('raises PersistenceError and cleans up when the target cannot be replaced', () => {
    const filePath = join(testDir, 'records.jsonl');
    mkdirSync(filePath);

    expect(() => writeRecordFile(filePath, records)).toThrow(PersistenceError);
    expect(readdirSync(testDir)).toEqual(['records.jsonl']);
  });

  it('raises PersistenceError when the parent path is a file', () => {
    const blocker = join(testDir, 'blocker');
    writeFileSync(blocker, 'x');

    expect(() => writeRecordFile(join(blocker, 'records.jsonl'), records)).toThrow(PersistenceError);
  });

  it('raises PersistenceError when the file cannot be read', () => {
    expect(() => readRecordFile(testDir)).toThrow(PersistenceError);
  });
});
