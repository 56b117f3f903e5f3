/**
 * MCP tools for record CRUD and search.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { jsonResult, storeErrorResult } from '../helpers.js';
import { RECORD_KINDS } from '../../types/records.js';
import { toRecordView } from '../../store/views.js';

const kindArg = z.enum(RECORD_KINDS).describe('Record kind: "Client", "Airline" or "Flight"');
const idArg = z.number().int().positive().describe('The numeric record id');
const fieldsArg = z.record(z.string(), z.unknown());

export function registerRecordTools(server: McpServer, ctx: AppContext): void {
  const { store } = ctx;

  // record_list — All records of one kind
  server.tool(
    'record_list',
    'List all records of one kind in insertion order. Flights include the resolved client and airline names.',
    { kind: kindArg },
    async (args) => {
      try {
        const records = store.list(args.kind).map((record) => toRecordView(store, record));
        return jsonResult({ records, total: records.length });
      } catch (err) {
        return storeErrorResult(err);
      }
    }
  );

  // record_search — Case-insensitive substring search within one kind
  server.tool(
    'record_search',
    'Search records of one kind for a case-insensitive substring in any field. Flights also match on client and airline names. An empty query returns every record of the kind.',
    {
      kind: kindArg,
      query: z.string().describe('Text to look for'),
    },
    async (args) => {
      try {
        const records = store.search(args.kind, args.query).map((record) => toRecordView(store, record));
        return jsonResult({ records, total: records.length });
      } catch (err) {
        return storeErrorResult(err);
      }
    }
  );

  // record_get — Retrieve a single record by id
  server.tool(
    'record_get',
    'Get a record by its numeric id.',
    { id: idArg },
    async (args) => {
      try {
        return jsonResult(toRecordView(store, store.get(args.id)));
      } catch (err) {
        return storeErrorResult(err);
      }
    }
  );

  // record_add — Create a record
  server.tool(
    'record_add',
    'Create a record. Client fields: name, addressLine1, addressLine2?, addressLine3?, city, state?, postalCode, country, phoneNumber. Airline fields: companyName. Flight fields: clientId, airlineId, date (YYYY-MM-DD[THH:mm[:ss]]), origin, destination. Returns the created record with its assigned id.',
    {
      kind: kindArg,
      fields: fieldsArg.describe('Editable fields of the new record'),
    },
    async (args) => {
      try {
        return jsonResult(toRecordView(store, store.add(args.kind, args.fields)));
      } catch (err) {
        return storeErrorResult(err);
      }
    }
  );

  // record_update — Merge fields into an existing record
  server.tool(
    'record_update',
    'Update a record. The given fields replace the current values; omitted fields keep theirs. The id and kind cannot be changed.',
    {
      id: idArg,
      fields: fieldsArg.describe('Fields to change'),
    },
    async (args) => {
      try {
        return jsonResult(toRecordView(store, store.update(args.id, args.fields)));
      } catch (err) {
        return storeErrorResult(err);
      }
    }
  );

  // record_delete — Remove a record
  server.tool(
    'record_delete',
    `Delete a record by id. Deleting a client or airline follows the "${store.deletePolicy}" policy for flights that reference it. Returns every removed record.`,
    { id: idArg },
    async (args) => {
      try {
        return jsonResult({ removed: store.delete(args.id) });
      } catch (err) {
        return storeErrorResult(err);
      }
    }
  );
}
