/**
 * RecordHandlers — HTTP handlers for record CRUD and search.
 *
 * These handlers are thin wrappers around RecordStore. Request shapes
 * are checked here; field rules live in the store.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { RecordStore } from '../../store/types.js';
import { RecordStoreError, ValidationError } from '../../store/errors.js';
import { RECORD_KINDS } from '../../types/records.js';
import { toRecordView } from '../../store/views.js';
import type { TravelRecord } from '../../types/records.js';
import type {
  ApiError,
  CreateRecordRequest,
  DeleteRecordResponse,
  ListRecordsQuery,
  ListRecordsResponse,
  RecordResponse,
  UpdateRecordRequest,
} from '../types.js';

const kindSchema = z.enum(RECORD_KINDS, {
  errorMap: () => ({ message: `kind must be one of: ${RECORD_KINDS.join(', ')}` }),
});

const fieldsSchema = z.record(z.unknown(), {
  errorMap: () => ({ message: 'fields must be an object' }),
});

const createBodySchema = z.object({ kind: kindSchema, fields: fieldsSchema });

const updateBodySchema = z.object({ fields: fieldsSchema });

const listQuerySchema = z.object({ kind: kindSchema, q: z.string().optional() });

const RECORD_ID_PATTERN = /^[1-9]\d*$/;

/**
 * Reply with a BAD_REQUEST built from the first zod issue.
 */
function badRequest(reply: FastifyReply, error: z.ZodError | string): ApiError {
  reply.status(400);
  const message = typeof error === 'string' ? error : (error.issues[0]?.message ?? 'Invalid request');
  return { error: 'BAD_REQUEST', message };
}

/**
 * Map a thrown error to its HTTP response. Store errors carry their own
 * status; anything else is a 500.
 */
export function sendStoreError(reply: FastifyReply, err: unknown, action: string): ApiError {
  if (err instanceof ValidationError) {
    reply.status(err.statusCode);
    return { error: err.code, message: err.message, details: err.issues };
  }
  if (err instanceof RecordStoreError) {
    reply.status(err.statusCode);
    return { error: err.code, message: err.message };
  }
  const message = err instanceof Error ? err.message : String(err);
  reply.status(500);
  return { error: 'INTERNAL_ERROR', message: `Failed to ${action}: ${message}` };
}

/**
 * Create record handlers bound to a RecordStore.
 */
export function createRecordHandlers(store: RecordStore) {
  const toView = (record: TravelRecord) => toRecordView(store, record);

  const parseId = (raw: string): number | null => (RECORD_ID_PATTERN.test(raw) ? Number(raw) : null);

  return {
    /**
     * GET /records?kind=K&q=text
     * List records of one kind, optionally filtered by search text.
     */
    async listRecords(
      request: FastifyRequest<{ Querystring: ListRecordsQuery }>,
      reply: FastifyReply
    ): Promise<ListRecordsResponse | ApiError> {
      const parsed = listQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return badRequest(reply, parsed.error);
      }

      try {
        const { kind, q } = parsed.data;
        const records = q !== undefined ? store.search(kind, q) : store.list(kind);
        return { records: records.map(toView), total: records.length };
      } catch (err) {
        return sendStoreError(reply, err, 'list records');
      }
    },

    /**
     * GET /records/:id
     * Get a single record by ID.
     */
    async getRecord(
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply
    ): Promise<RecordResponse | ApiError> {
      const id = parseId(request.params.id);
      if (id === null) {
        return badRequest(reply, `Invalid record id: ${request.params.id}`);
      }

      try {
        return { record: toView(store.get(id)) };
      } catch (err) {
        return sendStoreError(reply, err, 'get record');
      }
    },

    /**
     * POST /records
     * Create a new record.
     */
    async createRecord(
      request: FastifyRequest<{ Body: CreateRecordRequest }>,
      reply: FastifyReply
    ): Promise<RecordResponse | ApiError> {
      const parsed = createBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return badRequest(reply, parsed.error);
      }

      try {
        const record = store.add(parsed.data.kind, parsed.data.fields);
        reply.status(201);
        return { record: toView(record) };
      } catch (err) {
        return sendStoreError(reply, err, 'create record');
      }
    },

    /**
     * PUT /records/:id
     * Merge fields into an existing record.
     */
    async updateRecord(
      request: FastifyRequest<{ Params: { id: string }; Body: UpdateRecordRequest }>,
      reply: FastifyReply
    ): Promise<RecordResponse | ApiError> {
      const id = parseId(request.params.id);
      if (id === null) {
        return badRequest(reply, `Invalid record id: ${request.params.id}`);
      }

      const parsed = updateBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return badRequest(reply, parsed.error);
      }

      try {
        return { record: toView(store.update(id, parsed.data.fields)) };
      } catch (err) {
        return sendStoreError(reply, err, 'update record');
      }
    },

    /**
     * DELETE /records/:id
     * Delete a record (and, under the cascade policy, its flights).
     */
    async deleteRecord(
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply
    ): Promise<DeleteRecordResponse | ApiError> {
      const id = parseId(request.params.id);
      if (id === null) {
        return badRequest(reply, `Invalid record id: ${request.params.id}`);
      }

      try {
        return { removed: store.delete(id) };
      } catch (err) {
        return sendStoreError(reply, err, 'delete record');
      }
    },
  };
}

export type RecordHandlers = ReturnType<typeof createRecordHandlers>;
