/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers with no business rules.
 */

import type { FastifyInstance } from 'fastify';
import type { RecordHandlers } from './handlers/RecordHandlers.js';
import type { ReferenceHandlers } from './handlers/ReferenceHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  recordHandlers: RecordHandlers;
  referenceHandlers: ReferenceHandlers;
  health: () => HealthResponse['components'];
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { recordHandlers, referenceHandlers, health } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      components: health(),
    };
  });

  // ============================================================================
  // Record Routes
  // ============================================================================

  // List or search records of one kind
  fastify.get('/records', recordHandlers.listRecords);

  // Get single record
  fastify.get('/records/:id', recordHandlers.getRecord);

  // Create record
  fastify.post('/records', recordHandlers.createRecord);

  // Update record
  fastify.put('/records/:id', recordHandlers.updateRecord);

  // Delete record
  fastify.delete('/records/:id', recordHandlers.deleteRecord);

  // ============================================================================
  // Reference Routes
  // ============================================================================

  fastify.get('/reference/countries', referenceHandlers.listCountries);
  fastify.get('/reference/cities', referenceHandlers.listCities);
}
