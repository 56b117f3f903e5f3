/**
 * ReferenceHandlers — HTTP handlers for the city and country lists.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { ReferenceData, ReferenceListName } from '../../reference/ReferenceData.js';
import type { ReferenceListResponse } from '../types.js';

/**
 * Create reference handlers over loaded reference data.
 */
export function createReferenceHandlers(data: ReferenceData) {
  const listOf = (name: ReferenceListName): ReferenceListResponse => ({
    values: [...data[name]],
    total: data[name].length,
  });

  return {
    /**
     * GET /reference/countries
     */
    async listCountries(_request: FastifyRequest, _reply: FastifyReply): Promise<ReferenceListResponse> {
      return listOf('countries');
    },

    /**
     * GET /reference/cities
     */
    async listCities(_request: FastifyRequest, _reply: FastifyReply): Promise<ReferenceListResponse> {
      return listOf('cities');
    },
  };
}

export type ReferenceHandlers = ReturnType<typeof createReferenceHandlers>;
