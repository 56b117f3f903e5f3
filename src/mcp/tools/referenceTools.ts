/**
 * MCP tools for the city and country reference lists.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { jsonResult } from '../helpers.js';
import { REFERENCE_LISTS } from '../../reference/ReferenceData.js';

export function registerReferenceTools(server: McpServer, ctx: AppContext): void {
  // reference_list — Known cities or countries
  server.tool(
    'reference_list',
    'List the known countries or cities, as offered for client addresses and flight cities.',
    { list: z.enum(REFERENCE_LISTS).describe('Which list: "countries" or "cities"') },
    async (args) => {
      const values = ctx.reference[args.list];
      return jsonResult({ values, total: values.length });
    }
  );
}
