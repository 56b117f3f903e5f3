/**
 * Aggregator that registers all MCP tools on the server.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { registerRecordTools } from './recordTools.js';
import { registerReferenceTools } from './referenceTools.js';

export function registerAllTools(server: McpServer, ctx: AppContext): void {
  registerRecordTools(server, ctx);
  registerReferenceTools(server, ctx);
}
