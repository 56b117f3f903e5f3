/**
 * Factory function for creating the MCP server with all tools.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { registerAllTools } from './tools/index.js';

/**
 * Create and configure an MCP server bound to the given AppContext.
 */
export function createMcpServer(ctx: AppContext): McpServer {
  const server = new McpServer(
    { name: 'travel-records', version: '1.0.0' },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  registerAllTools(server, ctx);

  return server;
}
