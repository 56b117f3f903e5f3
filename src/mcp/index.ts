/**
 * Public exports for the MCP server layer.
 */

export { createMcpServer } from './McpServerFactory.js';
export { jsonResult, errorResult, storeErrorResult } from './helpers.js';
