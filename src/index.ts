/**
 * travel-records — Client, Airline and Flight records for a travel agency.
 *
 * This is the main entry point for the library.
 */

// Types
export * from './types/index.js';

// Field validation
export * from './validation/index.js';

// Record store
export * from './store/index.js';

// Reference lists
export * from './reference/index.js';

// Configuration
export { loadConfig, validateConfig, mergeConfig, applyEnvOverrides, ConfigValidationError } from './config/loader.js';
export type { LoadConfigOptions } from './config/loader.js';
export * from './config/types.js';

// HTTP API
export * from './api/index.js';

// MCP tools
export { createMcpServer } from './mcp/index.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext, InitOptions, CreateServerOptions } from './server.js';
