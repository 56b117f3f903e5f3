/**
 * Server entry point for the travel records API.
 *
 * This module:
 * - Initializes all components (config, record store, reference lists)
 * - Creates Fastify server with routes
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import type { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { RecordStoreImpl, createRecordStore } from './store/RecordStoreImpl.js';
import { applyEnvOverrides, loadConfig, mergeConfig } from './config/loader.js';
import type { AppConfig, LogLevel, PartialAppConfig } from './config/types.js';
import { loadReferenceDataOrEmpty } from './reference/ReferenceData.js';
import type { ReferenceData } from './reference/ReferenceData.js';
import { createRecordHandlers, createReferenceHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import type { ApiError } from './api/types.js';

/**
 * Options for initializing the application.
 */
export interface InitOptions {
  /** Path to config file (default: CONFIG_PATH or <basePath>/config.yaml) */
  configPath?: string;
  /** Values applied over the loaded configuration */
  overrides?: PartialAppConfig;
}

/**
 * Options for creating the HTTP server.
 */
export interface CreateServerOptions {
  /** Overrides the configured log level; 'silent' turns HTTP logging off */
  logLevel?: LogLevel | 'silent';
}

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  basePath: string;
  config: AppConfig;
  configPath: string;
  store: RecordStoreImpl;
  reference: ReferenceData;
}

/**
 * Initialize all application components.
 */
export async function initializeApp(
  basePath: string,
  options: InitOptions = {}
): Promise<AppContext> {
  console.log(`Initializing app with base path: ${basePath}`);

  const configPath = options.configPath ?? process.env.CONFIG_PATH ?? resolve(basePath, 'config.yaml');
  const loaded = applyEnvOverrides(await loadConfig({ configPath }));
  const config = mergeConfig(options.overrides ?? {}, loaded);

  // Initialize record store
  const recordsPath = resolve(basePath, config.store.path);
  console.log(`Loading records from: ${recordsPath}`);
  const store = createRecordStore({ filePath: recordsPath, onDelete: config.store.onDelete });
  console.log(`Records loaded: ${store.count()} (delete policy: ${store.deletePolicy})`);

  // Load reference lists; a missing list is served empty
  const reference = loadReferenceDataOrEmpty(config.reference, basePath);
  console.log(`Reference lists loaded: ${reference.countries.length} countries, ${reference.cities.length} cities`);

  return {
    basePath,
    config,
    configPath,
    store,
    reference,
  };
}

/**
 * Render errors Fastify raises itself (malformed JSON, unsupported
 * media type) in the API's error shape.
 */
function handleFrameworkError(error: FastifyError): { statusCode: number; body: ApiError } {
  const statusCode = error.statusCode ?? 500;
  if (statusCode < 500) {
    return { statusCode, body: { error: 'BAD_REQUEST', message: error.message } };
  }
  return { statusCode, body: { error: 'INTERNAL_ERROR', message: error.message } };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(
  ctx: AppContext,
  options: CreateServerOptions = {}
): Promise<FastifyInstance> {
  const serverConfig = ctx.config.server;

  // Create Fastify instance
  const fastify = Fastify({
    logger: {
      level: options.logLevel ?? serverConfig.logLevel,
    },
  });

  // Register CORS if enabled
  if (serverConfig.cors.enabled) {
    await fastify.register(cors, {
      origin: serverConfig.cors.origins.includes('*') ? true : serverConfig.cors.origins,
      methods: ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    });
  }

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const { statusCode, body } = handleFrameworkError(error);
    if (statusCode >= 500) {
      request.log.error(error);
    }
    void reply.status(statusCode).send(body);
  });

  // Create handlers
  const recordHandlers = createRecordHandlers(ctx.store);
  const referenceHandlers = createReferenceHandlers(ctx.reference);

  // Register API routes with /api prefix
  await fastify.register(async (instance) => {
    registerRoutes(instance, {
      recordHandlers,
      referenceHandlers,
      health: () => ({
        records: { loaded: ctx.store.count(), path: ctx.store.filePath },
        reference: {
          countries: ctx.reference.countries.length,
          cities: ctx.reference.cities.length,
        },
      }),
    });
  }, { prefix: '/api' });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(
  basePath: string,
  options: InitOptions = {}
): Promise<void> {
  try {
    // Initialize app
    const ctx = await initializeApp(basePath, options);

    // Create server
    const fastify = await createServer(ctx);
    const { port, host } = ctx.config.server;

    // Start listening
    await fastify.listen({ port, host });

    console.log(`Server listening on http://${host}:${port}`);
    console.log(`Records: ${ctx.store.count()} in ${ctx.store.filePath}`);

    // Handle shutdown
    const shutdown = async () => {
      console.log('\nShutting down...');
      await fastify.close();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

/**
 * CLI entry point.
 */
async function main() {
  const basePath = process.env.APP_BASE_PATH || process.cwd();
  await startServer(basePath);
}

// Run if executed directly
const isMain = process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isMain) {
  main().catch(console.error);
}
