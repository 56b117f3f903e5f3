/**
 * Configuration loader for the travel records server.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type {
  AppConfig,
  CorsConfig,
  LogLevel,
  PartialAppConfig,
  ReferenceConfig,
  ServerConfig,
  StoreConfig,
} from './types.js';
import { DEFAULT_CONFIG } from './types.js';
import { DELETE_POLICIES } from '../store/types.js';
import type { DeletePolicy } from '../store/types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    // Return empty string if no value and no default
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (isObject(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function requireObject(value: unknown, path: string): Record<string, unknown> {
  if (!isObject(value)) {
    throw new ConfigValidationError('must be an object', path, value);
  }
  return value;
}

/**
 * Accept numbers and numeric strings; env substitution always yields strings.
 */
function toPort(value: unknown, path: string): number {
  const port = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', path, value);
  }
  return port;
}

function toBoolean(value: unknown, path: string): boolean {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new ConfigValidationError('must be a boolean', path, value);
}

function toNonEmptyString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigValidationError('must be a non-empty string', path, value);
  }
  return value;
}

function toLogLevel(value: unknown, path: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (level === undefined) {
    throw new ConfigValidationError('logLevel must be one of: debug, info, warn, error', path, value);
  }
  return level;
}

function toDeletePolicy(value: unknown, path: string): DeletePolicy {
  const policy = DELETE_POLICIES.find((candidate) => candidate === value);
  if (policy === undefined) {
    throw new ConfigValidationError(`onDelete must be one of: ${DELETE_POLICIES.join(', ')}`, path, value);
  }
  return policy;
}

/**
 * Validate CORS configuration.
 */
function validateCorsConfig(config: unknown, path: string): Partial<CorsConfig> {
  const c = requireObject(config, path);
  const result: Partial<CorsConfig> = {};

  if (c.enabled !== undefined) {
    result.enabled = toBoolean(c.enabled, `${path}.enabled`);
  }

  if (c.origins !== undefined) {
    const origins = c.origins;
    if (!Array.isArray(origins) || !origins.every((origin): origin is string => typeof origin === 'string')) {
      throw new ConfigValidationError('origins must be a list of strings', `${path}.origins`, origins);
    }
    result.origins = origins;
  }

  return result;
}

/**
 * Validate server configuration.
 */
function validateServerConfig(config: unknown, path = 'server'): NonNullable<PartialAppConfig['server']> {
  const c = requireObject(config, path);
  const result: NonNullable<PartialAppConfig['server']> = {};

  if (c.port !== undefined) {
    result.port = toPort(c.port, `${path}.port`);
  }

  if (c.host !== undefined) {
    result.host = toNonEmptyString(c.host, `${path}.host`);
  }

  if (c.logLevel !== undefined) {
    result.logLevel = toLogLevel(c.logLevel, `${path}.logLevel`);
  }

  if (c.cors !== undefined) {
    result.cors = validateCorsConfig(c.cors, `${path}.cors`);
  }

  return result;
}

/**
 * Validate store configuration.
 */
function validateStoreConfig(config: unknown, path = 'store'): Partial<StoreConfig> {
  const c = requireObject(config, path);
  const result: Partial<StoreConfig> = {};

  if (c.path !== undefined) {
    result.path = toNonEmptyString(c.path, `${path}.path`);
  }

  if (c.onDelete !== undefined) {
    result.onDelete = toDeletePolicy(c.onDelete, `${path}.onDelete`);
  }

  return result;
}

/**
 * Validate reference data configuration.
 */
function validateReferenceConfig(config: unknown, path = 'reference'): Partial<ReferenceConfig> {
  const c = requireObject(config, path);
  const result: Partial<ReferenceConfig> = {};

  if (c.citiesPath !== undefined) {
    result.citiesPath = toNonEmptyString(c.citiesPath, `${path}.citiesPath`);
  }

  if (c.countriesPath !== undefined) {
    result.countriesPath = toNonEmptyString(c.countriesPath, `${path}.countriesPath`);
  }

  return result;
}

/**
 * Validate the entire configuration.
 *
 * A YAML file with no content parses to null and counts as empty.
 */
export function validateConfig(config: unknown): PartialAppConfig {
  if (config === null || config === undefined) {
    return {};
  }

  const c = requireObject(config, '');
  const result: PartialAppConfig = {};

  if (c.server !== undefined) {
    result.server = validateServerConfig(c.server);
  }

  if (c.store !== undefined) {
    result.store = validateStoreConfig(c.store);
  }

  if (c.reference !== undefined) {
    result.reference = validateReferenceConfig(c.reference);
  }

  return result;
}

/**
 * Merge a validated partial configuration over a complete one
 * (the defaults, unless given).
 */
export function mergeConfig(partial: PartialAppConfig, base: AppConfig = DEFAULT_CONFIG): AppConfig {
  const { cors, ...server } = partial.server ?? {};
  const mergedServer: ServerConfig = {
    ...base.server,
    ...server,
    cors: { ...base.server.cors, ...cors },
  };

  return {
    server: mergedServer,
    store: { ...base.store, ...partial.store },
    reference: { ...base.reference, ...partial.reference },
  };
}

/**
 * Load configuration from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath
    ?? process.env.CONFIG_PATH
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return mergeConfig({});
  }

  // Read and parse YAML
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // Substitute environment variables
  const substituted = substituteEnvVarsRecursive(parsed);

  return mergeConfig(validateConfig(substituted));
}

/**
 * Apply PORT and HOST environment overrides to the server section.
 */
export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const server = { ...config.server };
  if (env.PORT !== undefined && env.PORT !== '') {
    server.port = toPort(env.PORT, 'env.PORT');
  }
  if (env.HOST !== undefined && env.HOST !== '') {
    server.host = env.HOST;
  }
  return { ...config, server };
}
