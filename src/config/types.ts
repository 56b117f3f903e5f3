/**
 * Configuration types for the travel records server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

import type { DeletePolicy } from '../store/types.js';

/**
 * Top-level server configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  store: StoreConfig;
  reference: ReferenceConfig;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Record file settings. Relative paths resolve against the base path.
 */
export interface StoreConfig {
  /** JSON lines record file (default: 'data/records.jsonl') */
  path: string;
  /** What deleting a referenced Client or Airline does (default: 'orphan') */
  onDelete: DeletePolicy;
}

/**
 * Reference list files. Relative paths resolve against the base path.
 */
export interface ReferenceConfig {
  /** CSV with a `city_name` column (default: 'data/cities.csv') */
  citiesPath: string;
  /** CSV with a `country_name` column (default: 'data/countries.csv') */
  countriesPath: string;
}

/**
 * Shape of a config file before defaults are applied.
 */
export interface PartialAppConfig {
  server?: Partial<Omit<ServerConfig, 'cors'>> & { cors?: Partial<CorsConfig> };
  store?: Partial<StoreConfig>;
  reference?: Partial<ReferenceConfig>;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  store: {
    path: 'data/records.jsonl',
    onDelete: 'orphan',
  },
  reference: {
    citiesPath: 'data/cities.csv',
    countriesPath: 'data/countries.csv',
  },
};
