import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { ConfigValidationError, applyEnvOverrides, loadConfig, validateConfig } from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

describe('loadConfig', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `config-test-${randomUUID()}`);
    mkdirSync(testDir, { recursive: true });
    configPath = join(testDir, 'config.yaml');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('returns defaults when the file is missing', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const config = await loadConfig({ configPath });

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('merges file values over defaults', async () => {
    writeFileSync(
      configPath,
      ['server:', '  port: 8080', '  cors:', '    enabled: false', 'store:', '  onDelete: cascade', ''].join('\n')
    );

    const config = await loadConfig({ configPath });

    expect(config.server).toEqual({
      port: 8080,
      host: '0.0.0.0',
      logLevel: 'info',
      cors: { enabled: false, origins: ['*'] },
    });
    expect(config.store).toEqual({ path: 'data/records.jsonl', onDelete: 'cascade' });
    expect(config.reference).toEqual(DEFAULT_CONFIG.reference);
  });

  it('substitutes environment variables', async () => {
    vi.stubEnv('TRAVEL_RECORDS_FILE', '/srv/records.jsonl');
    writeFileSync(
      configPath,
      ['store:', '  path: ${TRAVEL_RECORDS_FILE}', 'server:', '  port: ${TRAVEL_PORT_UNSET:-4100}', ''].join('\n')
    );

    const config = await loadConfig({ configPath });

    expect(config.store.path).toBe('/srv/records.jsonl');
    expect(config.server.port).toBe(4100);
  });

  it('treats an empty file as defaults', async () => {
    writeFileSync(configPath, '');

    expect(await loadConfig({ configPath })).toEqual(DEFAULT_CONFIG);
  });

  it('rejects invalid values', async () => {
    writeFileSync(configPath, 'store:\n  onDelete: archive\n');

    await expect(loadConfig({ configPath })).rejects.toThrow(ConfigValidationError);
  });

  it('rejects malformed YAML', async () => {
    writeFileSync(configPath, 'server: [unclosed\n');

    await expect(loadConfig({ configPath })).rejects.toThrow(/^Failed to parse config file/);
  });
});

describe('validateConfig', () => {
  it('reports the offending path', () => {
    let caught: unknown;
    try {
      validateConfig({ server: { logLevel: 'verbose' } });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (!(caught instanceof ConfigValidationError)) return;
    expect(caught.path).toBe('server.logLevel');
    expect(caught.message).toBe(
      "Config validation error at 'server.logLevel': logLevel must be one of: debug, info, warn, error"
    );
  });

  it('rejects an out-of-range port', () => {
    expect(() => validateConfig({ server: { port: 70000 } })).toThrow(ConfigValidationError);
  });

  it('requires sections to be objects', () => {
    expect(() => validateConfig({ reference: 'data' })).toThrow("Config validation error at 'reference': must be an object");
  });
});

describe('applyEnvOverrides', () => {
  it('overrides port and host', () => {
    const config = applyEnvOverrides(DEFAULT_CONFIG, { PORT: '9000', HOST: '127.0.0.1' });

    expect(config.server.port).toBe(9000);
    expect(config.server.host).toBe('127.0.0.1');
    expect(DEFAULT_CONFIG.server.port).toBe(3001);
  });

  it('ignores unset variables', () => {
    expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
  });

  it('rejects a non-numeric port', () => {
    expect(() => applyEnvOverrides(DEFAULT_CONFIG, { PORT: 'http' })).toThrow(ConfigValidationError);
  });
});
