import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigError } from '../errors.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      databaseUrl: undefined,
      databaseMaxConnections: 10,
      logLevel: 'info',
      timeseriesQueryBatchSize: 500,
      aspectDeclarationsDir: undefined,
    });
  });

  it('reads and coerces every variable', () => {
    const config = loadConfig({
      DATABASE_URL: 'postgres://localhost:5432/metagraph',
      DATABASE_MAX_CONNECTIONS: '4',
      LOG_LEVEL: 'debug',
      TIMESERIES_QUERY_BATCH_SIZE: '100',
      ASPECT_DECLARATIONS_DIR: './aspects',
    });

    expect(config).toEqual({
      databaseUrl: 'postgres://localhost:5432/metagraph',
      databaseMaxConnections: 4,
      logLevel: 'debug',
      timeseriesQueryBatchSize: 100,
      aspectDeclarationsDir: './aspects',
    });
  });

  it('treats empty variables as unset', () => {
    expect(loadConfig({ DATABASE_URL: '', LOG_LEVEL: ' ' }).logLevel).toBe('info');
  });

  it('reports every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({ LOG_LEVEL: 'verbose', DATABASE_MAX_CONNECTIONS: '0' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.map((i) => i.path).sort()).toEqual(['DATABASE_MAX_CONNECTIONS', 'LOG_LEVEL']);
      expect(caught.code).toBe('CONFIG_ERROR');
    }
  });
});
