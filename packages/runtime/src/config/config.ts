// Service configuration from environment variables

import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { LogLevel } from '../logging/index.js';

const EnvSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  TIMESERIES_QUERY_BATCH_SIZE: z.coerce.number().int().positive().default(500),
  ASPECT_DECLARATIONS_DIR: z.string().optional(),
});

export type AspectServiceConfig = {
  /**
   * Postgres connection string; in-memory storage when absent
   */
  databaseUrl?: string;
  databaseMaxConnections: number;
  logLevel: LogLevel;
  timeseriesQueryBatchSize: number;

  /**
   * Directory of additional *.json aspect declarations
   */
  aspectDeclarationsDir?: string;
};

/**
 * Read configuration from the environment.
 * Empty variables count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AspectServiceConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  return {
    databaseUrl: result.data.DATABASE_URL,
    databaseMaxConnections: result.data.DATABASE_MAX_CONNECTIONS,
    logLevel: result.data.LOG_LEVEL,
    timeseriesQueryBatchSize: result.data.TIMESERIES_QUERY_BATCH_SIZE,
    aspectDeclarationsDir: result.data.ASPECT_DECLARATIONS_DIR,
  };
}
