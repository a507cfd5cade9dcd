import type { Executor } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { PgAspectRepository } from './aspect-repository.js';
import { PgTimeseriesRepository } from './timeseries-repository.js';

export type PgRepositoryOptions = {
  /**
   * Rows fetched per page when streaming or querying time-series (default 500)
   */
  queryBatchSize?: number;
};

/**
 * Aspect and time-series repositories on one Postgres executor, which may be a
 * pool or an open transaction.
 *
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 *
 * const current = await repos.aspects.get(urn, 'status');
 * ```
 */
export function createPgRepositoryContext(
  db: Executor,
  options: PgRepositoryOptions = {}
): RepositoryContext {
  return {
    aspects: new PgAspectRepository(db, options.queryBatchSize),
    timeseries: new PgTimeseriesRepository(db, options.queryBatchSize),
  };
}

/**
 * Postgres context whose transaction() scopes both the aspect table and the
 * time-series log to one connection.
 *
 * ```ts
 * const repos = createTransactionalPgRepositoryContext(db);
 * await repos.transaction(async (tx) => {
 *   const current = await tx.aspects.get(urn, 'status');
 *   await tx.aspects.write({ ...next, expectedVersion: current?.version ?? null });
 * });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: Executor,
  options: PgRepositoryOptions = {}
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db, options);
}

class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly aspects: PgAspectRepository;
  readonly timeseries: PgTimeseriesRepository;

  constructor(
    private db: Executor,
    private options: PgRepositoryOptions
  ) {
    this.aspects = new PgAspectRepository(db, options.queryBatchSize);
    this.timeseries = new PgTimeseriesRepository(db, options.queryBatchSize);
  }

  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    // drizzle rolls back when the callback rejects
    return this.db.transaction(async (tx) => fn(createPgRepositoryContext(tx, this.options)));
  }
}
