import type { AspectRepository } from './aspect-repository.js';
import type { TimeseriesRepository } from './timeseries-repository.js';

/**
 * The aspect table and the time-series log, handed to the change processor,
 * the time-series readers and bundle import/export as one value.
 *
 * ```typescript
 * const repos = createPgRepositoryContext(db);
 * const processor = createChangeProcessor({ registry, repos });
 * ```
 */
export interface RepositoryContext {
  readonly aspects: AspectRepository;
  readonly timeseries: TimeseriesRepository;
}

export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * A context whose aspect writes and time-series appends can be grouped so
 * that they all land or none do.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Run `fn` against repositories bound to one transaction. A rejection from
   * `fn` rolls back every write it made and is rethrown.
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}

export function isTransactional(
  repos: RepositoryContext | TransactionalRepositoryContext
): repos is TransactionalRepositoryContext {
  return 'transaction' in repos && typeof repos.transaction === 'function';
}

/**
 * Run `fn` in a transaction when the context has one, directly otherwise
 */
export function runInTransaction<T>(
  repos: RepositoryContext | TransactionalRepositoryContext,
  fn: TransactionFn<T>
): Promise<T> {
  return isTransactional(repos) ? repos.transaction(fn) : fn(repos);
}
