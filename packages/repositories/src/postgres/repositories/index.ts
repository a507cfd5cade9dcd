// Postgres repository implementations
export { PgAspectRepository } from './aspect-repository.js';
export { PgTimeseriesRepository } from './timeseries-repository.js';
export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
  type PgRepositoryOptions,
} from './context.js';
