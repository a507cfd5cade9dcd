// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  AspectRepository,
  StoredAspect,
  AspectVersion,
  WriteAspectInput,
} from './aspect-repository.js';

export type {
  TimeseriesRepository,
  AppendTimeseriesInput,
  TimeseriesQuery,
} from './timeseries-repository.js';

export {
  isTransactional,
  runInTransaction,
  type RepositoryContext,
  type TransactionFn,
  type TransactionalRepositoryContext,
} from './repository-context.js';
