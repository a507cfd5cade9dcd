// @metagraph/repositories
// Storage for versioned aspects and the time-series log: the contracts the
// runtime codes against, in-memory and Postgres implementations, and NDJSON
// bundles for moving state between stores.

export * from './interfaces/index.js';
export { VersionConflictError } from './errors.js';
export * as memory from './in-memory/index.js';
export * as postgres from './postgres/index.js';
export * as bundle from './bundle/index.js';
