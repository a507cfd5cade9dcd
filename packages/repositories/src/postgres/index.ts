// Postgres substrate: connection, schema and repositories
export { createDatabase, type Database, type DatabaseConfig, type Executor } from './db.js';
export * from './repositories/index.js';
export * as schema from './schema/index.js';
