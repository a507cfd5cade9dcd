// Aspect service - composition root
//
// Wires configuration, the sealed registry, storage, the change processor and
// the readers into one object. Storage is Postgres when DATABASE_URL is set,
// in-memory otherwise.

import type { AspectDescriptor, TimeseriesAspectInstance } from '@metagraph/protocol';
import { BUILTIN_ASPECT_DECLARATIONS } from '@metagraph/protocol';
import {
  bundle,
  memory,
  postgres,
  type RepositoryContext,
  type TimeseriesQuery,
  type TransactionalRepositoryContext,
} from '@metagraph/repositories';
import { createChangeProcessor, type ChangeProcessor, type IndexSink } from './changes/index.js';
import { loadConfig, type AspectServiceConfig } from './config/index.js';
import { createIndexResolver, type IndexResolver } from './indexing/index.js';
import { importBundle, ingestChangeLog, type IngestChangeLogResult } from './ingestion/index.js';
import { consoleLogger, createLevelLogger, type Logger } from './logging/index.js';
import {
  compileAspectDeclaration,
  createAspectRegistry,
  loadDeclarationsFromDirectory,
  type AspectRegistry,
} from './registry/index.js';
import { queryLatestTimeseries, queryTimeseries } from './timeseries/index.js';

export type AspectServiceOptions = {
  /**
   * Resolved configuration; read from `env` when omitted
   */
  config?: AspectServiceConfig;
  env?: NodeJS.ProcessEnv;

  /**
   * Base logger, filtered by the configured level (default: console)
   */
  logger?: Logger;

  /**
   * Declarations registered after the builtins and before the directory
   */
  declarations?: Iterable<unknown>;

  /**
   * Storage to use instead of the configured one
   */
  repos?: RepositoryContext | TransactionalRepositoryContext;
  indexSink?: IndexSink;
  now?: () => Date;

  /**
   * Where bundles are read and written (default: local directories)
   */
  bundleStorage?: bundle.BundleStorage;
};

export type AspectService = {
  readonly config: AspectServiceConfig;
  readonly logger: Logger;
  readonly registry: AspectRegistry;
  readonly repos: RepositoryContext;
  readonly processor: ChangeProcessor;
  readonly resolver: IndexResolver;

  queryTimeseries(query: TimeseriesQuery): AsyncIterable<TimeseriesAspectInstance>;
  queryLatestTimeseries(query: TimeseriesQuery): Promise<TimeseriesAspectInstance[]>;
  ingestChangeLog(ndjson: string): Promise<IngestChangeLogResult>;

  exportBundle(bundlePath: string, options?: bundle.ExportOptions): Promise<bundle.ExportSummary>;

  /**
   * Restore a bundle; every record must be accepted by the registry
   */
  importBundle(
    bundlePath: string,
    options?: Omit<bundle.ImportOptions, 'validateRecord'>
  ): Promise<bundle.ImportSummary>;

  /**
   * Release the database connection, if any
   */
  close(): Promise<void>;
};

async function loadDescriptors(
  config: AspectServiceConfig,
  declarations: Iterable<unknown>
): Promise<AspectDescriptor[]> {
  const descriptors = BUILTIN_ASPECT_DECLARATIONS.map((d) =>
    compileAspectDeclaration(d, `builtin:${d.Aspect.name}`)
  );
  for (const declaration of declarations) {
    descriptors.push(compileAspectDeclaration(declaration));
  }
  if (config.aspectDeclarationsDir) {
    descriptors.push(...(await loadDeclarationsFromDirectory(config.aspectDeclarationsDir)));
  }
  return descriptors;
}

/**
 * Create the service. Fails before opening any connection when the
 * configuration or a declaration is invalid.
 *
 * @throws ConfigError, InvalidAspectDeclarationError, InvalidAspectDescriptorError
 * or DuplicateAspectError
 */
export async function createAspectService(options: AspectServiceOptions = {}): Promise<AspectService> {
  const config = options.config ?? loadConfig(options.env);
  const logger = createLevelLogger(config.logLevel, options.logger ?? consoleLogger);

  const registry = createAspectRegistry(await loadDescriptors(config, options.declarations ?? []), {
    logger,
  });

  let repos: RepositoryContext | TransactionalRepositoryContext;
  let close = async (): Promise<void> => {};
  let storage: 'custom' | 'postgres' | 'memory';

  if (options.repos) {
    repos = options.repos;
    storage = 'custom';
  } else if (config.databaseUrl) {
    const { db, client } = postgres.createDatabase({
      connectionString: config.databaseUrl,
      maxConnections: config.databaseMaxConnections,
    });
    repos = postgres.createTransactionalPgRepositoryContext(db, {
      queryBatchSize: config.timeseriesQueryBatchSize,
    });
    close = () => client.end();
    storage = 'postgres';
  } else {
    repos = memory.createInMemoryRepositoryContext();
    storage = 'memory';
  }

  const processor = createChangeProcessor({
    registry,
    repos,
    logger,
    indexSink: options.indexSink,
    now: options.now,
  });

  logger.info('Aspect service ready', { aspects: registry.list().length, storage });

  const ctx = { registry, repos };
  const bundleStorage = options.bundleStorage ?? bundle.createDirectoryBundleStorage();
  return {
    config,
    logger,
    registry,
    repos,
    processor,
    resolver: createIndexResolver(registry),
    queryTimeseries: (query) => queryTimeseries(ctx, query),
    queryLatestTimeseries: (query) => queryLatestTimeseries(ctx, query),
    ingestChangeLog: (ndjson) => ingestChangeLog(processor, ndjson),
    exportBundle: (bundlePath, exportOptions) =>
      bundle.exportAspectBundle(repos, bundleStorage, bundlePath, exportOptions),
    importBundle: (bundlePath, importOptions) =>
      importBundle({ registry, repos, reader: bundleStorage }, bundlePath, importOptions),
    close: () => close(),
  };
}
