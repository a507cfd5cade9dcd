// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing
//
// Data does not persist between restarts.

import { changeKey, type TimeseriesAspectInstance } from '@metagraph/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  AspectRepository,
  TimeseriesRepository,
  StoredAspect,
  AspectVersion,
} from '../interfaces/index.js';
import { VersionConflictError } from '../errors.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  /** Current row per (entity, aspect), tombstones included */
  aspects: Map<string, StoredAspect>;
  /** Version history per (entity, aspect), oldest first */
  versions: Map<string, AspectVersion[]>;
  /** Time-series log in arrival order */
  timeseries: TimeseriesAspectInstance[];
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

function key(entityUrn: string, aspectName: string): string {
  return changeKey({ entityUrn, aspectName });
}

function byBucketThenArrival(a: TimeseriesAspectInstance, b: TimeseriesAspectInstance): number {
  return a.bucketTimestamp - b.bucketTimestamp || a.sequence - b.sequence;
}

/**
 * Create a complete in-memory repository context.
 *
 * All data is stored in memory and will not persist between restarts.
 * Returned objects are copies; mutating them does not change stored state.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 * const processor = createChangeProcessor({ registry, repos });
 *
 * // Access underlying data for debugging
 * console.log(repos._data.timeseries.length);
 *
 * // Clear all data
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const aspects = new Map<string, StoredAspect>();
  const versions = new Map<string, AspectVersion[]>();
  const timeseries: TimeseriesAspectInstance[] = [];
  let sequence = 0;

  const copy = <T>(value: T): T => structuredClone(value);

  const aspectRepo: AspectRepository = {
    async get(entityUrn, aspectName) {
      const row = aspects.get(key(entityUrn, aspectName));
      return row ? copy(row) : null;
    },

    async write(input) {
      const k = key(input.entityUrn, input.aspectName);
      const current = aspects.get(k);
      const currentVersion = current?.version ?? null;

      if (currentVersion !== input.expectedVersion) {
        throw new VersionConflictError(
          input.entityUrn,
          input.aspectName,
          input.expectedVersion,
          currentVersion
        );
      }

      const now = input.timestamp ?? new Date().toISOString();
      const row: StoredAspect = {
        entityUrn: input.entityUrn,
        aspectName: input.aspectName,
        version: input.version,
        payload: copy(input.payload),
        removed: false,
        lastModified: now,
        changeType: input.changeType,
      };
      aspects.set(k, row);

      const entry: AspectVersion = {
        entityUrn: input.entityUrn,
        aspectName: input.aspectName,
        version: input.version,
        payload: copy(input.payload),
        changeType: input.changeType,
        recordedAt: now,
      };
      const history = versions.get(k) ?? [];
      const existing = history.findIndex((v) => v.version === input.version);
      if (existing >= 0) {
        history[existing] = entry;
      } else {
        history.push(entry);
      }
      versions.set(k, history);

      return copy(row);
    },

    async remove(entityUrn, aspectName, expectedVersion, timestamp) {
      const k = key(entityUrn, aspectName);
      const current = aspects.get(k);
      if (!current || current.removed) {
        return null;
      }
      if (current.version !== expectedVersion) {
        throw new VersionConflictError(entityUrn, aspectName, expectedVersion, current.version);
      }

      const tombstone: StoredAspect = {
        ...current,
        payload: {},
        removed: true,
        lastModified: timestamp ?? new Date().toISOString(),
        changeType: 'DELETE',
      };
      aspects.set(k, tombstone);
      return copy(tombstone);
    },

    async history(entityUrn, aspectName) {
      const history = versions.get(key(entityUrn, aspectName)) ?? [];
      return copy([...history].sort((a, b) => a.version - b.version));
    },

    async listByEntity(entityUrn) {
      return Array.from(aspects.values())
        .filter((a) => a.entityUrn === entityUrn && !a.removed)
        .sort((a, b) => a.aspectName.localeCompare(b.aspectName))
        .map(copy);
    },

    stream() {
      return {
        async *[Symbol.asyncIterator]() {
          const rows = Array.from(aspects.values())
            .filter((a) => !a.removed)
            .sort(
              (a, b) =>
                a.entityUrn.localeCompare(b.entityUrn) || a.aspectName.localeCompare(b.aspectName)
            );
          for (const row of rows) {
            yield copy(row);
          }
        },
      };
    },
  };

  const timeseriesRepo: TimeseriesRepository = {
    async append(input) {
      sequence += 1;
      const record: TimeseriesAspectInstance = {
        kind: 'timeseries',
        aspectName: input.aspectName,
        entityUrn: input.entityUrn,
        payload: copy(input.payload),
        bucketTimestamp: input.bucketTimestamp,
        restatement: input.restatement,
        sequence,
        recordedAt: input.recordedAt ?? new Date().toISOString(),
      };
      timeseries.push(record);
      return copy(record);
    },

    query(query) {
      return {
        // Filtering happens per iteration so each pass sees the current log
        async *[Symbol.asyncIterator]() {
          const start = query.range?.start ?? Number.NEGATIVE_INFINITY;
          const end = query.range?.end ?? Number.POSITIVE_INFINITY;
          const matches = timeseries
            .filter(
              (r) =>
                r.entityUrn === query.entityUrn &&
                r.aspectName === query.aspectName &&
                r.bucketTimestamp >= start &&
                r.bucketTimestamp <= end
            )
            .sort(byBucketThenArrival);
          for (const record of matches) {
            yield copy(record);
          }
        },
      };
    },

    stream() {
      return {
        async *[Symbol.asyncIterator]() {
          for (const record of [...timeseries]) {
            yield copy(record);
          }
        },
      };
    },
  };

  const context: RepositoryContext = {
    aspects: aspectRepo,
    timeseries: timeseriesRepo,
  };

  return {
    ...context,
    async transaction<T>(fn: (repos: RepositoryContext) => Promise<T>): Promise<T> {
      // In-memory operations are atomic per call, so just execute
      return fn(context);
    },
    _data: {
      aspects,
      versions,
      timeseries,
    },
    clear() {
      aspects.clear();
      versions.clear();
      timeseries.length = 0;
      sequence = 0;
    },
  };
}
