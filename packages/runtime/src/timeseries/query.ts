// Time-series reads
//
// The store keeps every append. Readers that want one value per bucket take
// the record that arrived last, whatever its restatement flag.

import type { TimeseriesAspectInstance } from '@metagraph/protocol';
import type { RepositoryContext, TimeseriesQuery } from '@metagraph/repositories';
import { NotTimeseriesAspectError } from '../errors.js';
import type { AspectRegistry } from '../registry/index.js';

export type TimeseriesQueryContext = {
  registry: AspectRegistry;
  repos: RepositoryContext;
};

/**
 * Keep the last-arrived record (highest sequence) of each bucket.
 * Records may come from several entities or aspects; each keeps its own buckets.
 *
 * @returns Survivors ordered by bucket, then arrival
 */
export function latestPerBucket(
  records: Iterable<TimeseriesAspectInstance>
): TimeseriesAspectInstance[] {
  const latest = new Map<string, TimeseriesAspectInstance>();
  for (const record of records) {
    const key = `${record.entityUrn}\u0000${record.aspectName}\u0000${record.bucketTimestamp}`;
    const seen = latest.get(key);
    if (!seen || record.sequence > seen.sequence) {
      latest.set(key, record);
    }
  }
  return Array.from(latest.values()).sort(
    (a, b) => a.bucketTimestamp - b.bucketTimestamp || a.sequence - b.sequence
  );
}

function assertTimeseriesAspect(registry: AspectRegistry, aspectName: string): void {
  if (registry.describe(aspectName).kind !== 'timeseries') {
    throw new NotTimeseriesAspectError(aspectName);
  }
}

/**
 * All records in range, ordered by bucket then arrival. Lazy and re-iterable.
 *
 * @throws UnknownAspectError or NotTimeseriesAspectError, at call time
 */
export function queryTimeseries(
  ctx: TimeseriesQueryContext,
  query: TimeseriesQuery
): AsyncIterable<TimeseriesAspectInstance> {
  assertTimeseriesAspect(ctx.registry, query.aspectName);
  return ctx.repos.timeseries.query(query);
}

/**
 * One record per bucket in range: the last to arrive
 */
export async function queryLatestTimeseries(
  ctx: TimeseriesQueryContext,
  query: TimeseriesQuery
): Promise<TimeseriesAspectInstance[]> {
  const records: TimeseriesAspectInstance[] = [];
  for await (const record of queryTimeseries(ctx, query)) {
    records.push(record);
  }
  return latestPerBucket(records);
}
