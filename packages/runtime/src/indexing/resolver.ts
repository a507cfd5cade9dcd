// Search Indexing Hint Resolver
//
// Projects the search and time-series hints of a descriptor onto an aspect
// instance. The results are instructions for the external search index;
// nothing here talks to the index itself.

import type {
  AspectInstance,
  AspectPayload,
  EpochMillis,
  IndexOp,
  TimeseriesAspectInstance,
  TimeseriesIndexUpdate,
  TimeseriesProjection,
  Urn,
  VersionedAspectInstance,
  VersionedIndexUpdate,
} from '@metagraph/protocol';
import { isAbsent, type AspectRegistry, type ResolvedAspectDescriptor } from '../registry/index.js';
import { isPlainObject } from '../changes/merge.js';
import { NotTimeseriesAspectError } from '../errors.js';

/**
 * Index ops for a payload, one per searchable field in descriptor order.
 *
 * Absent values produce no op. Fields hinted with "/*" produce one op per
 * array element, in array order; other array fields produce a single op
 * carrying the whole array.
 */
export function indexOpsFor(descriptor: ResolvedAspectDescriptor, payload: AspectPayload): IndexOp[] {
  const ops: IndexOp[] = [];

  for (const searchable of descriptor.searchableFields) {
    const value = payload[searchable.field.name];
    if (isAbsent(value)) {
      continue;
    }

    const values = searchable.expandElements && Array.isArray(value) ? value : [value];
    for (const element of values) {
      if (isAbsent(element)) {
        continue;
      }
      ops.push({
        fieldName: searchable.fieldName,
        fieldType: searchable.fieldType,
        queryByDefault: searchable.queryByDefault,
        value: element,
      });
    }
  }

  return ops;
}

/**
 * Time-series fields and collection rows of a record's payload
 */
export function timeseriesProjectionFor(
  descriptor: ResolvedAspectDescriptor,
  payload: AspectPayload
): TimeseriesProjection {
  const fields: AspectPayload = {};
  for (const field of descriptor.timeseriesFields) {
    const value = payload[field.name];
    if (!isAbsent(value)) {
      fields[field.name] = value;
    }
  }

  const collections: TimeseriesProjection['collections'] = [];
  for (const { field, collectionKey } of descriptor.timeseriesCollections) {
    const value = payload[field.name];
    if (!Array.isArray(value)) {
      continue;
    }
    for (const entry of value) {
      const keyValue = isPlainObject(entry) ? entry[collectionKey] : undefined;
      collections.push({
        fieldName: field.name,
        collectionKey,
        keyValue: keyValue ?? null,
        entry,
      });
    }
  }

  return { fields, collections };
}

export type IndexResolver = {
  /**
   * Ordered index ops for an instance
   * @throws UnknownAspectError
   */
  deriveIndexOps(instance: AspectInstance): IndexOp[];

  /**
   * @throws NotTimeseriesAspectError when the aspect is versioned
   */
  deriveTimeseriesProjection(instance: TimeseriesAspectInstance): TimeseriesProjection;

  versionedUpdate(
    instance: VersionedAspectInstance,
    action: 'upsert' | 'reindex'
  ): VersionedIndexUpdate;

  /**
   * Removal signal; carries no ops
   */
  deletionUpdate(entityUrn: Urn, aspectName: string, version: number): VersionedIndexUpdate;

  timeseriesUpdate(
    instance: TimeseriesAspectInstance,
    action: 'append' | 'reindex'
  ): TimeseriesIndexUpdate;
};

/**
 * Create a resolver that looks descriptors up in the registry.
 */
export function createIndexResolver(registry: AspectRegistry): IndexResolver {
  const timeseriesDescriptor = (aspectName: string) => {
    const descriptor = registry.describe(aspectName);
    if (descriptor.kind !== 'timeseries') {
      throw new NotTimeseriesAspectError(aspectName);
    }
    return descriptor;
  };

  return {
    deriveIndexOps(instance) {
      return indexOpsFor(registry.describe(instance.aspectName), instance.payload);
    },

    deriveTimeseriesProjection(instance) {
      return timeseriesProjectionFor(timeseriesDescriptor(instance.aspectName), instance.payload);
    },

    versionedUpdate(instance, action) {
      return {
        kind: 'versioned',
        entityUrn: instance.entityUrn,
        aspectName: instance.aspectName,
        action,
        version: instance.version,
        ops: indexOpsFor(registry.describe(instance.aspectName), instance.payload),
      };
    },

    deletionUpdate(entityUrn, aspectName, version) {
      return { kind: 'versioned', entityUrn, aspectName, action: 'delete', version, ops: [] };
    },

    timeseriesUpdate(instance, action) {
      const descriptor = timeseriesDescriptor(instance.aspectName);
      const bucketTimestamp: EpochMillis = instance.bucketTimestamp;
      return {
        kind: 'timeseries',
        entityUrn: instance.entityUrn,
        aspectName: instance.aspectName,
        action,
        bucketTimestamp,
        ops: indexOpsFor(descriptor, instance.payload),
        projection: timeseriesProjectionFor(descriptor, instance.payload),
      };
    },
  };
}
