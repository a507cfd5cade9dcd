// Proposal helpers - transforms producers apply to change streams before submission
//
// Each helper takes and returns a lazy sequence of change events, so they
// compose: lowercaseUrns(withStatusAspects(events)).

import {
  lowercaseDatasetUrn,
  makeDataPlatformInstanceUrn,
  type AspectPayload,
  type ChangeEvent,
  type EpochMillis,
  type Urn,
} from '@metagraph/protocol';
import { silentLogger, type Logger } from '../logging/index.js';
import { isAbsent } from '../registry/index.js';

export const USAGE_ASPECT = 'datasetUsageStatistics';
export const OPERATION_ASPECT = 'operation';
export const DATASET_PROPERTIES_ASPECT = 'datasetProperties';
export const CONTAINER_ASPECT = 'container';
export const BROWSE_PATHS_ASPECT = 'browsePathsV2';

/**
 * Stable id of the unit of work carrying an event
 */
export function workUnitId(event: Pick<ChangeEvent, 'entityUrn' | 'aspectName'>): string {
  return `${event.entityUrn}-${event.aspectName}`;
}

/**
 * Pass events through, then mark every entity that never got a status event
 * as not removed.
 */
export function* withStatusAspects(events: Iterable<ChangeEvent>): Generator<ChangeEvent> {
  const seen: Urn[] = [];
  const seenSet = new Set<Urn>();
  const withStatus = new Set<Urn>();

  for (const event of events) {
    if (!seenSet.has(event.entityUrn)) {
      seenSet.add(event.entityUrn);
      seen.push(event.entityUrn);
    }
    if (event.aspectName === 'status') {
      withStatus.add(event.entityUrn);
    }
    yield event;
  }

  for (const entityUrn of seen) {
    if (!withStatus.has(entityUrn)) {
      yield { entityUrn, aspectName: 'status', changeType: 'UPSERT', payload: { removed: false } };
    }
  }
}

/**
 * Lowercase the name of every dataset URN
 */
export function* lowercaseUrns(events: Iterable<ChangeEvent>): Generator<ChangeEvent> {
  for (const event of events) {
    yield { ...event, entityUrn: lowercaseDatasetUrn(event.entityUrn) };
  }
}

export type UsageGranularity = 'HOUR' | 'DAY';

const BUCKET_MILLIS: Record<UsageGranularity, number> = {
  HOUR: 60 * 60 * 1000,
  DAY: 24 * 60 * 60 * 1000,
};

/**
 * Half-open window [start, end) split into buckets from `start`
 */
export type UsageWindow = {
  start: EpochMillis;
  end: EpochMillis;
  granularity?: UsageGranularity;
};

export type FillEmptyUsageOptions = {
  /**
   * Entities that should have usage; others are passed through untouched
   */
  entityUrns: Iterable<Urn>;
  window: UsageWindow;

  /**
   * Fill every empty bucket instead of only entities with no usage at all
   */
  allBuckets?: boolean;
  logger?: Logger;
};

/**
 * Start of every bucket in the window
 */
export function usageBuckets(window: UsageWindow): EpochMillis[] {
  const size = BUCKET_MILLIS[window.granularity ?? 'DAY'];
  const buckets: EpochMillis[] = [];
  for (let bucket = window.start; bucket < window.end; bucket += size) {
    buckets.push(bucket);
  }
  return buckets;
}

// Date cannot represent every JSON number; those are shown raw.
function describeTimestamp(timestamp: EpochMillis): string {
  const date = new Date(timestamp);
  return Number.isFinite(date.getTime()) ? date.toISOString() : String(timestamp);
}

function emptyUsage(timestampMillis: EpochMillis, granularity: UsageGranularity) {
  return {
    timestampMillis,
    eventGranularity: { unit: granularity, multiple: 1 },
    uniqueUserCount: 0,
    totalSqlQueries: 0,
    topSqlQueries: [],
    userCounts: [],
    fieldCounts: [],
  };
}

/**
 * Pass events through, then emit zero-valued usage for the gaps.
 *
 * With allBuckets, every (entity, bucket) without usage gets a CREATE.
 * Otherwise only entities with no usage in the window get one UPSERT, at the
 * first bucket. Usage outside the window is ignored with a warning.
 */
export function* fillEmptyUsageBuckets(
  events: Iterable<ChangeEvent>,
  options: FillEmptyUsageOptions
): Generator<ChangeEvent> {
  const { window } = options;
  const logger = options.logger ?? silentLogger;
  const granularity = window.granularity ?? 'DAY';
  const size = BUCKET_MILLIS[granularity];
  const filled = new Map<Urn, Set<EpochMillis>>();

  for (const event of events) {
    if (event.aspectName === USAGE_ASPECT && 'payload' in event) {
      const timestamp = event.payload.timestampMillis;
      if (typeof timestamp === 'number' && timestamp >= window.start && timestamp < window.end) {
        const bucket = window.start + Math.floor((timestamp - window.start) / size) * size;
        const buckets = filled.get(event.entityUrn) ?? new Set<EpochMillis>();
        buckets.add(bucket);
        filled.set(event.entityUrn, buckets);
      } else if (typeof timestamp === 'number') {
        logger.warn(`Usage bucket ${describeTimestamp(timestamp)} is outside the usage window; ignoring it`, {
          entityUrn: event.entityUrn,
        });
      }
    }
    yield event;
  }

  const buckets = usageBuckets(window);
  if (buckets.length === 0) {
    return;
  }

  for (const entityUrn of options.entityUrns) {
    const present = filled.get(entityUrn);
    if (options.allBuckets) {
      for (const bucket of buckets) {
        if (!present?.has(bucket)) {
          yield {
            entityUrn,
            aspectName: USAGE_ASPECT,
            changeType: 'CREATE',
            payload: emptyUsage(bucket, granularity),
          };
        }
      }
    } else if (!present) {
      yield {
        entityUrn,
        aspectName: USAGE_ASPECT,
        changeType: 'UPSERT',
        payload: emptyUsage(buckets[0], granularity),
      };
    }
  }
}

function eventFields(event: ChangeEvent): AspectPayload | null {
  switch (event.changeType) {
    case 'DELETE':
      return null;
    case 'PATCH':
      return event.patch;
    default:
      return event.payload;
  }
}

/**
 * Pass events through, then PATCH datasetProperties.lastModified to the
 * latest operation.lastUpdatedTimestamp of each entity.
 *
 * Entities whose stream already sets datasetProperties.lastModified are left
 * alone. The PATCH needs a datasetProperties aspect to apply to.
 */
export function* patchLastModified(events: Iterable<ChangeEvent>): Generator<ChangeEvent> {
  const latest = new Map<Urn, EpochMillis>();
  const alreadySet = new Set<Urn>();

  for (const event of events) {
    const fields = eventFields(event);
    if (fields && event.aspectName === OPERATION_ASPECT) {
      const updated = fields.lastUpdatedTimestamp;
      const current = latest.get(event.entityUrn);
      if (typeof updated === 'number' && (current === undefined || updated > current)) {
        latest.set(event.entityUrn, updated);
      }
    } else if (fields && event.aspectName === DATASET_PROPERTIES_ASPECT && !isAbsent(fields.lastModified)) {
      alreadySet.add(event.entityUrn);
    }
    yield event;
  }

  for (const [entityUrn, time] of latest) {
    if (!alreadySet.has(entityUrn)) {
      yield {
        entityUrn,
        aspectName: DATASET_PROPERTIES_ASPECT,
        changeType: 'PATCH',
        patch: { lastModified: { time } },
      };
    }
  }
}

export type BrowsePathEntry = {
  id: string;
  urn?: Urn;
};

export type BrowsePathOptions = {
  /**
   * With platformInstance, every path starts at the platform instance
   */
  platform?: string;
  platformInstance?: string;
  logger?: Logger;
};

function isBrowsePathEntry(value: unknown): value is BrowsePathEntry {
  if (typeof value !== 'object' || value === null || !('id' in value) || typeof value.id !== 'string') {
    return false;
  }
  return !('urn' in value) || value.urn === undefined || typeof value.urn === 'string';
}

function readBrowsePath(fields: AspectPayload): BrowsePathEntry[] | null {
  const path = fields.path;
  if (!Array.isArray(path)) {
    return null;
  }
  const entries: BrowsePathEntry[] = [];
  for (const entry of path) {
    if (!isBrowsePathEntry(entry)) {
      return null;
    }
    entries.push(entry);
  }
  return entries;
}

/**
 * Pass events through and give every entity a browsePathsV2 derived from its
 * container chain, emitted as soon as the stream moves on to another entity.
 *
 * Containers must precede their children. A browsePathsV2 sent by the source
 * is kept and used as the base for its descendants. With a platform instance,
 * paths are rooted at that instance.
 */
export function* withBrowsePaths(
  events: Iterable<ChangeEvent>,
  options: BrowsePathOptions = {}
): Generator<ChangeEvent> {
  const logger = options.logger ?? silentLogger;
  const root: BrowsePathEntry[] = [];
  if (options.platform && options.platformInstance) {
    const instanceUrn = makeDataPlatformInstanceUrn(options.platform, options.platformInstance);
    root.push({ id: instanceUrn, urn: instanceUrn });
  }

  const parents = new Map<Urn, Urn>();
  const paths = new Map<Urn, BrowsePathEntry[]>();
  const live = new Set<Urn>();

  const pathOf = (entityUrn: Urn, visiting: Set<Urn>): BrowsePathEntry[] => {
    const known = paths.get(entityUrn);
    if (known) {
      return known;
    }
    const parent = parents.get(entityUrn);
    if (!parent || visiting.has(parent)) {
      return [...root];
    }
    visiting.add(entityUrn);
    return [...pathOf(parent, visiting), { id: parent, urn: parent }];
  };

  function* settle(entityUrn: Urn): Generator<ChangeEvent> {
    if (paths.has(entityUrn) || !live.has(entityUrn)) {
      return;
    }
    const path = pathOf(entityUrn, new Set());
    paths.set(entityUrn, path);
    yield { entityUrn, aspectName: BROWSE_PATHS_ASPECT, changeType: 'UPSERT', payload: { path } };
  }

  let previous: Urn | null = null;
  for (const event of events) {
    if (previous !== null && previous !== event.entityUrn) {
      yield* settle(previous);
    }
    previous = event.entityUrn;

    const fields = eventFields(event);
    if (fields) {
      live.add(event.entityUrn);
    }

    if (fields && event.aspectName === CONTAINER_ASPECT && typeof fields.container === 'string') {
      if (paths.has(event.entityUrn)) {
        logger.warn('Container arrived after the browse path was emitted', { entityUrn: event.entityUrn });
      }
      parents.set(event.entityUrn, fields.container);
    }

    if (event.aspectName === BROWSE_PATHS_ASPECT && event.changeType !== 'PATCH' && event.changeType !== 'DELETE') {
      const declared = readBrowsePath(event.payload);
      if (declared) {
        if (paths.has(event.entityUrn)) {
          logger.warn('Browse path arrived after one was emitted', { entityUrn: event.entityUrn });
        }
        const first = declared[0];
        const rooted =
          root.length === 0 || (first !== undefined && first.id === root[0].id) ? declared : [...root, ...declared];
        paths.set(event.entityUrn, rooted);
        if (rooted !== declared) {
          yield { ...event, payload: { ...event.payload, path: rooted } };
          continue;
        }
      }
    }

    yield event;
  }

  if (previous !== null) {
    yield* settle(previous);
  }
}
