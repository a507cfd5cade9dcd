import { describe, it, expect } from 'vitest';
import {
  makeContainerUrn,
  makeDataPlatformInstanceUrn,
  makeDatasetUrn,
  type ChangeEvent,
} from '@metagraph/protocol';
import {
  fillEmptyUsageBuckets,
  lowercaseUrns,
  patchLastModified,
  usageBuckets,
  withBrowsePaths,
  withStatusAspects,
  workUnitId,
} from './helpers.js';
import { createCapturingLogger } from '../logging/index.js';

const DAY = 24 * 60 * 60 * 1000;
const JAN_1 = Date.UTC(2023, 0, 1);

const ORDERS = makeDatasetUrn('hive', 'db.Orders');
const ITEMS = makeDatasetUrn('hive', 'db.items');

function usage(entityUrn: string, timestampMillis: number): ChangeEvent {
  return {
    entityUrn,
    aspectName: 'datasetUsageStatistics',
    changeType: 'UPSERT',
    payload: { timestampMillis, uniqueUserCount: 1, totalSqlQueries: 1 },
  };
}

function emptyUsage(timestampMillis: number) {
  return {
    timestampMillis,
    eventGranularity: { unit: 'DAY', multiple: 1 },
    uniqueUserCount: 0,
    totalSqlQueries: 0,
    topSqlQueries: [],
    userCounts: [],
    fieldCounts: [],
  };
}

describe('workUnitId', () => {
  it('joins entity and aspect', () => {
    expect(workUnitId({ entityUrn: 'urn:li:corpuser:alice', aspectName: 'status' })).toBe(
      'urn:li:corpuser:alice-status'
    );
  });
});

describe('withStatusAspects', () => {
  it('adds a status for entities that have none, in first-seen order', () => {
    const events: ChangeEvent[] = [
      { entityUrn: ITEMS, aspectName: 'datasetProperties', changeType: 'UPSERT', payload: { name: 'items' } },
      { entityUrn: ORDERS, aspectName: 'datasetProperties', changeType: 'UPSERT', payload: { name: 'orders' } },
      { entityUrn: ORDERS, aspectName: 'status', changeType: 'UPSERT', payload: { removed: true } },
    ];

    const out = Array.from(withStatusAspects(events));

    expect(out.slice(0, 3)).toEqual(events);
    expect(out.slice(3)).toEqual([
      { entityUrn: ITEMS, aspectName: 'status', changeType: 'UPSERT', payload: { removed: false } },
    ]);
  });
});

describe('lowercaseUrns', () => {
  it('lowercases dataset names only', () => {
    const events: ChangeEvent[] = [
      { entityUrn: ORDERS, aspectName: 'status', changeType: 'DELETE' },
      { entityUrn: 'urn:li:corpuser:Alice', aspectName: 'status', changeType: 'DELETE' },
    ];

    expect(Array.from(lowercaseUrns(events)).map((e) => e.entityUrn)).toEqual([
      'urn:li:dataset:(urn:li:dataPlatform:hive,db.orders,PROD)',
      'urn:li:corpuser:Alice',
    ]);
  });
});

describe('usageBuckets', () => {
  it('splits a half-open window', () => {
    expect(usageBuckets({ start: JAN_1, end: JAN_1 + 2 * DAY })).toEqual([JAN_1, JAN_1 + DAY]);
    expect(usageBuckets({ start: JAN_1, end: JAN_1 + 3_600_000, granularity: 'HOUR' })).toEqual([JAN_1]);
  });
});

describe('fillEmptyUsageBuckets', () => {
  const window = { start: JAN_1, end: JAN_1 + DAY };

  it('adds one UPSERT for entities without usage', () => {
    const logger = createCapturingLogger();
    const events = [usage(ORDERS, JAN_1)];

    const out = Array.from(
      fillEmptyUsageBuckets(events, { entityUrns: [ORDERS, ITEMS], window, logger })
    );

    expect(out).toEqual([
      ...events,
      {
        entityUrn: ITEMS,
        aspectName: 'datasetUsageStatistics',
        changeType: 'UPSERT',
        payload: emptyUsage(JAN_1),
      },
    ]);
    expect(logger.entries).toEqual([]);
  });

  it('fills every empty bucket with CREATE and warns about usage outside the window', () => {
    const logger = createCapturingLogger();
    const events = [usage(ORDERS, 0)];

    const out = Array.from(
      fillEmptyUsageBuckets(events, { entityUrns: [ORDERS], window, allBuckets: true, logger })
    );

    expect(out).toEqual([
      ...events,
      {
        entityUrn: ORDERS,
        aspectName: 'datasetUsageStatistics',
        changeType: 'CREATE',
        payload: emptyUsage(JAN_1),
      },
    ]);
    expect(logger.entries.map((e) => [e.level, e.message])).toEqual([
      ['warn', 'Usage bucket 1970-01-01T00:00:00.000Z is outside the usage window; ignoring it'],
    ]);
  });

  it('reports timestamps Date cannot represent as raw numbers', () => {
    const logger = createCapturingLogger();
    const events = [usage(ORDERS, 1e17)];

    const out = Array.from(fillEmptyUsageBuckets(events, { entityUrns: [], window, logger }));

    expect(out).toEqual(events);
    expect(logger.entries.map((e) => [e.level, e.message])).toEqual([
      ['warn', 'Usage bucket 100000000000000000 is outside the usage window; ignoring it'],
    ]);
  });

  it('skips buckets that already have usage', () => {
    const twoDays = { start: JAN_1, end: JAN_1 + 2 * DAY };

    const out = Array.from(
      fillEmptyUsageBuckets([usage(ORDERS, JAN_1 + 1000)], {
        entityUrns: [ORDERS],
        window: twoDays,
        allBuckets: true,
      })
    );

    expect(out.slice(1).map((e) => ('payload' in e ? e.payload.timestampMillis : null))).toEqual([JAN_1 + DAY]);
  });
});

describe('patchLastModified', () => {
  const DBT = makeDatasetUrn('dbt', 'abc.foo.bar');

  function operation(timestampMillis: number, lastUpdatedTimestamp: number): ChangeEvent {
    return {
      entityUrn: DBT,
      aspectName: 'operation',
      changeType: 'UPSERT',
      payload: { timestampMillis, lastUpdatedTimestamp, operationType: 'CREATE' },
    };
  }

  function propertiesPatch(patch: Record<string, unknown>): ChangeEvent {
    return { entityUrn: DBT, aspectName: 'datasetProperties', changeType: 'PATCH', patch };
  }

  const operations = [operation(10, 12), operation(11, 20)];
  const generated: ChangeEvent = propertiesPatch({ lastModified: { time: 20 } });

  it('leaves streams without operations unchanged', () => {
    const events: ChangeEvent[] = [
      { entityUrn: makeContainerUrn('c1'), aspectName: 'status', changeType: 'UPSERT', payload: { removed: false } },
      usage(ORDERS, JAN_1),
    ];

    expect(Array.from(patchLastModified(events))).toEqual(events);
  });

  it('patches lastModified to the latest operation update', () => {
    expect(Array.from(patchLastModified(operations))).toEqual([...operations, generated]);
  });

  it('adds its own patch next to a source patch of other properties', () => {
    const events = [...operations, propertiesPatch({ name: 'foo', description: 'it is fake' })];

    expect(Array.from(patchLastModified(events))).toEqual([...events, generated]);
  });

  it('adds nothing when the source already patches lastModified', () => {
    const events = [...operations, propertiesPatch({ name: 'foo', lastModified: { time: 20 } })];

    expect(Array.from(patchLastModified(events))).toEqual(events);
  });

  it('adds the patch when the source patch clears lastModified', () => {
    const events = [...operations, propertiesPatch({ name: 'foo', lastModified: null })];

    expect(Array.from(patchLastModified(events))).toEqual([...events, generated]);
  });
});

describe('withBrowsePaths', () => {
  const A = makeContainerUrn('a');
  const B = makeContainerUrn('b');
  const C = makeContainerUrn('c');

  function status(entityUrn: string): ChangeEvent {
    return { entityUrn, aspectName: 'status', changeType: 'UPSERT', payload: { removed: false } };
  }

  function container(entityUrn: string, parent: string): ChangeEvent {
    return { entityUrn, aspectName: 'container', changeType: 'UPSERT', payload: { container: parent } };
  }

  function browsePath(entityUrn: string, path: Array<{ id: string; urn?: string }>): ChangeEvent {
    return { entityUrn, aspectName: 'browsePathsV2', changeType: 'UPSERT', payload: { path } };
  }

  const hierarchy = [status(A), container(B, A), status(B), container(C, B), status(C)];

  it('emits each path once the stream moves past the entity', () => {
    expect(Array.from(withBrowsePaths(hierarchy))).toEqual([
      status(A),
      browsePath(A, []),
      container(B, A),
      status(B),
      browsePath(B, [{ id: A, urn: A }]),
      container(C, B),
      status(C),
      browsePath(C, [
        { id: A, urn: A },
        { id: B, urn: B },
      ]),
    ]);
  });

  it('roots paths at the platform instance', () => {
    const instance = makeDataPlatformInstanceUrn('mysql', 'eu-west');
    const root = { id: instance, urn: instance };

    const paths = Array.from(withBrowsePaths(hierarchy, { platform: 'mysql', platformInstance: 'eu-west' }))
      .filter((e) => e.aspectName === 'browsePathsV2')
      .map((e) => ('payload' in e ? e.payload.path : null));

    expect(paths).toEqual([[root], [root, { id: A, urn: A }], [root, { id: A, urn: A }, { id: B, urn: B }]]);
  });

  it('keeps a path sent by the source and builds descendants on it', () => {
    const declared = browsePath(A, [{ id: 'my' }, { id: 'path' }]);
    const events = [status(A), declared, container(B, A), status(B)];

    expect(Array.from(withBrowsePaths(events))).toEqual([
      status(A),
      declared,
      container(B, A),
      status(B),
      browsePath(B, [{ id: 'my' }, { id: 'path' }, { id: A, urn: A }]),
    ]);
  });

  it('prefixes a source path with the platform instance', () => {
    const instance = makeDataPlatformInstanceUrn('mysql', 'eu-west');
    const events = [status(A), browsePath(A, [{ id: 'my' }])];

    expect(Array.from(withBrowsePaths(events, { platform: 'mysql', platformInstance: 'eu-west' }))).toEqual([
      status(A),
      browsePath(A, [{ id: instance, urn: instance }, { id: 'my' }]),
    ]);
  });

  it('warns when a container arrives after the path was emitted', () => {
    const logger = createCapturingLogger();
    const events = [status(B), status(A), container(B, A)];

    const out = Array.from(withBrowsePaths(events, { logger }));

    expect(out).toEqual([status(B), browsePath(B, []), status(A), browsePath(A, []), container(B, A)]);
    expect(logger.entries.map((e) => [e.level, e.message, e.data])).toEqual([
      ['warn', 'Container arrived after the browse path was emitted', { entityUrn: B }],
    ]);
  });

  it('skips entities that are only deleted', () => {
    const events: ChangeEvent[] = [{ entityUrn: A, aspectName: 'status', changeType: 'DELETE' }];

    expect(Array.from(withBrowsePaths(events))).toEqual(events);
  });
});
