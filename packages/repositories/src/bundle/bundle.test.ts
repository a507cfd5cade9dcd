// Tests for bundle import/export functionality.
// Verifies round-trip: export → import → verify identical state.

import { describe, it, expect, beforeEach } from 'vitest';
import { exportAspectBundle } from './export.js';
import { BundleConflictError, importAspectBundle, InvalidBundleError } from './import.js';
import { createMemoryBundleStorage } from './fs.js';
import type { BundleRecord } from './types.js';
import type { RepositoryContext } from '../interfaces/repository-context.js';
import { createInMemoryRepositoryContext, type InMemoryRepositoryContext } from '../in-memory/index.js';

const ORDERS = 'urn:li:dataset:(urn:li:dataPlatform:hive,db.orders,PROD)';
const CUSTOMERS = 'urn:li:dataset:(urn:li:dataPlatform:hive,db.customers,PROD)';

const MANIFEST = JSON.stringify({
  formatVersion: 1,
  exportedAt: '2024-01-01T00:00:00.000Z',
  aspectCount: 1,
  timeseriesCount: 0,
});

function aspectLine(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    entityUrn: ORDERS,
    aspectName: 'status',
    version: 2,
    payload: { removed: false },
    changeType: 'UPSERT',
    lastModified: '2024-01-01T00:00:00.000Z',
    ...overrides,
  });
}

function readerOf(files: Map<string, string>) {
  return createMemoryBundleStorage(files).storage;
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe('bundle export/import', () => {
  let source: InMemoryRepositoryContext;

  beforeEach(async () => {
    source = createInMemoryRepositoryContext();

    await source.aspects.write({
      entityUrn: ORDERS,
      aspectName: 'status',
      version: 1,
      payload: { removed: false },
      changeType: 'CREATE',
      expectedVersion: null,
      timestamp: '2024-01-01T00:00:00.000Z',
    });
    await source.aspects.write({
      entityUrn: ORDERS,
      aspectName: 'status',
      version: 2,
      payload: { removed: true },
      changeType: 'UPSERT',
      expectedVersion: 1,
      timestamp: '2024-01-02T00:00:00.000Z',
    });
    await source.aspects.write({
      entityUrn: CUSTOMERS,
      aspectName: 'datasetProperties',
      version: 1,
      payload: { description: 'Customers' },
      changeType: 'CREATE',
      expectedVersion: null,
      timestamp: '2024-01-03T00:00:00.000Z',
    });
    await source.aspects.write({
      entityUrn: CUSTOMERS,
      aspectName: 'status',
      version: 1,
      payload: { removed: false },
      changeType: 'CREATE',
      expectedVersion: null,
    });
    await source.aspects.remove(CUSTOMERS, 'status', 1);

    await source.timeseries.append({
      entityUrn: ORDERS,
      aspectName: 'datasetUsageStatistics',
      bucketTimestamp: 86_400_000,
      payload: { timestampMillis: 86_400_000, uniqueUserCount: 3 },
      restatement: false,
      recordedAt: '2024-01-04T00:00:00.000Z',
    });
    await source.timeseries.append({
      entityUrn: ORDERS,
      aspectName: 'datasetUsageStatistics',
      bucketTimestamp: 0,
      payload: { timestampMillis: 0, uniqueUserCount: 1 },
      restatement: true,
      recordedAt: '2024-01-05T00:00:00.000Z',
    });
  });

  it('writes live aspects, the time-series log and a manifest', async () => {
    const { storage: writer, files } = createMemoryBundleStorage();

    const summary = await exportAspectBundle(source, writer, 'bundle');

    expect(summary.aspectCount).toBe(2);
    expect(summary.timeseriesCount).toBe(2);
    expect(Array.from(files.keys()).sort()).toEqual([
      'bundle/aspects.ndjson',
      'bundle/manifest.json',
      'bundle/timeseries.ndjson',
    ]);

    const aspectLines = (files.get('bundle/aspects.ndjson') ?? '').trim().split('\n');
    expect(aspectLines.map((l) => JSON.parse(l))).toEqual([
      {
        entityUrn: CUSTOMERS,
        aspectName: 'datasetProperties',
        version: 1,
        payload: { description: 'Customers' },
        changeType: 'CREATE',
        lastModified: '2024-01-03T00:00:00.000Z',
      },
      {
        entityUrn: ORDERS,
        aspectName: 'status',
        version: 2,
        payload: { removed: true },
        changeType: 'UPSERT',
        lastModified: '2024-01-02T00:00:00.000Z',
      },
    ]);

    const manifest = JSON.parse(files.get('bundle/manifest.json') ?? '{}');
    expect(manifest).toMatchObject({ formatVersion: 1, aspectCount: 2, timeseriesCount: 2 });
  });

  it('restores the same state into empty repositories', async () => {
    const { storage: writer, files } = createMemoryBundleStorage();
    await exportAspectBundle(source, writer, 'bundle');

    const target = createInMemoryRepositoryContext();
    const summary = await importAspectBundle(target, readerOf(files), 'bundle');

    expect(summary.aspectCount).toBe(2);
    expect(summary.timeseriesCount).toBe(2);
    expect(summary.warnings).toEqual([]);

    expect(await collect(target.aspects.stream())).toEqual(await collect(source.aspects.stream()));

    const records = await collect(target.timeseries.stream());
    expect(records.map((r) => [r.bucketTimestamp, r.restatement, r.sequence])).toEqual([
      [86_400_000, false, 1],
      [0, true, 2],
    ]);
  });

  it('refuses to overwrite an existing bundle unless asked', async () => {
    const { storage: writer } = createMemoryBundleStorage();
    await exportAspectBundle(source, writer, 'bundle');

    await expect(exportAspectBundle(source, writer, 'bundle')).rejects.toThrow(
      'Bundle already exists at bundle'
    );
    await expect(
      exportAspectBundle(source, writer, 'bundle', { overwrite: true })
    ).resolves.toMatchObject({ aspectCount: 2 });
  });

  it('fails on a live aspect unless skipExisting is set', async () => {
    const files = new Map([
      ['bundle/manifest.json', MANIFEST],
      ['bundle/aspects.ndjson', aspectLine({ version: 1 }) + '\n'],
    ]);

    await expect(importAspectBundle(source, readerOf(files), 'bundle')).rejects.toThrow(
      `Aspect status of ${ORDERS} already exists`
    );

    const summary = await importAspectBundle(source, readerOf(files), 'bundle', {
      skipExisting: true,
    });
    expect(summary.aspectCount).toBe(0);
    expect(summary.warnings).toEqual([`Aspect status of ${ORDERS} already exists, skipping`]);
  });

  it('continues the version sequence over a tombstone', async () => {
    const files = new Map([
      ['bundle/manifest.json', MANIFEST],
      ['bundle/aspects.ndjson', aspectLine({ entityUrn: CUSTOMERS, version: 1 }) + '\n'],
    ]);

    const summary = await importAspectBundle(source, readerOf(files), 'bundle');

    const restored = await source.aspects.get(CUSTOMERS, 'status');
    expect(restored?.version).toBe(2);
    expect(restored?.removed).toBe(false);
    expect(summary.warnings).toEqual([
      `Aspect status of ${CUSTOMERS} imported as version 2 instead of 1`,
    ]);
  });

  it('rejects malformed lines before writing anything', async () => {
    const target = createInMemoryRepositoryContext();
    const files = new Map([
      ['bundle/manifest.json', MANIFEST],
      ['bundle/aspects.ndjson', aspectLine() + '\n' + aspectLine({ entityUrn: 'orders' }) + '\n'],
    ]);

    await expect(
      importAspectBundle(target, readerOf(files), 'bundle')
    ).rejects.toThrow('Invalid bundle: aspects.ndjson line 2: entityUrn: must be a URN');
    expect(target._data.aspects.size).toBe(0);
  });

  it('requires a manifest with a known format version', async () => {
    const target = createInMemoryRepositoryContext();

    await expect(
      importAspectBundle(
        target,
        readerOf(new Map([['bundle/aspects.ndjson', aspectLine()]])),
        'bundle'
      )
    ).rejects.toThrow('Invalid bundle: missing manifest.json');

    await expect(
      importAspectBundle(
        target,
        readerOf(
          new Map([['bundle/manifest.json', JSON.stringify({ ...JSON.parse(MANIFEST), formatVersion: 2 })]])
        ),
        'bundle'
      )
    ).rejects.toBeInstanceOf(InvalidBundleError);
  });

  it('warns when the manifest counts disagree with the files', async () => {
    const target = createInMemoryRepositoryContext();
    const files = new Map([
      ['bundle/manifest.json', MANIFEST],
      ['bundle/aspects.ndjson', ''],
    ]);

    const summary = await importAspectBundle(target, readerOf(files), 'bundle');

    expect(summary.warnings).toEqual([
      'Manifest counts (1 aspects, 0 time-series records) do not match bundle contents (0, 0)',
    ]);
  });

  it('checks every aspect against the store before writing any', async () => {
    const files = new Map([
      ['bundle/manifest.json', JSON.stringify({ ...JSON.parse(MANIFEST), aspectCount: 2 })],
      ['bundle/aspects.ndjson', [aspectLine({ entityUrn: CUSTOMERS }), aspectLine()].join('\n') + '\n'],
    ]);

    await expect(importAspectBundle(source, readerOf(files), 'bundle')).rejects.toBeInstanceOf(
      BundleConflictError
    );

    const tombstone = await source.aspects.get(CUSTOMERS, 'status');
    expect(tombstone?.removed).toBe(true);
    expect(tombstone?.version).toBe(1);
  });

  it('rejects records the validator refuses and leaves the store untouched', async () => {
    const target = createInMemoryRepositoryContext();
    const known = new Set(['status', 'datasetUsageStatistics']);
    const seen: string[] = [];
    const validateRecord = (entry: BundleRecord) => {
      seen.push(`${entry.kind}:${entry.record.aspectName}`);
      return known.has(entry.record.aspectName) ? null : `unknown aspect ${entry.record.aspectName}`;
    };
    const files = new Map([
      ['bundle/manifest.json', MANIFEST],
      [
        'bundle/aspects.ndjson',
        [aspectLine({ entityUrn: CUSTOMERS }), aspectLine({ aspectName: 'notARegisteredAspect' })].join('\n'),
      ],
    ]);

    await expect(importAspectBundle(target, readerOf(files), 'bundle', { validateRecord })).rejects.toThrow(
      'Invalid bundle: aspects.ndjson line 2: unknown aspect notARegisteredAspect'
    );
    expect(seen).toEqual(['aspect:status', 'aspect:notARegisteredAspect']);
    expect(target._data.aspects.size).toBe(0);
  });

  it('passes time-series lines to the validator too', async () => {
    const target = createInMemoryRepositoryContext();
    const files = new Map([
      ['bundle/manifest.json', MANIFEST],
      [
        'bundle/timeseries.ndjson',
        JSON.stringify({
          entityUrn: ORDERS,
          aspectName: 'status',
          bucketTimestamp: 0,
          payload: { removed: false },
          restatement: false,
          recordedAt: '2024-01-01T00:00:00.000Z',
        }),
      ],
    ]);

    await expect(
      importAspectBundle(target, readerOf(files), 'bundle', {
        validateRecord: (entry) => (entry.kind === 'timeseries' ? 'status is not a time-series aspect' : null),
      })
    ).rejects.toThrow('Invalid bundle: timeseries.ndjson line 1: status is not a time-series aspect');
    expect(target._data.timeseries).toEqual([]);
  });

  it('rejects an aspect listed twice', async () => {
    const target = createInMemoryRepositoryContext();
    const files = new Map([
      ['bundle/manifest.json', MANIFEST],
      ['bundle/aspects.ndjson', [aspectLine(), aspectLine({ version: 3 })].join('\n')],
    ]);

    await expect(importAspectBundle(target, readerOf(files), 'bundle')).rejects.toThrow(
      `Invalid bundle: aspects.ndjson line 2: aspect status of ${ORDERS} appears twice`
    );
    expect(target._data.aspects.size).toBe(0);
  });

  it('writes through the transaction when the context has one', async () => {
    const target = createInMemoryRepositoryContext();
    let transactions = 0;
    const transactional = {
      aspects: target.aspects,
      timeseries: target.timeseries,
      async transaction<T>(fn: (repos: RepositoryContext) => Promise<T>): Promise<T> {
        transactions++;
        return fn(target);
      },
    };
    const files = new Map([
      ['bundle/manifest.json', MANIFEST],
      ['bundle/aspects.ndjson', aspectLine()],
    ]);

    const summary = await importAspectBundle(transactional, readerOf(files), 'bundle');

    expect(transactions).toBe(1);
    expect(summary.aspectCount).toBe(1);
    expect((await target.aspects.get(ORDERS, 'status'))?.version).toBe(2);
  });
});

describe('createMemoryBundleStorage', () => {
  it('treats the parents of written files as directories', async () => {
    const { storage, files } = createMemoryBundleStorage();

    await storage.writeFile('out/2024/manifest.json', '{}');

    expect(await storage.isDirectory('out')).toBe(true);
    expect(await storage.isDirectory('out/2024')).toBe(true);
    expect(await storage.isDirectory('out/2024/manifest.json')).toBe(false);
    expect(await storage.exists('out/2024/manifest.json')).toBe(true);
    expect(files.get('out/2024/manifest.json')).toBe('{}');
    await expect(storage.readFile('out/missing.json')).rejects.toThrow('No bundle file at out/missing.json');
  });
});
