// Bundle import functionality.
// Restores aspect state and the time-series log from a bundle folder.

import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import {
  runInTransaction,
  type RepositoryContext,
  type TransactionalRepositoryContext,
} from '../interfaces/repository-context.js';
import type { WriteAspectInput } from '../interfaces/aspect-repository.js';
import type { BundleReader, BundleRecord, ImportOptions, ImportSummary } from './types.js';
import {
  BundleManifestSchema,
  AspectBundleRecordSchema,
  TimeseriesBundleRecordSchema,
  manifestPath,
  aspectsLogPath,
  timeseriesLogPath,
  parseNdjsonLines,
  type AspectBundleRecord,
  type NdjsonLine,
} from '@metagraph/protocol';

/**
 * Error for bundles that are missing files or contain malformed records
 */
export class InvalidBundleError extends Error {
  readonly code = 'INVALID_BUNDLE';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidBundleError';
  }
}

/**
 * A bundle aspect collides with a live aspect in the store
 */
export class BundleConflictError extends Error {
  readonly code = 'BUNDLE_CONFLICT';

  constructor(
    readonly entityUrn: string,
    readonly aspectName: string
  ) {
    super(`Aspect ${aspectName} of ${entityUrn} already exists`);
    this.name = 'BundleConflictError';
  }
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

type Numbered<T> = { line: number; record: T };

/**
 * Import an aspect bundle into the repositories.
 *
 * Every line is parsed and passed to `validateRecord` first, then every aspect
 * is checked against the store, and only then is anything written. The checks
 * and writes share one transaction when the context offers one.
 *
 * A versioned aspect that already has a live value is a conflict; a tombstone
 * is overwritten with a version above the tombstone's.
 *
 * @param bundlePath - Root path of the bundle
 * @throws InvalidBundleError when a file or line is unusable, BundleConflictError
 * when an aspect is already live and skipExisting is off
 */
export async function importAspectBundle(
  repos: RepositoryContext | TransactionalRepositoryContext,
  reader: BundleReader,
  bundlePath: string,
  options: ImportOptions = {}
): Promise<ImportSummary> {
  const { skipExisting = false, validateRecord } = options;
  const joinPath = (...parts: string[]) => parts.join('/');

  if (!(await reader.isDirectory(bundlePath))) {
    throw new InvalidBundleError(`Invalid bundle: ${bundlePath} is not a directory`);
  }

  const manifestFile = joinPath(bundlePath, manifestPath());
  if (!(await reader.exists(manifestFile))) {
    throw new InvalidBundleError(`Invalid bundle: missing ${manifestPath()}`);
  }

  let manifestJson: unknown;
  try {
    manifestJson = JSON.parse(await reader.readFile(manifestFile));
  } catch (error) {
    throw new InvalidBundleError(`Invalid bundle: ${manifestPath()} is not JSON: ${describeError(error)}`);
  }
  const manifest = BundleManifestSchema.safeParse(manifestJson);
  if (!manifest.success) {
    throw new InvalidBundleError(`Invalid bundle: ${manifestPath()}: ${describeIssues(manifest.error)}`);
  }

  const readLog = async <T>(file: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<Numbered<T>[]> => {
    const filePath = joinPath(bundlePath, file);
    if (!(await reader.exists(filePath))) {
      return [];
    }
    let lines: NdjsonLine[];
    try {
      lines = parseNdjsonLines(await reader.readFile(filePath));
    } catch (error) {
      throw new InvalidBundleError(`Invalid bundle: ${file}: ${describeError(error)}`);
    }
    return lines.map(({ line, value }) => {
      const parsed = schema.safeParse(value);
      if (!parsed.success) {
        throw new InvalidBundleError(`Invalid bundle: ${file} line ${line}: ${describeIssues(parsed.error)}`);
      }
      return { line, record: parsed.data };
    });
  };

  const aspectRecords = await readLog(aspectsLogPath(), AspectBundleRecordSchema);
  const timeseriesRecords = await readLog(timeseriesLogPath(), TimeseriesBundleRecordSchema);

  const check = (file: string, line: number, entry: BundleRecord) => {
    const problem = validateRecord?.(entry);
    if (problem !== undefined && problem !== null) {
      throw new InvalidBundleError(`Invalid bundle: ${file} line ${line}: ${problem}`);
    }
  };

  const seen = new Set<string>();
  for (const { line, record } of aspectRecords) {
    check(aspectsLogPath(), line, { kind: 'aspect', record });
    const key = `${record.entityUrn}\u0000${record.aspectName}`;
    if (seen.has(key)) {
      throw new InvalidBundleError(
        `Invalid bundle: ${aspectsLogPath()} line ${line}: aspect ${record.aspectName} of ${record.entityUrn} appears twice`
      );
    }
    seen.add(key);
  }
  for (const { line, record } of timeseriesRecords) {
    check(timeseriesLogPath(), line, { kind: 'timeseries', record });
  }

  const summary: ImportSummary = {
    bundlePath,
    aspectCount: 0,
    timeseriesCount: 0,
    importedAt: new Date().toISOString(),
    warnings: [],
  };

  await runInTransaction(repos, async (tx) => {
    const writes: WriteAspectInput[] = [];
    const warnings: string[] = [];

    for (const { record } of aspectRecords) {
      const existing = await tx.aspects.get(record.entityUrn, record.aspectName);

      if (existing && !existing.removed) {
        if (!skipExisting) {
          throw new BundleConflictError(record.entityUrn, record.aspectName);
        }
        warnings.push(`Aspect ${record.aspectName} of ${record.entityUrn} already exists, skipping`);
        continue;
      }

      writes.push(toWrite(record, existing?.version ?? null, warnings));
    }

    for (const write of writes) {
      await tx.aspects.write(write);
    }
    for (const { record } of timeseriesRecords) {
      await tx.timeseries.append(record);
    }

    summary.aspectCount = writes.length;
    summary.timeseriesCount = timeseriesRecords.length;
    summary.warnings.push(...warnings);
  });

  if (
    manifest.data.aspectCount !== aspectRecords.length ||
    manifest.data.timeseriesCount !== timeseriesRecords.length
  ) {
    summary.warnings.push(
      `Manifest counts (${manifest.data.aspectCount} aspects, ${manifest.data.timeseriesCount} time-series records) do not match bundle contents (${aspectRecords.length}, ${timeseriesRecords.length})`
    );
  }

  return summary;
}

function toWrite(
  record: AspectBundleRecord,
  existingVersion: number | null,
  warnings: string[]
): WriteAspectInput {
  // Versions never go backwards, even across an import
  const version = existingVersion === null ? record.version : Math.max(record.version, existingVersion + 1);
  if (version !== record.version) {
    warnings.push(
      `Aspect ${record.aspectName} of ${record.entityUrn} imported as version ${version} instead of ${record.version}`
    );
  }

  return {
    entityUrn: record.entityUrn,
    aspectName: record.aspectName,
    version,
    payload: record.payload,
    changeType: record.changeType,
    expectedVersion: existingVersion,
    timestamp: record.lastModified,
  };
}
