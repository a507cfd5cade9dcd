// Bundle export functionality.
// Writes the current aspect state and the time-series log to a bundle folder.

import type { RepositoryContext } from '../interfaces/repository-context.js';
import type { BundleWriter, ExportOptions, ExportSummary } from './types.js';
import {
  BUNDLE_FORMAT_VERSION,
  manifestPath,
  aspectsLogPath,
  timeseriesLogPath,
  stringifyNdjsonLine,
  type AspectBundleRecord,
  type BundleManifest,
  type TimeseriesBundleRecord,
} from '@metagraph/protocol';

/**
 * Export the repository state to an aspect bundle.
 *
 * The bundle holds every live versioned aspect (tombstones and history are
 * not exported) and every time-series record in arrival order.
 *
 * @param bundlePath - Root path for the bundle
 * @returns Summary of the export operation
 */
export async function exportAspectBundle(
  repos: RepositoryContext,
  writer: BundleWriter,
  bundlePath: string,
  options: ExportOptions = {}
): Promise<ExportSummary> {
  const joinPath = (...parts: string[]) => parts.join('/');

  if (!options.overwrite && (await writer.exists(joinPath(bundlePath, manifestPath())))) {
    throw new Error(`Bundle already exists at ${bundlePath}`);
  }

  const summary: ExportSummary = {
    bundlePath,
    aspectCount: 0,
    timeseriesCount: 0,
    exportedAt: new Date().toISOString(),
  };

  await writer.mkdir(bundlePath);

  let aspectLines = '';
  for await (const aspect of repos.aspects.stream()) {
    const record: AspectBundleRecord = {
      entityUrn: aspect.entityUrn,
      aspectName: aspect.aspectName,
      version: aspect.version,
      payload: aspect.payload,
      changeType: aspect.changeType,
      lastModified: aspect.lastModified,
    };
    aspectLines += stringifyNdjsonLine(record);
    summary.aspectCount++;
  }
  await writer.writeFile(joinPath(bundlePath, aspectsLogPath()), aspectLines);

  let timeseriesLines = '';
  for await (const record of repos.timeseries.stream()) {
    const line: TimeseriesBundleRecord = {
      entityUrn: record.entityUrn,
      aspectName: record.aspectName,
      bucketTimestamp: record.bucketTimestamp,
      payload: record.payload,
      restatement: record.restatement,
      recordedAt: record.recordedAt,
    };
    timeseriesLines += stringifyNdjsonLine(line);
    summary.timeseriesCount++;
  }
  await writer.writeFile(joinPath(bundlePath, timeseriesLogPath()), timeseriesLines);

  // Manifest is written last; its presence marks a complete bundle
  const manifest: BundleManifest = {
    formatVersion: BUNDLE_FORMAT_VERSION,
    exportedAt: summary.exportedAt,
    aspectCount: summary.aspectCount,
    timeseriesCount: summary.timeseriesCount,
  };
  await writer.writeFile(
    joinPath(bundlePath, manifestPath()),
    JSON.stringify(manifest, null, 2) + '\n'
  );

  return summary;
}
