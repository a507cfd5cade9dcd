// Bundle storage seams and the options and summaries of import/export

import type { AspectBundleRecord, TimeseriesBundleRecord } from '@metagraph/protocol';

export interface BundleWriter {
  /**
   * Write a whole file, creating its parent directories
   */
  writeFile(path: string, content: string): Promise<void>;
  mkdir(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
}

export interface BundleReader {
  exists(path: string): Promise<boolean>;
  isDirectory(path: string): Promise<boolean>;
  readFile(path: string): Promise<string>;
}

/**
 * Storage that can both hold and serve bundles
 */
export type BundleStorage = BundleReader & BundleWriter;

export type ExportSummary = {
  bundlePath: string;
  aspectCount: number;
  timeseriesCount: number;
  exportedAt: string;
};

export type ImportSummary = {
  bundlePath: string;
  aspectCount: number;
  timeseriesCount: number;
  importedAt: string;
  warnings: string[];
};

/**
 * A parsed bundle line, tagged with the log it came from
 */
export type BundleRecord =
  | { kind: 'aspect'; record: AspectBundleRecord }
  | { kind: 'timeseries'; record: TimeseriesBundleRecord };

/**
 * Checks a record against the aspects the store accepts.
 * Returns the problem, or null when the record may be imported.
 */
export type BundleRecordValidator = (entry: BundleRecord) => string | null;

export type ImportOptions = {
  /**
   * Skip aspects that already have a live value instead of failing
   * @default false
   */
  skipExisting?: boolean;

  /**
   * Run on every line after it parses and before anything is written
   */
  validateRecord?: BundleRecordValidator;
};

export type ExportOptions = {
  /**
   * Replace a bundle already present at the target path.
   * @default false
   */
  overwrite?: boolean;
};
