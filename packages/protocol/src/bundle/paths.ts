// Aspect bundle path constants
// Defines the file layout for bundle interchange

/**
 * Root-level files in an aspect bundle
 */
export const BUNDLE_FILES = {
  MANIFEST: 'manifest.json',
  ASPECTS: 'aspects.ndjson',
  TIMESERIES: 'timeseries.ndjson',
} as const;

/**
 * Bundle format version written to the manifest
 */
export const BUNDLE_FORMAT_VERSION = 1;

/**
 * Path to the manifest of a bundle
 */
export function manifestPath(): string {
  return BUNDLE_FILES.MANIFEST;
}

/**
 * Path to the current versioned aspects (NDJSON, one aspect per line)
 */
export function aspectsLogPath(): string {
  return BUNDLE_FILES.ASPECTS;
}

/**
 * Path to the time-series log (NDJSON, arrival order)
 */
export function timeseriesLogPath(): string {
  return BUNDLE_FILES.TIMESERIES;
}
