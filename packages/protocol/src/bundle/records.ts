// Aspect bundle record formats
//
// One record per NDJSON line. Records are read back from files a user may
// have edited, so every line is checked before it reaches a repository.

import { z } from 'zod';
import { CHANGE_TYPES } from '../types/changes.js';
import { isUrn } from '../types/urns.js';
import { BUNDLE_FORMAT_VERSION } from './paths.js';

const UrnSchema = z.string().refine(isUrn, { message: 'must be a URN' });
const PayloadSchema = z.record(z.unknown());

export const BundleManifestSchema = z.object({
  formatVersion: z.literal(BUNDLE_FORMAT_VERSION),
  exportedAt: z.string(),
  aspectCount: z.number().int().nonnegative(),
  timeseriesCount: z.number().int().nonnegative(),
});

export type BundleManifest = z.infer<typeof BundleManifestSchema>;

/**
 * Current value of a versioned aspect
 */
export const AspectBundleRecordSchema = z.object({
  entityUrn: UrnSchema,
  aspectName: z.string().min(1),
  version: z.number().int().positive(),
  payload: PayloadSchema,
  changeType: z.enum(CHANGE_TYPES),
  lastModified: z.string(),
});

export type AspectBundleRecord = z.infer<typeof AspectBundleRecordSchema>;

/**
 * One time-series record. Lines are in arrival order; sequence numbers are
 * reassigned on import.
 */
export const TimeseriesBundleRecordSchema = z.object({
  entityUrn: UrnSchema,
  aspectName: z.string().min(1),
  bucketTimestamp: z.number().int(),
  payload: PayloadSchema,
  restatement: z.boolean(),
  recordedAt: z.string(),
});

export type TimeseriesBundleRecord = z.infer<typeof TimeseriesBundleRecordSchema>;
