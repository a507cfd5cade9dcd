// Index instructions handed to the external search-indexing collaborator

import type { AspectPayload, EpochMillis, Urn } from './common.js';
import type { SearchFieldType } from './aspects.js';

/**
 * One index-update instruction for a searchable field
 */
export type IndexOp = {
  fieldName: string;
  fieldType: SearchFieldType;
  queryByDefault: boolean;
  value: unknown;
};

/**
 * Row derived from a TimeseriesFieldCollection element
 */
export type TimeseriesCollectionRow = {
  fieldName: string;
  collectionKey: string;
  keyValue: unknown;
  entry: unknown;
};

/**
 * Time-series fields projected from one appended record
 */
export type TimeseriesProjection = {
  fields: AspectPayload;
  collections: TimeseriesCollectionRow[];
};

export type VersionedIndexUpdate = {
  kind: 'versioned';
  entityUrn: Urn;
  aspectName: string;

  /**
   * reindex: same version, fresh ops (restatement)
   */
  action: 'upsert' | 'delete' | 'reindex';
  version: number;
  ops: IndexOp[];
};

export type TimeseriesIndexUpdate = {
  kind: 'timeseries';
  entityUrn: Urn;
  aspectName: string;
  action: 'append' | 'reindex';
  bucketTimestamp: EpochMillis;
  ops: IndexOp[];
  projection: TimeseriesProjection;
};

export type IndexUpdate = VersionedIndexUpdate | TimeseriesIndexUpdate;
