// Aspect types - descriptors, annotation hints and stored instances

import type { AspectPayload, EpochMillis, Timestamp, Urn } from './common.js';

/**
 * How instances of an aspect are stored.
 * - versioned: one current value per entity, with a monotonic version number
 * - timeseries: append-only records bucketed by timestamp
 */
export type AspectKind = 'versioned' | 'timeseries';

export const ASPECT_KINDS: readonly AspectKind[] = ['versioned', 'timeseries'];

/**
 * Primitive value types a field can declare.
 * `record` and `map` are opaque structured values.
 */
export type PrimitiveTypeName =
  | 'string'
  | 'int'
  | 'long'
  | 'float'
  | 'double'
  | 'boolean'
  | 'bytes'
  | 'map'
  | 'record';

export const PRIMITIVE_TYPE_NAMES: readonly PrimitiveTypeName[] = [
  'string',
  'int',
  'long',
  'float',
  'double',
  'boolean',
  'bytes',
  'map',
  'record',
];

/**
 * A single (non-array) value type
 */
export type ScalarValueType =
  | { kind: 'primitive'; name: PrimitiveTypeName }
  | { kind: 'urn' };

/**
 * The declared value type of a field: a scalar or an array of scalars
 */
export type FieldValueType = ScalarValueType | { kind: 'array'; items: ScalarValueType };

/**
 * Search index field types understood by the indexing collaborator
 */
export type SearchFieldType =
  | 'KEYWORD'
  | 'TEXT'
  | 'TEXT_PARTIAL'
  | 'WORD_GRAM'
  | 'BROWSE_PATH'
  | 'BROWSE_PATH_V2'
  | 'URN'
  | 'URN_PARTIAL'
  | 'BOOLEAN'
  | 'COUNT'
  | 'DATETIME'
  | 'DOUBLE'
  | 'OBJECT'
  | 'MAP_ARRAY';

export const SEARCH_FIELD_TYPES: readonly SearchFieldType[] = [
  'KEYWORD',
  'TEXT',
  'TEXT_PARTIAL',
  'WORD_GRAM',
  'BROWSE_PATH',
  'BROWSE_PATH_V2',
  'URN',
  'URN_PARTIAL',
  'BOOLEAN',
  'COUNT',
  'DATETIME',
  'DOUBLE',
  'OBJECT',
  'MAP_ARRAY',
];

/**
 * Path marker for hints that apply to each element of an array field
 */
export const WILDCARD_PATH = '/*';

/**
 * Search hint attached to a field (the `Searchable` annotation).
 */
export type SearchHint = {
  /**
   * Name of the field in the search index. Defaults to the field name.
   */
  fieldName?: string;

  fieldType: SearchFieldType;

  /**
   * Whether free-text queries match this field without naming it
   */
  queryByDefault: boolean;

  /**
   * Set to "/*" when the hint applies to each element of an array field
   */
  path?: typeof WILDCARD_PATH;
};

/**
 * Time-series hint attached to a field
 * (the `TimeseriesField` / `TimeseriesFieldCollection` annotations).
 */
export type TimeseriesHint = {
  isField: boolean;
  isCollection: boolean;

  /**
   * For collections: the element key that identifies each row
   */
  collectionKey?: string;
};

export type FieldDescriptor = {
  name: string;
  type: FieldValueType;
  optional: boolean;
  search: SearchHint | null;
  timeseries: TimeseriesHint | null;
  description?: string;
};

export type AspectDescriptor = {
  /**
   * Unique aspect name, e.g. "schemaFieldAliases"
   */
  name: string;
  kind: AspectKind;
  fields: FieldDescriptor[];
  description?: string;
};

/**
 * Name of the field that carries the bucket timestamp of time-series aspects
 */
export const TIMESTAMP_FIELD = 'timestampMillis';

/**
 * Current value of a versioned aspect
 */
export type VersionedAspectInstance = {
  kind: 'versioned';
  aspectName: string;
  entityUrn: Urn;
  payload: AspectPayload;

  /**
   * Strictly increasing per (entity, aspect)
   */
  version: number;
  lastModified: Timestamp;
};

/**
 * One appended record of a time-series aspect
 */
export type TimeseriesAspectInstance = {
  kind: 'timeseries';
  aspectName: string;
  entityUrn: Urn;
  payload: AspectPayload;
  bucketTimestamp: EpochMillis;

  /**
   * True when appended by a RESTATE change
   */
  restatement: boolean;

  /**
   * Arrival order across the store; later arrivals have higher numbers
   */
  sequence: number;
  recordedAt: Timestamp;
};

export type AspectInstance = VersionedAspectInstance | TimeseriesAspectInstance;

/**
 * Render a field value type the way declarations spell it, e.g. "array[Urn]"
 */
export function formatFieldValueType(type: FieldValueType): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'urn':
      return 'Urn';
    case 'array':
      return `array[${formatFieldValueType(type.items)}]`;
  }
}
