// Builtin aspect declarations
//
// The aspects every deployment knows about. Additional declarations are loaded
// from JSON files at startup.

import type { AspectDeclaration } from '../types/declarations.js';

export const statusAspect: AspectDeclaration = {
  Aspect: { name: 'status' },
  doc: 'Whether the entity has been soft-deleted',
  fields: [
    {
      name: 'removed',
      type: 'boolean',
      doc: 'Whether the entity has been removed (soft-deleted)',
      annotations: {
        Searchable: { fieldType: 'BOOLEAN' },
      },
    },
  ],
};

export const schemaFieldAliasesAspect: AspectDeclaration = {
  Aspect: { name: 'schemaFieldAliases' },
  doc: 'Other schema fields that refer to the same logical field',
  fields: [
    {
      name: 'aliases',
      type: 'array[Urn]',
      optional: true,
      doc: 'Schema field URNs that are aliases of this field',
      annotations: {
        Searchable: {
          '/*': {
            fieldName: 'schemaFieldAliases',
            fieldType: 'URN',
            queryByDefault: false,
          },
        },
      },
    },
  ],
};

export const datasetPropertiesAspect: AspectDeclaration = {
  Aspect: { name: 'datasetProperties' },
  doc: 'Descriptive properties of a dataset',
  fields: [
    {
      name: 'name',
      type: 'string',
      optional: true,
      annotations: {
        Searchable: { fieldType: 'WORD_GRAM', queryByDefault: true },
      },
    },
    {
      name: 'qualifiedName',
      type: 'string',
      optional: true,
      annotations: {
        Searchable: { fieldType: 'WORD_GRAM', queryByDefault: true },
      },
    },
    {
      name: 'description',
      type: 'string',
      optional: true,
      annotations: {
        Searchable: { fieldType: 'TEXT', queryByDefault: true },
      },
    },
    { name: 'customProperties', type: 'map[string, string]', optional: true },
    { name: 'externalUrl', type: 'string', optional: true },
    {
      name: 'tags',
      type: 'array[string]',
      optional: true,
      annotations: {
        Searchable: { '/*': { fieldName: 'tags', fieldType: 'KEYWORD' } },
      },
    },
    { name: 'lastModified', type: 'TimeStamp', optional: true },
  ],
};

export const datasetUsageStatisticsAspect: AspectDeclaration = {
  Aspect: { name: 'datasetUsageStatistics', type: 'timeseries' },
  doc: 'Usage of a dataset over a time window',
  fields: [
    { name: 'timestampMillis', type: 'long', doc: 'Start of the bucket, epoch millis' },
    { name: 'eventGranularity', type: 'TimeWindowSize', optional: true },
    { name: 'partitionSpec', type: 'PartitionSpec', optional: true },
    { name: 'messageId', type: 'string', optional: true },
    {
      name: 'uniqueUserCount',
      type: 'int',
      optional: true,
      annotations: { TimeseriesField: {} },
    },
    {
      name: 'totalSqlQueries',
      type: 'int',
      optional: true,
      annotations: { TimeseriesField: {} },
    },
    {
      name: 'topSqlQueries',
      type: 'array[string]',
      optional: true,
      annotations: { TimeseriesField: {} },
    },
    {
      name: 'userCounts',
      type: 'array[DatasetUserUsageCounts]',
      optional: true,
      annotations: { TimeseriesFieldCollection: { key: 'user' } },
    },
    {
      name: 'fieldCounts',
      type: 'array[DatasetFieldUsageCounts]',
      optional: true,
      annotations: { TimeseriesFieldCollection: { key: 'fieldPath' } },
    },
  ],
};

export const operationAspect: AspectDeclaration = {
  Aspect: { name: 'operation', type: 'timeseries' },
  doc: 'A write operation observed on a dataset',
  fields: [
    { name: 'timestampMillis', type: 'long' },
    { name: 'actor', type: 'Urn', optional: true, annotations: { TimeseriesField: {} } },
    { name: 'operationType', type: 'string', annotations: { TimeseriesField: {} } },
    { name: 'customOperationType', type: 'string', optional: true },
    { name: 'numAffectedRows', type: 'long', optional: true },
    {
      name: 'affectedDatasets',
      type: 'array[Urn]',
      optional: true,
      annotations: { TimeseriesField: {} },
    },
    {
      name: 'lastUpdatedTimestamp',
      type: 'long',
      annotations: { TimeseriesField: {} },
    },
  ],
};

export const containerAspect: AspectDeclaration = {
  Aspect: { name: 'container' },
  doc: 'The container an entity belongs to',
  fields: [
    {
      name: 'container',
      type: 'Urn',
      annotations: {
        Searchable: { fieldName: 'container', fieldType: 'URN' },
      },
    },
  ],
};

export const browsePathsV2Aspect: AspectDeclaration = {
  Aspect: { name: 'browsePathsV2' },
  doc: 'Where the entity sits in the browse hierarchy, root first',
  fields: [
    {
      name: 'path',
      type: 'array[BrowsePathEntry]',
      doc: 'Entries with an id and, for entities, the urn they point at',
    },
  ],
};

export const BUILTIN_ASPECT_DECLARATIONS: readonly AspectDeclaration[] = [
  statusAspect,
  schemaFieldAliasesAspect,
  datasetPropertiesAspect,
  datasetUsageStatisticsAspect,
  operationAspect,
  containerAspect,
  browsePathsV2Aspect,
];
