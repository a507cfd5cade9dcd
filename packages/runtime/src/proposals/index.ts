export {
  fillEmptyUsageBuckets,
  lowercaseUrns,
  patchLastModified,
  usageBuckets,
  withBrowsePaths,
  withStatusAspects,
  workUnitId,
  BROWSE_PATHS_ASPECT,
  CONTAINER_ASPECT,
  DATASET_PROPERTIES_ASPECT,
  OPERATION_ASPECT,
  USAGE_ASPECT,
  type BrowsePathEntry,
  type BrowsePathOptions,
  type FillEmptyUsageOptions,
  type UsageGranularity,
  type UsageWindow,
} from './helpers.js';
