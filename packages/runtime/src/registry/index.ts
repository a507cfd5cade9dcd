export {
  AspectRegistry,
  createAspectRegistry,
  isAbsent,
  type AspectRegistryOptions,
  type ResolvedAspectDescriptor,
  type SearchableField,
  type TimeseriesCollectionField,
  type PayloadValidationResult,
  type PayloadValidationError,
} from './registry.js';
export {
  compileAspectDeclaration,
  loadDeclarationsFromDirectory,
  parseFieldType,
} from './declarations.js';
