// @metagraph/runtime
// Aspect registry, change processing, index hints and the service that wires them

// Error types
export {
  RuntimeError,
  ValidationError,
  UnknownAspectError,
  DuplicateAspectError,
  RegistrySealedError,
  InvalidAspectDescriptorError,
  InvalidAspectDeclarationError,
  UnknownFieldError,
  MissingRequiredFieldError,
  InvalidFieldValueError,
  AlreadyExistsError,
  NotFoundError,
  UnsupportedOperationError,
  UnsupportedForTimeseriesError,
  NotTimeseriesAspectError,
  InvalidChangeEventError,
  ConfigError,
  type ConfigIssue,
} from './errors.js';

// Aspect Schema Registry
export * from './registry/index.js';

// Change Event Processor
export * from './changes/index.js';

// Search Indexing Hint Resolver
export * from './indexing/index.js';

// Time-series reads
export * from './timeseries/index.js';

// Change ingestion
export * from './ingestion/index.js';

// Proposal helpers
export * from './proposals/index.js';

// Logging and configuration
export * from './logging/index.js';
export * from './config/index.js';

// Composition root
export {
  createAspectService,
  type AspectService,
  type AspectServiceOptions,
} from './service.js';
