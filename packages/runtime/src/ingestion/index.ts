// Ingestion module - entry points for change events into the system

export {
  ingestChangeLog,
  parseChangeEvent,
  type ChangeLogFailure,
  type IngestChangeLogResult,
} from './change-log.js';

export { bundleRecordValidator, importBundle, type ImportBundleContext } from './bundle.js';
