export {
  createIndexResolver,
  indexOpsFor,
  timeseriesProjectionFor,
  type IndexResolver,
} from './resolver.js';
