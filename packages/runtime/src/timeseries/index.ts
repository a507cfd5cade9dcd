export {
  latestPerBucket,
  queryLatestTimeseries,
  queryTimeseries,
  type TimeseriesQueryContext,
} from './query.js';
