import type {
  AspectPayload,
  EpochMillis,
  TimeRange,
  TimeseriesAspectInstance,
  Timestamp,
  Urn,
} from '@metagraph/protocol';

export type AppendTimeseriesInput = {
  entityUrn: Urn;
  aspectName: string;
  bucketTimestamp: EpochMillis;
  payload: AspectPayload;
  restatement: boolean;

  /**
   * ISO 8601, defaults to now
   */
  recordedAt?: Timestamp;
};

export type TimeseriesQuery = {
  entityUrn: Urn;
  aspectName: string;

  /**
   * Inclusive bucket range; open bounds when omitted
   */
  range?: TimeRange;
};

/**
 * Repository interface for time-series aspects.
 *
 * The log is append-only: records are never updated or deleted. Each append
 * gets a sequence number greater than every earlier one, which is the arrival
 * order used to pick the latest record of a bucket.
 */
export interface TimeseriesRepository {
  append(input: AppendTimeseriesInput): Promise<TimeseriesAspectInstance>;

  /**
   * Records of one entity and aspect ordered by bucket, then arrival.
   * The result is lazy and can be iterated again from the start.
   */
  query(query: TimeseriesQuery): AsyncIterable<TimeseriesAspectInstance>;

  /**
   * Every record in arrival order, for export
   */
  stream(): AsyncIterable<TimeseriesAspectInstance>;
}
