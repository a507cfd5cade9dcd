// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Structured entity identifier, e.g. "urn:li:dataset:(urn:li:dataPlatform:hive,db.table,PROD)"
 */
export type Urn = string;

/**
 * Epoch milliseconds
 */
export type EpochMillis = number;

/**
 * Inclusive time range in epoch milliseconds.
 * An omitted bound is open.
 */
export type TimeRange = {
  start?: EpochMillis;
  end?: EpochMillis;
};

/**
 * Aspect payload: field name → value.
 * Values are JSON-compatible; structure is described by the aspect's descriptor.
 */
export type AspectPayload = Record<string, unknown>;
