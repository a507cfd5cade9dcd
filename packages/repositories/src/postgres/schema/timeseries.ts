import { pgTable, text, bigint, bigserial, boolean, timestamp, jsonb, index } from 'drizzle-orm/pg-core';
import type { AspectPayload } from '@metagraph/protocol';

/**
 * Time-series aspects table - immutable append-only log.
 *
 * Design notes:
 * - Append-only: no updates or deletes
 * - sequence is the arrival order; the highest sequence of a bucket wins
 * - Consider time-based partitioning on bucket_timestamp for large deployments
 */
export const timeseriesAspects = pgTable(
  'timeseries_aspects',
  {
    sequence: bigserial('sequence', { mode: 'number' }).primaryKey(),
    entityUrn: text('entity_urn').notNull(),
    aspectName: text('aspect_name').notNull(),
    bucketTimestamp: bigint('bucket_timestamp', { mode: 'number' }).notNull(),
    payload: jsonb('payload').$type<AspectPayload>().notNull(),
    restatement: boolean('restatement').notNull().default(false),
    recordedAt: timestamp('recorded_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('timeseries_aspects_entity_aspect_bucket_idx').on(
      table.entityUrn,
      table.aspectName,
      table.bucketTimestamp
    ),
  ]
);
