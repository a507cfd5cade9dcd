import {
  pgTable,
  text,
  integer,
  boolean,
  timestamp,
  jsonb,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';
import type { AspectPayload, ChangeType } from '@metagraph/protocol';

/**
 * Aspects table - current value per (entity, aspect).
 *
 * Design notes:
 * - Removed aspects stay as tombstones (removed = true) and keep their version
 * - Writes are conditional on the version read at planning time
 */
export const aspects = pgTable(
  'aspects',
  {
    entityUrn: text('entity_urn').notNull(),
    aspectName: text('aspect_name').notNull(),
    version: integer('version').notNull(),
    payload: jsonb('payload').$type<AspectPayload>().notNull(),
    removed: boolean('removed').notNull().default(false),
    changeType: text('change_type').$type<ChangeType>().notNull(),
    lastModified: timestamp('last_modified', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.entityUrn, table.aspectName] }),
    index('aspects_aspect_name_idx').on(table.aspectName),
  ]
);

/**
 * Aspect versions table - one row per committed version.
 * A restatement overwrites the row of the version it restates.
 */
export const aspectVersions = pgTable(
  'aspect_versions',
  {
    entityUrn: text('entity_urn').notNull(),
    aspectName: text('aspect_name').notNull(),
    version: integer('version').notNull(),
    payload: jsonb('payload').$type<AspectPayload>().notNull(),
    changeType: text('change_type').$type<ChangeType>().notNull(),
    recordedAt: timestamp('recorded_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [primaryKey({ columns: [table.entityUrn, table.aspectName, table.version] })]
);
