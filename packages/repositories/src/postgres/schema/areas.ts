import { pgTable, text, timestamp, jsonb, real } from 'drizzle-orm/pg-core';
import type { AreaConfig } from '@roomsense/protocol';

/**
 * Areas table - operator-owned configuration, one row per area.
 * The threshold is kept in its own column so it can be updated alone.
 */
export const areas = pgTable('areas', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  config: jsonb('config').$type<AreaConfig>().notNull(),
  threshold: real('threshold').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
