import { pgTable, text, timestamp, jsonb, integer } from 'drizzle-orm/pg-core';
import type { NumericBaseline, PriorModel, SensorType } from '@roomsense/protocol';
import { areas } from './areas.js';

/**
 * Prior sets table - the likelihood/prior store.
 *
 * One row per area. A learner commit rewrites the whole row in a single
 * statement, so readers see either the old set or the new one.
 */
export const priorSets = pgTable('prior_sets', {
  areaId: text('area_id')
    .primaryKey()
    .references(() => areas.id, { onDelete: 'cascade' }),
  version: integer('version').notNull(),
  models: jsonb('models').$type<Record<SensorType, PriorModel>>().notNull(),
  sensorModels: jsonb('sensor_models').$type<Record<string, PriorModel>>().notNull().default({}),
  baselines: jsonb('baselines').$type<Record<string, NumericBaseline>>().notNull().default({}),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull(),
});
