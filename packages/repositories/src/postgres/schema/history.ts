import { pgTable, text, timestamp, jsonb, boolean, bigserial, index } from 'drizzle-orm/pg-core';
import type { RawValue } from '@roomsense/protocol';

/**
 * Sensor history table - append-only state timeline read by the learner.
 * Not keyed by area: several areas may share a sensor.
 */
export const sensorHistory = pgTable(
  'sensor_history',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    sensorId: text('sensor_id').notNull(),
    value: jsonb('value').$type<RawValue>(),
    available: boolean('available').notNull(),
    timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
  },
  (table) => [
    index('sensor_history_sensor_time_idx').on(table.sensorId, table.timestamp),
    index('sensor_history_time_idx').on(table.timestamp),
  ]
);
