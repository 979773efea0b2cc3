// Sensor history types
//
// The recorded state timeline the learner reads from.

import type { Id, RawValue, Timestamp } from './common.js';

export type SensorStateRecord = {
  sensorId: Id;
  value: RawValue;
  available: boolean;
  timestamp: Timestamp;
};

export type SensorHistoryFilter = {
  sensorIds: Id[];
  /** Inclusive */
  start: Timestamp;
  /** Inclusive */
  end: Timestamp;
  limit?: number;
};
