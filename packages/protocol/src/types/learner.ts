// Historical analysis learner result types

import type { Id, Timestamp } from './common.js';
import type { SensorType } from './sensors.js';

export type LearnerStatus = 'success' | 'partial' | 'failed';

export type InsufficientHistoryReason =
  | 'too_few_samples'
  | 'no_proxy_history'
  | 'no_occupied_time'
  | 'no_unoccupied_time';

/**
 * A sensor type whose priors were kept because history was too thin.
 */
export type InsufficientHistory = {
  type: SensorType;
  reason: InsufficientHistoryReason;
  samples: number;
};

/**
 * Overlap between a proxy sensor and another sensor's active time.
 * Dice coefficient: 2·|A∩B| / (|A| + |B|).
 */
export type SensorCorrelation = {
  proxySensorId: Id;
  sensorId: Id;
  coefficient: number;
};

/**
 * Fraction of observed time that was occupied, per 30-minute UTC slot
 * ("HH:MM") and per UTC weekday.
 */
export type OccupancyPatterns = {
  timeSlots: Record<string, number>;
  weekdays: Record<string, number>;
};

export type LearnerReport = {
  areaId: Id;
  status: LearnerStatus;
  startedAt: Timestamp;
  finishedAt: Timestamp;
  durationMs: number;
  historyPeriodDays: number;
  updatedTypes: SensorType[];
  /** Sensors that received a model learned from their own history */
  updatedSensors: Id[];
  insufficient: InsufficientHistory[];
  correlations: SensorCorrelation[];
  patterns: OccupancyPatterns | null;
  /** Version of the prior set in effect after the run */
  priorVersion: number;
  error?: {
    code: string;
    message: string;
  };
};
