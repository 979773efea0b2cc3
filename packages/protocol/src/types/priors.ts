// Prior and likelihood types
//
// A PriorSet is the per-area likelihood/prior store entry. It is always
// replaced as a whole; nothing mutates a PriorModel in place.

import type { Id, Timestamp } from './common.js';
import type { SensorType } from './sensors.js';

export type PriorSource = 'default' | 'learned';

/**
 * Likelihoods and baseline occupancy for one sensor type, or for one
 * sensor when learned from that sensor's own history.
 * All three probabilities lie strictly inside (0, 1).
 */
export type PriorModel = {
  /** P(sensor active | area occupied) */
  pTruePositive: number;
  /** P(sensor active | area unoccupied) */
  pFalsePositive: number;
  /** P(area occupied) baseline */
  priorOccupied: number;
  source: PriorSource;
  sampleCount: number;
  learnedAt: Timestamp | null;
};

/**
 * Learned distribution of one numeric sensor's readings.
 */
export type NumericBaseline = {
  sensorId: Id;
  mean: number;
  min: number;
  max: number;
  /** mean + 5% of the observed range */
  upperBound: number;
  sampleCount: number;
};

export type PriorSet = {
  areaId: Id;
  /** Incremented on every committed replacement */
  version: number;
  updatedAt: Timestamp;
  models: Record<SensorType, PriorModel>;
  /** Learned likelihoods for individual sensors; these win over `models` */
  sensorModels: Record<Id, PriorModel>;
  baselines: Record<Id, NumericBaseline>;
};
