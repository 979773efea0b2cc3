// Area types
//
// An Area is one room or zone with its own sensors, priors, threshold
// and occupancy decision.

import type { Id, Timestamp } from './common.js';
import type { DecayState, SensorConfig, SensorState, SensorType } from './sensors.js';
import type { PriorSet } from './priors.js';
import type { LearnerReport } from './learner.js';

export type DecayCurve = 'cosine' | 'exponential' | 'linear';

export type DecayConfig = {
  enabled: boolean;
  /** Seconds over which the factor falls from 1 to 0 */
  windowSeconds: number;
  /** Grace period before decay starts */
  minDelaySeconds: number;
  curve: DecayCurve;
};

export type LearnerConfig = {
  /**
   * Sensor types whose union of active time is used as the occupancy
   * ground-truth proxy. Defaults to motion only.
   */
  proxyTypes: SensorType[];
  /** Minimum state records per type before a learned estimate replaces the old one */
  minSamples: number;
  /** Bound on a single learner run */
  timeoutMs: number;
};

/**
 * Area configuration as supplied by the operator. Everything except the
 * identity and sensor list has a default.
 */
export type AreaConfigInput = {
  id: Id;
  name: string;
  sensors: SensorConfig[];
  weights?: Partial<Record<SensorType, number>>;
  /** Percent, 1..99 */
  threshold?: number;
  decay?: Partial<DecayConfig>;
  historyPeriodDays?: number;
  historicalAnalysisEnabled?: boolean;
  learner?: Partial<LearnerConfig>;
};

/**
 * Fully resolved area configuration.
 */
export type AreaConfig = {
  id: Id;
  name: string;
  sensors: SensorConfig[];
  weights: Record<SensorType, number>;
  threshold: number;
  decay: DecayConfig;
  historyPeriodDays: number;
  historicalAnalysisEnabled: boolean;
  learner: LearnerConfig;
};

/**
 * Aggregate occupancy result for one area at one instant.
 * Derived from sensor states, priors and decay; never a source of truth.
 */
export type AreaState = {
  areaId: Id;
  /** Posterior occupancy probability in [0, 1] */
  probability: number;
  /** Baseline the posterior started from */
  priorProbability: number;
  occupied: boolean;
  /** Threshold percent the `occupied` flag was decided against */
  threshold: number;
  /** Sensors currently contributing non-negligible evidence, sorted */
  activeTriggers: Id[];
  /** Posterior from the baseline plus this sensor's evidence alone */
  perSensorProbabilities: Record<Id, number>;
  /** Remaining decay factor of every inactive sensor still decaying */
  decayStatus: Record<Id, number>;
  sensorAvailability: Record<Id, boolean>;
  /** Contributing weight over available weight, in [0, 1] */
  evidenceStrength: number;
  priorVersion: number;
  lastUpdated: Timestamp;
};

/**
 * Rolling statistics over recent recomputations.
 */
export type AreaMetrics = {
  movingAverage: number;
  minProbability: number;
  maxProbability: number;
  /** Probability change per minute across the rolling window */
  rateOfChange: number;
  /** Fraction of recent decisions that were occupied */
  occupancyRate: number;
  lastOccupiedAt: Timestamp | null;
  lastStateChangeAt: Timestamp | null;
  stateDurationSeconds: number;
  samples: number;
};

export type SensorDiagnostics = {
  config: SensorConfig;
  weight: number;
  state: SensorState;
  decay: DecayState;
};

export type AreaDiagnostics = {
  areaId: Id;
  name: string;
  state: AreaState;
  metrics: AreaMetrics;
  priors: PriorSet;
  sensors: SensorDiagnostics[];
  lastLearnerReport: LearnerReport | null;
};
