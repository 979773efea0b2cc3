// Default configuration values
//
// Conservative priors used until the learner has seen enough history,
// plus the type-level weights and state maps new areas start with.

import type { SensorType } from './types/sensors.js';
import type { DecayConfig, LearnerConfig } from './types/area.js';

export type DefaultPrior = {
  pTruePositive: number;
  pFalsePositive: number;
  priorOccupied: number;
};

export const DEFAULT_PRIORS: Record<SensorType, DefaultPrior> = {
  motion: { pTruePositive: 0.25, pFalsePositive: 0.05, priorOccupied: 0.35 },
  media: { pTruePositive: 0.25, pFalsePositive: 0.02, priorOccupied: 0.3 },
  appliance: { pTruePositive: 0.2, pFalsePositive: 0.02, priorOccupied: 0.2356 },
  door: { pTruePositive: 0.2, pFalsePositive: 0.02, priorOccupied: 0.1356 },
  window: { pTruePositive: 0.2, pFalsePositive: 0.02, priorOccupied: 0.1569 },
  light: { pTruePositive: 0.2, pFalsePositive: 0.02, priorOccupied: 0.3846 },
  illuminance: { pTruePositive: 0.09, pFalsePositive: 0.01, priorOccupied: 0.0769 },
  humidity: { pTruePositive: 0.09, pFalsePositive: 0.01, priorOccupied: 0.0769 },
  temperature: { pTruePositive: 0.09, pFalsePositive: 0.01, priorOccupied: 0.0769 },
};

export const DEFAULT_WEIGHTS: Record<SensorType, number> = {
  motion: 0.85,
  media: 0.7,
  appliance: 0.3,
  door: 0.3,
  window: 0.2,
  light: 0.2,
  illuminance: 0.1,
  humidity: 0.1,
  temperature: 0.1,
};

/**
 * Readings that count as active for state-based sensor types.
 * Numeric types have no entry; they use a curve or threshold predicate.
 */
export const DEFAULT_ACTIVE_STATES: Partial<Record<SensorType, string[]>> = {
  motion: ['on'],
  media: ['playing', 'paused'],
  appliance: ['on', 'active'],
  door: ['closed', 'off'],
  window: ['open', 'on'],
  light: ['on'],
};

/**
 * Readings meaning the platform has no usable value.
 */
export const UNAVAILABLE_VALUES: readonly string[] = ['unavailable', 'unknown', ''];

/** Used as the baseline when an area has no configured types */
export const DEFAULT_PRIOR_OCCUPIED = 0.35;

export const DEFAULT_THRESHOLD = 50;
export const MIN_THRESHOLD = 1;
export const MAX_THRESHOLD = 99;

export const DEFAULT_HISTORY_PERIOD_DAYS = 7;

export const DEFAULT_DECAY: DecayConfig = {
  enabled: true,
  windowSeconds: 600,
  minDelaySeconds: 60,
  curve: 'cosine',
};

export const DEFAULT_LEARNER: LearnerConfig = {
  proxyTypes: ['motion'],
  minSamples: 10,
  timeoutMs: 30_000,
};
