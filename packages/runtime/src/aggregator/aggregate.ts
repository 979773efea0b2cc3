// Bayesian Aggregator
//
// Combines every available sensor's evidence into one occupancy
// probability by a weighted update in log-odds space. Pure: the same
// inputs always give the same AreaState, whatever order sensors are listed in.

import type {
  AreaState,
  DecayConfig,
  Id,
  PriorSet,
  SensorConfig,
  SensorState,
  SensorType,
} from '@roomsense/protocol';
import { computeDecayState } from '../decay/index.js';
import { createSensorState } from '../evidence/index.js';
import { baselinePrior } from '../priors/index.js';
import { LOG_ODDS_LIMIT, assertFinite, clamp, logit, sigmoid } from '../probability.js';
import { isOccupied } from '../threshold.js';
import { likelihoodRatio } from './likelihood.js';

/** Decayed weights at or below this are not reported as triggers */
export const NEGLIGIBLE_WEIGHT = 0.01;

export type AggregationInput = {
  areaId: Id;
  sensors: readonly SensorConfig[];
  weights: Record<SensorType, number>;
  states: ReadonlyMap<Id, SensorState>;
  priors: PriorSet;
  decay: DecayConfig;
  /** Threshold percent for the `occupied` flag */
  threshold: number;
  now: Date;
};

/**
 * One sensor's share of the update.
 */
export type SensorContribution = {
  sensorId: Id;
  type: SensorType;
  available: boolean;
  /** Configured type-level (or per-sensor) weight */
  typeWeight: number;
  decayFactor: number;
  decayStartTime: string | null;
  /** typeWeight × decayFactor */
  weight: number;
  strength: number;
  likelihoodRatio: number;
  /** weight × ln(likelihoodRatio); 0 for excluded sensors */
  logOdds: number;
  continuous: boolean;
  isActive: boolean;
};

/**
 * Weight of a sensor: its own override, else the area's type weight.
 */
export function sensorWeight(config: SensorConfig, weights: Record<SensorType, number>): number {
  return config.weight ?? weights[config.type];
}

/**
 * Canonical sensor order (UTF-16 code unit order of ids).
 */
export function compareIds(a: Id, b: Id): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Per-sensor contributions in canonical order.
 */
export function computeContributions(input: AggregationInput): SensorContribution[] {
  const now = input.now.getTime();
  const sorted = [...input.sensors].sort((a, b) => compareIds(a.id, b.id));

  return sorted.map((config) => {
    const state = input.states.get(config.id) ?? createSensorState(config);
    const typeWeight = sensorWeight(config, input.weights);
    const decay = computeDecayState(state, input.decay, now);
    const base = {
      sensorId: config.id,
      type: config.type,
      available: state.available,
      typeWeight,
      decayFactor: decay.factor,
      decayStartTime: decay.decayStartTime,
      continuous: state.continuous,
      isActive: state.isActive,
    };

    if (!state.available || decay.factor === 0 || typeWeight === 0) {
      return { ...base, weight: 0, strength: state.strength, likelihoodRatio: 1, logOdds: 0 };
    }

    // Binary evidence that is decaying still counts as the last active reading
    const strength = state.continuous ? state.strength : 1;
    // A model learned from this sensor's own history wins over its type's
    const model = input.priors.sensorModels[config.id] ?? input.priors.models[config.type];
    const ratio = likelihoodRatio(strength, model.pTruePositive, model.pFalsePositive);
    const weight = typeWeight * decay.factor;

    return {
      ...base,
      weight,
      strength,
      likelihoodRatio: ratio,
      logOdds: weight * Math.log(ratio),
    };
  });
}

/**
 * Recompute an area's occupancy state.
 *
 * 1. Baseline = mean prior of the configured sensor types.
 * 2. Each available sensor adds `w_i × ln(LR_i)` to the log-odds, where
 *    `w_i` is its weight scaled by decay.
 * 3. The sum is clamped to ±LOG_ODDS_LIMIT and converted back.
 *
 * Unavailable sensors are skipped entirely, including from the
 * evidence-strength denominator. With no evidence the baseline is
 * returned unchanged.
 */
export function aggregate(input: AggregationInput): AreaState {
  const priorProbability = baselinePrior(input.priors, input.sensors.map((s) => s.type));
  const baseLogOdds = logit(priorProbability);
  const contributions = computeContributions(input);

  let sum = 0;
  let availableWeight = 0;
  let contributingWeight = 0;
  const activeTriggers: Id[] = [];
  const perSensorProbabilities: Record<Id, number> = {};
  const decayStatus: Record<Id, number> = {};
  const sensorAvailability: Record<Id, boolean> = {};

  for (const c of contributions) {
    sensorAvailability[c.sensorId] = c.available;
    if (!c.available) continue;

    availableWeight += c.typeWeight;
    sum += c.logOdds;
    perSensorProbabilities[c.sensorId] =
      c.logOdds === 0 ? priorProbability : sigmoid(clamp(baseLogOdds + c.logOdds, -LOG_ODDS_LIMIT, LOG_ODDS_LIMIT));

    if (c.continuous) {
      contributingWeight += c.weight * Math.abs(2 * c.strength - 1);
    } else {
      contributingWeight += c.weight;
    }

    if (c.weight > NEGLIGIBLE_WEIGHT && (!c.continuous || c.strength > 0.5)) {
      activeTriggers.push(c.sensorId);
    }

    if (!c.continuous && !c.isActive && c.decayStartTime !== null && c.decayFactor > 0) {
      decayStatus[c.sensorId] = c.decayFactor;
    }
  }

  const probability =
    sum === 0
      ? priorProbability
      : sigmoid(clamp(baseLogOdds + assertFinite(sum, 'Log-odds sum'), -LOG_ODDS_LIMIT, LOG_ODDS_LIMIT));
  assertFinite(probability, 'Occupancy probability');

  return {
    areaId: input.areaId,
    probability,
    priorProbability,
    occupied: isOccupied(probability, input.threshold),
    threshold: input.threshold,
    activeTriggers,
    perSensorProbabilities,
    decayStatus,
    sensorAvailability,
    evidenceStrength: availableWeight > 0 ? clamp(contributingWeight / availableWeight, 0, 1) : 0,
    priorVersion: input.priors.version,
    lastUpdated: input.now.toISOString(),
  };
}
