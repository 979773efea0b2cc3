// Prior Store Helpers
//
// Creating, clamping and deriving baselines from PriorSets. A PriorSet
// is never edited in place: every change produces a new set.

import type { Id, PriorModel, PriorSet, SensorType } from '@roomsense/protocol';
import { DEFAULT_PRIORS, DEFAULT_PRIOR_OCCUPIED, SENSOR_TYPES } from '@roomsense/protocol';
import { clampProbability } from '../probability.js';

/** Bounds for estimates the learner produces */
export const MIN_LEARNED_PROBABILITY = 0.05;
export const MAX_LEARNED_PROBABILITY = 0.95;

/**
 * Clamp all three probabilities of a model into (0, 1).
 */
export function clampPriorModel(model: PriorModel): PriorModel {
  return {
    ...model,
    pTruePositive: clampProbability(model.pTruePositive),
    pFalsePositive: clampProbability(model.pFalsePositive),
    priorOccupied: clampProbability(model.priorOccupied),
  };
}

export function createDefaultPriorModel(type: SensorType): PriorModel {
  return clampPriorModel({
    ...DEFAULT_PRIORS[type],
    source: 'default',
    sampleCount: 0,
    learnedAt: null,
  });
}

/**
 * Conservative priors for a new area.
 */
export function createDefaultPriorSet(areaId: Id, now: Date = new Date()): PriorSet {
  return {
    areaId,
    version: 0,
    updatedAt: now.toISOString(),
    models: {
      motion: createDefaultPriorModel('motion'),
      media: createDefaultPriorModel('media'),
      appliance: createDefaultPriorModel('appliance'),
      door: createDefaultPriorModel('door'),
      window: createDefaultPriorModel('window'),
      light: createDefaultPriorModel('light'),
      illuminance: createDefaultPriorModel('illuminance'),
      humidity: createDefaultPriorModel('humidity'),
      temperature: createDefaultPriorModel('temperature'),
    },
    sensorModels: {},
    baselines: {},
  };
}

/**
 * The same prior set with every type and sensor model clamped into
 * (0, 1). Sets loaded from storage or built by hand pass through here
 * before any likelihood ratio is taken from them.
 */
export function normalizePriorSet(priors: PriorSet): PriorSet {
  const { models } = priors;
  const sensorModels: Record<Id, PriorModel> = {};
  for (const [sensorId, model] of Object.entries(priors.sensorModels)) {
    sensorModels[sensorId] = clampPriorModel(model);
  }

  return {
    ...priors,
    models: {
      motion: clampPriorModel(models.motion),
      media: clampPriorModel(models.media),
      appliance: clampPriorModel(models.appliance),
      door: clampPriorModel(models.door),
      window: clampPriorModel(models.window),
      light: clampPriorModel(models.light),
      illuminance: clampPriorModel(models.illuminance),
      humidity: clampPriorModel(models.humidity),
      temperature: clampPriorModel(models.temperature),
    },
    sensorModels,
  };
}

/**
 * Aggregate baseline occupancy: mean `priorOccupied` over the distinct
 * sensor types an area configures, summed in canonical type order.
 */
export function baselinePrior(priors: PriorSet, types: Iterable<SensorType>): number {
  const present = new Set(types);
  const ordered = SENSOR_TYPES.filter((t) => present.has(t));
  if (ordered.length === 0) return clampProbability(DEFAULT_PRIOR_OCCUPIED);

  let sum = 0;
  for (const type of ordered) {
    sum += priors.models[type].priorOccupied;
  }
  return clampProbability(sum / ordered.length);
}
