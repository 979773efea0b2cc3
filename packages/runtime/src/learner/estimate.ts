// Estimators used by the learner

import type { NumericBaseline, SensorStateRecord, TimeSpan, Id } from '@roomsense/protocol';
import { isUnavailableValue, parseNumeric } from '../evidence/index.js';
import { clampProbability } from '../probability.js';
import { MAX_LEARNED_PROBABILITY, MIN_LEARNED_PROBABILITY } from '../priors/index.js';
import { intersectIntervals, totalDuration } from './intervals.js';

/** Fraction of the range added to the mean to form the upper bound */
export const BASELINE_MARGIN = 0.05;

/**
 * Clamp an estimate into the learned range, away from 0 and 1.
 */
export function clampLearned(p: number): number {
  return clampProbability(p, MIN_LEARNED_PROBABILITY, MAX_LEARNED_PROBABILITY);
}

/**
 * Distribution of a numeric sensor's readings.
 * @returns null when no record holds a usable number
 */
export function learnBaseline(sensorId: Id, records: readonly SensorStateRecord[]): NumericBaseline | null {
  const values: number[] = [];
  for (const record of records) {
    if (!record.available || record.value === null || isUnavailableValue(record.value)) continue;
    const value = parseNumeric(record.value);
    if (value !== null) values.push(value);
  }
  if (values.length === 0) return null;

  const min = values.reduce((m, v) => Math.min(m, v), Number.POSITIVE_INFINITY);
  const max = values.reduce((m, v) => Math.max(m, v), Number.NEGATIVE_INFINITY);
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const range = max - min;

  return {
    sensorId,
    mean,
    min,
    max,
    upperBound: range === 0 ? mean : mean + BASELINE_MARGIN * range,
    sampleCount: values.length,
  };
}

/**
 * Overlap of two active timelines: 2·|A∩B| / (|A| + |B|).
 */
export function diceCoefficient(a: readonly TimeSpan[], b: readonly TimeSpan[]): number {
  const denominator = totalDuration(a) + totalDuration(b);
  if (denominator === 0) return 0;
  return (2 * totalDuration(intersectIntervals(a, b))) / denominator;
}
