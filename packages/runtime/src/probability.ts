// Probability helpers
//
// Everything that turns probabilities into odds goes through here so the
// clamps live in one place.

import { InvariantViolationError } from './errors.js';

/** Probabilities stored anywhere are kept inside [MIN, MAX] */
export const MIN_PROBABILITY = 0.001;
export const MAX_PROBABILITY = 0.999;

/** Log-odds are clamped to ±LOG_ODDS_LIMIT before conversion */
export const LOG_ODDS_LIMIT = 20;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function clampProbability(p: number, min = MIN_PROBABILITY, max = MAX_PROBABILITY): number {
  return clamp(p, min, max);
}

export function logit(p: number): number {
  return Math.log(p / (1 - p));
}

export function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

/**
 * Throw if a value that must be finite is not.
 */
export function assertFinite(value: number, what: string): number {
  if (!Number.isFinite(value)) {
    throw new InvariantViolationError(`${what} is not finite: ${value}`);
  }
  return value;
}
