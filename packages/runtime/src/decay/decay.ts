// Decay Function
//
// Time-based attenuation of a sensor's evidence after it stops
// indicating activity. Factor is 1 through the grace period, then falls
// smoothly to 0 over the decay window.

import type { DecayConfig, DecayCurve, DecayState, SensorState } from '@roomsense/protocol';
import { clamp } from '../probability.js';

/** Rate of the normalized exponential curve */
export const EXPONENTIAL_DECAY_RATE = 3;

/**
 * Decay factor after `elapsedSeconds` of inactivity.
 *
 * - `elapsed <= minDelay`: exactly 1
 * - `elapsed >= minDelay + window`: exactly 0
 * - in between: non-increasing along the chosen curve
 */
export function decayFactor(
  elapsedSeconds: number,
  windowSeconds: number,
  minDelaySeconds: number,
  curve: DecayCurve = 'cosine'
): number {
  if (elapsedSeconds <= minDelaySeconds) return 1;
  if (elapsedSeconds >= minDelaySeconds + windowSeconds) return 0;

  const t = (elapsedSeconds - minDelaySeconds) / windowSeconds;

  switch (curve) {
    case 'cosine':
      return clamp(0.5 * (1 + Math.cos(Math.PI * t)), 0, 1);
    case 'exponential': {
      const floor = Math.exp(-EXPONENTIAL_DECAY_RATE);
      return clamp((Math.exp(-EXPONENTIAL_DECAY_RATE * t) - floor) / (1 - floor), 0, 1);
    }
    case 'linear':
      return clamp(1 - t, 0, 1);
  }
}

/**
 * Derive a sensor's decay state at `now` (epoch ms).
 *
 * Active sensors and continuous sensors never decay. An inactive sensor
 * that was never active has nothing to decay and gets factor 0, as does
 * every inactive sensor when decay is disabled.
 */
export function computeDecayState(state: SensorState, decay: DecayConfig, now: number): DecayState {
  if (state.continuous || state.isActive) {
    return { sensorId: state.sensorId, decayStartTime: null, factor: 1 };
  }

  const start = state.lastActivatedAt === null ? null : state.lastDeactivatedAt;
  if (start === null) {
    return { sensorId: state.sensorId, decayStartTime: null, factor: 0 };
  }

  if (!decay.enabled) {
    return { sensorId: state.sensorId, decayStartTime: start, factor: 0 };
  }

  const elapsedSeconds = Math.max(0, (now - Date.parse(start)) / 1000);
  return {
    sensorId: state.sensorId,
    decayStartTime: start,
    factor: decayFactor(elapsedSeconds, decay.windowSeconds, decay.minDelaySeconds, decay.curve),
  };
}
