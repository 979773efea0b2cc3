// Sensor Evidence Model
//
// The only place new SensorState values are produced. States are
// immutable; every reading yields a fresh object.

import type { RawValue, SensorConfig, SensorState, Timestamp } from '@roomsense/protocol';
import { UNAVAILABLE_VALUES, isNumericSensorType } from '@roomsense/protocol';
import { extractEvidence, type EvidenceContext } from './extractors.js';

/**
 * A single reading for one sensor.
 */
export type SensorReading = {
  value: RawValue;
  timestamp: Timestamp;
  available?: boolean;
};

/**
 * Check whether a raw value means "no usable reading".
 */
export function isUnavailableValue(value: RawValue): boolean {
  if (value === null) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') return UNAVAILABLE_VALUES.includes(value.trim().toLowerCase());
  return false;
}

/**
 * Whether a sensor produces continuous (curve) evidence.
 */
export function isContinuousSensor(config: SensorConfig): boolean {
  if (!isNumericSensorType(config.type)) return false;
  return config.activation === undefined || config.activation.kind === 'curve';
}

/**
 * Initial state before any reading: unavailable, never active.
 */
export function createSensorState(config: SensorConfig): SensorState {
  return {
    sensorId: config.id,
    type: config.type,
    available: false,
    isActive: false,
    strength: 0,
    continuous: isContinuousSensor(config),
    rawValue: null,
    lastActivatedAt: null,
    lastDeactivatedAt: null,
    lastObservedAt: null,
  };
}

/**
 * Apply a reading to a sensor's state.
 *
 * - Readings older than the last observation are ignored.
 * - An unavailable reading keeps the previous evidence and transition
 *   timestamps; the aggregator excludes the sensor while unavailable.
 * - Active→inactive records the deactivation time that starts decay;
 *   inactive→active records the activation time, which ends any decay.
 */
export function applyReading(
  state: SensorState,
  config: SensorConfig,
  reading: SensorReading,
  context: EvidenceContext = {}
): SensorState {
  if (state.lastObservedAt !== null && Date.parse(reading.timestamp) < Date.parse(state.lastObservedAt)) {
    return state;
  }

  const value = reading.value;
  const evidence =
    reading.available === false || value === null || isUnavailableValue(value)
      ? null
      : extractEvidence(config, value, context);

  if (evidence === null) {
    return {
      ...state,
      available: false,
      rawValue: value,
      lastObservedAt: reading.timestamp,
    };
  }

  const activated = evidence.active && !state.isActive;
  const deactivated = !evidence.active && state.isActive;

  return {
    ...state,
    available: true,
    isActive: evidence.active,
    strength: evidence.strength,
    continuous: evidence.continuous,
    rawValue: value,
    lastActivatedAt: activated ? reading.timestamp : state.lastActivatedAt,
    lastDeactivatedAt: deactivated ? reading.timestamp : state.lastDeactivatedAt,
    lastObservedAt: reading.timestamp,
  };
}

/**
 * Re-derive evidence from the last reading, e.g. after a new numeric
 * baseline has been learned.
 */
export function reevaluateEvidence(
  state: SensorState,
  config: SensorConfig,
  context: EvidenceContext
): SensorState {
  if (!state.available || state.lastObservedAt === null) return state;
  return applyReading(state, config, { value: state.rawValue, timestamp: state.lastObservedAt }, context);
}
