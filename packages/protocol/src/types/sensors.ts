// Sensor types
//
// A sensor is one physical entity reported by the host platform.
// Its type tag selects the evidence extractor; there is no class hierarchy.

import type { Id, RawValue, Timestamp } from './common.js';

export const SENSOR_TYPES = [
  'motion',
  'media',
  'appliance',
  'door',
  'window',
  'light',
  'illuminance',
  'humidity',
  'temperature',
] as const;

/**
 * Sensor-type category.
 */
export type SensorType = (typeof SENSOR_TYPES)[number];

/**
 * Sensor types whose readings are numbers rather than states.
 */
export type NumericSensorType = 'illuminance' | 'humidity' | 'temperature';

export const NUMERIC_SENSOR_TYPES: readonly NumericSensorType[] = [
  'illuminance',
  'humidity',
  'temperature',
];

export function isSensorType(value: unknown): value is SensorType {
  return typeof value === 'string' && SENSOR_TYPES.some((t) => t === value);
}

export function isNumericSensorType(type: SensorType): type is NumericSensorType {
  return NUMERIC_SENSOR_TYPES.some((t) => t === type);
}

/**
 * Maps a raw reading to evidence.
 *
 * - `states`: active when the reading is one of `activeStates`
 * - `above` / `below`: hard threshold on a numeric reading
 * - `band`: active while `min <= value <= max`
 * - `curve`: continuous logistic strength around `reference`; when reference
 *   or scale are omitted they come from the learned numeric baseline
 */
export type ActivationPredicate =
  | { kind: 'states'; activeStates: string[] }
  | { kind: 'above'; threshold: number }
  | { kind: 'below'; threshold: number }
  | { kind: 'band'; min: number; max: number }
  | { kind: 'curve'; direction: 'above' | 'below'; reference?: number; scale?: number };

/**
 * Identifies one physical sensor inside an area.
 */
export type SensorConfig = {
  /** Host entity id, e.g. "binary_sensor.kitchen_motion" */
  id: Id;
  type: SensorType;
  name?: string;
  /** Overrides the area's type-level weight for this sensor */
  weight?: number;
  activation?: ActivationPredicate;
};

/**
 * Current evidence for one sensor.
 * Only the evidence model produces new values; everything else reads them.
 */
export type SensorState = {
  sensorId: Id;
  type: SensorType;
  available: boolean;
  isActive: boolean;
  /**
   * Evidence strength in [0, 1]. Binary evidence is exactly 0 or 1;
   * continuous evidence lies anywhere in between, 0.5 being neutral.
   */
  strength: number;
  /** True when the strength comes from a continuous curve (no decay applies) */
  continuous: boolean;
  rawValue: RawValue;
  lastActivatedAt: Timestamp | null;
  lastDeactivatedAt: Timestamp | null;
  lastObservedAt: Timestamp | null;
};

/**
 * Derived decay status for one sensor.
 */
export type DecayState = {
  sensorId: Id;
  /** Set when evidence went from active to inactive; null while active */
  decayStartTime: Timestamp | null;
  factor: number;
};

/**
 * A sensor-state-change notification from the host platform.
 */
export type SensorStateChangeEvent = {
  sensorId: Id;
  value: RawValue;
  timestamp: Timestamp;
  /** Explicit availability flag; when omitted it is derived from the value */
  available?: boolean;
};
