// Area Configuration Validation
//
// Resolves operator input against defaults and checks the result.
// An area with any validation error must not become active.

import type { AreaConfig, AreaConfigInput } from '../types/area.js';
import type { SensorConfig, SensorType } from '../types/sensors.js';
import { SENSOR_TYPES, isNumericSensorType } from '../types/sensors.js';
import {
  DEFAULT_DECAY,
  DEFAULT_HISTORY_PERIOD_DAYS,
  DEFAULT_LEARNER,
  DEFAULT_THRESHOLD,
  DEFAULT_WEIGHTS,
  MAX_THRESHOLD,
  MIN_THRESHOLD,
} from '../defaults.js';

/**
 * Result of validating an area configuration
 */
export type AreaConfigValidationResult = {
  valid: boolean;
  errors: AreaConfigIssue<AreaConfigErrorCode>[];
  warnings: AreaConfigIssue<AreaConfigWarningCode>[];
};

export type AreaConfigIssue<Code extends string> = {
  path: string;
  message: string;
  code: Code;
};

/**
 * Validation error codes (area cannot be activated)
 */
export type AreaConfigErrorCode =
  | 'MISSING_FIELD'
  | 'MISSING_MOTION_SENSOR'
  | 'DUPLICATE_SENSOR'
  | 'INVALID_WEIGHT'
  | 'INVALID_THRESHOLD'
  | 'INVALID_DECAY'
  | 'INVALID_HISTORY_PERIOD'
  | 'INVALID_PREDICATE'
  | 'INVALID_LEARNER';

/**
 * Validation warning codes (area works but may behave unexpectedly)
 */
export type AreaConfigWarningCode = 'ZERO_WEIGHT' | 'PROXY_TYPE_NOT_CONFIGURED';

/**
 * Fill every omitted setting with its default.
 * The input is not mutated; weights are merged over the defaults.
 */
export function resolveAreaConfig(input: AreaConfigInput): AreaConfig {
  return {
    id: input.id,
    name: input.name,
    sensors: input.sensors.map((sensor) => ({ ...sensor })),
    weights: { ...DEFAULT_WEIGHTS, ...input.weights },
    threshold: input.threshold ?? DEFAULT_THRESHOLD,
    decay: { ...DEFAULT_DECAY, ...input.decay },
    historyPeriodDays: input.historyPeriodDays ?? DEFAULT_HISTORY_PERIOD_DAYS,
    historicalAnalysisEnabled: input.historicalAnalysisEnabled ?? true,
    learner: {
      ...DEFAULT_LEARNER,
      ...input.learner,
      proxyTypes: [...(input.learner?.proxyTypes ?? DEFAULT_LEARNER.proxyTypes)],
    },
  };
}

/**
 * Check a threshold percent.
 */
export function isValidThreshold(threshold: number): boolean {
  return Number.isFinite(threshold) && threshold >= MIN_THRESHOLD && threshold <= MAX_THRESHOLD;
}

export function isValidWeight(weight: number): boolean {
  return Number.isFinite(weight) && weight >= 0 && weight <= 1;
}

/**
 * Validate a resolved area configuration.
 */
export function validateAreaConfig(config: AreaConfig): AreaConfigValidationResult {
  const errors: AreaConfigIssue<AreaConfigErrorCode>[] = [];
  const warnings: AreaConfigIssue<AreaConfigWarningCode>[] = [];

  if (config.id.trim() === '') {
    errors.push({ path: 'id', message: 'Area must have a non-empty id', code: 'MISSING_FIELD' });
  }

  if (!config.sensors.some((s) => s.type === 'motion')) {
    errors.push({
      path: 'sensors',
      message: 'Area must have at least one motion sensor',
      code: 'MISSING_MOTION_SENSOR',
    });
  }

  const seen = new Set<string>();
  config.sensors.forEach((sensor, i) => {
    const path = `sensors[${i}]`;
    if (sensor.id.trim() === '') {
      errors.push({ path: `${path}.id`, message: 'Sensor must have a non-empty id', code: 'MISSING_FIELD' });
    } else if (seen.has(sensor.id)) {
      errors.push({
        path: `${path}.id`,
        message: `Sensor "${sensor.id}" is configured more than once`,
        code: 'DUPLICATE_SENSOR',
      });
    }
    seen.add(sensor.id);

    if (sensor.weight !== undefined && !isValidWeight(sensor.weight)) {
      errors.push({
        path: `${path}.weight`,
        message: `Weight must be between 0 and 1, got ${sensor.weight}`,
        code: 'INVALID_WEIGHT',
      });
    }

    errors.push(...validatePredicate(sensor, path));
  });

  for (const type of SENSOR_TYPES) {
    const weight = config.weights[type];
    if (!isValidWeight(weight)) {
      errors.push({
        path: `weights.${type}`,
        message: `Weight must be between 0 and 1, got ${weight}`,
        code: 'INVALID_WEIGHT',
      });
    } else if (weight === 0 && config.sensors.some((s) => s.type === type && s.weight === undefined)) {
      warnings.push({
        path: `weights.${type}`,
        message: `Sensors of type "${type}" have weight 0 and never affect the probability`,
        code: 'ZERO_WEIGHT',
      });
    }
  }

  if (!isValidThreshold(config.threshold)) {
    errors.push({
      path: 'threshold',
      message: `Threshold must be between ${MIN_THRESHOLD} and ${MAX_THRESHOLD}, got ${config.threshold}`,
      code: 'INVALID_THRESHOLD',
    });
  }

  if (!Number.isFinite(config.decay.windowSeconds) || config.decay.windowSeconds <= 0) {
    errors.push({
      path: 'decay.windowSeconds',
      message: 'Decay window must be a positive number of seconds',
      code: 'INVALID_DECAY',
    });
  }
  if (!Number.isFinite(config.decay.minDelaySeconds) || config.decay.minDelaySeconds < 0) {
    errors.push({
      path: 'decay.minDelaySeconds',
      message: 'Decay minimum delay must not be negative',
      code: 'INVALID_DECAY',
    });
  }

  if (!Number.isFinite(config.historyPeriodDays) || config.historyPeriodDays <= 0) {
    errors.push({
      path: 'historyPeriodDays',
      message: 'History period must be a positive number of days',
      code: 'INVALID_HISTORY_PERIOD',
    });
  }

  errors.push(...validateLearner(config));
  warnings.push(...proxyWarnings(config));

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function validatePredicate(sensor: SensorConfig, path: string): AreaConfigIssue<AreaConfigErrorCode>[] {
  const activation = sensor.activation;
  if (!activation) return [];

  const issue = (message: string): AreaConfigIssue<AreaConfigErrorCode>[] => [
    { path: `${path}.activation`, message, code: 'INVALID_PREDICATE' },
  ];

  if (activation.kind === 'states') {
    return activation.activeStates.length === 0
      ? issue('A states predicate needs at least one active state')
      : [];
  }

  if (!isNumericSensorType(sensor.type)) {
    return issue(`A ${activation.kind} predicate requires a numeric sensor, "${sensor.id}" is ${sensor.type}`);
  }

  switch (activation.kind) {
    case 'above':
    case 'below':
      return Number.isFinite(activation.threshold) ? [] : issue('Threshold must be a finite number');
    case 'band':
      if (!Number.isFinite(activation.min) || !Number.isFinite(activation.max)) {
        return issue('Band bounds must be finite numbers');
      }
      return activation.min <= activation.max ? [] : issue('Band min must not exceed max');
    case 'curve':
      if (activation.reference !== undefined && !Number.isFinite(activation.reference)) {
        return issue('Curve reference must be a finite number');
      }
      if (activation.scale !== undefined && !(activation.scale > 0)) {
        return issue('Curve scale must be positive');
      }
      return [];
  }
}

function validateLearner(config: AreaConfig): AreaConfigIssue<AreaConfigErrorCode>[] {
  const errors: AreaConfigIssue<AreaConfigErrorCode>[] = [];
  if (config.learner.proxyTypes.length === 0) {
    errors.push({
      path: 'learner.proxyTypes',
      message: 'At least one occupancy proxy type is required',
      code: 'INVALID_LEARNER',
    });
  }
  if (!Number.isInteger(config.learner.minSamples) || config.learner.minSamples < 1) {
    errors.push({
      path: 'learner.minSamples',
      message: 'Minimum sample count must be a positive integer',
      code: 'INVALID_LEARNER',
    });
  }
  if (!Number.isFinite(config.learner.timeoutMs) || config.learner.timeoutMs <= 0) {
    errors.push({
      path: 'learner.timeoutMs',
      message: 'Learner timeout must be positive',
      code: 'INVALID_LEARNER',
    });
  }
  return errors;
}

function proxyWarnings(config: AreaConfig): AreaConfigIssue<AreaConfigWarningCode>[] {
  const configured = new Set<SensorType>(config.sensors.map((s) => s.type));
  return config.learner.proxyTypes
    .filter((type) => !configured.has(type))
    .map((type) => ({
      path: 'learner.proxyTypes',
      message: `Proxy type "${type}" has no configured sensor`,
      code: 'PROXY_TYPE_NOT_CONFIGURED' as const,
    }));
}
