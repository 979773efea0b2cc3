// Evidence Extraction
//
// Turns a raw reading into evidence. The extractor is chosen by the
// sensor's type tag; predicates on the SensorConfig refine it.

import type { NumericBaseline, RawValue, SensorConfig, SensorType } from '@roomsense/protocol';
import { DEFAULT_ACTIVE_STATES } from '@roomsense/protocol';
import { sigmoid } from '../probability.js';

/**
 * Evidence derived from one reading.
 */
export type Evidence = {
  active: boolean;
  /** 0 or 1 for binary evidence, anywhere in [0, 1] for continuous */
  strength: number;
  continuous: boolean;
};

/**
 * Learned data an extractor may consult.
 */
export type EvidenceContext = {
  baseline?: NumericBaseline;
};

/**
 * Returns null when the reading cannot be interpreted for this sensor.
 */
export type EvidenceExtractor = (
  config: SensorConfig,
  value: Exclude<RawValue, null>,
  context: EvidenceContext
) => Evidence | null;

/** Smallest scale used for a curve, so a flat baseline never divides by zero */
export const MIN_CURVE_SCALE = 1e-6;

/** Fraction of the observed range used as the curve scale */
export const BASELINE_SCALE_FRACTION = 0.05;

function binary(active: boolean): Evidence {
  return { active, strength: active ? 1 : 0, continuous: false };
}

/**
 * Canonical string form of a reading for state comparison.
 */
export function normalizeState(value: Exclude<RawValue, null>): string {
  if (typeof value === 'boolean') return value ? 'on' : 'off';
  return String(value).trim().toLowerCase();
}

export function parseNumeric(value: Exclude<RawValue, null>): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return null;
  const trimmed = value.trim();
  if (trimmed === '') return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * States that count as active for a sensor, from its predicate or the type default.
 */
export function activeStatesFor(config: SensorConfig): string[] {
  if (config.activation?.kind === 'states') {
    return config.activation.activeStates.map((s) => s.toLowerCase());
  }
  return DEFAULT_ACTIVE_STATES[config.type] ?? ['on'];
}

const stateEvidence: EvidenceExtractor = (config, value) =>
  binary(activeStatesFor(config).includes(normalizeState(value)));

const numericEvidence: EvidenceExtractor = (config, value, context) => {
  const activation = config.activation;
  if (activation?.kind === 'states') {
    return stateEvidence(config, value, context);
  }

  const reading = parseNumeric(value);
  if (reading === null) return null;

  switch (activation?.kind) {
    case 'above':
      return binary(reading > activation.threshold);
    case 'below':
      return binary(reading < activation.threshold);
    case 'band':
      return binary(reading >= activation.min && reading <= activation.max);
    default: {
      const direction = activation?.direction ?? 'above';
      const reference = activation?.reference ?? context.baseline?.upperBound;
      if (reference === undefined) {
        // Nothing to compare against yet: neutral evidence
        return { active: false, strength: 0.5, continuous: true };
      }
      const scale = activation?.scale ?? baselineScale(context.baseline);
      const z = (reading - reference) / scale;
      const strength = sigmoid(direction === 'above' ? z : -z);
      return { active: strength > 0.5, strength, continuous: true };
    }
  }
};

/**
 * Curve scale from a learned baseline: 5% of the observed range.
 */
export function baselineScale(baseline: NumericBaseline | undefined): number {
  if (!baseline) return 1;
  return Math.max((baseline.max - baseline.min) * BASELINE_SCALE_FRACTION, MIN_CURVE_SCALE);
}

/**
 * Extractor per sensor type.
 */
export const evidenceExtractors: Record<SensorType, EvidenceExtractor> = {
  motion: stateEvidence,
  media: stateEvidence,
  appliance: stateEvidence,
  door: stateEvidence,
  window: stateEvidence,
  light: stateEvidence,
  illuminance: numericEvidence,
  humidity: numericEvidence,
  temperature: numericEvidence,
};

/**
 * Extract evidence from an available reading.
 */
export function extractEvidence(
  config: SensorConfig,
  value: Exclude<RawValue, null>,
  context: EvidenceContext = {}
): Evidence | null {
  return evidenceExtractors[config.type](config, value, context);
}
