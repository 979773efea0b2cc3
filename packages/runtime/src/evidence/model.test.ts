// Tests for the sensor evidence model

import { describe, it, expect } from 'vitest';
import type { NumericBaseline, SensorConfig } from '@roomsense/protocol';
import { applyReading, createSensorState, isUnavailableValue, reevaluateEvidence } from './model.js';
import { extractEvidence } from './extractors.js';

const motion: SensorConfig = { id: 'binary_sensor.hall_motion', type: 'motion' };
const lux: SensorConfig = { id: 'sensor.hall_lux', type: 'illuminance' };

const baseline: NumericBaseline = {
  sensorId: 'sensor.hall_lux',
  mean: 100,
  min: 0,
  max: 200,
  upperBound: 110,
  sampleCount: 50,
};

describe('isUnavailableValue', () => {
  it('treats platform placeholders as unavailable', () => {
    expect(isUnavailableValue(null)).toBe(true);
    expect(isUnavailableValue('unavailable')).toBe(true);
    expect(isUnavailableValue('Unknown')).toBe(true);
    expect(isUnavailableValue('')).toBe(true);
    expect(isUnavailableValue(Number.NaN)).toBe(true);
  });

  it('accepts real readings', () => {
    expect(isUnavailableValue('off')).toBe(false);
    expect(isUnavailableValue(0)).toBe(false);
    expect(isUnavailableValue(false)).toBe(false);
  });
});

describe('applyReading', () => {
  it('starts unavailable and never active', () => {
    const state = createSensorState(motion);

    expect(state.available).toBe(false);
    expect(state.isActive).toBe(false);
    expect(state.lastActivatedAt).toBeNull();
  });

  it('records activation and deactivation times', () => {
    let state = createSensorState(motion);
    state = applyReading(state, motion, { value: 'on', timestamp: '2024-03-01T10:00:00.000Z' });
    state = applyReading(state, motion, { value: 'off', timestamp: '2024-03-01T10:05:00.000Z' });

    expect(state.isActive).toBe(false);
    expect(state.available).toBe(true);
    expect(state.lastActivatedAt).toBe('2024-03-01T10:00:00.000Z');
    expect(state.lastDeactivatedAt).toBe('2024-03-01T10:05:00.000Z');
  });

  it('does not move timestamps on repeated readings', () => {
    let state = createSensorState(motion);
    state = applyReading(state, motion, { value: 'on', timestamp: '2024-03-01T10:00:00.000Z' });
    state = applyReading(state, motion, { value: 'on', timestamp: '2024-03-01T10:01:00.000Z' });

    expect(state.lastActivatedAt).toBe('2024-03-01T10:00:00.000Z');
    expect(state.lastObservedAt).toBe('2024-03-01T10:01:00.000Z');
  });

  it('keeps previous evidence when a sensor becomes unavailable', () => {
    let state = createSensorState(motion);
    state = applyReading(state, motion, { value: 'on', timestamp: '2024-03-01T10:00:00.000Z' });
    state = applyReading(state, motion, { value: 'unavailable', timestamp: '2024-03-01T10:01:00.000Z' });

    expect(state.available).toBe(false);
    expect(state.isActive).toBe(true);
    expect(state.lastActivatedAt).toBe('2024-03-01T10:00:00.000Z');
  });

  it('honours an explicit availability flag', () => {
    const state = applyReading(createSensorState(motion), motion, {
      value: 'on',
      timestamp: '2024-03-01T10:00:00.000Z',
      available: false,
    });

    expect(state.available).toBe(false);
    expect(state.isActive).toBe(false);
  });

  it('ignores readings older than the last observation', () => {
    let state = createSensorState(motion);
    state = applyReading(state, motion, { value: 'on', timestamp: '2024-03-01T10:00:00.000Z' });
    const stale = applyReading(state, motion, { value: 'off', timestamp: '2024-03-01T09:59:00.000Z' });

    expect(stale).toBe(state);
  });

  it('does not mutate the previous state', () => {
    const initial = createSensorState(motion);
    applyReading(initial, motion, { value: 'on', timestamp: '2024-03-01T10:00:00.000Z' });

    expect(initial.isActive).toBe(false);
  });

  it('re-derives continuous evidence when a baseline appears', () => {
    let state = applyReading(createSensorState(lux), lux, { value: 120, timestamp: '2024-03-01T10:00:00.000Z' });
    expect(state.strength).toBe(0.5);

    state = reevaluateEvidence(state, lux, { baseline });
    expect(state.strength).toBeCloseTo(0.7310585786300049, 12);
    expect(state.isActive).toBe(true);
    expect(state.lastActivatedAt).toBe('2024-03-01T10:00:00.000Z');
  });
});

describe('extractEvidence', () => {
  it('uses type default active states', () => {
    expect(extractEvidence({ id: 'm', type: 'media' }, 'paused')?.active).toBe(true);
    expect(extractEvidence({ id: 'm', type: 'media' }, 'idle')?.active).toBe(false);
    expect(extractEvidence({ id: 'd', type: 'door' }, 'closed')?.active).toBe(true);
    expect(extractEvidence({ id: 'w', type: 'window' }, 'open')?.active).toBe(true);
    expect(extractEvidence({ id: 'a', type: 'appliance' }, 'standby')?.active).toBe(false);
    expect(extractEvidence(motion, true)?.active).toBe(true);
    expect(extractEvidence(motion, 'ON')?.active).toBe(true);
  });

  it('uses configured active states', () => {
    const config: SensorConfig = {
      id: 'sensor.tv',
      type: 'media',
      activation: { kind: 'states', activeStates: ['On'] },
    };

    expect(extractEvidence(config, 'on')).toEqual({ active: true, strength: 1, continuous: false });
    expect(extractEvidence(config, 'playing')?.active).toBe(false);
  });

  it('returns neutral continuous evidence without a baseline', () => {
    expect(extractEvidence(lux, 300)).toEqual({ active: false, strength: 0.5, continuous: true });
  });

  it('scores numeric readings against the learned baseline', () => {
    expect(extractEvidence(lux, 110, { baseline })?.strength).toBe(0.5);
    expect(extractEvidence(lux, '120', { baseline })?.strength).toBeCloseTo(0.7310585786300049, 12);
  });

  it('flips the curve for a below direction', () => {
    const config: SensorConfig = {
      id: 'sensor.hall_lux',
      type: 'illuminance',
      activation: { kind: 'curve', direction: 'below', reference: 110, scale: 10 },
    };

    expect(extractEvidence(config, 100)?.strength).toBeCloseTo(0.7310585786300049, 12);
  });

  it('applies hard numeric predicates', () => {
    const above: SensorConfig = { id: 't', type: 'temperature', activation: { kind: 'above', threshold: 22 } };
    const band: SensorConfig = { id: 'h', type: 'humidity', activation: { kind: 'band', min: 40, max: 60 } };

    expect(extractEvidence(above, 23)).toEqual({ active: true, strength: 1, continuous: false });
    expect(extractEvidence(above, 22)?.active).toBe(false);
    expect(extractEvidence(band, 60)?.active).toBe(true);
    expect(extractEvidence(band, 61)?.active).toBe(false);
  });

  it('rejects non-numeric readings for numeric sensors', () => {
    expect(extractEvidence(lux, 'bright')).toBeNull();
  });
});
