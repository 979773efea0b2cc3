// Tests for the area coordinator

import { describe, it, expect, beforeEach } from 'vitest';
import type { AreaConfigInput, AreaState, PriorSet } from '@roomsense/protocol';
import { resolveAreaConfig } from '@roomsense/protocol';
import { Area } from './area.js';
import { ConfigurationError, ValidationError } from '../errors.js';
import { createCapturingLogger, silentLogger } from '../logger.js';
import { createDefaultPriorSet } from '../priors/index.js';
import { logit, sigmoid } from '../probability.js';

// --- Test Fixtures ---

const T0 = Date.parse('2024-03-01T10:00:00.000Z');
const MOTION = 'binary_sensor.motion';
const TV = 'media_player.tv';

function at(seconds: number): string {
  return new Date(T0 + seconds * 1000).toISOString();
}

const input: AreaConfigInput = {
  id: 'den',
  name: 'Den',
  sensors: [{ id: MOTION, type: 'motion' }],
};

// Default motion model: LR = 0.25 / 0.05 = 5, weight 0.85
const MOTION_ACTIVE = sigmoid(logit(0.35) + 0.85 * Math.log(5));

describe('Area', () => {
  let clock: number;
  let area: Area;

  beforeEach(() => {
    clock = T0;
    area = Area.create(input, { logger: silentLogger, now: () => new Date(clock) });
  });

  it('starts at the baseline with every sensor unavailable', () => {
    const state = area.getState();

    expect(state.probability).toBe(0.35);
    expect(state.priorProbability).toBe(0.35);
    expect(state.occupied).toBe(false);
    expect(state.sensorAvailability).toEqual({ [MOTION]: false });
    expect(state.priorVersion).toBe(0);
  });

  it('rejects an invalid configuration', () => {
    expect(() => Area.create({ id: 'den', name: 'Den', sensors: [{ id: TV, type: 'media' }] })).toThrow(
      ConfigurationError
    );
  });

  it('recomputes when a sensor event arrives', async () => {
    const state = await area.applyEvent({ sensorId: MOTION, value: 'on', timestamp: at(0) });

    expect(state.probability).toBeCloseTo(MOTION_ACTIVE, 12);
    expect(state.occupied).toBe(true);
    expect(state.activeTriggers).toEqual([MOTION]);
    expect(state.lastUpdated).toBe(at(0));
  });

  it('ignores events for sensors it does not configure', async () => {
    const state = await area.applyEvent({ sensorId: TV, value: 'playing', timestamp: at(0) });

    expect(state.probability).toBe(0.35);
  });

  it('applies queued events in call order', async () => {
    const [first, second] = await Promise.all([
      area.applyEvent({ sensorId: MOTION, value: 'on', timestamp: at(0) }),
      area.applyEvent({ sensorId: MOTION, value: 'unavailable', timestamp: at(1) }),
    ]);

    expect(first?.sensorAvailability[MOTION]).toBe(true);
    expect(second?.sensorAvailability[MOTION]).toBe(false);
    expect(second?.probability).toBe(0.35);
  });

  it('re-decides occupancy on threshold change without recomputing', async () => {
    await area.applyEvent({ sensorId: MOTION, value: 'on', timestamp: at(0) });
    const before = area.getState();

    area.setThreshold(90);
    const after = area.getState();

    expect(after.probability).toBe(before.probability);
    expect(after.lastUpdated).toBe(before.lastUpdated);
    expect(after.threshold).toBe(90);
    expect(after.occupied).toBe(false);
  });

  it('rejects thresholds outside 1..99', () => {
    expect(() => area.setThreshold(0)).toThrow(ValidationError);
    expect(() => area.setThreshold(100)).toThrow(ValidationError);
    expect(area.getThreshold()).toBe(50);
  });

  it('decays evidence on refresh', async () => {
    await area.applyEvent({ sensorId: MOTION, value: 'on', timestamp: at(0) });
    clock = T0 + 60_000;
    await area.applyEvent({ sensorId: MOTION, value: 'off', timestamp: at(60) });

    // 360s after deactivation: 300s into the 600s window, cosine factor 0.5
    clock = T0 + 420_000;
    const state = await area.refresh();

    expect(state.decayStatus[MOTION]).toBeCloseTo(0.5, 12);
    expect(state.probability).toBeCloseTo(sigmoid(logit(0.35) + 0.425 * Math.log(5)), 12);
  });

  it('uses new priors after replacement', async () => {
    await area.applyEvent({ sensorId: MOTION, value: 'on', timestamp: at(0) });
    const current = area.getPriors();
    const next: PriorSet = {
      ...current,
      version: 1,
      models: { ...current.models, motion: { ...current.models.motion, pTruePositive: 0.95 } },
    };

    const state = await area.replacePriors(next);

    expect(state.priorVersion).toBe(1);
    expect(state.probability).toBeCloseTo(sigmoid(logit(0.35) + 0.85 * Math.log(19)), 12);
    expect(area.getPriors()).toEqual(next);
  });

  it('clamps stored priors that claim certainty', async () => {
    const defaults = createDefaultPriorSet('den', new Date(T0));
    const certain: PriorSet = {
      ...defaults,
      models: { ...defaults.models, motion: { ...defaults.models.motion, pTruePositive: 1, pFalsePositive: 0 } },
    };
    const loaded = Area.create(input, { priors: certain, logger: silentLogger, now: () => new Date(clock) });

    const state = await loaded.applyEvent({ sensorId: MOTION, value: 'on', timestamp: at(0) });

    expect(state.probability).toBeCloseTo(sigmoid(logit(0.35) + 0.85 * Math.log(0.999 / 0.001)), 12);
    expect(loaded.getPriors().models.motion.pTruePositive).toBe(0.999);
    expect(loaded.getPriors().models.motion.pFalsePositive).toBe(0.001);
  });

  it('clamps replacement priors that claim certainty', async () => {
    await area.applyEvent({ sensorId: MOTION, value: 'on', timestamp: at(0) });
    const current = area.getPriors();
    const certain: PriorSet = {
      ...current,
      version: 1,
      models: { ...current.models, motion: { ...current.models.motion, pTruePositive: 1, pFalsePositive: 0 } },
    };

    const state = await area.replacePriors(certain);

    expect(state.probability).toBeCloseTo(sigmoid(logit(0.35) + 0.85 * Math.log(0.999 / 0.001)), 12);
    expect(area.getPriors().models.motion.pFalsePositive).toBe(0.001);
  });

  it('refuses priors belonging to another area', () => {
    expect(() => area.replacePriors(createDefaultPriorSet('kitchen'))).toThrow(ValidationError);
  });

  it('keeps sensor state across reconfiguration', async () => {
    await area.applyEvent({ sensorId: MOTION, value: 'on', timestamp: at(0) });

    const state = await area.reconfigure(
      resolveAreaConfig({ ...input, sensors: [...input.sensors, { id: TV, type: 'media' }] })
    );

    expect(state.sensorAvailability).toEqual({ [TV]: false, [MOTION]: true });
    expect(area.hasSensor(TV)).toBe(true);
  });

  it('seeds sensors from their current values', async () => {
    const state = await area.initialize(async (sensorId) =>
      sensorId === MOTION ? { value: 'on', timestamp: at(0) } : null
    );

    expect(state.activeTriggers).toEqual([MOTION]);
  });

  it('notifies the listener after each recomputation', async () => {
    const seen: AreaState[] = [];
    const listened = Area.create(input, {
      logger: silentLogger,
      now: () => new Date(clock),
      onStateChange: (state) => {
        seen.push(state);
      },
    });

    await listened.applyEvent({ sensorId: MOTION, value: 'on', timestamp: at(0) });

    expect(seen).toHaveLength(1);
    expect(seen[0]?.occupied).toBe(true);
  });

  it('logs listener failures without failing the update', async () => {
    const logger = createCapturingLogger();
    const failing = Area.create(input, {
      logger,
      now: () => new Date(clock),
      onStateChange: () => {
        throw new Error('listener broke');
      },
    });

    const state = await failing.applyEvent({ sensorId: MOTION, value: 'on', timestamp: at(0) });

    expect(state.occupied).toBe(true);
    expect(logger.entries.map((e) => e.message)).toEqual(['State change listener failed']);
  });

  it('hands out state that callers cannot change', async () => {
    await area.applyEvent({ sensorId: MOTION, value: 'on', timestamp: at(0) });
    const first = area.getState();

    first.activeTriggers.push(TV);
    first.perSensorProbabilities[MOTION] = 0;
    first.decayStatus[MOTION] = 0;
    first.sensorAvailability[MOTION] = false;

    const second = area.getState();
    expect(second.activeTriggers).toEqual([MOTION]);
    expect(second.perSensorProbabilities[MOTION]).toBeCloseTo(MOTION_ACTIVE, 12);
    expect(second.decayStatus).toEqual({});
    expect(second.sensorAvailability).toEqual({ [MOTION]: true });
  });

  it('reports diagnostics per sensor', async () => {
    await area.applyEvent({ sensorId: MOTION, value: 'on', timestamp: at(0) });
    const diagnostics = area.getDiagnostics();

    expect(diagnostics.name).toBe('Den');
    expect(diagnostics.sensors).toHaveLength(1);
    expect(diagnostics.sensors[0]?.weight).toBe(0.85);
    expect(diagnostics.sensors[0]?.decay).toEqual({ sensorId: MOTION, decayStartTime: null, factor: 1 });
    expect(diagnostics.metrics.samples).toBe(1);
    expect(diagnostics.lastLearnerReport).toBeNull();
  });
});
