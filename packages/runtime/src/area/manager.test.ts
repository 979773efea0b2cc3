// Tests for the area manager

import { describe, it, expect, beforeEach } from 'vitest';
import type { AreaConfigInput, SensorStateRecord } from '@roomsense/protocol';
import { resolveAreaConfig } from '@roomsense/protocol';
import {
  createInMemoryRepositoryContext,
  type InMemoryRepositoryContext,
  type RepositoryContext,
} from '@roomsense/repositories';
import { AreaManager } from './manager.js';
import { ALL_AREAS, type AreaEvent } from '../events/index.js';
import { AreaNotFoundError, ConfigurationError, ValidationError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { createDefaultPriorSet } from '../priors/index.js';

// --- Test Fixtures ---

const DAY_START = Date.parse('2024-03-07T00:00:00.000Z');
const NOW = new Date(DAY_START + 24 * 3600_000);
const MOTION = 'binary_sensor.motion';
const HALL_MOTION = 'binary_sensor.hall_motion';

const den: AreaConfigInput = {
  id: 'den',
  name: 'Den',
  sensors: [{ id: MOTION, type: 'motion' }],
  historyPeriodDays: 1,
};

const hall: AreaConfigInput = {
  id: 'hall',
  name: 'Hall',
  sensors: [
    { id: HALL_MOTION, type: 'motion' },
    { id: MOTION, type: 'motion' },
  ],
};

// Motion on for the first half of every even hour: 6h of 24h occupied
function motionHistory(): SensorStateRecord[] {
  return Array.from({ length: 12 }, (_, h) => ({
    sensorId: MOTION,
    value: h % 2 === 0 ? 'on' : 'off',
    available: true,
    timestamp: new Date(DAY_START + h * 3600_000).toISOString(),
  }));
}

describe('AreaManager', () => {
  let repos: InMemoryRepositoryContext;
  let manager: AreaManager;
  let events: AreaEvent[];

  beforeEach(() => {
    repos = createInMemoryRepositoryContext();
    manager = new AreaManager(repos, { logger: silentLogger, now: () => NOW });
    events = [];
    manager.bus.subscribe(ALL_AREAS, (e) => {
      events.push(e);
    });
  });

  describe('addArea', () => {
    it('persists the configuration and default priors', async () => {
      const area = await manager.addArea(den);

      expect(area.id).toBe('den');
      expect(repos._data.areas.get('den')?.threshold).toBe(50);
      expect(repos._data.priors.get('den')?.version).toBe(0);
    });

    it('rejects an area without a motion sensor', async () => {
      await expect(
        manager.addArea({ id: 'den', name: 'Den', sensors: [{ id: 'light.lamp', type: 'light' }] })
      ).rejects.toThrow(ConfigurationError);
      expect(repos._data.areas.size).toBe(0);
    });

    it('reconfigures an active area in place', async () => {
      const first = await manager.addArea(den);
      const second = await manager.addArea({ ...den, threshold: 70 });

      expect(second).toBe(first);
      expect(second.getThreshold()).toBe(70);
    });
  });

  describe('load', () => {
    it('activates stored areas with their stored priors', async () => {
      await repos.areas.save(resolveAreaConfig(den));
      await repos.priors.replace({ ...createDefaultPriorSet('den', NOW), version: 4 });

      const loaded = await AreaManager.load(repos, { logger: silentLogger, now: () => NOW });

      expect(loaded.getArea('den').getPriors().version).toBe(4);
    });

    it('clamps stored priors before activating the area', async () => {
      const stored = createDefaultPriorSet('den', NOW);
      await repos.areas.save(resolveAreaConfig(den));
      await repos.priors.replace({
        ...stored,
        models: { ...stored.models, motion: { ...stored.models.motion, pTruePositive: 1, pFalsePositive: 0 } },
      });

      const loaded = await AreaManager.load(repos, { logger: silentLogger, now: () => NOW });
      const states = await loaded.dispatch({ sensorId: MOTION, value: 'on', timestamp: NOW.toISOString() });

      expect(loaded.getArea('den').getPriors().models.motion.pTruePositive).toBe(0.999);
      expect(states[0]?.occupied).toBe(true);
    });

    it('skips stored areas that no longer validate', async () => {
      await repos.areas.save({ ...resolveAreaConfig(den), threshold: 0 });

      const loaded = await AreaManager.load(repos, { logger: silentLogger, now: () => NOW });

      expect(loaded.listAreas()).toEqual([]);
    });
  });

  describe('dispatch', () => {
    it('updates every area that configures the sensor', async () => {
      await manager.addArea(den);
      await manager.addArea(hall);

      const states = await manager.dispatch({ sensorId: MOTION, value: 'on', timestamp: NOW.toISOString() });

      expect(states.map((s) => s.areaId)).toEqual(['den', 'hall']);
      expect(manager.areasForSensor(HALL_MOTION)).toEqual(['hall']);
      expect(events.filter((e) => e.type === 'area.state.updated').map((e) => e.areaId)).toEqual([
        'den',
        'hall',
      ]);
    });
  });

  describe('setThreshold', () => {
    beforeEach(async () => {
      await manager.addArea(den);
    });

    it('persists the threshold and publishes the change', async () => {
      const state = await manager.setThreshold('den', 80);

      expect(state.threshold).toBe(80);
      expect(repos._data.areas.get('den')?.threshold).toBe(80);
      expect(events).toHaveLength(1);
      expect(events[0]?.type).toBe('area.threshold.changed');
      expect(events[0]?.payload).toEqual({ previous: 50, threshold: 80 });
    });

    it('rejects invalid thresholds', async () => {
      await expect(manager.setThreshold('den', 0)).rejects.toThrow(ValidationError);
      expect(repos._data.areas.get('den')?.threshold).toBe(50);
    });

    it('rejects unknown areas', async () => {
      await expect(manager.setThreshold('attic', 60)).rejects.toThrow(AreaNotFoundError);
    });
  });

  describe('updatePriors', () => {
    beforeEach(async () => {
      await repos.history.append(motionHistory());
      await manager.addArea(den);
    });

    it('commits learned priors and recomputes the area', async () => {
      const report = await manager.updatePriors('den');
      const area = manager.getArea('den');

      expect(report.status).toBe('success');
      expect(report.updatedTypes).toEqual(['motion']);
      expect(repos._data.priors.get('den')?.version).toBe(1);
      expect(area.getPriors().version).toBe(1);
      expect(area.getState().priorProbability).toBe(0.25);
      expect(area.getLastLearnerReport()).toBe(report);
      expect(events.map((e) => e.type)).toEqual(['area.state.updated', 'area.priors.updated']);
      expect(events[1]?.payload).toEqual({ version: 1, updatedTypes: ['motion'] });
    });

    it('shares a run already in flight', async () => {
      const first = manager.updatePriors('den');
      const second = manager.updatePriors('den');

      expect(second).toBe(first);
      await first;
    });

    it('keeps the current priors when learning fails', async () => {
      const broken: RepositoryContext = {
        areas: repos.areas,
        priors: repos.priors,
        history: {
          ...repos.history,
          query: async () => {
            throw new Error('disk gone');
          },
        },
      };
      const failing = new AreaManager(broken, { logger: silentLogger, now: () => NOW });
      const failures: AreaEvent[] = [];
      failing.bus.subscribe('den', (e) => {
        failures.push(e);
      });
      await failing.addArea(den);

      const report = await failing.updatePriors('den');

      expect(report.status).toBe('failed');
      expect(report.error).toEqual({
        code: 'LEARNER_ERROR',
        message: 'Historical analysis for area "den" failed: disk gone',
      });
      expect(failing.getArea('den').getPriors().version).toBe(0);
      expect(failures.map((e) => e.type)).toEqual(['area.learner.failed']);
    });

    it('reports a failed commit without swapping priors', async () => {
      const flaky: RepositoryContext = {
        areas: repos.areas,
        history: repos.history,
        priors: {
          ...repos.priors,
          replace: async () => {
            throw new Error('write refused');
          },
        },
      };
      const failing = new AreaManager(flaky, { logger: silentLogger, now: () => NOW });
      await repos.priors.replace(createDefaultPriorSet('den', NOW));
      await failing.addArea(den);

      const report = await failing.updatePriors('den');

      expect(report.status).toBe('failed');
      expect(report.error?.code).toBe('PRIOR_COMMIT_FAILED');
      expect(failing.getArea('den').getPriors().version).toBe(0);
      expect(repos._data.priors.get('den')?.version).toBe(0);
    });

    it('leaves other areas with the same sensor types untouched', async () => {
      const other = await manager.addArea(hall);
      const before = other.getPriors();

      await manager.updatePriors('den');

      expect(manager.getArea('den').getPriors().models.motion.priorOccupied).toBe(0.25);
      expect(other.getPriors()).toBe(before);
      expect(other.getState().priorProbability).toBe(0.35);
      expect(repos._data.priors.get('hall')?.version).toBe(0);
      expect(repos._data.priors.get('hall')?.models.motion.priorOccupied).toBe(0.35);
    });

    it('cancels the run and writes nothing when the area is removed', async () => {
      const running = manager.updatePriors('den');

      expect(await manager.removeArea('den')).toBe(true);
      const report = await running;

      expect(report.status).toBe('failed');
      expect(report.error?.code).toBe('LEARNER_CANCELLED');
      expect(repos._data.priors.has('den')).toBe(false);
      expect(events).toEqual([]);
    });

    it('rejects unknown areas', () => {
      expect(() => manager.updatePriors('attic')).toThrow(AreaNotFoundError);
    });
  });

  describe('removeArea', () => {
    it('drops the area and its stored data', async () => {
      await manager.addArea(den);

      expect(await manager.removeArea('den')).toBe(true);
      expect(() => manager.getArea('den')).toThrow(AreaNotFoundError);
      expect(repos._data.priors.has('den')).toBe(false);
      expect(await manager.removeArea('den')).toBe(false);
    });
  });

  describe('pruneHistory', () => {
    const old: SensorStateRecord[] = [
      { sensorId: MOTION, value: 'on', available: true, timestamp: '2024-03-05T12:00:00.000Z' },
      { sensorId: MOTION, value: 'off', available: true, timestamp: '2024-03-06T12:00:00.000Z' },
    ];

    beforeEach(async () => {
      await repos.history.append(old);
    });

    it('deletes history older than the longest period plus a day', async () => {
      await manager.addArea(den);

      expect(await manager.pruneHistory()).toBe(1);
      expect(repos._data.history.map((r) => r.timestamp)).toEqual(['2024-03-06T12:00:00.000Z']);
    });

    it('keeps what the area with the longest period still reads', async () => {
      await manager.addArea(den);
      await manager.addArea(hall);

      expect(await manager.pruneHistory()).toBe(0);
      expect(repos._data.history).toHaveLength(2);
    });

    it('deletes nothing without active areas', async () => {
      expect(await manager.pruneHistory()).toBe(0);
    });
  });
});
