// Tests for sensor event ingestion

import { describe, it, expect, beforeEach } from 'vitest';
import {
  createInMemoryRepositoryContext,
  type InMemoryRepositoryContext,
  type RepositoryContext,
} from '@roomsense/repositories';
import { ingestSensorEvent, validateSensorEvent } from './sensor-event.js';
import { AreaManager } from '../area/index.js';
import { InvalidSensorEventError } from '../errors.js';
import { createCapturingLogger, silentLogger } from '../logger.js';

const NOW = new Date('2024-03-01T10:00:00.000Z');
const MOTION = 'binary_sensor.motion';

describe('validateSensorEvent', () => {
  it('accepts a well-formed event', () => {
    expect(validateSensorEvent({ sensorId: MOTION, value: 'on', timestamp: NOW.toISOString() })).toEqual({
      sensorId: MOTION,
      value: 'on',
      timestamp: NOW.toISOString(),
    });
  });

  it('keeps an explicit availability flag', () => {
    const event = validateSensorEvent({ sensorId: MOTION, value: null, timestamp: NOW.toISOString(), available: false });

    expect(event.available).toBe(false);
  });

  it.each([
    ['not an object', 'on', undefined],
    ['missing sensorId', { value: 'on', timestamp: NOW.toISOString() }, 'sensorId'],
    ['blank sensorId', { sensorId: ' ', value: 'on', timestamp: NOW.toISOString() }, 'sensorId'],
    ['bad timestamp', { sensorId: MOTION, value: 'on', timestamp: 'yesterday' }, 'timestamp'],
    ['object value', { sensorId: MOTION, value: { on: true }, timestamp: NOW.toISOString() }, 'value'],
    ['infinite value', { sensorId: MOTION, value: Infinity, timestamp: NOW.toISOString() }, 'value'],
    ['non-boolean available', { sensorId: MOTION, value: 'on', timestamp: NOW.toISOString(), available: 1 }, 'available'],
  ])('rejects %s', (_label, input, field) => {
    try {
      validateSensorEvent(input);
      expect.fail('expected validation to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidSensorEventError);
      if (error instanceof InvalidSensorEventError) {
        expect(error.field).toBe(field);
      }
    }
  });
});

describe('ingestSensorEvent', () => {
  let repos: InMemoryRepositoryContext;
  let manager: AreaManager;

  beforeEach(async () => {
    repos = createInMemoryRepositoryContext();
    manager = new AreaManager(repos, { logger: silentLogger, now: () => NOW });
    await manager.addArea({ id: 'den', name: 'Den', sensors: [{ id: MOTION, type: 'motion' }] });
  });

  it('records history and updates the area', async () => {
    const result = await ingestSensorEvent(repos, manager, {
      sensorId: MOTION,
      value: 'on',
      timestamp: NOW.toISOString(),
    });

    expect(repos._data.history).toEqual([
      { sensorId: MOTION, value: 'on', available: true, timestamp: NOW.toISOString() },
    ]);
    expect(result.states).toHaveLength(1);
    expect(result.states[0]?.activeTriggers).toEqual([MOTION]);
    expect(result.historyRecorded).toBe(true);
  });

  it('updates areas when the history write fails', async () => {
    const logger = createCapturingLogger();
    const broken: RepositoryContext = {
      areas: repos.areas,
      priors: repos.priors,
      history: {
        ...repos.history,
        append: async () => {
          throw new Error('db down');
        },
      },
    };

    const result = await ingestSensorEvent(
      broken,
      manager,
      { sensorId: MOTION, value: 'on', timestamp: NOW.toISOString() },
      { logger }
    );

    expect(result.historyRecorded).toBe(false);
    expect(result.states[0]?.activeTriggers).toEqual([MOTION]);
    expect(manager.getArea('den').getState().occupied).toBe(true);
    expect(logger.entries.map((e) => [e.level, e.message])).toEqual([['error', 'Failed to record sensor history']]);
    expect(logger.entries[0]?.data).toEqual({ sensorId: MOTION, error: 'db down' });
  });

  it('records unavailable readings as unavailable', async () => {
    await ingestSensorEvent(repos, manager, { sensorId: MOTION, value: 'unavailable', timestamp: NOW.toISOString() });

    expect(repos._data.history[0]?.available).toBe(false);
  });

  it('can skip the history write', async () => {
    const result = await ingestSensorEvent(
      repos,
      manager,
      { sensorId: MOTION, value: 'on', timestamp: NOW.toISOString() },
      { recordHistory: false }
    );

    expect(repos._data.history).toEqual([]);
    expect(result.historyRecorded).toBe(false);
  });

  it('records events for sensors no area configures', async () => {
    const result = await ingestSensorEvent(repos, manager, {
      sensorId: 'light.porch',
      value: 'on',
      timestamp: NOW.toISOString(),
    });

    expect(result.states).toEqual([]);
    expect(repos._data.history).toHaveLength(1);
  });

  it('writes nothing for an invalid event', async () => {
    await expect(ingestSensorEvent(repos, manager, { sensorId: MOTION })).rejects.toThrow(InvalidSensorEventError);
    expect(repos._data.history).toEqual([]);
  });
});
