// Tests for interval arithmetic and occupancy patterns

import { describe, it, expect } from 'vitest';
import { intersectIntervals, mergeIntervals, subtractIntervals, totalDuration } from './intervals.js';
import { occupancyPatterns } from './patterns.js';
import { diceCoefficient, learnBaseline } from './estimate.js';

describe('mergeIntervals', () => {
  it('sorts, joins overlapping and touching spans, and drops empty ones', () => {
    expect(
      mergeIntervals([
        { start: 10, end: 20 },
        { start: 0, end: 5 },
        { start: 5, end: 8 },
        { start: 15, end: 25 },
        { start: 30, end: 30 },
      ])
    ).toEqual([
      { start: 0, end: 8 },
      { start: 10, end: 25 },
    ]);
  });
});

describe('intersectIntervals', () => {
  it('returns the common parts', () => {
    expect(
      intersectIntervals(
        [{ start: 0, end: 10 }, { start: 20, end: 30 }],
        [{ start: 5, end: 25 }]
      )
    ).toEqual([
      { start: 5, end: 10 },
      { start: 20, end: 25 },
    ]);
  });
});

describe('subtractIntervals', () => {
  it('removes covered parts', () => {
    expect(
      subtractIntervals(
        [{ start: 0, end: 100 }],
        [{ start: 10, end: 20 }, { start: 50, end: 60 }, { start: 90, end: 120 }]
      )
    ).toEqual([
      { start: 0, end: 10 },
      { start: 20, end: 50 },
      { start: 60, end: 90 },
    ]);
  });

  it('lets one subtrahend cover several spans', () => {
    expect(
      subtractIntervals(
        [{ start: 0, end: 10 }, { start: 20, end: 30 }],
        [{ start: 5, end: 25 }]
      )
    ).toEqual([
      { start: 0, end: 5 },
      { start: 25, end: 30 },
    ]);
  });
});

describe('totalDuration', () => {
  it('sums span lengths', () => {
    expect(totalDuration([{ start: 0, end: 5 }, { start: 10, end: 12 }])).toBe(7);
  });
});

describe('diceCoefficient', () => {
  it('is 1 for identical timelines and 0 for disjoint ones', () => {
    const a = [{ start: 0, end: 10 }];
    expect(diceCoefficient(a, a)).toBe(1);
    expect(diceCoefficient(a, [{ start: 20, end: 30 }])).toBe(0);
    expect(diceCoefficient([], [])).toBe(0);
  });
});

describe('learnBaseline', () => {
  it('ignores unavailable and non-numeric records', () => {
    const baseline = learnBaseline('sensor.humidity', [
      { sensorId: 'sensor.humidity', value: '40', available: true, timestamp: '2024-03-01T00:00:00.000Z' },
      { sensorId: 'sensor.humidity', value: 'unknown', available: true, timestamp: '2024-03-01T01:00:00.000Z' },
      { sensorId: 'sensor.humidity', value: 60, available: true, timestamp: '2024-03-01T02:00:00.000Z' },
      { sensorId: 'sensor.humidity', value: 99, available: false, timestamp: '2024-03-01T03:00:00.000Z' },
    ]);

    expect(baseline).toEqual({
      sensorId: 'sensor.humidity',
      mean: 50,
      min: 40,
      max: 60,
      upperBound: 51,
      sampleCount: 2,
    });
  });

  it('uses the mean as upper bound when all readings are equal', () => {
    const baseline = learnBaseline('sensor.temp', [
      { sensorId: 'sensor.temp', value: 21, available: true, timestamp: '2024-03-01T00:00:00.000Z' },
    ]);

    expect(baseline?.upperBound).toBe(21);
  });

  it('returns null without usable readings', () => {
    expect(learnBaseline('sensor.temp', [])).toBeNull();
  });
});

describe('occupancyPatterns', () => {
  const monday = Date.parse('2024-03-04T00:00:00.000Z');
  const minutes = (m: number) => monday + m * 60_000;

  it('splits observed time into 30-minute UTC slots and weekdays', () => {
    const patterns = occupancyPatterns(
      [{ start: minutes(0), end: minutes(90) }],
      [{ start: minutes(15), end: minutes(45) }]
    );

    expect(patterns.timeSlots).toEqual({ '00:00': 0.5, '00:30': 0.5, '01:00': 0 });
    expect(patterns.weekdays).toEqual({ monday: 1 / 3 });
  });
});
