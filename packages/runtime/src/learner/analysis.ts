// Historical Analysis
//
// Re-estimates likelihoods and priors from recorded sensor history.
// The union of proxy-type activity (motion by default) stands in for
// ground-truth occupancy:
//
// - proxy types: priorOccupied = duty cycle; tp/fp are kept
// - other types: tp = |active ∩ occupied| / |available ∩ occupied|,
//   fp = |active ∩ unoccupied| / |available ∩ unoccupied|
//
// Non-proxy sensors with enough samples of their own also get a model
// from their own timeline, so two sensors of one type are not forced to
// share likelihoods. A type without enough history keeps its current
// model object.

import type {
  AreaConfig,
  Id,
  InsufficientHistory,
  NumericBaseline,
  OccupancyPatterns,
  PriorModel,
  PriorSet,
  SensorConfig,
  SensorCorrelation,
  SensorStateRecord,
  SensorType,
  TimeSpan,
} from '@roomsense/protocol';
import { SENSOR_TYPES, isNumericSensorType } from '@roomsense/protocol';
import { compareIds } from '../aggregator/index.js';
import { isContinuousSensor } from '../evidence/index.js';
import { clampLearned, diceCoefficient, learnBaseline } from './estimate.js';
import { intersectIntervals, mergeIntervals, subtractIntervals, totalDuration } from './intervals.js';
import { occupancyPatterns } from './patterns.js';
import { buildTimeline, type SensorTimeline } from './timeline.js';

/** Correlations at or below this are not reported */
export const CORRELATION_THRESHOLD = 0.3;

/**
 * Recorded history for an area's sensors over one window.
 */
export type HistorySnapshot = {
  window: TimeSpan;
  records: ReadonlyMap<Id, readonly SensorStateRecord[]>;
  /** Last record before the window, per sensor */
  initial: ReadonlyMap<Id, SensorStateRecord | null>;
};

export type HistoryAnalysis = {
  models: Partial<Record<SensorType, PriorModel>>;
  sensorModels: Record<Id, PriorModel>;
  baselines: Record<Id, NumericBaseline>;
  updatedTypes: SensorType[];
  updatedSensors: Id[];
  insufficient: InsufficientHistory[];
  correlations: SensorCorrelation[];
  patterns: OccupancyPatterns | null;
};

type EvidenceTotals = {
  samples: number;
  occupiedAvailable: number;
  occupiedActive: number;
  unoccupiedAvailable: number;
  unoccupiedActive: number;
};

/**
 * Analyze an area's history. Pure: performs no I/O.
 */
export function analyzeHistory(
  config: AreaConfig,
  current: PriorSet,
  snapshot: HistorySnapshot,
  now: Date
): HistoryAnalysis {
  const sensors = [...config.sensors].sort((a, b) => compareIds(a.id, b.id));
  const recordsOf = (sensor: SensorConfig) => snapshot.records.get(sensor.id) ?? [];

  // Numeric baselines come first: they decide what "active" means for numeric sensors
  const baselines: Record<Id, NumericBaseline> = {};
  for (const sensor of sensors) {
    if (!isNumericSensorType(sensor.type) || !isContinuousSensor(sensor)) continue;
    const baseline = learnBaseline(sensor.id, recordsOf(sensor));
    if (baseline) baselines[sensor.id] = baseline;
  }

  const timelines = sensors.map((sensor) =>
    buildTimeline(sensor, recordsOf(sensor), snapshot.initial.get(sensor.id) ?? null, snapshot.window, {
      baseline: baselines[sensor.id] ?? current.baselines[sensor.id],
    })
  );

  const proxyTypes = new Set(config.learner.proxyTypes);
  const proxies = timelines.filter((t) => proxyTypes.has(t.type));
  const occupied = mergeIntervals(proxies.flatMap((t) => t.active));
  const observed = mergeIntervals(proxies.flatMap((t) => t.available));
  const unoccupied = subtractIntervals(observed, occupied);
  const occupiedTime = totalDuration(occupied);
  const observedTime = totalDuration(observed);
  const unoccupiedTime = totalDuration(unoccupied);
  const proxySamples = proxies.reduce((sum, t) => sum + t.records, 0);
  const proxyUsable = proxySamples >= config.learner.minSamples && observedTime > 0;

  const totals = totalsByType(timelines, occupied, unoccupied);
  const configuredTypes = SENSOR_TYPES.filter((type) => totals.has(type));
  const learnedAt = now.toISOString();
  const dutyCycle = observedTime > 0 ? clampLearned(occupiedTime / observedTime) : 0;

  const models: Partial<Record<SensorType, PriorModel>> = {};
  const updatedTypes: SensorType[] = [];
  const insufficient: InsufficientHistory[] = [];

  for (const type of configuredTypes) {
    const t = totals.get(type);
    if (!t) continue;

    const reject = (reason: InsufficientHistory['reason']) =>
      insufficient.push({ type, reason, samples: t.samples });

    if (t.samples < config.learner.minSamples) {
      reject('too_few_samples');
      continue;
    }
    if (!proxyUsable) {
      reject('no_proxy_history');
      continue;
    }
    if (occupiedTime === 0) {
      reject('no_occupied_time');
      continue;
    }
    if (unoccupiedTime === 0) {
      reject('no_unoccupied_time');
      continue;
    }

    if (proxyTypes.has(type)) {
      models[type] = {
        ...current.models[type],
        priorOccupied: dutyCycle,
        source: 'learned',
        sampleCount: t.samples,
        learnedAt,
      };
      updatedTypes.push(type);
      continue;
    }

    if (t.occupiedAvailable === 0) {
      reject('no_occupied_time');
      continue;
    }
    if (t.unoccupiedAvailable === 0) {
      reject('no_unoccupied_time');
      continue;
    }

    models[type] = learnedModel(t, dutyCycle, learnedAt);
    updatedTypes.push(type);
  }

  const sensorModels: Record<Id, PriorModel> = {};
  const updatedSensors: Id[] = [];
  if (proxyUsable && occupiedTime > 0 && unoccupiedTime > 0) {
    for (const timeline of timelines) {
      if (proxyTypes.has(timeline.type) || timeline.records < config.learner.minSamples) continue;
      const t = totalsOf(timeline, occupied, unoccupied);
      if (t.occupiedAvailable === 0 || t.unoccupiedAvailable === 0) continue;
      sensorModels[timeline.sensorId] = learnedModel(t, dutyCycle, learnedAt);
      updatedSensors.push(timeline.sensorId);
    }
  }

  return {
    models,
    sensorModels,
    baselines,
    updatedTypes,
    updatedSensors,
    insufficient,
    correlations: correlate(proxies, timelines.filter((t) => !proxyTypes.has(t.type))),
    patterns: observedTime > 0 ? occupancyPatterns(observed, occupied) : null,
  };
}

function learnedModel(t: EvidenceTotals, priorOccupied: number, learnedAt: string): PriorModel {
  return {
    pTruePositive: clampLearned(t.occupiedActive / t.occupiedAvailable),
    pFalsePositive: clampLearned(t.unoccupiedActive / t.unoccupiedAvailable),
    priorOccupied,
    source: 'learned',
    sampleCount: t.samples,
    learnedAt,
  };
}

function totalsOf(
  timeline: SensorTimeline,
  occupied: readonly TimeSpan[],
  unoccupied: readonly TimeSpan[]
): EvidenceTotals {
  return {
    samples: timeline.records,
    occupiedAvailable: totalDuration(intersectIntervals(timeline.available, occupied)),
    occupiedActive: totalDuration(intersectIntervals(timeline.active, occupied)),
    unoccupiedAvailable: totalDuration(intersectIntervals(timeline.available, unoccupied)),
    unoccupiedActive: totalDuration(intersectIntervals(timeline.active, unoccupied)),
  };
}

function totalsByType(
  timelines: readonly SensorTimeline[],
  occupied: readonly TimeSpan[],
  unoccupied: readonly TimeSpan[]
): Map<SensorType, EvidenceTotals> {
  const totals = new Map<SensorType, EvidenceTotals>();

  for (const timeline of timelines) {
    const own = totalsOf(timeline, occupied, unoccupied);
    const t = totals.get(timeline.type);
    totals.set(
      timeline.type,
      t
        ? {
            samples: t.samples + own.samples,
            occupiedAvailable: t.occupiedAvailable + own.occupiedAvailable,
            occupiedActive: t.occupiedActive + own.occupiedActive,
            unoccupiedAvailable: t.unoccupiedAvailable + own.unoccupiedAvailable,
            unoccupiedActive: t.unoccupiedActive + own.unoccupiedActive,
          }
        : own
    );
  }
  return totals;
}

function correlate(proxies: readonly SensorTimeline[], others: readonly SensorTimeline[]): SensorCorrelation[] {
  const correlations: SensorCorrelation[] = [];
  for (const proxy of proxies) {
    for (const other of others) {
      const coefficient = diceCoefficient(proxy.active, other.active);
      if (coefficient > CORRELATION_THRESHOLD) {
        correlations.push({ proxySensorId: proxy.sensorId, sensorId: other.sensorId, coefficient });
      }
    }
  }
  return correlations;
}
