// Historical Analysis Runner
//
// Loads history for an area and runs the analysis under a deadline and
// an optional caller-supplied AbortSignal. Never commits anything: the
// caller decides whether to replace the stored PriorSet.

import type { AreaConfig, Id, LearnerReport, PriorSet, SensorStateRecord } from '@roomsense/protocol';
import type { SensorHistoryRepository } from '@roomsense/repositories';
import { LearnerCancelledError, LearnerError, LearnerTimeoutError } from '../errors.js';
import { consoleLogger, type Logger } from '../logger.js';
import { analyzeHistory, type HistoryAnalysis, type HistorySnapshot } from './analysis.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Options for a learner run
 */
export type HistoricalAnalysisOptions = {
  /** End of the analysis window (defaults to now) */
  now?: Date;
  /** Overrides the area's configured history period */
  historyPeriodDays?: number;
  /** Cancels the run when aborted */
  signal?: AbortSignal;
  /** Overrides the area's configured learner timeout */
  timeoutMs?: number;
  logger?: Logger;
};

export type HistoricalAnalysisResult = {
  report: LearnerReport;
  /** Replacement prior set, or null when nothing should be committed */
  priorSet: PriorSet | null;
};

/**
 * Run the historical analysis learner for one area.
 *
 * Timeouts, cancellation and repository failures all produce a `failed`
 * report with a null prior set. Insufficient history for some types
 * produces a `partial` report.
 */
export async function runHistoricalAnalysis(
  config: AreaConfig,
  current: PriorSet,
  history: SensorHistoryRepository,
  options: HistoricalAnalysisOptions = {}
): Promise<HistoricalAnalysisResult> {
  const { now = new Date(), logger = consoleLogger } = options;
  const historyPeriodDays = options.historyPeriodDays ?? config.historyPeriodDays;
  const timeoutMs = options.timeoutMs ?? config.learner.timeoutMs;
  const startTime = Date.now();

  const controller = new AbortController();
  const onCancel = () => controller.abort(new LearnerCancelledError(config.id));
  if (options.signal?.aborted) {
    onCancel();
  } else {
    options.signal?.addEventListener('abort', onCancel, { once: true });
  }
  const timeoutId = setTimeout(
    () => controller.abort(new LearnerTimeoutError(config.id, timeoutMs)),
    timeoutMs
  );

  const baseReport = {
    areaId: config.id,
    startedAt: new Date(startTime).toISOString(),
    historyPeriodDays,
  };

  try {
    const window = { start: now.getTime() - historyPeriodDays * DAY_MS, end: now.getTime() };
    const snapshot = await abortable(loadSnapshot(config, history, window, controller.signal), controller.signal);
    const analysis = analyzeHistory(config, current, snapshot, now);
    controller.signal.throwIfAborted();

    const priorSet = buildPriorSet(current, analysis, now);
    const finishedAt = Date.now();

    logger.info('Historical analysis finished', {
      areaId: config.id,
      updatedTypes: analysis.updatedTypes,
      updatedSensors: analysis.updatedSensors,
      insufficient: analysis.insufficient.length,
    });

    return {
      priorSet,
      report: {
        ...baseReport,
        status: analysis.insufficient.length === 0 ? 'success' : 'partial',
        finishedAt: new Date(finishedAt).toISOString(),
        durationMs: finishedAt - startTime,
        updatedTypes: analysis.updatedTypes,
        updatedSensors: analysis.updatedSensors,
        insufficient: analysis.insufficient,
        correlations: analysis.correlations,
        patterns: analysis.patterns,
        priorVersion: priorSet?.version ?? current.version,
      },
    };
  } catch (error) {
    const learnerError = toLearnerError(config.id, error);
    const finishedAt = Date.now();

    logger.warn('Historical analysis failed', {
      areaId: config.id,
      code: learnerError.code,
      error: learnerError.message,
    });

    return {
      priorSet: null,
      report: {
        ...baseReport,
        status: 'failed',
        finishedAt: new Date(finishedAt).toISOString(),
        durationMs: finishedAt - startTime,
        updatedTypes: [],
        updatedSensors: [],
        insufficient: [],
        correlations: [],
        patterns: null,
        priorVersion: current.version,
        error: { code: learnerError.code, message: learnerError.message },
      },
    };
  } finally {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener('abort', onCancel);
  }
}

async function loadSnapshot(
  config: AreaConfig,
  history: SensorHistoryRepository,
  window: { start: number; end: number },
  signal: AbortSignal
): Promise<HistorySnapshot> {
  const start = new Date(window.start).toISOString();
  const end = new Date(window.end).toISOString();
  const records = new Map<Id, SensorStateRecord[]>();
  const initial = new Map<Id, SensorStateRecord | null>();

  for (const sensor of config.sensors) {
    signal.throwIfAborted();
    records.set(sensor.id, await history.query({ sensorIds: [sensor.id], start, end }));
    initial.set(sensor.id, await history.latestBefore(sensor.id, start));
  }

  return { window, records, initial };
}

/**
 * New prior set with learned models merged over the current ones.
 * Types and sensors that were not learned keep their existing models.
 */
function buildPriorSet(current: PriorSet, analysis: HistoryAnalysis, now: Date): PriorSet | null {
  if (
    analysis.updatedTypes.length === 0 &&
    analysis.updatedSensors.length === 0 &&
    Object.keys(analysis.baselines).length === 0
  ) {
    return null;
  }

  return {
    areaId: current.areaId,
    version: current.version + 1,
    updatedAt: now.toISOString(),
    models: { ...current.models, ...analysis.models },
    sensorModels: { ...current.sensorModels, ...analysis.sensorModels },
    baselines: { ...current.baselines, ...analysis.baselines },
  };
}

/**
 * Settle with the signal's reason as soon as it aborts, even if the
 * underlying work has not finished.
 */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function toLearnerError(areaId: string, error: unknown): LearnerError {
  if (error instanceof LearnerError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new LearnerError(areaId, `Historical analysis for area "${areaId}" failed: ${message}`);
}
