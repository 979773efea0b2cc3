// Area Manager
//
// Holds every active area, routes sensor events to the areas that
// configure the sensor, persists threshold and prior changes, and
// publishes an event for each committed change. Learned priors are only
// committed for an area that is still active when its run finishes.

import type {
  AreaConfig,
  AreaConfigInput,
  AreaState,
  Id,
  LearnerReport,
  SensorStateChangeEvent,
} from '@roomsense/protocol';
import { isValidThreshold, resolveAreaConfig, validateAreaConfig } from '@roomsense/protocol';
import type { RepositoryContext } from '@roomsense/repositories';
import { AreaNotFoundError, ConfigurationError, ValidationError } from '../errors.js';
import { EventBus } from '../events/index.js';
import { runHistoricalAnalysis } from '../learner/index.js';
import { consoleLogger, type Logger } from '../logger.js';
import { createDefaultPriorSet } from '../priors/index.js';
import { Area, type SensorReader } from './area.js';

export const DEFAULT_REFRESH_INTERVAL_MS = 10_000;
export const DEFAULT_ANALYSIS_INTERVAL_MS = 6 * 60 * 60 * 1000;
/** History is kept this many days beyond the longest configured period */
export const HISTORY_RETENTION_MARGIN_DAYS = 1;

const DAY_MS = 24 * 60 * 60 * 1000;

export type AreaManagerOptions = {
  logger?: Logger;
  now?: () => Date;
  bus?: EventBus;
};

/**
 * Options for an on-demand prior update
 */
export type UpdatePriorsOptions = {
  /** Overrides the area's configured history period */
  historyPeriodDays?: number;
  signal?: AbortSignal;
  timeoutMs?: number;
};

export type SchedulerOptions = {
  /** How often every area is recomputed so decay progresses */
  refreshIntervalMs?: number;
  /** How often areas with historical analysis enabled are re-learned and history is pruned */
  analysisIntervalMs?: number;
};

type LearnerRun = {
  report: Promise<LearnerReport>;
  controller: AbortController;
};

export class AreaManager {
  private areas: Map<Id, Area> = new Map();
  private learnerRuns: Map<Id, LearnerRun> = new Map();
  private timers: Array<ReturnType<typeof setInterval>> = [];

  readonly bus: EventBus;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(
    private repos: RepositoryContext,
    options: AreaManagerOptions = {}
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.clock = options.now ?? (() => new Date());
    this.bus = options.bus ?? new EventBus(this.logger);
  }

  /**
   * Create a manager with every stored area activated.
   * Stored areas that no longer validate are skipped and logged.
   */
  static async load(repos: RepositoryContext, options: AreaManagerOptions = {}): Promise<AreaManager> {
    const manager = new AreaManager(repos, options);
    for (const config of await repos.areas.list()) {
      try {
        await manager.activate(config);
      } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;
        manager.logger.error('Skipping invalid stored area', { areaId: config.id, error: error.message });
      }
    }
    return manager;
  }

  /**
   * Validate, persist and activate an area. Replaces an active area with
   * the same id.
   *
   * @throws ConfigurationError if the configuration has validation errors
   */
  async addArea(input: AreaConfigInput): Promise<Area> {
    const config = resolveAreaConfig(input);
    const validation = validateAreaConfig(config);
    if (!validation.valid) {
      throw new ConfigurationError(config.id, validation.errors);
    }
    for (const warning of validation.warnings) {
      this.logger.warn('Area configuration warning', { areaId: config.id, ...warning });
    }

    const existing = this.areas.get(config.id);
    await this.repos.areas.save(config);
    if (existing) {
      await existing.reconfigure(config);
      return existing;
    }
    return this.activate(config);
  }

  /**
   * Deactivate an area and delete its stored configuration and priors.
   * A learner run in flight for the area is cancelled and allowed to
   * settle first, so it cannot write priors back afterwards.
   */
  async removeArea(areaId: Id): Promise<boolean> {
    const removed = this.areas.delete(areaId);
    const running = this.learnerRuns.get(areaId);
    if (running) {
      running.controller.abort();
      await Promise.allSettled([running.report]);
    }
    await this.repos.priors.delete(areaId);
    const deleted = await this.repos.areas.delete(areaId);
    return removed || deleted;
  }

  /**
   * @throws AreaNotFoundError if the area is not active
   */
  getArea(areaId: Id): Area {
    const area = this.areas.get(areaId);
    if (!area) {
      throw new AreaNotFoundError(areaId);
    }
    return area;
  }

  listAreas(): Area[] {
    return [...this.areas.values()];
  }

  /**
   * Ids of the areas that configure a sensor.
   */
  areasForSensor(sensorId: Id): Id[] {
    return this.listAreas()
      .filter((area) => area.hasSensor(sensorId))
      .map((area) => area.id);
  }

  /**
   * Apply a sensor event to every area that configures the sensor.
   * Areas recompute independently.
   */
  async dispatch(event: SensorStateChangeEvent): Promise<AreaState[]> {
    const targets = this.listAreas().filter((area) => area.hasSensor(event.sensorId));
    return Promise.all(targets.map((area) => area.applyEvent(event)));
  }

  /**
   * Persist and apply a new threshold. Takes effect on the next read of
   * the area state without a recomputation.
   *
   * @throws ValidationError if the threshold is outside 1..99
   * @throws AreaNotFoundError if the area is not active
   */
  async setThreshold(areaId: Id, threshold: number): Promise<AreaState> {
    const area = this.getArea(areaId);
    if (!isValidThreshold(threshold)) {
      throw new ValidationError(`Threshold must be between 1 and 99, got ${threshold}`, {
        field: 'threshold',
      });
    }

    const previous = area.getThreshold();
    const saved = await this.repos.areas.updateThreshold(areaId, threshold);
    if (!saved) {
      throw new AreaNotFoundError(areaId);
    }
    area.setThreshold(threshold);

    await this.bus.publish(
      this.bus.createEvent('area.threshold.changed', areaId, { previous, threshold }, this.clock())
    );
    return area.getState();
  }

  /**
   * Run the learner for one area and commit its result.
   *
   * A run already in flight for the area is shared rather than started
   * again. On failure the stored and active priors are left untouched.
   *
   * @throws AreaNotFoundError if the area is not active
   */
  updatePriors(areaId: Id, options: UpdatePriorsOptions = {}): Promise<LearnerReport> {
    const area = this.getArea(areaId);
    const running = this.learnerRuns.get(areaId);
    if (running) {
      return running.report;
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const report: Promise<LearnerReport> = this.learn(area, {
      ...options,
      signal: controller.signal,
    }).finally(() => {
      options.signal?.removeEventListener('abort', forwardAbort);
      if (this.learnerRuns.get(areaId)?.report === report) {
        this.learnerRuns.delete(areaId);
      }
    });
    this.learnerRuns.set(areaId, { report, controller });
    return report;
  }

  /**
   * Delete sensor history no active area can still learn from: anything
   * older than the longest configured history period plus a day.
   *
   * @returns Number of records deleted
   */
  async pruneHistory(): Promise<number> {
    const periods = this.listAreas().map((area) => area.getConfig().historyPeriodDays);
    if (periods.length === 0) return 0;

    const longest = periods.reduce((max, days) => Math.max(max, days), 0);
    const before = new Date(
      this.clock().getTime() - (longest + HISTORY_RETENTION_MARGIN_DAYS) * DAY_MS
    ).toISOString();
    const removed = await this.repos.history.prune(before);
    this.logger.info('Pruned sensor history', { before, removed });
    return removed;
  }

  /**
   * Seed every area's sensor states from the host platform.
   */
  async initialize(reader: SensorReader): Promise<AreaState[]> {
    return Promise.all(this.listAreas().map((area) => area.initialize(reader)));
  }

  /**
   * Recompute every area so decay progresses.
   */
  async refreshAll(): Promise<AreaState[]> {
    return Promise.all(this.listAreas().map((area) => area.refresh()));
  }

  /**
   * Start periodic refresh, learning and history pruning. Scheduled
   * learning only runs for areas with historical analysis enabled.
   *
   * @returns Stop function
   */
  startScheduler(options: SchedulerOptions = {}): () => void {
    const {
      refreshIntervalMs = DEFAULT_REFRESH_INTERVAL_MS,
      analysisIntervalMs = DEFAULT_ANALYSIS_INTERVAL_MS,
    } = options;

    const refreshTimer = setInterval(() => {
      void this.refreshAll().catch((error: unknown) => {
        this.logger.error('Scheduled refresh failed', { error: errorMessage(error) });
      });
    }, refreshIntervalMs);

    const analysisTimer = setInterval(() => {
      void this.pruneHistory().catch((error: unknown) => {
        this.logger.error('Scheduled history pruning failed', { error: errorMessage(error) });
      });
      for (const area of this.listAreas()) {
        if (!area.getConfig().historicalAnalysisEnabled) continue;
        void this.updatePriors(area.id).catch((error: unknown) => {
          this.logger.error('Scheduled prior update failed', { areaId: area.id, error: errorMessage(error) });
        });
      }
    }, analysisIntervalMs);

    const timers = [refreshTimer, analysisTimer];
    this.timers.push(...timers);

    return () => {
      for (const timer of timers) {
        clearInterval(timer);
      }
      this.timers = this.timers.filter((t) => !timers.includes(t));
    };
  }

  /**
   * Stop every scheduler started on this manager.
   */
  stop(): void {
    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers = [];
  }

  private async activate(config: AreaConfig): Promise<Area> {
    let priors = await this.repos.priors.get(config.id);
    if (!priors) {
      priors = await this.repos.priors.replace(createDefaultPriorSet(config.id, this.clock()));
    }

    const area = new Area(config, {
      priors,
      logger: this.logger,
      now: this.clock,
      onStateChange: (state) =>
        this.bus.publish(this.bus.createEvent('area.state.updated', config.id, { state }, this.clock())),
    });
    this.areas.set(config.id, area);
    this.logger.info('Area activated', { areaId: config.id, sensors: config.sensors.length });
    return area;
  }

  private async learn(area: Area, options: UpdatePriorsOptions): Promise<LearnerReport> {
    const result = await runHistoricalAnalysis(area.getConfig(), area.getPriors(), this.repos.history, {
      now: this.clock(),
      historyPeriodDays: options.historyPeriodDays,
      signal: options.signal,
      timeoutMs: options.timeoutMs,
      logger: this.logger,
    });

    if (this.areas.get(area.id) !== area) {
      this.logger.info('Discarding learner run for removed area', { areaId: area.id });
      return discardedReport(result.report, area.id);
    }

    let report = result.report;
    if (result.priorSet) {
      try {
        await this.repos.priors.replace(result.priorSet);
        await area.replacePriors(result.priorSet);
      } catch (error) {
        this.logger.error('Failed to commit learned priors', { areaId: area.id, error: errorMessage(error) });
        report = {
          ...report,
          status: 'failed',
          updatedTypes: [],
          updatedSensors: [],
          priorVersion: area.getPriors().version,
          error: { code: 'PRIOR_COMMIT_FAILED', message: errorMessage(error) },
        };
      }
    }

    area.recordLearnerReport(report);
    if (report.status === 'failed') {
      await this.bus.publish(this.bus.createEvent('area.learner.failed', area.id, { report }, this.clock()));
    } else if (result.priorSet) {
      await this.bus.publish(
        this.bus.createEvent(
          'area.priors.updated',
          area.id,
          { version: result.priorSet.version, updatedTypes: report.updatedTypes },
          this.clock()
        )
      );
    }
    return report;
  }
}

/**
 * A finished run whose area is gone. Already-failed reports keep their
 * own error.
 */
function discardedReport(report: LearnerReport, areaId: Id): LearnerReport {
  if (report.status === 'failed') return report;
  return {
    ...report,
    status: 'failed',
    updatedTypes: [],
    updatedSensors: [],
    error: { code: 'AREA_REMOVED', message: `Area "${areaId}" was removed during historical analysis` },
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
