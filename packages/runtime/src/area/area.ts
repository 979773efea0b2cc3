// Area Coordinator
//
// Owns one area's sensor states, prior set reference, threshold and
// metrics. Every mutation of sensor state or priors goes through a
// serial queue, so a recomputation always sees one consistent snapshot
// and never interleaves with another.

import type {
  AreaConfig,
  AreaConfigInput,
  AreaDiagnostics,
  AreaMetrics,
  AreaState,
  Id,
  LearnerReport,
  PriorSet,
  SensorConfig,
  SensorState,
  SensorStateChangeEvent,
} from '@roomsense/protocol';
import { isValidThreshold, resolveAreaConfig, validateAreaConfig } from '@roomsense/protocol';
import { aggregate, sensorWeight } from '../aggregator/index.js';
import { computeDecayState } from '../decay/index.js';
import { ConfigurationError, ValidationError } from '../errors.js';
import { applyReading, createSensorState, reevaluateEvidence, type SensorReading } from '../evidence/index.js';
import { consoleLogger, type Logger } from '../logger.js';
import { createDefaultPriorSet, normalizePriorSet } from '../priors/index.js';
import { isOccupied } from '../threshold.js';
import { HistoryMetrics } from './metrics.js';

export type StateChangeListener = (state: AreaState) => void | Promise<void>;

/**
 * Reads the current value of a sensor from the host platform.
 */
export type SensorReader = (sensorId: Id) => Promise<SensorReading | null>;

export type AreaOptions = {
  /** Stored prior set; defaults to the built-in priors at version 0 */
  priors?: PriorSet;
  logger?: Logger;
  /** Clock used for decay and timestamps */
  now?: () => Date;
  /** Called after every recomputation, inside the serial section */
  onStateChange?: StateChangeListener;
};

export class Area {
  private config: AreaConfig;
  private configById: Map<Id, SensorConfig>;
  private states: Map<Id, SensorState> = new Map();
  private priors: PriorSet;
  private threshold: number;
  private state: AreaState;
  private metrics = new HistoryMetrics();
  private lastLearnerReport: LearnerReport | null = null;
  private queue: Promise<void> = Promise.resolve();

  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly onStateChange?: StateChangeListener;

  /**
   * @throws ConfigurationError if the configuration has validation errors
   */
  constructor(config: AreaConfig, options: AreaOptions = {}) {
    assertValidConfig(config);
    this.logger = options.logger ?? consoleLogger;
    this.clock = options.now ?? (() => new Date());
    this.onStateChange = options.onStateChange;

    this.config = config;
    this.configById = indexSensors(config);
    this.threshold = config.threshold;
    this.priors = normalizePriorSet(
      options.priors ?? createDefaultPriorSet(config.id, this.clock())
    );
    assertPriorsBelong(config.id, this.priors);

    for (const sensor of config.sensors) {
      this.states.set(sensor.id, createSensorState(sensor));
    }
    this.state = this.compute(this.clock());
  }

  static create(input: AreaConfigInput, options: AreaOptions = {}): Area {
    return new Area(resolveAreaConfig(input), options);
  }

  get id(): Id {
    return this.config.id;
  }

  hasSensor(sensorId: Id): boolean {
    return this.configById.has(sensorId);
  }

  getConfig(): AreaConfig {
    return { ...this.config, threshold: this.threshold };
  }

  /**
   * Latest computed state. `occupied` always reflects the current
   * threshold, even if it changed after the last recomputation.
   * The result is a copy; changing it does not touch the area.
   */
  getState(): AreaState {
    const { state } = this;
    return {
      ...state,
      activeTriggers: [...state.activeTriggers],
      perSensorProbabilities: { ...state.perSensorProbabilities },
      decayStatus: { ...state.decayStatus },
      sensorAvailability: { ...state.sensorAvailability },
      threshold: this.threshold,
      occupied: isOccupied(state.probability, this.threshold),
    };
  }

  getThreshold(): number {
    return this.threshold;
  }

  /**
   * Change the decision threshold. Probabilities are not recomputed.
   *
   * @throws ValidationError if the threshold is outside 1..99
   */
  setThreshold(threshold: number): void {
    if (!isValidThreshold(threshold)) {
      throw new ValidationError(`Threshold must be between 1 and 99, got ${threshold}`, {
        field: 'threshold',
      });
    }
    this.threshold = threshold;
  }

  getPriors(): PriorSet {
    return this.priors;
  }

  getSensorStates(): SensorState[] {
    return this.config.sensors.map((s) => this.states.get(s.id) ?? createSensorState(s));
  }

  getMetrics(): AreaMetrics {
    return this.metrics.snapshot(this.clock());
  }

  getLastLearnerReport(): LearnerReport | null {
    return this.lastLearnerReport;
  }

  recordLearnerReport(report: LearnerReport): void {
    this.lastLearnerReport = report;
  }

  /**
   * Apply one sensor state change and recompute.
   * Events for sensors this area does not configure are ignored.
   */
  applyEvent(event: SensorStateChangeEvent): Promise<AreaState> {
    return this.enqueue(() => {
      const sensor = this.configById.get(event.sensorId);
      if (!sensor) {
        return;
      }
      this.applyToSensor(sensor, {
        value: event.value,
        timestamp: event.timestamp,
        available: event.available,
      });
    });
  }

  /**
   * Recompute without new readings so decay progresses.
   */
  refresh(): Promise<AreaState> {
    return this.enqueue(() => {});
  }

  /**
   * Seed sensor states from their current values. Reads happen outside
   * the serial section; sensors the reader knows nothing about stay
   * unavailable.
   */
  async initialize(reader: SensorReader): Promise<AreaState> {
    const readings = await Promise.all(
      this.config.sensors.map(async (sensor) => ({ sensor, reading: await reader(sensor.id) }))
    );

    return this.enqueue(() => {
      for (const { sensor, reading } of readings) {
        if (reading) {
          this.applyToSensor(sensor, reading);
        }
      }
    });
  }

  /**
   * Swap in a new prior set, clamped into (0, 1). Continuous sensors are
   * re-evaluated against the new baselines before the recomputation.
   *
   * @throws ValidationError if the prior set belongs to another area
   */
  replacePriors(input: PriorSet): Promise<AreaState> {
    assertPriorsBelong(this.config.id, input);
    const priorSet = normalizePriorSet(input);
    return this.enqueue(() => {
      this.priors = priorSet;
      for (const sensor of this.config.sensors) {
        const state = this.states.get(sensor.id);
        if (state?.continuous) {
          this.states.set(
            sensor.id,
            reevaluateEvidence(state, sensor, { baseline: priorSet.baselines[sensor.id] })
          );
        }
      }
    });
  }

  /**
   * Replace the configuration. Sensors that remain with the same type
   * keep their state; new sensors start unavailable.
   *
   * @throws ConfigurationError if the configuration has validation errors
   */
  reconfigure(config: AreaConfig): Promise<AreaState> {
    assertValidConfig(config);
    if (config.id !== this.config.id) {
      throw new ValidationError(`Cannot reconfigure area "${this.config.id}" as "${config.id}"`, {
        field: 'id',
      });
    }

    return this.enqueue(() => {
      const previous = this.states;
      this.config = config;
      this.configById = indexSensors(config);
      this.threshold = config.threshold;
      this.states = new Map();

      for (const sensor of config.sensors) {
        const state = previous.get(sensor.id);
        this.states.set(
          sensor.id,
          state && state.type === sensor.type
            ? reevaluateEvidence(state, sensor, { baseline: this.priors.baselines[sensor.id] })
            : createSensorState(sensor)
        );
      }
    });
  }

  getDiagnostics(): AreaDiagnostics {
    const now = this.clock();
    return {
      areaId: this.config.id,
      name: this.config.name,
      state: this.getState(),
      metrics: this.metrics.snapshot(now),
      priors: this.priors,
      sensors: this.config.sensors.map((sensor) => {
        const state = this.states.get(sensor.id) ?? createSensorState(sensor);
        return {
          config: sensor,
          weight: sensorWeight(sensor, this.config.weights),
          state,
          decay: computeDecayState(state, this.config.decay, now.getTime()),
        };
      }),
      lastLearnerReport: this.lastLearnerReport,
    };
  }

  private applyToSensor(sensor: SensorConfig, reading: SensorReading): void {
    const state = this.states.get(sensor.id) ?? createSensorState(sensor);
    this.states.set(
      sensor.id,
      applyReading(state, sensor, reading, { baseline: this.priors.baselines[sensor.id] })
    );
  }

  private compute(now: Date): AreaState {
    return aggregate({
      areaId: this.config.id,
      sensors: this.config.sensors,
      weights: this.config.weights,
      states: this.states,
      priors: this.priors,
      decay: this.config.decay,
      threshold: this.threshold,
      now,
    });
  }

  /**
   * Run a mutation then recompute, strictly after every earlier call.
   * A failing mutation rejects its own caller only.
   */
  private enqueue(mutate: () => void): Promise<AreaState> {
    const run = async (): Promise<AreaState> => {
      mutate();
      const now = this.clock();
      this.state = this.compute(now);
      this.metrics.record(this.state.probability, this.state.occupied, now);
      await this.notify();
      return this.getState();
    };

    const task = this.queue.then(run, run);
    this.queue = task.then(
      () => {},
      () => {}
    );
    return task;
  }

  private async notify(): Promise<void> {
    if (!this.onStateChange) return;
    try {
      await this.onStateChange(this.getState());
    } catch (error) {
      this.logger.error('State change listener failed', {
        areaId: this.config.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function indexSensors(config: AreaConfig): Map<Id, SensorConfig> {
  return new Map(config.sensors.map((s) => [s.id, s]));
}

function assertValidConfig(config: AreaConfig): void {
  const result = validateAreaConfig(config);
  if (!result.valid) {
    throw new ConfigurationError(config.id, result.errors);
  }
}

function assertPriorsBelong(areaId: Id, priors: PriorSet): void {
  if (priors.areaId !== areaId) {
    throw new ValidationError(`Prior set for area "${priors.areaId}" cannot be used by area "${areaId}"`, {
      field: 'areaId',
    });
  }
}
