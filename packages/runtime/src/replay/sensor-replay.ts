// Sensor Event Replay
//
// Rebuilds an area's state from a recorded event log with no side
// effects. The same config, priors, events and instant always produce
// the same AreaState; events for different sensors may arrive in any
// interleaving.

import type {
  AreaConfig,
  AreaState,
  Id,
  PriorSet,
  SensorState,
  SensorStateChangeEvent,
} from '@roomsense/protocol';
import { aggregate } from '../aggregator/index.js';
import { applyReading, createSensorState } from '../evidence/index.js';
import { normalizePriorSet } from '../priors/index.js';

/**
 * Result of replaying an event log
 */
export type ReplayResult = {
  state: AreaState;
  /** Final state of every configured sensor */
  sensorStates: Record<Id, SensorState>;
  /** Events applied (those for configured sensors) */
  applied: number;
  /** Events skipped because no configured sensor matched */
  skipped: number;
};

/**
 * Replay sensor events in timestamp order and compute the area state.
 *
 * Events with equal timestamps keep their log order. The state is
 * computed at `at`, defaulting to the last event's timestamp (or the
 * prior set's update time for an empty log). Prior models are clamped
 * into (0, 1) first.
 */
export function replaySensorEvents(
  config: AreaConfig,
  input: PriorSet,
  events: readonly SensorStateChangeEvent[],
  at?: Date
): ReplayResult {
  const priors = normalizePriorSet(input);
  const sensors = new Map(config.sensors.map((s) => [s.id, s]));
  const states = new Map<Id, SensorState>(config.sensors.map((s) => [s.id, createSensorState(s)]));

  const ordered = events
    .map((event, index) => ({ event, index, time: Date.parse(event.timestamp) }))
    .sort((a, b) => a.time - b.time || a.index - b.index);

  let applied = 0;
  let skipped = 0;
  for (const { event } of ordered) {
    const sensor = sensors.get(event.sensorId);
    const state = states.get(event.sensorId);
    if (!sensor || !state) {
      skipped++;
      continue;
    }
    states.set(
      sensor.id,
      applyReading(
        state,
        sensor,
        { value: event.value, timestamp: event.timestamp, available: event.available },
        { baseline: priors.baselines[sensor.id] }
      )
    );
    applied++;
  }

  const last = ordered[ordered.length - 1];
  const now = at ?? (last ? new Date(last.time) : new Date(priors.updatedAt));

  return {
    state: aggregate({
      areaId: config.id,
      sensors: config.sensors,
      weights: config.weights,
      states,
      priors,
      decay: config.decay,
      threshold: config.threshold,
      now,
    }),
    sensorStates: Object.fromEntries(states),
    applied,
    skipped,
  };
}
