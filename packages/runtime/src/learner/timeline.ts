// Sensor Timelines
//
// Rebuilds a sensor's available and active time from its recorded
// state changes, clipped to the analysis window. Each record's state
// holds until the next record.

import type { SensorConfig, SensorStateRecord, SensorType, TimeSpan, Id } from '@roomsense/protocol';
import { extractEvidence, isUnavailableValue, type EvidenceContext } from '../evidence/index.js';
import { clamp } from '../probability.js';
import { mergeIntervals } from './intervals.js';

export type SensorTimeline = {
  sensorId: Id;
  type: SensorType;
  /** Records inside the window, not counting the carried-in one */
  records: number;
  available: TimeSpan[];
  active: TimeSpan[];
};

/**
 * @param initial - Last record before the window, carried in at its start
 */
export function buildTimeline(
  config: SensorConfig,
  records: readonly SensorStateRecord[],
  initial: SensorStateRecord | null,
  window: TimeSpan,
  context: EvidenceContext = {}
): SensorTimeline {
  const points = [
    ...(initial ? [{ record: initial, at: window.start }] : []),
    ...records
      .map((record) => ({ record, at: clamp(Date.parse(record.timestamp), window.start, window.end) }))
      .sort((a, b) => a.at - b.at),
  ];

  const available: TimeSpan[] = [];
  const active: TimeSpan[] = [];

  points.forEach(({ record, at }, i) => {
    const end = i + 1 < points.length ? points[i + 1].at : window.end;
    if (end <= at) return;

    const value = record.value;
    if (!record.available || value === null || isUnavailableValue(value)) return;

    const evidence = extractEvidence(config, value, context);
    if (evidence === null) return;

    available.push({ start: at, end });
    if (evidence.active) active.push({ start: at, end });
  });

  return {
    sensorId: config.id,
    type: config.type,
    records: records.length,
    available: mergeIntervals(available),
    active: mergeIntervals(active),
  };
}
