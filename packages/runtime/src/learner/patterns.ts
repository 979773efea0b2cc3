// Occupancy patterns by time of day and weekday (UTC)

import type { OccupancyPatterns, TimeSpan } from '@roomsense/protocol';

export const SLOT_MINUTES = 30;
const SLOT_MS = SLOT_MINUTES * 60 * 1000;

export const WEEKDAYS = [
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
] as const;

type Totals = { slots: Map<string, number>; days: Map<string, number> };

function accumulate(spans: readonly TimeSpan[]): Totals {
  const totals: Totals = { slots: new Map(), days: new Map() };

  for (const span of spans) {
    let t = span.start;
    while (t < span.end) {
      const slotStart = Math.floor(t / SLOT_MS) * SLOT_MS;
      const end = Math.min(slotStart + SLOT_MS, span.end);
      const slot = new Date(slotStart).toISOString().slice(11, 16);
      const day = WEEKDAYS[new Date(slotStart).getUTCDay()];

      totals.slots.set(slot, (totals.slots.get(slot) ?? 0) + (end - t));
      totals.days.set(day, (totals.days.get(day) ?? 0) + (end - t));
      t = end;
    }
  }
  return totals;
}

function ratios(occupied: Map<string, number>, observed: Map<string, number>, keys: readonly string[]) {
  const result: Record<string, number> = {};
  for (const key of keys) {
    const total = observed.get(key) ?? 0;
    if (total > 0) result[key] = (occupied.get(key) ?? 0) / total;
  }
  return result;
}

/**
 * Occupied fraction of observed time per 30-minute slot and per weekday.
 * `occupied` must lie within `observed`.
 */
export function occupancyPatterns(observed: readonly TimeSpan[], occupied: readonly TimeSpan[]): OccupancyPatterns {
  const seen = accumulate(observed);
  const busy = accumulate(occupied);
  const slotKeys = [...seen.slots.keys()].sort();

  return {
    timeSlots: ratios(busy.slots, seen.slots, slotKeys),
    weekdays: ratios(busy.days, seen.days, WEEKDAYS),
  };
}
