// Interval arithmetic over epoch-millisecond spans
//
// All functions accept unsorted, possibly overlapping input and return
// sorted, disjoint, non-empty spans.

import type { TimeSpan } from '@roomsense/protocol';

export function mergeIntervals(spans: readonly TimeSpan[]): TimeSpan[] {
  const sorted = spans
    .filter((s) => s.end > s.start)
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const merged: TimeSpan[] = [];
  for (const span of sorted) {
    const last = merged[merged.length - 1];
    if (last && span.start <= last.end) {
      if (span.end > last.end) {
        merged[merged.length - 1] = { start: last.start, end: span.end };
      }
    } else {
      merged.push({ start: span.start, end: span.end });
    }
  }
  return merged;
}

export function intersectIntervals(a: readonly TimeSpan[], b: readonly TimeSpan[]): TimeSpan[] {
  const left = mergeIntervals(a);
  const right = mergeIntervals(b);
  const result: TimeSpan[] = [];

  let i = 0;
  let j = 0;
  while (i < left.length && j < right.length) {
    const l = left[i];
    const r = right[j];
    const start = Math.max(l.start, r.start);
    const end = Math.min(l.end, r.end);
    if (start < end) result.push({ start, end });
    if (l.end < r.end) i++;
    else j++;
  }
  return result;
}

/**
 * Parts of `a` not covered by `b`.
 */
export function subtractIntervals(a: readonly TimeSpan[], b: readonly TimeSpan[]): TimeSpan[] {
  const left = mergeIntervals(a);
  const right = mergeIntervals(b);
  const result: TimeSpan[] = [];

  let j = 0;
  for (const span of left) {
    let start = span.start;
    while (j < right.length && right[j].end <= start) j++;

    for (let k = j; k < right.length && right[k].start < span.end; k++) {
      if (right[k].start > start) result.push({ start, end: right[k].start });
      start = Math.max(start, right[k].end);
    }
    if (start < span.end) result.push({ start, end: span.end });
  }
  return result;
}

export function totalDuration(spans: readonly TimeSpan[]): number {
  return spans.reduce((sum, s) => sum + (s.end - s.start), 0);
}
