// Rolling occupancy metrics
//
// Short probability window for smoothing and trend, long decision window
// for occupancy rate.

import type { AreaMetrics, Timestamp } from '@roomsense/protocol';

export const PROBABILITY_WINDOW = 12;
export const OCCUPANCY_WINDOW = 288;

type Sample = {
  probability: number;
  at: number;
};

export class HistoryMetrics {
  private samples: Sample[] = [];
  private decisions: boolean[] = [];
  private lastOccupied: boolean | null = null;
  private lastOccupiedAt: Timestamp | null = null;
  private lastStateChangeAt: Timestamp | null = null;

  /**
   * Record one recomputation result.
   */
  record(probability: number, occupied: boolean, at: Date): void {
    this.samples.push({ probability, at: at.getTime() });
    if (this.samples.length > PROBABILITY_WINDOW) this.samples.shift();

    this.decisions.push(occupied);
    if (this.decisions.length > OCCUPANCY_WINDOW) this.decisions.shift();

    if (occupied) this.lastOccupiedAt = at.toISOString();
    if (this.lastOccupied !== occupied) {
      this.lastStateChangeAt = at.toISOString();
      this.lastOccupied = occupied;
    }
  }

  snapshot(now: Date): AreaMetrics {
    const values = this.samples.map((s) => s.probability);
    const first = this.samples[0];
    const last = this.samples[this.samples.length - 1];
    const minutes = first && last ? (last.at - first.at) / 60_000 : 0;

    return {
      movingAverage: values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0,
      minProbability: values.length > 0 ? Math.min(...values) : 0,
      maxProbability: values.length > 0 ? Math.max(...values) : 0,
      rateOfChange: first && last && minutes > 0 ? (last.probability - first.probability) / minutes : 0,
      occupancyRate:
        this.decisions.length > 0 ? this.decisions.filter(Boolean).length / this.decisions.length : 0,
      lastOccupiedAt: this.lastOccupiedAt,
      lastStateChangeAt: this.lastStateChangeAt,
      stateDurationSeconds:
        this.lastStateChangeAt === null
          ? 0
          : Math.max(0, (now.getTime() - Date.parse(this.lastStateChangeAt)) / 1000),
      samples: this.samples.length,
    };
  }
}
