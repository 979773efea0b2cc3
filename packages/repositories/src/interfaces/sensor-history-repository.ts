import type { Id, SensorHistoryFilter, SensorStateRecord, Timestamp } from '@roomsense/protocol';

/**
 * Repository interface for the recorded sensor state timeline.
 *
 * History is append-only and shared by every area that configures a
 * sensor. The learner reads it; the real-time path only appends.
 */
export interface SensorHistoryRepository {
  /**
   * Append state records. Records may arrive out of order.
   */
  append(records: SensorStateRecord[]): Promise<void>;

  /**
   * Records for the given sensors within the filter's time range,
   * ordered by timestamp, then by insertion order.
   */
  query(filter: SensorHistoryFilter): Promise<SensorStateRecord[]>;

  /**
   * The newest record for a sensor strictly before `timestamp`.
   * Used to know a sensor's state at the start of a window.
   */
  latestBefore(sensorId: Id, timestamp: Timestamp): Promise<SensorStateRecord | null>;

  /**
   * Delete records older than `before`. Called on the analysis schedule
   * so the table holds no more than the learners can read.
   * @returns Number of records deleted
   */
  prune(before: Timestamp): Promise<number>;
}
