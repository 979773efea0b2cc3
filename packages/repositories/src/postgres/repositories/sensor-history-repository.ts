import { and, asc, desc, eq, gte, inArray, lt, lte } from 'drizzle-orm';
import type { DatabaseExecutor } from '../db.js';
import { sensorHistory } from '../schema/index.js';
import type { SensorHistoryRepository } from '../../interfaces/index.js';
import type { Id, SensorHistoryFilter, SensorStateRecord, Timestamp } from '@roomsense/protocol';

export class PgSensorHistoryRepository implements SensorHistoryRepository {
  constructor(private db: DatabaseExecutor) {}

  async append(records: SensorStateRecord[]): Promise<void> {
    if (records.length === 0) return;

    await this.db.insert(sensorHistory).values(
      records.map((r) => ({
        sensorId: r.sensorId,
        value: r.value,
        available: r.available,
        timestamp: new Date(r.timestamp),
      }))
    );
  }

  async query(filter: SensorHistoryFilter): Promise<SensorStateRecord[]> {
    if (filter.sensorIds.length === 0) return [];

    let query = this.db
      .select()
      .from(sensorHistory)
      .where(this.buildConditions(filter))
      .orderBy(asc(sensorHistory.timestamp), asc(sensorHistory.id))
      .$dynamic();

    if (filter.limit !== undefined) {
      query = query.limit(filter.limit);
    }

    const rows = await query;
    return rows.map((r) => this.rowToRecord(r));
  }

  async latestBefore(sensorId: Id, timestamp: Timestamp): Promise<SensorStateRecord | null> {
    const [row] = await this.db
      .select()
      .from(sensorHistory)
      .where(and(eq(sensorHistory.sensorId, sensorId), lt(sensorHistory.timestamp, new Date(timestamp))))
      .orderBy(desc(sensorHistory.timestamp), desc(sensorHistory.id))
      .limit(1);

    return row ? this.rowToRecord(row) : null;
  }

  async prune(before: Timestamp): Promise<number> {
    const result = await this.db
      .delete(sensorHistory)
      .where(lt(sensorHistory.timestamp, new Date(before)))
      .returning({ id: sensorHistory.id });
    return result.length;
  }

  private buildConditions(filter: SensorHistoryFilter) {
    return and(
      inArray(sensorHistory.sensorId, filter.sensorIds),
      gte(sensorHistory.timestamp, new Date(filter.start)),
      lte(sensorHistory.timestamp, new Date(filter.end))
    );
  }

  private rowToRecord(row: typeof sensorHistory.$inferSelect): SensorStateRecord {
    return {
      sensorId: row.sensorId,
      value: row.value,
      available: row.available,
      timestamp: row.timestamp.toISOString(),
    };
  }
}
