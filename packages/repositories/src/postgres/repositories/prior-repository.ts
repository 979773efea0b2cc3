import { eq } from 'drizzle-orm';
import type { DatabaseExecutor } from '../db.js';
import { priorSets } from '../schema/index.js';
import type { PriorRepository } from '../../interfaces/index.js';
import type { Id, PriorSet } from '@roomsense/protocol';

export class PgPriorRepository implements PriorRepository {
  constructor(private db: DatabaseExecutor) {}

  async get(areaId: Id): Promise<PriorSet | null> {
    const [row] = await this.db.select().from(priorSets).where(eq(priorSets.areaId, areaId));
    return row ? this.rowToPriorSet(row) : null;
  }

  async replace(priorSet: PriorSet): Promise<PriorSet> {
    const values = {
      version: priorSet.version,
      models: priorSet.models,
      sensorModels: priorSet.sensorModels,
      baselines: priorSet.baselines,
      updatedAt: new Date(priorSet.updatedAt),
    };

    // Single upsert statement: the row is swapped as a whole
    const [row] = await this.db
      .insert(priorSets)
      .values({ areaId: priorSet.areaId, ...values })
      .onConflictDoUpdate({ target: priorSets.areaId, set: values })
      .returning();

    return this.rowToPriorSet(row);
  }

  async delete(areaId: Id): Promise<boolean> {
    const result = await this.db
      .delete(priorSets)
      .where(eq(priorSets.areaId, areaId))
      .returning({ areaId: priorSets.areaId });
    return result.length > 0;
  }

  private rowToPriorSet(row: typeof priorSets.$inferSelect): PriorSet {
    return {
      areaId: row.areaId,
      version: row.version,
      updatedAt: row.updatedAt.toISOString(),
      models: row.models,
      sensorModels: row.sensorModels,
      baselines: row.baselines,
    };
  }
}
