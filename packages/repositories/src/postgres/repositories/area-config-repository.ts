import { asc, eq } from 'drizzle-orm';
import type { DatabaseExecutor } from '../db.js';
import { areas } from '../schema/index.js';
import type { AreaConfigRepository } from '../../interfaces/index.js';
import type { AreaConfig, Id } from '@roomsense/protocol';

export class PgAreaConfigRepository implements AreaConfigRepository {
  constructor(private db: DatabaseExecutor) {}

  async save(config: AreaConfig): Promise<AreaConfig> {
    const now = new Date();

    const [row] = await this.db
      .insert(areas)
      .values({
        id: config.id,
        name: config.name,
        config,
        threshold: config.threshold,
        createdAt: now,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: areas.id,
        set: { name: config.name, config, threshold: config.threshold, updatedAt: now },
      })
      .returning();

    return this.rowToAreaConfig(row);
  }

  async get(id: Id): Promise<AreaConfig | null> {
    const [row] = await this.db.select().from(areas).where(eq(areas.id, id));
    return row ? this.rowToAreaConfig(row) : null;
  }

  async list(): Promise<AreaConfig[]> {
    const rows = await this.db.select().from(areas).orderBy(asc(areas.id));
    return rows.map((r) => this.rowToAreaConfig(r));
  }

  async updateThreshold(id: Id, threshold: number): Promise<AreaConfig | null> {
    const [row] = await this.db
      .update(areas)
      .set({ threshold, updatedAt: new Date() })
      .where(eq(areas.id, id))
      .returning();

    return row ? this.rowToAreaConfig(row) : null;
  }

  async delete(id: Id): Promise<boolean> {
    const result = await this.db.delete(areas).where(eq(areas.id, id)).returning({ id: areas.id });
    return result.length > 0;
  }

  // The threshold column is authoritative; the JSON copy may be stale
  private rowToAreaConfig(row: typeof areas.$inferSelect): AreaConfig {
    return {
      ...row.config,
      id: row.id,
      name: row.name,
      threshold: row.threshold,
    };
  }
}
