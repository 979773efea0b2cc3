import type { AreaConfig, Id } from '@roomsense/protocol';

/**
 * Repository interface for area configuration.
 *
 * Configuration is owned by the operator. The engine itself only ever
 * writes the threshold back; everything else changes through `save`.
 */
export interface AreaConfigRepository {
  /**
   * Create or replace an area's configuration.
   */
  save(config: AreaConfig): Promise<AreaConfig>;

  /**
   * Get an area configuration by ID
   * @returns AreaConfig or null if not found
   */
  get(id: Id): Promise<AreaConfig | null>;

  /**
   * List all configured areas, ordered by id.
   */
  list(): Promise<AreaConfig[]>;

  /**
   * Persist a new threshold without touching any other setting.
   * @returns Updated AreaConfig or null if the area does not exist
   */
  updateThreshold(id: Id, threshold: number): Promise<AreaConfig | null>;

  /**
   * Delete an area configuration.
   * @returns true if deleted, false if not found
   */
  delete(id: Id): Promise<boolean>;
}
