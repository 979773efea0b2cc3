import type { Id, PriorSet } from '@roomsense/protocol';

/**
 * Repository interface for the likelihood/prior store.
 *
 * Entries are keyed by area id; no area ever reads another's entry.
 * A PriorSet is only ever written whole, so a concurrent reader observes
 * either the previous set or the new one, never a mix.
 */
export interface PriorRepository {
  /**
   * Get the current prior set for an area
   * @returns PriorSet or null if the area has never stored one
   */
  get(areaId: Id): Promise<PriorSet | null>;

  /**
   * Atomically replace an area's prior set.
   */
  replace(priorSet: PriorSet): Promise<PriorSet>;

  /**
   * Delete an area's prior set.
   * @returns true if deleted, false if not found
   */
  delete(areaId: Id): Promise<boolean>;
}
