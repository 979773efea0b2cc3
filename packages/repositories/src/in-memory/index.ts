// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing
//
// Data does not persist between restarts.

import type { AreaConfig, PriorSet, SensorHistoryFilter, SensorStateRecord } from '@roomsense/protocol';
import type {
  TransactionalRepositoryContext,
  AreaConfigRepository,
  PriorRepository,
  SensorHistoryRepository,
} from '../interfaces/index.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  areas: Map<string, AreaConfig>;
  priors: Map<string, PriorSet>;
  history: SensorStateRecord[];
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

/**
 * Create a complete in-memory repository context.
 *
 * Stored values are copied on the way in and out, so callers can never
 * mutate what another reader sees.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 * await repos.areas.save(config);
 * console.log(repos._data.areas.size);
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const areas = new Map<string, AreaConfig>();
  const priors = new Map<string, PriorSet>();
  const history: SensorStateRecord[] = [];

  const areaRepo: AreaConfigRepository = {
    async save(config) {
      areas.set(config.id, structuredClone(config));
      return structuredClone(config);
    },
    async get(id) {
      const config = areas.get(id);
      return config ? structuredClone(config) : null;
    },
    async list() {
      return Array.from(areas.values())
        .sort((a, b) => a.id.localeCompare(b.id))
        .map((c) => structuredClone(c));
    },
    async updateThreshold(id, threshold) {
      const config = areas.get(id);
      if (!config) return null;
      const updated: AreaConfig = { ...config, threshold };
      areas.set(id, updated);
      return structuredClone(updated);
    },
    async delete(id) {
      return areas.delete(id);
    },
  };

  const priorRepo: PriorRepository = {
    async get(areaId) {
      const set = priors.get(areaId);
      return set ? structuredClone(set) : null;
    },
    async replace(priorSet) {
      priors.set(priorSet.areaId, structuredClone(priorSet));
      return structuredClone(priorSet);
    },
    async delete(areaId) {
      return priors.delete(areaId);
    },
  };

  const matches = (record: SensorStateRecord, filter: SensorHistoryFilter): boolean => {
    const time = Date.parse(record.timestamp);
    return (
      filter.sensorIds.includes(record.sensorId) &&
      time >= Date.parse(filter.start) &&
      time <= Date.parse(filter.end)
    );
  };

  // Array.prototype.sort is stable, so equal timestamps keep insertion order
  const byTime = (a: SensorStateRecord, b: SensorStateRecord) =>
    Date.parse(a.timestamp) - Date.parse(b.timestamp);

  const historyRepo: SensorHistoryRepository = {
    async append(records) {
      history.push(...records.map((r) => ({ ...r })));
    },
    async query(filter) {
      const result = history.filter((r) => matches(r, filter)).sort(byTime);
      const limited = filter.limit !== undefined ? result.slice(0, filter.limit) : result;
      return limited.map((r) => ({ ...r }));
    },
    async latestBefore(sensorId, timestamp) {
      const cutoff = Date.parse(timestamp);
      const earlier = history
        .filter((r) => r.sensorId === sensorId && Date.parse(r.timestamp) < cutoff)
        .sort(byTime);
      const latest = earlier[earlier.length - 1];
      return latest ? { ...latest } : null;
    },
    async prune(before) {
      const cutoff = Date.parse(before);
      const kept = history.filter((r) => Date.parse(r.timestamp) >= cutoff);
      const removed = history.length - kept.length;
      history.splice(0, history.length, ...kept);
      return removed;
    },
  };

  const context: InMemoryRepositoryContext = {
    areas: areaRepo,
    priors: priorRepo,
    history: historyRepo,
    _data: { areas, priors, history },
    clear() {
      areas.clear();
      priors.clear();
      history.length = 0;
    },
    async transaction(fn) {
      // In-memory has no rollback; operations apply immediately
      return fn(context);
    },
  };

  return context;
}
