import type { AreaConfigRepository } from './area-config-repository.js';
import type { PriorRepository } from './prior-repository.js';
import type { SensorHistoryRepository } from './sensor-history-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the primary dependency injection point for the runtime.
 * Pass a RepositoryContext to any code that needs data access,
 * and you can swap implementations (Postgres, in-memory)
 * without changing the consuming code.
 *
 * Example usage:
 * ```typescript
 * const repos = createPgRepositoryContext(db);
 * const manager = await AreaManager.load(repos);
 * ```
 */
export interface RepositoryContext {
  readonly areas: AreaConfigRepository;
  readonly priors: PriorRepository;
  readonly history: SensorHistoryRepository;
}

/**
 * Transaction wrapper type for atomic operations across repositories.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * Extended context with transaction support.
 * Implementations that support transactions should implement this interface.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a database transaction.
   * All repository operations within the function will be atomic.
   *
   * @throws Rolls back the transaction if the function throws
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}
