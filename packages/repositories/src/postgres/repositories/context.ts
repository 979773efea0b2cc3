import type { Database, DatabaseExecutor } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { PgAreaConfigRepository } from './area-config-repository.js';
import { PgPriorRepository } from './prior-repository.js';
import { PgSensorHistoryRepository } from './sensor-history-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 * const priors = await repos.priors.get('kitchen');
 * ```
 */
export function createPgRepositoryContext(db: DatabaseExecutor): RepositoryContext {
  return {
    areas: new PgAreaConfigRepository(db),
    priors: new PgPriorRepository(db),
    history: new PgSensorHistoryRepository(db),
  };
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const repos = createTransactionalPgRepositoryContext(db);
 * await repos.transaction(async (txRepos) => {
 *   await txRepos.areas.save(config);
 *   await txRepos.priors.replace(defaults);
 * });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: Database
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly areas: PgAreaConfigRepository;
  readonly priors: PgPriorRepository;
  readonly history: PgSensorHistoryRepository;

  constructor(private db: Database) {
    this.areas = new PgAreaConfigRepository(db);
    this.priors = new PgPriorRepository(db);
    this.history = new PgSensorHistoryRepository(db);
  }

  /**
   * Execute a function within a database transaction.
   *
   * - If the function returns successfully, all changes are committed
   * - If the function throws, all changes are rolled back
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    return this.db.transaction(async (tx) => fn(createPgRepositoryContext(tx)));
  }
}
