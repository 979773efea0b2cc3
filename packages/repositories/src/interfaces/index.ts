// Repository interfaces
// These define the contracts for data access, independent of the storage backend.

export type { AreaConfigRepository } from './area-config-repository.js';

export type { PriorRepository } from './prior-repository.js';

export type { SensorHistoryRepository } from './sensor-history-repository.js';

export type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from './repository-context.js';
