export { PgAreaConfigRepository } from './area-config-repository.js';
export { PgPriorRepository } from './prior-repository.js';
export { PgSensorHistoryRepository } from './sensor-history-repository.js';
export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
} from './context.js';
