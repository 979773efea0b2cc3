// Postgres implementation of the repository interfaces
export { createDatabase, type Database, type DatabaseConfig, type DatabaseExecutor } from './db.js';
export * from './repositories/index.js';
export * as schema from './schema/index.js';
