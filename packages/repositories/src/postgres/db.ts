// Postgres connection

import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema/index.js';

const DEFAULT_MAX_CONNECTIONS = 10;
const DEFAULT_IDLE_TIMEOUT_SECONDS = 30;

export type DatabaseConfig = {
  connectionString: string;
  /** Pool size (default 10) */
  maxConnections?: number;
  /** Seconds before an idle pooled connection is closed */
  idleTimeoutSeconds?: number;
};

/**
 * Open the pooled connection behind the Postgres repositories.
 * `client.end()` drains the pool on shutdown.
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? DEFAULT_MAX_CONNECTIONS,
    idle_timeout: config.idleTimeoutSeconds ?? DEFAULT_IDLE_TIMEOUT_SECONDS,
  });
  const db = drizzle(client, { schema });

  return { db, client };
}

export type Database = ReturnType<typeof createDatabase>['db'];

/**
 * Anything repositories can run queries on: the database itself or a
 * transaction opened on it.
 */
export type DatabaseExecutor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;
