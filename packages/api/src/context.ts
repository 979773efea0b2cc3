// tRPC request context
//
// Every procedure gets the repositories and the area manager. The
// manager is long-lived; contexts are cheap wrappers around it.

import {
  createInMemoryRepositoryContext,
  postgres,
  type RepositoryContext,
} from '@roomsense/repositories';
import { AreaManager, consoleLogger, type Logger } from '@roomsense/runtime';

/**
 * Context available to all tRPC procedures.
 */
export type Context = {
  /** Repository context for data access */
  repos: RepositoryContext;
  /** Active areas and their coordinators */
  manager: AreaManager;
  logger: Logger;
};

export type CreateContextOptions = {
  repos: RepositoryContext;
  manager: AreaManager;
  logger?: Logger;
};

export function createContext(opts: CreateContextOptions): Context {
  return {
    repos: opts.repos,
    manager: opts.manager,
    logger: opts.logger ?? consoleLogger,
  };
}

let shared: Promise<Context> | null = null;

/**
 * Context backed by Postgres when DATABASE_URL is set, otherwise by the
 * in-memory repositories. Built once per process.
 */
export function createContextFromEnv(env: NodeJS.ProcessEnv = process.env): Promise<Context> {
  if (!shared) {
    shared = buildContext(env).catch((error: unknown) => {
      shared = null;
      throw error;
    });
  }
  return shared;
}

async function buildContext(env: NodeJS.ProcessEnv): Promise<Context> {
  const connectionString = env.DATABASE_URL;
  let repos: RepositoryContext;
  if (connectionString) {
    const { db } = postgres.createDatabase({ connectionString, maxConnections: 3 });
    repos = postgres.createTransactionalPgRepositoryContext(db);
    consoleLogger.info('Using Postgres repositories');
  } else {
    repos = createInMemoryRepositoryContext();
    consoleLogger.info('DATABASE_URL not set, using in-memory repositories');
  }

  const manager = await AreaManager.load(repos, { logger: consoleLogger });
  return createContext({ repos, manager, logger: consoleLogger });
}
