// tRPC initialization
//
// Sets up tRPC with the superjson transformer and maps engine errors onto
// tRPC error codes, so callers see NOT_FOUND and BAD_REQUEST instead of
// INTERNAL_SERVER_ERROR.

import { initTRPC, TRPCError } from '@trpc/server';
import superjson from 'superjson';
import {
  AreaNotFoundError,
  ConfigurationError,
  RuntimeError,
  ValidationError,
} from '@roomsense/runtime';
import type { Context } from './context.js';

/**
 * Initialize tRPC with context and superjson transformer.
 */
const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        // Engine error code for client-side handling
        domainCode: error.cause instanceof RuntimeError ? error.cause.code : null,
      },
    };
  },
});

/**
 * Rethrow engine errors with the matching tRPC code.
 */
const mapEngineErrors = t.middleware(async ({ next }) => {
  const result = await next();
  if (!result.ok) {
    const cause = result.error.cause;
    if (cause instanceof AreaNotFoundError) {
      throw new TRPCError({ code: 'NOT_FOUND', message: cause.message, cause });
    }
    if (cause instanceof ValidationError || cause instanceof ConfigurationError) {
      throw new TRPCError({ code: 'BAD_REQUEST', message: cause.message, cause });
    }
  }
  return result;
});

export const router = t.router;

/**
 * Base procedure for every route. There is no authentication layer; the
 * API is meant for the host platform on a trusted network.
 */
export const publicProcedure = t.procedure.use(mapEngineErrors);

export const middleware = t.middleware;

export const createCallerFactory = t.createCallerFactory;

export { TRPCError };
