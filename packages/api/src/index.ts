// @roomsense/api
// tRPC surface for the occupancy engine
export { appRouter, type AppRouter } from './routers/index.js';
export { createContext, createContextFromEnv, type Context, type CreateContextOptions } from './context.js';
export { createCallerFactory, router, publicProcedure, middleware, TRPCError } from './trpc.js';
