// Root router - combines all domain routers

import { router } from '../trpc.js';
import { areasRouter } from './areas.js';
import { sensorsRouter } from './sensors.js';

/**
 * The root router.
 *
 * Usage from a client:
 * ```ts
 * const state = await trpc.areas.getState.query({ areaId: 'kitchen' });
 * await trpc.sensors.ingest.mutate({ sensorId: 'binary_sensor.kitchen_motion', value: 'on', timestamp });
 * ```
 */
export const appRouter = router({
  areas: areasRouter,
  sensors: sensorsRouter,
});

/**
 * Export the router type for client-side type inference.
 */
export type AppRouter = typeof appRouter;
