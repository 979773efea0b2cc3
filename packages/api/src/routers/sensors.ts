// Sensors router - state change ingestion from the host platform

import { z } from 'zod';
import { ingestSensorEvent } from '@roomsense/runtime';
import { router, publicProcedure } from '../trpc.js';
import { RawValueSchema } from '../schemas.js';

export const sensorsRouter = router({
  /**
   * Record a sensor state change and update every area that uses it.
   */
  ingest: publicProcedure
    .input(
      z.object({
        sensorId: z.string().min(1),
        value: RawValueSchema,
        timestamp: z.string().datetime({ offset: true }),
        available: z.boolean().optional(),
      })
    )
    .mutation(async ({ ctx, input }) => {
      const { states } = await ingestSensorEvent(ctx.repos, ctx.manager, input, { logger: ctx.logger });
      return states;
    }),

  /**
   * Ids of the areas that configure a sensor.
   */
  areas: publicProcedure.input(z.object({ sensorId: z.string().min(1) })).query(({ ctx, input }) => {
    return ctx.manager.areasForSensor(input.sensorId);
  }),
});
