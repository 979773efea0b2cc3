// Areas router - state, threshold, priors and diagnostics per area

import { z } from 'zod';
import { MAX_THRESHOLD, MIN_THRESHOLD } from '@roomsense/protocol';
import { router, publicProcedure } from '../trpc.js';
import { AreaConfigInputSchema, AreaIdSchema } from '../schemas.js';

export const areasRouter = router({
  /**
   * List active areas with their current state.
   */
  list: publicProcedure.query(({ ctx }) => {
    return ctx.manager.listAreas().map((area) => ({
      id: area.id,
      name: area.getConfig().name,
      state: area.getState(),
    }));
  }),

  /**
   * Create or replace an area.
   */
  upsert: publicProcedure.input(AreaConfigInputSchema).mutation(async ({ ctx, input }) => {
    const area = await ctx.manager.addArea(input);
    return area.getConfig();
  }),

  remove: publicProcedure.input(AreaIdSchema).mutation(async ({ ctx, input }) => {
    return { removed: await ctx.manager.removeArea(input.areaId) };
  }),

  getConfig: publicProcedure.input(AreaIdSchema).query(({ ctx, input }) => {
    return ctx.manager.getArea(input.areaId).getConfig();
  }),

  /**
   * Current probability, decision and supporting detail.
   */
  getState: publicProcedure.input(AreaIdSchema).query(({ ctx, input }) => {
    return ctx.manager.getArea(input.areaId).getState();
  }),

  getThreshold: publicProcedure.input(AreaIdSchema).query(({ ctx, input }) => {
    return { threshold: ctx.manager.getArea(input.areaId).getThreshold() };
  }),

  /**
   * Change the decision threshold (percent).
   */
  setThreshold: publicProcedure
    .input(
      z.object({
        areaId: z.string().min(1),
        threshold: z.number().min(MIN_THRESHOLD).max(MAX_THRESHOLD),
      })
    )
    .mutation(async ({ ctx, input }) => {
      return ctx.manager.setThreshold(input.areaId, input.threshold);
    }),

  getPriors: publicProcedure.input(AreaIdSchema).query(({ ctx, input }) => {
    return ctx.manager.getArea(input.areaId).getPriors();
  }),

  /**
   * Run the historical analysis now and return its report.
   * Runs whether or not scheduled analysis is enabled for the area.
   */
  updatePriors: publicProcedure
    .input(
      z.object({
        areaId: z.string().min(1),
        historyPeriodDays: z.number().int().min(1).max(90).optional(),
        timeoutMs: z.number().int().positive().optional(),
      })
    )
    .mutation(async ({ ctx, input, signal }) => {
      return ctx.manager.updatePriors(input.areaId, {
        historyPeriodDays: input.historyPeriodDays,
        timeoutMs: input.timeoutMs,
        signal,
      });
    }),

  getMetrics: publicProcedure.input(AreaIdSchema).query(({ ctx, input }) => {
    return ctx.manager.getArea(input.areaId).getMetrics();
  }),

  getDiagnostics: publicProcedure.input(AreaIdSchema).query(({ ctx, input }) => {
    return ctx.manager.getArea(input.areaId).getDiagnostics();
  }),
});
