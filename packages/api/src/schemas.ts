// Zod schemas for API input

import { z } from 'zod';
import { SENSOR_TYPES } from '@roomsense/protocol';

export const SensorTypeSchema = z.enum(SENSOR_TYPES);

export const RawValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ActivationPredicateSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('states'), activeStates: z.array(z.string()).min(1) }),
  z.object({ kind: z.literal('above'), threshold: z.number() }),
  z.object({ kind: z.literal('below'), threshold: z.number() }),
  z.object({ kind: z.literal('band'), min: z.number(), max: z.number() }),
  z.object({
    kind: z.literal('curve'),
    direction: z.enum(['above', 'below']),
    reference: z.number().optional(),
    scale: z.number().positive().optional(),
  }),
]);

export const SensorConfigSchema = z.object({
  id: z.string().min(1),
  type: SensorTypeSchema,
  name: z.string().optional(),
  weight: z.number().min(0).max(1).optional(),
  activation: ActivationPredicateSchema.optional(),
});

// Range checks beyond types are left to validateAreaConfig so every
// problem is reported together
export const AreaConfigInputSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  sensors: z.array(SensorConfigSchema),
  weights: z.record(SensorTypeSchema, z.number()).optional(),
  threshold: z.number().optional(),
  decay: z
    .object({
      enabled: z.boolean().optional(),
      windowSeconds: z.number().optional(),
      minDelaySeconds: z.number().optional(),
      curve: z.enum(['cosine', 'exponential', 'linear']).optional(),
    })
    .optional(),
  historyPeriodDays: z.number().int().optional(),
  historicalAnalysisEnabled: z.boolean().optional(),
  learner: z
    .object({
      proxyTypes: z.array(SensorTypeSchema).optional(),
      minSamples: z.number().int().optional(),
      timeoutMs: z.number().int().optional(),
    })
    .optional(),
});

export const AreaIdSchema = z.object({ areaId: z.string().min(1) });
