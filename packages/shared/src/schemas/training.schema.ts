import { z } from 'zod';

export const precisionSchema = z.enum(['full', 'mixed']);

export const trainingConfigSchema = z.object({
  batchSize: z.number().int().positive(),
  precision: precisionSchema,
  epochs: z.number().int().positive(),
});

export const optimizationRuleSchema = z.object({
  maxIntensity: z.number().nonnegative(),
  batchSizeFactor: z.number().positive().max(1),
  precision: z.enum(['keep', 'mixed']),
  label: z.string().optional(),
});
