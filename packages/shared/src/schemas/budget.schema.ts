import { z } from 'zod';

export const budgetPeriodSchema = z.enum(['daily', 'project']);

export const carbonBudgetSchema = z.object({
  limitGrams: z.number().positive(),
  period: budgetPeriodSchema,
  consumedGrams: z.number().nonnegative(),
  periodStart: z.string().datetime(),
});
