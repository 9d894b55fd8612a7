import { z } from 'zod';

export const carbonSourceSchema = z.enum(['live', 'cached', 'fallback_average', 'mock']);

export const carbonReadingSchema = z.object({
  region: z.string().min(1),
  intensity: z.number().nonnegative(),
  timestamp: z.string().datetime({ offset: true }),
  source: carbonSourceSchema,
});
