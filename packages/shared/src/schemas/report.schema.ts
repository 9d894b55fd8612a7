import { z } from 'zod';
import { carbonReadingSchema } from './carbon.schema.js';
import { carbonBudgetSchema } from './budget.schema.js';
import { trainingConfigSchema } from './training.schema.js';

export const energySampleSchema = z.object({
  timestamp: z.string(),
  powerWatts: z.number(),
  cpuPowerWatts: z.number(),
  acceleratorPowerWatts: z.number(),
  cpuUtilization: z.number(),
  cumulativeKwh: z.number(),
  degraded: z.boolean(),
});

export const energySessionSchema = z.object({
  startedAt: z.string(),
  endedAt: z.string(),
  durationSeconds: z.number(),
  samplingIntervalMs: z.number(),
  samples: z.array(energySampleSchema),
  sampleCount: z.number().int(),
  totalKwh: z.number(),
  averagePowerWatts: z.number(),
  peakPowerWatts: z.number(),
  cpuTdpWatts: z.number(),
  degradedSamples: z.number().int(),
});

export const schedulingDecisionSchema = z.object({
  verdict: z.enum(['proceed', 'wait', 'reject']),
  code: z.enum([
    'optimal',
    'acceptable',
    'carbon_too_high',
    'outside_window',
    'retry_budget_exhausted',
    'max_wait_exceeded',
    'budget_exhausted',
    'cancelled',
  ]),
  reason: z.string(),
  reading: carbonReadingSchema,
  attempt: z.number().int().positive(),
  evaluatedAt: z.string(),
});

export const sessionStatusSchema = z.enum(['completed', 'failed', 'cancelled', 'budget_exceeded', 'rejected']);

export const sessionReportSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  region: z.string(),
  status: sessionStatusSchema,
  partial: z.boolean(),
  decisions: z.array(schedulingDecisionSchema),
  config: trainingConfigSchema.optional(),
  energy: energySessionSchema.optional(),
  emissionsGrams: z.number(),
  costUsd: z.number(),
  equivalents: z.object({
    carMiles: z.number(),
    phoneCharges: z.number(),
    treeDays: z.number(),
  }),
  averageIntensity: z.number(),
  budget: carbonBudgetSchema,
  budgetAlert: z.boolean(),
  startedAt: z.string(),
  completedAt: z.string(),
  error: z.string().optional(),
});
