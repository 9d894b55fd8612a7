import { z } from 'zod';
import { budgetPeriodSchema } from './budget.schema.js';

const hourSchema = z.number().int().min(0).max(23);

export const backoffPolicySchema = z.object({
  strategy: z.enum(['fixed', 'exponential']).default('exponential'),
  initialDelayMs: z.number().int().positive().default(60_000),
  maxDelayMs: z.number().int().positive().default(900_000),
  multiplier: z.number().min(1).default(2),
  maxRetries: z.number().int().min(1).default(12),
  maxWaitMs: z.number().int().positive().default(6 * 60 * 60 * 1000),
}).refine(b => b.initialDelayMs <= b.maxDelayMs, {
  message: 'initialDelayMs must not exceed maxDelayMs',
  path: ['initialDelayMs'],
});

export const carbonApiConfigSchema = z.object({
  provider: z.enum(['electricitymap', 'mock']).default('mock'),
  apiKey: z.string().min(1).optional(),
  region: z.string().min(1).default('IN-SO'),
  baseUrl: z.string().url().default('https://api.electricitymap.org/v3'),
  timeoutMs: z.number().int().positive().default(5_000),
  cacheTtlMs: z.number().int().nonnegative().default(300_000),
  staleTtlMs: z.number().int().nonnegative().default(1_800_000),
  defaultRegion: z.string().min(1).default('default'),
  seed: z.number().int().optional(),
});

export const trainConfigSchema = z.object({
  earliestStartHour: hourSchema.default(0),
  latestStartHour: hourSchema.default(0),
  minCarbonIntensity: z.number().nonnegative().default(200),
  maxCarbonIntensity: z.number().nonnegative().default(400),
  backoff: backoffPolicySchema.default({}),
  budgetCheckIntervalMs: z.number().int().positive().default(10_000),
}).refine(t => t.minCarbonIntensity <= t.maxCarbonIntensity, {
  message: 'minCarbonIntensity must not exceed maxCarbonIntensity',
  path: ['minCarbonIntensity'],
});

export const modelConfigSchema = z.object({
  batchSize: z.number().int().positive().default(64),
  useMixedPrecision: z.boolean().default(false),
  epochs: z.number().int().positive().default(10),
});

export const monitorConfigSchema = z.object({
  samplingIntervalMs: z.number().int().min(50).default(1_000),
  cpuTdpWatts: z.number().positive().optional(),
  idleFraction: z.number().min(0).max(1).default(0),
  maxFraction: z.number().min(0).max(1).default(1),
  historyLimit: z.number().int().positive().default(3_600),
  accelerator: z.enum(['none', 'nvidia-smi']).default('none'),
}).refine(m => m.idleFraction <= m.maxFraction, {
  message: 'idleFraction must not exceed maxFraction',
  path: ['idleFraction'],
});

export const budgetConfigSchema = z.object({
  limitGrams: z.number().positive().default(6_300),
  period: budgetPeriodSchema.default('daily'),
});

export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const greenGateConfigSchema = z.object({
  carbonApi: carbonApiConfigSchema.default({}),
  train: trainConfigSchema.default({}),
  model: modelConfigSchema.default({}),
  monitor: monitorConfigSchema.default({}),
  budget: budgetConfigSchema.default({}),
  optimizer: z.object({
    minBatchSize: z.number().int().positive().default(32),
  }).default({}),
  logging: loggingConfigSchema.default({}),
  store: z.object({
    enabled: z.boolean().default(true),
    dbPath: z.string().min(1).optional(),
  }).default({}),
}).superRefine((cfg, ctx) => {
  if (cfg.carbonApi.provider === 'electricitymap' && !cfg.carbonApi.apiKey) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'apiKey is required for the electricitymap provider',
      path: ['carbonApi', 'apiKey'],
    });
  }
});
