import type { BudgetPeriod } from './budget.js';
import type { BackoffPolicy } from './scheduler.js';

export type CarbonProviderName = 'electricitymap' | 'mock';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface CarbonApiConfig {
  provider: CarbonProviderName;
  apiKey?: string;
  region: string;
  baseUrl: string;
  timeoutMs: number;
  cacheTtlMs: number;
  staleTtlMs: number;
  defaultRegion: string;
  seed?: number;
}

export interface TrainConfig {
  earliestStartHour: number;
  latestStartHour: number;
  minCarbonIntensity: number;
  maxCarbonIntensity: number;
  backoff: BackoffPolicy;
  budgetCheckIntervalMs: number;
}

export interface ModelConfig {
  batchSize: number;
  useMixedPrecision: boolean;
  epochs: number;
}

export interface MonitorConfig {
  samplingIntervalMs: number;
  cpuTdpWatts?: number;
  idleFraction: number;
  maxFraction: number;
  historyLimit: number;
  accelerator: 'none' | 'nvidia-smi';
}

export interface BudgetConfig {
  limitGrams: number;
  period: BudgetPeriod;
}

export interface OptimizerConfig {
  minBatchSize: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface StoreConfig {
  enabled: boolean;
  dbPath?: string;
}

export interface GreenGateConfig {
  carbonApi: CarbonApiConfig;
  train: TrainConfig;
  model: ModelConfig;
  monitor: MonitorConfig;
  budget: BudgetConfig;
  optimizer: OptimizerConfig;
  logging: LoggingConfig;
  store: StoreConfig;
}
