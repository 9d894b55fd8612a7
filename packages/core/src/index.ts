export { GreenGate } from './greengate.js';
export type { GreenGateOptions } from './greengate.js';
export { ConfigManager, CONFIG_FILE_NAMES, CONFIG_ENV_VARS, deepMerge, camelCaseKeys } from './config-manager.js';
export type { ConfigLoadOptions } from './config-manager.js';
export {
  CarbonIntensityProvider,
  ElectricityMapsProvider,
  MockProvider,
  StaticTableProvider,
  createCarbonProvider,
} from './providers/index.js';
export type { ElectricityMapsOptions, MockProviderOptions } from './providers/index.js';
export { CarbonIntensityService } from './carbon-intensity-service.js';
export type { CarbonIntensityServiceOptions } from './carbon-intensity-service.js';
export { EnergyMonitor, withEnergyMonitor } from './energy-monitor.js';
export type { EnergyMonitorOptions } from './energy-monitor.js';
export {
  OsCpuUtilizationSampler,
  NvidiaSmiSampler,
  parseNvidiaSmiOutput,
  estimateCpuTdp,
} from './energy-samplers.js';
export type { CpuUtilizationSampler, AcceleratorSampler } from './energy-samplers.js';
export { Optimizer, defaultRules, validateRules, precisionFactor, trainingLoad } from './optimizer.js';
export type { OptimizerOptions } from './optimizer.js';
export { BudgetLedger } from './budget-ledger.js';
export type { BudgetLedgerOptions, BudgetAlertListener } from './budget-ledger.js';
export {
  CarbonScheduler,
  isWithinWindow,
  backoffDelay,
  createSessionRequest,
} from './scheduler.js';
export type {
  CarbonSchedulerOptions,
  TrainingContext,
  TrainFn,
  SessionOptions,
  NegotiationResult,
  StateListener,
} from './scheduler.js';
