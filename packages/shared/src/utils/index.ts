export { generateId } from './id.js';
export { sleep, systemClock } from './clock.js';
export type { Clock } from './clock.js';
export {
  GreenGateError,
  ConfigError,
  ProviderUnavailableError,
  BudgetExceededError,
  MonitorFailureError,
  SessionCancelledError,
} from './errors.js';
export { createLogger, formatLogLine, silentLogger } from './logger.js';
export type { Logger, LogSink } from './logger.js';
export {
  emissionsGrams,
  regionPricePerKwh,
  electricityCost,
  calculateEquivalents,
  startOfUtcDay,
  createBudget,
  isBudgetExceeded,
  updateBudget,
  rolloverBudget,
  budgetStatus,
} from './carbon.js';
