import type { CarbonBudget } from '../types/budget.js';

export class GreenGateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GreenGateError';
  }
}

export class ConfigError extends GreenGateError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

export class ProviderUnavailableError extends GreenGateError {
  constructor(
    public readonly providerName: string,
    public readonly region: string,
    detail: string,
    cause?: unknown,
  ) {
    super(`Carbon provider ${providerName} unavailable for ${region}: ${detail}`, { cause });
    this.name = 'ProviderUnavailableError';
  }
}

export class BudgetExceededError extends GreenGateError {
  constructor(public readonly budget: CarbonBudget) {
    super(
      `Carbon budget exceeded: ${budget.consumedGrams.toFixed(2)} g of ${budget.limitGrams.toFixed(2)} g (${budget.period})`,
    );
    this.name = 'BudgetExceededError';
  }
}

export class MonitorFailureError extends GreenGateError {
  constructor(public readonly sampler: string, cause: unknown) {
    super(`Energy sampler ${sampler} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'MonitorFailureError';
  }
}

export class SessionCancelledError extends GreenGateError {
  constructor(message = 'Session cancelled') {
    super(message);
    this.name = 'SessionCancelledError';
  }
}
