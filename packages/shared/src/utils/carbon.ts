import type { BudgetPeriod, BudgetStatus, BudgetUpdate, CarbonBudget } from '../types/budget.js';
import type { EmissionEquivalents } from '../types/carbon.js';
import {
  DEFAULT_REGION,
  GRAMS_CO2_PER_CAR_MILE,
  GRAMS_CO2_PER_PHONE_CHARGE,
  GRAMS_CO2_PER_TREE_DAY,
  REGION_PRICE_PER_KWH,
} from '../constants.js';

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

/** grams CO2eq = kWh × gCO2eq/kWh */
export function emissionsGrams(energyKwh: number, intensity: number): number {
  return nonNegative(energyKwh) * nonNegative(intensity);
}

export function regionPricePerKwh(region: string): number {
  return Object.hasOwn(REGION_PRICE_PER_KWH, region) ? REGION_PRICE_PER_KWH[region] : REGION_PRICE_PER_KWH[DEFAULT_REGION];
}

export function electricityCost(energyKwh: number, pricePerKwh: number): number {
  return nonNegative(energyKwh) * nonNegative(pricePerKwh);
}

export function calculateEquivalents(grams: number): EmissionEquivalents {
  const g = nonNegative(grams);
  return {
    carMiles: g / GRAMS_CO2_PER_CAR_MILE,
    phoneCharges: g / GRAMS_CO2_PER_PHONE_CHARGE,
    treeDays: g / GRAMS_CO2_PER_TREE_DAY,
  };
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function createBudget(limitGrams: number, period: BudgetPeriod, now: Date = new Date()): CarbonBudget {
  return {
    limitGrams,
    period,
    consumedGrams: 0,
    periodStart: (period === 'daily' ? startOfUtcDay(now) : now).toISOString(),
  };
}

export function isBudgetExceeded(budget: CarbonBudget): boolean {
  return budget.consumedGrams > budget.limitGrams;
}

/**
 * Adds `grams` to the budget. `alert` is true only for the increment that takes
 * consumption from at-or-below the limit to above it.
 */
export function updateBudget(budget: CarbonBudget, grams: number): BudgetUpdate {
  const increment = nonNegative(grams);
  if (increment === 0) return { budget, alert: false };

  const next: CarbonBudget = { ...budget, consumedGrams: budget.consumedGrams + increment };
  return {
    budget: next,
    alert: !isBudgetExceeded(budget) && isBudgetExceeded(next),
  };
}

/** Starts a new period for a daily budget whose period began on an earlier UTC day. */
export function rolloverBudget(budget: CarbonBudget, now: Date): CarbonBudget {
  if (budget.period !== 'daily') return budget;
  const today = startOfUtcDay(now);
  if (new Date(budget.periodStart).getTime() >= today.getTime()) return budget;
  return { ...budget, consumedGrams: 0, periodStart: today.toISOString() };
}

export function budgetStatus(budget: CarbonBudget): BudgetStatus {
  return {
    remainingGrams: Math.max(0, budget.limitGrams - budget.consumedGrams),
    percentUsed: (budget.consumedGrams / budget.limitGrams) * 100,
    exceeded: isBudgetExceeded(budget),
  };
}
