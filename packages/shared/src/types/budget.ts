export type BudgetPeriod = 'daily' | 'project';

export interface CarbonBudget {
  readonly limitGrams: number;
  readonly period: BudgetPeriod;
  readonly consumedGrams: number;
  readonly periodStart: string;
}

export interface BudgetUpdate {
  budget: CarbonBudget;
  /** True only on the update where consumption first passes the limit. */
  alert: boolean;
}

export interface BudgetStatus {
  remainingGrams: number;
  percentUsed: number;
  exceeded: boolean;
}
