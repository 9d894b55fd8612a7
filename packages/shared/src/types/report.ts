import type { CarbonBudget } from './budget.js';
import type { EmissionEquivalents } from './carbon.js';
import type { EnergySession } from './energy.js';
import type { SchedulingDecision } from './scheduler.js';
import type { TrainingConfig } from './training.js';

export type SessionStatus = 'completed' | 'failed' | 'cancelled' | 'budget_exceeded' | 'rejected';

export interface SessionReport {
  id: string;
  name?: string;
  region: string;
  status: SessionStatus;
  /** True when training started but did not run to completion. */
  partial: boolean;
  decisions: SchedulingDecision[];
  config?: TrainingConfig;
  energy?: EnergySession;
  emissionsGrams: number;
  costUsd: number;
  equivalents: EmissionEquivalents;
  averageIntensity: number;
  budget: CarbonBudget;
  budgetAlert: boolean;
  startedAt: string;
  completedAt: string;
  error?: string;
}
