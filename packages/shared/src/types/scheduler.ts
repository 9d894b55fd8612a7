import type { CarbonReading } from './carbon.js';
import type { TrainingConfig } from './training.js';

export type Verdict = 'proceed' | 'wait' | 'reject';

export type DecisionCode =
  | 'optimal'
  | 'acceptable'
  | 'carbon_too_high'
  | 'outside_window'
  | 'retry_budget_exhausted'
  | 'max_wait_exceeded'
  | 'budget_exhausted'
  | 'cancelled';

export interface SchedulingDecision {
  readonly verdict: Verdict;
  readonly code: DecisionCode;
  readonly reason: string;
  readonly reading: CarbonReading;
  readonly attempt: number;
  readonly evaluatedAt: string;
}

export type SchedulerState = 'idle' | 'evaluating' | 'waiting' | 'training' | 'rejected';

export interface TimeWindow {
  /** 0-23, inclusive */
  earliestStartHour: number;
  /** 0-23, exclusive; a smaller value than earliestStartHour wraps past midnight */
  latestStartHour: number;
}

export interface IntensityThresholds {
  /** Optimal threshold: at or below it training runs with the base configuration. */
  minCarbonIntensity: number;
  /** Hard ceiling: above it the scheduler waits. */
  maxCarbonIntensity: number;
}

export interface BackoffPolicy {
  strategy: 'fixed' | 'exponential';
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Maximum number of carbon polls before the request is rejected. */
  maxRetries: number;
  maxWaitMs: number;
}

export interface SessionRequest {
  name?: string;
  region: string;
  window: TimeWindow;
  thresholds: IntensityThresholds;
  baseConfig: TrainingConfig;
}
