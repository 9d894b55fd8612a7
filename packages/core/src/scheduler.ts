import {
  type BackoffPolicy,
  type CarbonReading,
  type Clock,
  type EnergySession,
  type GreenGateConfig,
  type Logger,
  type OptimizationRule,
  type SchedulerState,
  type SchedulingDecision,
  type SessionReport,
  type SessionRequest,
  type SessionStatus,
  type TimeWindow,
  type TrainingConfig,
  type Verdict,
  type DecisionCode,
  BudgetExceededError,
  GreenGateError,
  SessionCancelledError,
  calculateEquivalents,
  electricityCost,
  emissionsGrams,
  generateId,
  isBudgetExceeded,
  regionPricePerKwh,
  silentLogger,
  systemClock,
} from '@greengate/shared';
import type { SessionRepository } from '@greengate/store';
import type { CarbonIntensityService } from './carbon-intensity-service.js';
import type { BudgetLedger } from './budget-ledger.js';
import { EnergyMonitor } from './energy-monitor.js';
import { Optimizer } from './optimizer.js';

export interface TrainingContext {
  /** Current tuned configuration; changes after reoptimize(). */
  readonly config: TrainingConfig;
  readonly reading: CarbonReading;
  /** Aborted on external cancellation or when the carbon budget is exceeded. */
  readonly signal: AbortSignal;
  energyKwh(): number;
  reoptimize(): Promise<TrainingConfig>;
}

export type TrainFn = (ctx: TrainingContext) => Promise<unknown>;

export interface SessionOptions {
  signal?: AbortSignal;
}

export interface NegotiationResult {
  decision: SchedulingDecision;
  trail: SchedulingDecision[];
}

export type StateListener = (state: SchedulerState, previous: SchedulerState) => void;

export interface CarbonSchedulerOptions {
  carbon: CarbonIntensityService;
  ledger: BudgetLedger;
  backoff: BackoffPolicy;
  monitor?: EnergyMonitor;
  samplingIntervalMs?: number;
  budgetCheckIntervalMs?: number;
  /** Custom optimizer table; defaults to one derived from each request's thresholds. */
  rules?: OptimizationRule[];
  minBatchSize?: number;
  sessions?: SessionRepository;
  clock?: Clock;
  logger?: Logger;
}

export function isWithinWindow(hour: number, window: TimeWindow): boolean {
  const { earliestStartHour: earliest, latestStartHour: latest } = window;
  if (earliest === latest) return true;
  if (earliest < latest) return hour >= earliest && hour < latest;
  // wraps past midnight, e.g. 22 → 6
  return hour >= earliest || hour < latest;
}

export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  if (policy.strategy === 'fixed') return policy.initialDelayMs;
  return Math.min(policy.maxDelayMs, policy.initialDelayMs * policy.multiplier ** (attempt - 1));
}

export function createSessionRequest(config: GreenGateConfig, name?: string): SessionRequest {
  return {
    name,
    region: config.carbonApi.region,
    window: {
      earliestStartHour: config.train.earliestStartHour,
      latestStartHour: config.train.latestStartHour,
    },
    thresholds: {
      minCarbonIntensity: config.train.minCarbonIntensity,
      maxCarbonIntensity: config.train.maxCarbonIntensity,
    },
    baseConfig: {
      batchSize: config.model.batchSize,
      precision: config.model.useMixedPrecision ? 'mixed' : 'full',
      epochs: config.model.epochs,
    },
  };
}

function pad(hour: number): string {
  return `${String(hour).padStart(2, '0')}:00`;
}

/**
 * Carbon-aware gate in front of a training run:
 * idle → evaluating → { waiting, training, rejected } → idle.
 * One session at a time per instance; share a BudgetLedger across instances instead.
 */
export class CarbonScheduler {
  private state: SchedulerState = 'idle';
  private listeners = new Set<StateListener>();
  private carbon: CarbonIntensityService;
  private ledger: BudgetLedger;
  private backoff: BackoffPolicy;
  private monitor: EnergyMonitor;
  private samplingIntervalMs: number;
  private budgetCheckIntervalMs: number;
  private rules?: OptimizationRule[];
  private minBatchSize?: number;
  private sessions?: SessionRepository;
  private clock: Clock;
  private logger: Logger;

  constructor(options: CarbonSchedulerOptions) {
    this.carbon = options.carbon;
    this.ledger = options.ledger;
    this.backoff = options.backoff;
    this.samplingIntervalMs = options.samplingIntervalMs ?? 1_000;
    this.budgetCheckIntervalMs = options.budgetCheckIntervalMs ?? 10_000;
    this.rules = options.rules;
    this.minBatchSize = options.minBatchSize;
    this.sessions = options.sessions;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.monitor = options.monitor ?? new EnergyMonitor({ clock: this.clock, logger: this.logger });
  }

  getState(): SchedulerState {
    return this.state;
  }

  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** One scheduling decision for the current time, carbon intensity and budget. */
  async evaluate(request: SessionRequest, attempt = 1): Promise<SchedulingDecision> {
    const reading = await this.carbon.getCurrent(request.region);
    const now = this.clock.now();
    const hour = now.getHours();
    const { minCarbonIntensity: min, maxCarbonIntensity: max } = request.thresholds;
    const intensity = Number.isNaN(reading.intensity) ? Infinity : reading.intensity;

    const decide = (verdict: Verdict, code: DecisionCode, reason: string): SchedulingDecision =>
      Object.freeze({ verdict, code, reason, reading, attempt, evaluatedAt: now.toISOString() });

    if (!isWithinWindow(hour, request.window)) {
      const { earliestStartHour, latestStartHour } = request.window;
      return decide(
        'reject',
        'outside_window',
        `outside allowed hours: ${pad(hour)} is not in [${pad(earliestStartHour)}, ${pad(latestStartHour)})`,
      );
    }

    const budget = this.ledger.snapshot();
    if (isBudgetExceeded(budget)) {
      return decide(
        'reject',
        'budget_exhausted',
        `carbon budget exhausted: ${budget.consumedGrams.toFixed(1)} g of ${budget.limitGrams} g used`,
      );
    }

    if (intensity > max) {
      return decide('wait', 'carbon_too_high', `carbon too high: ${reading.intensity} gCO2/kWh > ${max}`);
    }
    if (intensity <= min) {
      return decide('proceed', 'optimal', `optimal carbon intensity: ${reading.intensity} gCO2/kWh <= ${min}`);
    }
    return decide('proceed', 'acceptable', `acceptable carbon intensity: ${reading.intensity} gCO2/kWh <= ${max}`);
  }

  /** Polls with backoff until the request may proceed or is rejected. */
  async requestSession(request: SessionRequest, options: SessionOptions = {}): Promise<NegotiationResult> {
    this.claim();
    try {
      return await this.negotiate(request, options.signal);
    } finally {
      this.setState('idle');
    }
  }

  /**
   * Negotiates a start, then runs `train` under the energy monitor while
   * charging emissions to the budget. Always resolves with a report.
   */
  async runSession(request: SessionRequest, train: TrainFn, options: SessionOptions = {}): Promise<SessionReport> {
    this.claim();
    const startedAt = this.clock.now();
    const controller = new AbortController();
    const onExternalAbort = () => controller.abort(new SessionCancelledError());
    if (options.signal?.aborted) onExternalAbort();
    else options.signal?.addEventListener('abort', onExternalAbort, { once: true });

    try {
      const { decision, trail } = await this.negotiate(request, controller.signal);
      if (decision.verdict !== 'proceed') {
        return this.persist(this.rejectedReport(request, decision, trail, startedAt));
      }
      return this.persist(await this.train(request, decision, trail, train, controller, startedAt));
    } finally {
      options.signal?.removeEventListener('abort', onExternalAbort);
      this.setState('idle');
    }
  }

  private claim(): void {
    if (this.state !== 'idle') {
      throw new GreenGateError(`Scheduler is busy (${this.state})`);
    }
    this.setState('evaluating');
  }

  private async negotiate(request: SessionRequest, signal?: AbortSignal): Promise<NegotiationResult> {
    const trail: SchedulingDecision[] = [];
    const startedAt = this.clock.now().getTime();
    const policy = this.backoff;

    const finish = (decision: SchedulingDecision): NegotiationResult => {
      trail.push(decision);
      if (decision.verdict === 'reject') this.setState('rejected');
      this.logger.info(`${request.name ?? request.region}: ${decision.verdict} (${decision.reason})`);
      return { decision, trail };
    };

    for (let attempt = 1; ; attempt++) {
      this.setState('evaluating');
      const decision = await this.evaluate(request, attempt);
      if (signal?.aborted) {
        return finish(this.cancelled(decision));
      }
      if (decision.verdict !== 'wait') {
        return finish(decision);
      }

      if (attempt >= policy.maxRetries) {
        return finish(this.convert(decision, 'retry_budget_exhausted', `retry budget exhausted after ${attempt} polls`));
      }

      const delay = backoffDelay(policy, attempt);
      const elapsed = this.clock.now().getTime() - startedAt;
      if (elapsed + delay > policy.maxWaitMs) {
        return finish(
          this.convert(decision, 'max_wait_exceeded', `max wait exceeded: ${elapsed + delay} ms would pass the ${policy.maxWaitMs} ms limit`),
        );
      }

      trail.push(decision);
      this.setState('waiting');
      this.logger.info(`${decision.reason}; retrying in ${Math.round(delay / 1000)}s (poll ${attempt}/${policy.maxRetries})`);
      await this.clock.sleep(delay, signal);
      if (signal?.aborted) {
        return finish(this.cancelled(decision));
      }
    }
  }

  private async train(
    request: SessionRequest,
    decision: SchedulingDecision,
    trail: SchedulingDecision[],
    train: TrainFn,
    controller: AbortController,
    startedAt: Date,
  ): Promise<SessionReport> {
    const optimizer = this.rules
      ? new Optimizer(this.rules, { minBatchSize: this.minBatchSize, logger: this.logger })
      : Optimizer.fromThresholds(request.thresholds, { minBatchSize: this.minBatchSize, logger: this.logger });

    let config = optimizer.suggest(request.baseConfig, decision.reading);
    let reading = decision.reading;
    let accountedKwh = 0;
    let grams = 0;
    let budgetAlert = false;
    let accounting: Promise<void> = Promise.resolve();
    let accountingError: unknown;

    const accountDelta = async (totalKwh: number): Promise<void> => {
      const delta = totalKwh - accountedKwh;
      if (delta <= 0) return;
      const latest = await this.carbon.getCurrent(request.region);
      const increment = emissionsGrams(delta, latest.intensity);
      const update = await this.ledger.record(increment);
      // Only charged energy moves forward; a failed charge is retried with the next delta.
      accountedKwh = totalKwh;
      grams += increment;
      if (update.alert) budgetAlert = true;
      if (isBudgetExceeded(update.budget) && !controller.signal.aborted) {
        controller.abort(new BudgetExceededError(update.budget));
      }
    };
    // Chained so the final delta is never charged before an earlier one; the chain always settles.
    const account = (totalKwh: number): Promise<void> => {
      accounting = accounting.then(() => accountDelta(totalKwh)).then(
        () => {
          accountingError = undefined;
        },
        (err: unknown) => {
          accountingError = err;
          this.logger.warn(`Budget check failed: ${err instanceof Error ? err.message : String(err)}`);
        },
      );
      return accounting;
    };

    this.setState('training');
    this.logger.info(
      `Training ${request.name ?? 'session'} with batch ${config.batchSize}, ${config.precision} precision, ${config.epochs} epochs`,
    );
    this.monitor.start(this.samplingIntervalMs);
    const budgetTimer = setInterval(() => {
      // Settles without rejecting; failures are logged and kept in accountingError.
      return account(this.monitor.currentTotalKwh());
    }, this.budgetCheckIntervalMs);
    budgetTimer.unref();

    const monitor = this.monitor;
    const ctx: TrainingContext = {
      get config() {
        return config;
      },
      get reading() {
        return reading;
      },
      signal: controller.signal,
      energyKwh: () => monitor.currentTotalKwh(),
      reoptimize: async () => {
        reading = await this.carbon.getCurrent(request.region);
        const next = optimizer.suggest(request.baseConfig, reading);
        if (next.batchSize !== config.batchSize || next.precision !== config.precision) {
          this.logger.info(`Reoptimized at ${reading.intensity} gCO2/kWh: batch ${next.batchSize}, ${next.precision}`);
        }
        config = next;
        return config;
      },
    };

    let status: SessionStatus = 'completed';
    let error: string | undefined;
    try {
      const training = Promise.resolve().then(() => train(ctx));
      const aborted = new Promise<never>((_, reject) => {
        if (controller.signal.aborted) reject(controller.signal.reason);
        else controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
      });
      // Training that ignores the signal may still settle later.
      training.catch((err: unknown) => {
        if (controller.signal.aborted) {
          this.logger.debug(`Training settled after abort: ${err instanceof Error ? err.message : String(err)}`);
        }
      });
      await Promise.race([training, aborted]);
    } catch (err) {
      status = err instanceof BudgetExceededError
        ? 'budget_exceeded'
        : err instanceof SessionCancelledError
          ? 'cancelled'
          : 'failed';
      error = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Training ${status}: ${error}`);
    }

    clearInterval(budgetTimer);
    const energy: EnergySession = this.monitor.stop();

    await account(energy.totalKwh);
    if (accountingError !== undefined) {
      const message = accountingError instanceof Error ? accountingError.message : String(accountingError);
      this.logger.error(`Final budget accounting failed: ${message}`);
      error ??= message;
    }

    return {
      id: generateId('session'),
      name: request.name,
      region: request.region,
      status,
      partial: status !== 'completed',
      decisions: trail,
      config,
      energy,
      emissionsGrams: grams,
      costUsd: electricityCost(energy.totalKwh, regionPricePerKwh(request.region)),
      equivalents: calculateEquivalents(grams),
      averageIntensity: energy.totalKwh > 0 ? grams / energy.totalKwh : decision.reading.intensity,
      budget: this.ledger.snapshot(),
      budgetAlert,
      startedAt: startedAt.toISOString(),
      completedAt: this.clock.now().toISOString(),
      error,
    };
  }

  private rejectedReport(
    request: SessionRequest,
    decision: SchedulingDecision,
    trail: SchedulingDecision[],
    startedAt: Date,
  ): SessionReport {
    return {
      id: generateId('session'),
      name: request.name,
      region: request.region,
      status: decision.code === 'cancelled' ? 'cancelled' : 'rejected',
      partial: false,
      decisions: trail,
      emissionsGrams: 0,
      costUsd: 0,
      equivalents: calculateEquivalents(0),
      averageIntensity: decision.reading.intensity,
      budget: this.ledger.snapshot(),
      budgetAlert: false,
      startedAt: startedAt.toISOString(),
      completedAt: this.clock.now().toISOString(),
      error: decision.reason,
    };
  }

  private persist(report: SessionReport): SessionReport {
    if (this.sessions) {
      try {
        this.sessions.save(report);
      } catch (err) {
        this.logger.error(`Failed to persist session ${report.id}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    return report;
  }

  private convert(decision: SchedulingDecision, code: DecisionCode, reason: string): SchedulingDecision {
    return Object.freeze({ ...decision, verdict: 'reject' as const, code, reason });
  }

  private cancelled(decision: SchedulingDecision): SchedulingDecision {
    return this.convert(decision, 'cancelled', 'cancelled while waiting for a start');
  }

  private setState(next: SchedulerState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }
}
