import {
  type BudgetPeriod,
  type BudgetUpdate,
  type CarbonBudget,
  type Clock,
  type Logger,
  budgetStatus,
  createBudget,
  isBudgetExceeded,
  rolloverBudget,
  silentLogger,
  systemClock,
  updateBudget,
} from '@greengate/shared';
import type { BudgetRepository } from '@greengate/store';

export type BudgetAlertListener = (budget: CarbonBudget) => void;

export interface BudgetLedgerOptions {
  limitGrams: number;
  period: BudgetPeriod;
  /** Key under which the budget is persisted. */
  id?: string;
  repository?: BudgetRepository;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Shared carbon budget. Updates are applied one at a time in call order,
 * so the crossing alert fires once no matter how many sessions record concurrently.
 * With a repository the stored row is the source of truth, and ledgers in other
 * processes charge against the same total.
 */
export class BudgetLedger {
  readonly id: string;
  private budget: CarbonBudget;
  private queue: Promise<unknown> = Promise.resolve();
  private listeners = new Set<BudgetAlertListener>();
  private repository?: BudgetRepository;
  private clock: Clock;
  private logger: Logger;
  private limitGrams: number;

  constructor(options: BudgetLedgerOptions) {
    this.id = options.id ?? 'default';
    this.repository = options.repository;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.limitGrams = options.limitGrams;
    this.budget = createBudget(options.limitGrams, options.period, this.clock.now());
    this.refresh();
  }

  snapshot(): CarbonBudget {
    this.refresh();
    this.budget = rolloverBudget(this.budget, this.clock.now());
    return this.budget;
  }

  isExceeded(): boolean {
    return isBudgetExceeded(this.snapshot());
  }

  onAlert(listener: BudgetAlertListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  record(grams: number): Promise<BudgetUpdate> {
    return this.enqueue(() => this.apply(grams));
  }

  reset(): Promise<CarbonBudget> {
    return this.enqueue(() => {
      this.budget = createBudget(this.budget.limitGrams, this.budget.period, this.clock.now());
      this.repository?.save(this.id, this.budget);
      this.logger.info(`Budget ${this.id} reset`);
      return this.budget;
    });
  }

  private enqueue<T>(task: () => T): Promise<T> {
    const run = this.queue.then(task);
    // The caller sees the rejection through `run`; the chain itself keeps going.
    this.queue = run.catch((err: unknown) => {
      this.logger.error(`Budget update failed: ${err instanceof Error ? err.message : String(err)}`);
    });
    return run;
  }

  /** Picks up consumption recorded by other ledgers on the same store. */
  private refresh(): void {
    const stored = this.repository?.load(this.id);
    if (stored && stored.period === this.budget.period) {
      this.budget = { ...stored, limitGrams: this.limitGrams };
    }
  }

  private apply(grams: number): BudgetUpdate {
    const update = this.repository
      ? this.repository.increment(this.id, this.budget, grams, this.clock.now())
      : updateBudget(this.snapshot(), grams);
    this.budget = update.budget;

    if (update.alert) {
      const status = budgetStatus(update.budget);
      this.logger.warn(
        `Carbon budget exceeded: ${update.budget.consumedGrams.toFixed(2)} g of ${update.budget.limitGrams} g (${status.percentUsed.toFixed(0)}%)`,
      );
      for (const listener of this.listeners) {
        listener(update.budget);
      }
    }
    return update;
  }
}
