import type Database from 'better-sqlite3';
import { type BudgetPeriod, type BudgetUpdate, type CarbonBudget, rolloverBudget, updateBudget } from '@greengate/shared';

export interface BudgetRow {
  id: string;
  limit_grams: number;
  period: string;
  consumed_grams: number;
  period_start: string;
  updated_at: string;
}

type BudgetParams = Omit<BudgetRow, 'updated_at'>;

function toPeriod(value: string): BudgetPeriod {
  return value === 'project' ? 'project' : 'daily';
}

export class BudgetRepository {
  private upsertStmt: Database.Statement<[BudgetParams]>;
  private getStmt: Database.Statement<[string], BudgetRow>;
  private deleteStmt: Database.Statement<[string]>;
  private incrementTx: Database.Transaction<(id: string, current: CarbonBudget, grams: number, now: Date) => BudgetUpdate>;

  constructor(db: Database.Database) {
    this.upsertStmt = db.prepare<BudgetParams>(`
      INSERT INTO budgets (id, limit_grams, period, consumed_grams, period_start, updated_at)
      VALUES (@id, @limit_grams, @period, @consumed_grams, @period_start, datetime('now'))
      ON CONFLICT(id) DO UPDATE SET
        limit_grams = excluded.limit_grams,
        period = excluded.period,
        consumed_grams = excluded.consumed_grams,
        period_start = excluded.period_start,
        updated_at = excluded.updated_at
    `);
    this.getStmt = db.prepare<[string], BudgetRow>('SELECT * FROM budgets WHERE id = ?');
    this.deleteStmt = db.prepare<[string]>('DELETE FROM budgets WHERE id = ?');
    this.incrementTx = db.transaction((id: string, current: CarbonBudget, grams: number, now: Date) => {
      const stored = this.load(id);
      const base = stored && stored.period === current.period
        ? { ...stored, limitGrams: current.limitGrams }
        : current;
      const update = updateBudget(rolloverBudget(base, now), grams);
      this.save(id, update.budget);
      return update;
    });
  }

  load(id: string): CarbonBudget | null {
    const row = this.getStmt.get(id);
    if (!row) return null;
    return {
      limitGrams: row.limit_grams,
      period: toPeriod(row.period),
      consumedGrams: row.consumed_grams,
      periodStart: row.period_start,
    };
  }

  save(id: string, budget: CarbonBudget): void {
    this.upsertStmt.run({
      id,
      limit_grams: budget.limitGrams,
      period: budget.period,
      consumed_grams: budget.consumedGrams,
      period_start: budget.periodStart,
    });
  }

  /**
   * Adds `grams` to the stored budget inside one write transaction, so ledgers in
   * other processes sharing the file never overwrite each other's consumption.
   * `current` stands in when nothing compatible is stored yet.
   */
  increment(id: string, current: CarbonBudget, grams: number, now: Date): BudgetUpdate {
    return this.incrementTx.immediate(id, current, grams, now);
  }

  delete(id: string): boolean {
    return this.deleteStmt.run(id).changes > 0;
  }
}
