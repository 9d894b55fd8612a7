import type Database from 'better-sqlite3';
import { type SessionReport, type SessionStatus, GreenGateError, sessionReportSchema } from '@greengate/shared';

export interface SessionReportRow {
  id: string;
  name: string | null;
  region: string;
  status: string;
  partial: number;
  energy_kwh: number;
  emissions_grams: number;
  cost_usd: number;
  average_intensity: number;
  budget_alert: number;
  started_at: string;
  completed_at: string;
  error: string | null;
  report: string;
}

export interface SessionListOptions {
  limit?: number;
  offset?: number;
  status?: SessionStatus;
}

export interface SessionTotals {
  sessions: number;
  completed: number;
  energyKwh: number;
  emissionsGrams: number;
  costUsd: number;
}

interface TotalsRow {
  sessions: number;
  completed: number | null;
  energy_kwh: number | null;
  emissions_grams: number | null;
  cost_usd: number | null;
}

export class SessionRepository {
  private upsertStmt: Database.Statement<[SessionReportRow]>;
  private getStmt: Database.Statement<[string], SessionReportRow>;
  private countStmt: Database.Statement<[], { c: number }>;
  private totalsStmt: Database.Statement<[], TotalsRow>;

  constructor(private db: Database.Database) {
    this.upsertStmt = db.prepare<SessionReportRow>(`
      INSERT OR REPLACE INTO session_reports
        (id, name, region, status, partial, energy_kwh, emissions_grams, cost_usd,
         average_intensity, budget_alert, started_at, completed_at, error, report)
      VALUES
        (@id, @name, @region, @status, @partial, @energy_kwh, @emissions_grams, @cost_usd,
         @average_intensity, @budget_alert, @started_at, @completed_at, @error, @report)
    `);
    this.getStmt = db.prepare<[string], SessionReportRow>('SELECT * FROM session_reports WHERE id = ?');
    this.countStmt = db.prepare<[], { c: number }>('SELECT COUNT(*) AS c FROM session_reports');
    this.totalsStmt = db.prepare<[], TotalsRow>(`
      SELECT
        COUNT(*) AS sessions,
        SUM(CASE WHEN status = 'completed' THEN 1 ELSE 0 END) AS completed,
        SUM(energy_kwh) AS energy_kwh,
        SUM(emissions_grams) AS emissions_grams,
        SUM(cost_usd) AS cost_usd
      FROM session_reports
    `);
  }

  save(report: SessionReport): void {
    this.upsertStmt.run({
      id: report.id,
      name: report.name ?? null,
      region: report.region,
      status: report.status,
      partial: report.partial ? 1 : 0,
      energy_kwh: report.energy?.totalKwh ?? 0,
      emissions_grams: report.emissionsGrams,
      cost_usd: report.costUsd,
      average_intensity: report.averageIntensity,
      budget_alert: report.budgetAlert ? 1 : 0,
      started_at: report.startedAt,
      completed_at: report.completedAt,
      error: report.error ?? null,
      report: JSON.stringify(report),
    });
  }

  getById(id: string): SessionReport | null {
    const row = this.getStmt.get(id);
    return row ? this.rowToReport(row) : null;
  }

  /** Most recent first. */
  list(options: SessionListOptions = {}): SessionReport[] {
    const params: Array<string | number> = [];
    let sql = 'SELECT * FROM session_reports';
    if (options.status) {
      sql += ' WHERE status = ?';
      params.push(options.status);
    }
    sql += ' ORDER BY started_at DESC, rowid DESC LIMIT ? OFFSET ?';
    params.push(options.limit ?? 20, options.offset ?? 0);

    return this.db
      .prepare<Array<string | number>, SessionReportRow>(sql)
      .all(...params)
      .map(row => this.rowToReport(row));
  }

  count(): number {
    return this.countStmt.get()?.c ?? 0;
  }

  totals(): SessionTotals {
    const row = this.totalsStmt.get();
    return {
      sessions: row?.sessions ?? 0,
      completed: row?.completed ?? 0,
      energyKwh: row?.energy_kwh ?? 0,
      emissionsGrams: row?.emissions_grams ?? 0,
      costUsd: row?.cost_usd ?? 0,
    };
  }

  private rowToReport(row: SessionReportRow): SessionReport {
    const parsed = sessionReportSchema.safeParse(JSON.parse(row.report));
    if (!parsed.success) {
      throw new GreenGateError(`Stored report ${row.id} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
    }
    return parsed.data;
  }
}
