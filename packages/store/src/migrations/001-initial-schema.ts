import type { Migration } from '../migrations.js';

export const migration001: Migration = {
  version: 1,
  name: 'initial-schema',
  up(db) {
    // ── Budgets ──────────────────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS budgets (
        id              TEXT PRIMARY KEY,
        limit_grams     REAL NOT NULL,
        period          TEXT NOT NULL,
        consumed_grams  REAL NOT NULL DEFAULT 0,
        period_start    TEXT NOT NULL,
        updated_at      TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

    // ── Session reports ──────────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS session_reports (
        id                 TEXT PRIMARY KEY,
        name               TEXT,
        region             TEXT NOT NULL,
        status             TEXT NOT NULL,
        partial            INTEGER NOT NULL DEFAULT 0,
        energy_kwh         REAL NOT NULL DEFAULT 0,
        emissions_grams    REAL NOT NULL DEFAULT 0,
        cost_usd           REAL NOT NULL DEFAULT 0,
        average_intensity  REAL NOT NULL DEFAULT 0,
        budget_alert       INTEGER NOT NULL DEFAULT 0,
        started_at         TEXT NOT NULL,
        completed_at       TEXT NOT NULL,
        error              TEXT,
        report             TEXT NOT NULL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_reports_status ON session_reports(status)');
    db.exec('CREATE INDEX IF NOT EXISTS idx_reports_started ON session_reports(started_at)');
  },
};
