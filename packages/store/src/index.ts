// ── Database & Migrations ────────────────────────────────────────
export { openDatabase, createTestDatabase, DEFAULT_DB_PATH } from './database.js';
export type { DatabaseOptions } from './database.js';
export { runMigrations, getCurrentVersion } from './migrations.js';
export type { Migration } from './migrations.js';
export { allMigrations } from './migrations/index.js';

// ── Repositories ─────────────────────────────────────────────────
export { BudgetRepository } from './repositories/budget.repository.js';
export type { BudgetRow } from './repositories/budget.repository.js';

export { SessionRepository } from './repositories/session.repository.js';
export type {
  SessionReportRow, SessionListOptions, SessionTotals,
} from './repositories/session.repository.js';

// ── Store ────────────────────────────────────────────────────────

import type Database from 'better-sqlite3';
import { openDatabase } from './database.js';
import { runMigrations } from './migrations.js';
import { allMigrations } from './migrations/index.js';
import { BudgetRepository } from './repositories/budget.repository.js';
import { SessionRepository } from './repositories/session.repository.js';

export interface GreenGateStore {
  db: Database.Database;
  budgets: BudgetRepository;
  sessions: SessionRepository;
}

/**
 * Opens (or creates) the database, runs migrations and returns the repositories.
 *
 * @param dbPath - SQLite file; defaults to `.greengate/greengate.db` under the cwd.
 */
export function initializeStore(dbPath?: string): GreenGateStore {
  return createStore(openDatabase({ dbPath }));
}

/** Wraps an already open database, e.g. an in-memory one. */
export function createStore(db: Database.Database): GreenGateStore {
  runMigrations(db, allMigrations);
  return {
    db,
    budgets: new BudgetRepository(db),
    sessions: new SessionRepository(db),
  };
}
