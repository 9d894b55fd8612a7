import type Database from 'better-sqlite3';
import { GreenGateError } from '@greengate/shared';

export interface Migration {
  version: number;
  name: string;
  up(db: Database.Database): void;
}

/**
 * Applies migrations newer than the schema version stored in `PRAGMA user_version`.
 * Each migration and its version bump commit together.
 *
 * @returns versions applied by this call
 */
export function runMigrations(db: Database.Database, migrations: Migration[]): number[] {
  const ordered = [...migrations].sort((a, b) => a.version - b.version);
  ordered.forEach((m, i) => {
    if (!Number.isInteger(m.version) || m.version < 1) {
      throw new GreenGateError(`Migration ${m.name} has invalid version ${m.version}`);
    }
    if (i > 0 && ordered[i - 1].version === m.version) {
      throw new GreenGateError(`Duplicate migration version ${m.version}`);
    }
  });

  const current = getCurrentVersion(db);
  const pending = ordered.filter(m => m.version > current);
  for (const migration of pending) {
    db.transaction(() => {
      migration.up(db);
      db.pragma(`user_version = ${migration.version}`);
    })();
  }
  return pending.map(m => m.version);
}

/** 0 for a database no migration has touched. */
export function getCurrentVersion(db: Database.Database): number {
  const version = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}
