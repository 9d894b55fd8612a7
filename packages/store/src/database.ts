import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';

export const DEFAULT_DB_PATH = path.join('.greengate', 'greengate.db');

export interface DatabaseOptions {
  /** Relative paths resolve against the cwd. */
  dbPath?: string;
  busyTimeoutMs?: number;
}

/**
 * Opens the session database, creating its directory when missing.
 * Each call returns its own connection; the caller closes it.
 */
export function openDatabase(options: DatabaseOptions = {}): Database.Database {
  const file = path.resolve(options.dbPath ?? DEFAULT_DB_PATH);
  fs.mkdirSync(path.dirname(file), { recursive: true });

  const db = new Database(file);
  configure(db, options.busyTimeoutMs);
  return db;
}

/** Fresh in-memory database per call, for tests. */
export function createTestDatabase(): Database.Database {
  const db = new Database(':memory:');
  configure(db);
  return db;
}

function configure(db: Database.Database, busyTimeoutMs = 5_000): void {
  // `history` may read while a `run` in another process is still writing.
  if (!db.memory) db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  db.pragma(`busy_timeout = ${Math.max(0, Math.trunc(busyTimeoutMs))}`);
}
