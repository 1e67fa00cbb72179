import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

export type DatabaseHandle = BetterSqlite3.Database;

export const DB_FILENAME = 'lockin.db';

/**
 * Open (or create) the estimate store. Pass ':memory:' for a throwaway
 * database; otherwise the directory is created if missing.
 */
export function openDatabase(location: string): DatabaseHandle {
  let file = location;
  if (location !== ':memory:') {
    if (!fs.existsSync(location)) fs.mkdirSync(location, { recursive: true });
    file = path.join(location, DB_FILENAME);
  }

  const db: DatabaseHandle = new Database(file);

  // Performance settings
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS settings (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL DEFAULT '{}'
    );

    CREATE TABLE IF NOT EXISTS estimates (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id TEXT NOT NULL,
      amplitude REAL NOT NULL,
      phase_radians REAL NOT NULL,
      timestamp REAL NOT NULL,
      settings TEXT NOT NULL DEFAULT '{}',
      recorded_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_estimates_run ON estimates(run_id);
  `);

  return db;
}
