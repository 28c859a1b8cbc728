import BetterSqlite3 from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { HOSTPULSE_DB_FILE } from '@hostpulse/shared';

export function openDatabase(dbPath: string = HOSTPULSE_DB_FILE): BetterSqlite3.Database {
  mkdirSync(dirname(dbPath), { recursive: true });

  const db = new BetterSqlite3(dbPath);

  // WAL lets readers run alongside the sampler's writes
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');

  return db;
}

/**
 * Opens the database, runs `fn`, and closes the handle again whatever the
 * outcome. No connection outlives a single store operation.
 */
export function withDatabase<T>(dbPath: string, fn: (db: BetterSqlite3.Database) => T): T {
  const db = openDatabase(dbPath);
  try {
    return fn(db);
  } finally {
    db.close();
  }
}
