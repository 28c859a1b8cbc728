import type BetterSqlite3 from 'better-sqlite3';
import { up as migration001 } from './001_initial.js';
import { up as migration002 } from './002_voltage.js';

export interface MetricsTables {
  metrics: string;
  networkStats: string;
}

interface Migration {
  name: string;
  up: (db: BetterSqlite3.Database, tables: MetricsTables) => void;
}

// Steps are additive and idempotent; all of them run on every startup.
const migrations: Migration[] = [
  { name: '001_initial', up: migration001 },
  { name: '002_voltage', up: migration002 },
];

export function runMigrations(db: BetterSqlite3.Database, tables: MetricsTables): string[] {
  const runAll = db.transaction(() => {
    for (const migration of migrations) {
      migration.up(db, tables);
    }
  });

  runAll();
  return migrations.map((m) => m.name);
}
