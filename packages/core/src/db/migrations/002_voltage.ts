import type BetterSqlite3 from 'better-sqlite3';
import type { MetricsTables } from './index.js';

// Databases written before voltage sampling existed lack the column.
export function up(db: BetterSqlite3.Database, tables: MetricsTables): void {
  const columns = db
    .prepare<[], { name: string }>(`SELECT name FROM pragma_table_info('${tables.metrics}')`)
    .all();

  if (!columns.some((column) => column.name === 'voltage')) {
    db.exec(`ALTER TABLE ${tables.metrics} ADD COLUMN voltage REAL`);
  }
}
