import type BetterSqlite3 from 'better-sqlite3';
import type { MetricsTables } from './index.js';

export function up(db: BetterSqlite3.Database, tables: MetricsTables): void {
  const { metrics, networkStats } = tables;

  db.exec(`
    CREATE TABLE IF NOT EXISTS ${metrics} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp TEXT NOT NULL,
      cpu_percent REAL NOT NULL,
      memory_percent REAL NOT NULL,
      disk_percent REAL NOT NULL,
      temperature REAL,
      cpu_frequency REAL,
      uptime REAL NOT NULL,
      voltage REAL
    );

    CREATE INDEX IF NOT EXISTS idx_${metrics}_timestamp
      ON ${metrics}(timestamp);

    CREATE TABLE IF NOT EXISTS ${networkStats} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      metric_id INTEGER NOT NULL,
      interface TEXT NOT NULL,
      bytes_sent INTEGER NOT NULL,
      bytes_recv INTEGER NOT NULL,
      packets_sent INTEGER NOT NULL,
      packets_recv INTEGER NOT NULL,
      errin INTEGER NOT NULL,
      errout INTEGER NOT NULL,
      dropin INTEGER NOT NULL,
      dropout INTEGER NOT NULL,
      UNIQUE (metric_id, interface),
      FOREIGN KEY (metric_id) REFERENCES ${metrics}(id)
    );

    CREATE INDEX IF NOT EXISTS idx_${networkStats}_interface_metric
      ON ${networkStats}(interface, metric_id);
  `);
}
