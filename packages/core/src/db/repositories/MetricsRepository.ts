import type BetterSqlite3 from 'better-sqlite3';
import type {
  InterfaceStat,
  MetricSnapshot,
  NetworkCounters,
  NetworkData,
  NetworkStat,
  StoredSnapshot,
} from '@hostpulse/shared';
import type { MetricsTables } from '../migrations/index.js';

export interface MetricRow {
  id: number;
  timestamp: string;
  cpu_percent: number;
  memory_percent: number;
  disk_percent: number;
  temperature: number | null;
  cpu_frequency: number | null;
  uptime: number;
  voltage: number | null;
}

export interface NetworkStatRow {
  id: number;
  metric_id: number;
  interface: string;
  bytes_sent: number;
  bytes_recv: number;
  packets_sent: number;
  packets_recv: number;
  errin: number;
  errout: number;
  dropin: number;
  dropout: number;
}

export interface InterfaceStatRow extends NetworkStatRow {
  timestamp: string;
}

type MetricInsertParams = Omit<MetricRow, 'id'>;
type NetworkStatInsertParams = Omit<NetworkStatRow, 'id'>;

export const METRIC_COLUMNS = [
  'timestamp',
  'cpu_percent',
  'memory_percent',
  'disk_percent',
  'temperature',
  'cpu_frequency',
  'uptime',
  'voltage',
] as const satisfies readonly (keyof MetricInsertParams)[];

export const NETWORK_STAT_COLUMNS = [
  'metric_id',
  'interface',
  'bytes_sent',
  'bytes_recv',
  'packets_sent',
  'packets_recv',
  'errin',
  'errout',
  'dropin',
  'dropout',
] as const satisfies readonly (keyof NetworkStatInsertParams)[];

function insertSql(table: string, columns: readonly string[]): string {
  return `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${columns
    .map((c) => `@${c}`)
    .join(', ')})`;
}

export function toMetricRowParams(snapshot: MetricSnapshot): MetricInsertParams {
  return {
    timestamp: snapshot.timestamp,
    cpu_percent: snapshot.cpuPercent,
    memory_percent: snapshot.memoryPercent,
    disk_percent: snapshot.diskPercent,
    temperature: snapshot.temperature,
    cpu_frequency: snapshot.cpuFrequency,
    uptime: snapshot.uptime,
    voltage: snapshot.voltage,
  };
}

export function toNetworkStat(row: NetworkStatRow): NetworkStat {
  return {
    id: row.id,
    metricId: row.metric_id,
    interface: row.interface,
    bytesSent: row.bytes_sent,
    bytesRecv: row.bytes_recv,
    packetsSent: row.packets_sent,
    packetsRecv: row.packets_recv,
    errin: row.errin,
    errout: row.errout,
    dropin: row.dropin,
    dropout: row.dropout,
  };
}

export function toStoredSnapshot(row: MetricRow, networkStats: NetworkStat[]): StoredSnapshot {
  return {
    id: row.id,
    timestamp: row.timestamp,
    cpuPercent: row.cpu_percent,
    memoryPercent: row.memory_percent,
    diskPercent: row.disk_percent,
    temperature: row.temperature,
    cpuFrequency: row.cpu_frequency,
    uptime: row.uptime,
    voltage: row.voltage,
    networkStats,
  };
}

export class MetricsRepository {
  private db: BetterSqlite3.Database;
  private tables: MetricsTables;
  private insertMetricStmt: BetterSqlite3.Statement<[MetricInsertParams], unknown>;
  private insertNetworkStmt: BetterSqlite3.Statement<[NetworkStatInsertParams], unknown>;

  constructor(db: BetterSqlite3.Database, tables: MetricsTables) {
    this.db = db;
    this.tables = tables;
    this.insertMetricStmt = db.prepare<[MetricInsertParams], unknown>(
      insertSql(tables.metrics, METRIC_COLUMNS),
    );
    this.insertNetworkStmt = db.prepare<[NetworkStatInsertParams], unknown>(
      insertSql(tables.networkStats, NETWORK_STAT_COLUMNS),
    );
  }

  /**
   * Writes the snapshot and one row per interface in a single transaction.
   * Interface rows follow the key order of `networkData`.
   */
  insertSnapshot(snapshot: MetricSnapshot, networkData: NetworkData = {}): number {
    const write = this.db.transaction((): number => {
      const info = this.insertMetricStmt.run(toMetricRowParams(snapshot));
      const metricId = Number(info.lastInsertRowid);

      for (const [name, counters] of Object.entries(networkData)) {
        this.insertNetworkStat(metricId, name, counters);
      }

      return metricId;
    });

    return write();
  }

  insertNetworkStat(metricId: number, name: string, counters: NetworkCounters): void {
    this.insertNetworkStmt.run({
      metric_id: metricId,
      interface: name,
      bytes_sent: counters.bytesSent,
      bytes_recv: counters.bytesRecv,
      packets_sent: counters.packetsSent,
      packets_recv: counters.packetsRecv,
      errin: counters.errin,
      errout: counters.errout,
      dropin: counters.dropin,
      dropout: counters.dropout,
    });
  }

  /** Newest first. */
  findRecent(limit: number): StoredSnapshot[] {
    const { metrics, networkStats } = this.tables;
    const newest = `SELECT id FROM ${metrics} ORDER BY timestamp DESC, id DESC LIMIT ?`;

    const read = this.db.transaction((): StoredSnapshot[] => {
      const rows = this.db
        .prepare<[number], MetricRow>(
          `SELECT * FROM ${metrics} ORDER BY timestamp DESC, id DESC LIMIT ?`,
        )
        .all(limit);
      const stats = this.db
        .prepare<[number], NetworkStatRow>(
          `SELECT * FROM ${networkStats} WHERE metric_id IN (${newest}) ORDER BY id`,
        )
        .all(limit);
      return this.attachNetworkStats(rows, stats);
    });

    return read();
  }

  /** Oldest first; `after` is exclusive and `until` inclusive. */
  findInWindow(after: string, until: string): StoredSnapshot[] {
    const { metrics, networkStats } = this.tables;

    const read = this.db.transaction((): StoredSnapshot[] => {
      const rows = this.db
        .prepare<[string, string], MetricRow>(
          `SELECT * FROM ${metrics}
           WHERE timestamp > ? AND timestamp <= ?
           ORDER BY timestamp, id`,
        )
        .all(after, until);
      const stats = this.db
        .prepare<[string, string], NetworkStatRow>(
          `SELECT ns.* FROM ${networkStats} ns
           JOIN ${metrics} m ON m.id = ns.metric_id
           WHERE m.timestamp > ? AND m.timestamp <= ?
           ORDER BY ns.id`,
        )
        .all(after, until);
      return this.attachNetworkStats(rows, stats);
    });

    return read();
  }

  findInterfaceInWindow(name: string, after: string, until: string): InterfaceStat[] {
    const { metrics, networkStats } = this.tables;

    return this.db
      .prepare<[string, string, string], InterfaceStatRow>(
        `SELECT ns.*, m.timestamp AS timestamp FROM ${networkStats} ns
         JOIN ${metrics} m ON m.id = ns.metric_id
         WHERE ns.interface = ? AND m.timestamp > ? AND m.timestamp <= ?
         ORDER BY m.timestamp, ns.id`,
      )
      .all(name, after, until)
      .map((row) => ({ ...toNetworkStat(row), timestamp: row.timestamp }));
  }

  listInterfaces(after: string, until: string): string[] {
    const { metrics, networkStats } = this.tables;

    return this.db
      .prepare<[string, string], { interface: string }>(
        `SELECT DISTINCT ns.interface AS interface FROM ${networkStats} ns
         JOIN ${metrics} m ON m.id = ns.metric_id
         WHERE m.timestamp > ? AND m.timestamp <= ?
         ORDER BY ns.interface`,
      )
      .all(after, until)
      .map((row) => row.interface);
  }

  count(): number {
    const row = this.db
      .prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${this.tables.metrics}`)
      .get();
    return row?.total ?? 0;
  }

  private attachNetworkStats(rows: MetricRow[], statRows: NetworkStatRow[]): StoredSnapshot[] {
    const byMetric = new Map<number, NetworkStat[]>();
    for (const statRow of statRows) {
      const list = byMetric.get(statRow.metric_id);
      if (list) {
        list.push(toNetworkStat(statRow));
      } else {
        byMetric.set(statRow.metric_id, [toNetworkStat(statRow)]);
      }
    }

    return rows.map((row) => toStoredSnapshot(row, byMetric.get(row.id) ?? []));
  }
}
