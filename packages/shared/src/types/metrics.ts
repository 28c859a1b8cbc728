/**
 * One sampled snapshot of whole-system readings.
 *
 * Optional sensors that could not be read are `null`, never `0`.
 */
export interface MetricSnapshot {
  timestamp: string;
  cpuPercent: number;
  memoryPercent: number;
  diskPercent: number;
  uptime: number;
  temperature: number | null;
  cpuFrequency: number | null;
  voltage: number | null;
}

/** Snapshot as handed to the store; optional sensors may be left out entirely. */
export type MetricSnapshotInput = Omit<MetricSnapshot, 'temperature' | 'cpuFrequency' | 'voltage'> &
  Partial<Pick<MetricSnapshot, 'temperature' | 'cpuFrequency' | 'voltage'>>;

export interface NetworkCounters {
  bytesSent: number;
  bytesRecv: number;
  packetsSent: number;
  packetsRecv: number;
  errin: number;
  errout: number;
  dropin: number;
  dropout: number;
}

/** Interface name → counters observed at sample time. */
export type NetworkData = Record<string, NetworkCounters>;

export interface NetworkStat extends NetworkCounters {
  id: number;
  metricId: number;
  interface: string;
}

export interface StoredSnapshot extends MetricSnapshot {
  id: number;
  networkStats: NetworkStat[];
}

/** A single interface row annotated with its parent snapshot's timestamp. */
export interface InterfaceStat extends NetworkStat {
  timestamp: string;
}

export type InsertFailureReason = 'validation' | 'storage';

export type InsertResult =
  | { ok: true; id: number }
  | { ok: false; reason: InsertFailureReason; error: string };

export const METRIC_FIELDS = [
  'cpuPercent',
  'memoryPercent',
  'diskPercent',
  'temperature',
  'cpuFrequency',
  'voltage',
] as const;

export type MetricField = (typeof METRIC_FIELDS)[number];

export const COUNTER_FIELDS = [
  'bytesSent',
  'bytesRecv',
  'packetsSent',
  'packetsRecv',
  'errin',
  'errout',
  'dropin',
  'dropout',
] as const satisfies readonly (keyof NetworkCounters)[];

export type CounterField = (typeof COUNTER_FIELDS)[number];

export type FieldSeries = Record<MetricField, (number | null)[]>;

export type InterfaceSeries = { timestamps: Date[] } & Record<CounterField, number[]>;

/** Column-oriented view of a time window, ready for charting. */
export interface MetricSeries {
  timestamps: Date[];
  fields: FieldSeries;
  interfaces: Record<string, InterfaceSeries>;
}
