export type {
  MetricSnapshot,
  MetricSnapshotInput,
  NetworkCounters,
  NetworkData,
  NetworkStat,
  StoredSnapshot,
  InterfaceStat,
  InsertFailureReason,
  InsertResult,
  MetricField,
  CounterField,
  FieldSeries,
  InterfaceSeries,
  MetricSeries,
} from './metrics.js';

export { METRIC_FIELDS, COUNTER_FIELDS } from './metrics.js';

export type { StoreConfig, CliConfig } from './config.js';
