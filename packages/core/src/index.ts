// Database
export { openDatabase, withDatabase } from './db/Database.js';
export { runMigrations } from './db/migrations/index.js';
export type { MetricsTables } from './db/migrations/index.js';
export { MetricsRepository } from './db/repositories/MetricsRepository.js';
export type {
  MetricRow,
  NetworkStatRow,
  InterfaceStatRow,
} from './db/repositories/MetricsRepository.js';

// Store
export { MetricsStore } from './store/MetricsStore.js';
export type { TimeWindow } from './store/MetricsStore.js';

// Series
export {
  reshapeSeries,
  filterInterfaces,
  hasSeriesData,
  primaryInterface,
} from './series/SeriesReshaper.js';
export {
  latestValues,
  evenlySpacedIndices,
  downsample,
  movingAverage,
  smoothSeries,
} from './series/transforms.js';

// Sampling
export {
  SystemSampler,
  parseMeminfo,
  parseNetDev,
  parseThermal,
  parseVoltage,
} from './metrics/SystemSampler.js';
export type { Sample, SystemSamplerOptions } from './metrics/SystemSampler.js';

export { HostMonitor } from './monitor/HostMonitor.js';
export type {
  SampleSource,
  SnapshotSink,
  HostMonitorOptions,
  HostMonitorStats,
} from './monitor/HostMonitor.js';

// Transfer
export { pullDatabase, buildScpArgs, resolvePullOptions } from './transfer/pullDatabase.js';
export type { PullOptions, ResolvedPullOptions } from './transfer/pullDatabase.js';
