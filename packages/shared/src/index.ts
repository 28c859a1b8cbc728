// Types
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
  StoreConfig,
  CliConfig,
} from './types/index.js';

export { METRIC_FIELDS, COUNTER_FIELDS } from './types/index.js';

// Constants
export {
  HOSTPULSE_HOME,
  HOSTPULSE_DB_FILE,
  HOSTPULSE_CONFIG_FILE,
  HOSTPULSE_VERSION,
  DEFAULT_METRICS_TABLE,
  DEFAULT_NETWORK_STATS_TABLE,
  DEFAULT_SAMPLE_INTERVAL,
  DEFAULT_TIMESPAN_HOURS,
  DEFAULT_RECENT_LIMIT,
  DEFAULT_CHART_POINTS,
  DEFAULT_PULL_HOST,
  DEFAULT_PULL_USER,
  DEFAULT_SSH_PORT,
  DEFAULT_REMOTE_DB_PATH,
  THERMAL_ZONE_FILE,
  PROC_MEMINFO_FILE,
  PROC_NET_DEV_FILE,
} from './constants.js';

// Schemas
export {
  metricSnapshotSchema,
  networkCountersSchema,
  networkDataSchema,
} from './schemas/metric.schema.js';

export type { ValidatedSnapshot, ValidatedNetworkData } from './schemas/metric.schema.js';

export {
  storeConfigSchema,
  cliConfigSchema,
  pullConfigSchema,
  logLevelSchema,
} from './schemas/config.schema.js';

export type { StoreConfigInput, ValidatedCliConfig } from './schemas/config.schema.js';

// Utilities
export {
  parseDuration,
  formatBytes,
  formatPercent,
  formatUptime,
} from './utils/parser.js';

export { createLogger, getLogger, setDefaultLogger, setLogLevel, isLogLevel } from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  HostPulseError,
  ConfigValidationError,
  SnapshotValidationError,
  StorageError,
  InvalidQueryError,
  formatZodIssues,
} from './utils/errors.js';
