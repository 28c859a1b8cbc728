import { homedir } from 'node:os';
import { join } from 'node:path';

export const HOSTPULSE_HOME = process.env.HOSTPULSE_HOME || join(homedir(), '.hostpulse');
export const HOSTPULSE_DB_FILE = join(HOSTPULSE_HOME, 'hostpulse.db');

export const HOSTPULSE_CONFIG_FILE = 'hostpulse.config.json';

export const DEFAULT_METRICS_TABLE = 'health_metrics';
export const DEFAULT_NETWORK_STATS_TABLE = 'network_stats';

export const DEFAULT_SAMPLE_INTERVAL = '60s';
export const DEFAULT_TIMESPAN_HOURS = 24;
export const DEFAULT_RECENT_LIMIT = 10;
export const DEFAULT_CHART_POINTS = 20;

export const DEFAULT_PULL_HOST = 'rpi4';
export const DEFAULT_PULL_USER = 'admin';
export const DEFAULT_SSH_PORT = 22;
// Relative to the remote user's home directory.
export const DEFAULT_REMOTE_DB_PATH = '.hostpulse/hostpulse.db';

export const THERMAL_ZONE_FILE = '/sys/class/thermal/thermal_zone0/temp';
export const PROC_MEMINFO_FILE = '/proc/meminfo';
export const PROC_NET_DEV_FILE = '/proc/net/dev';

export const HOSTPULSE_VERSION = '1.0.0';
