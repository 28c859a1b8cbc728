export interface StoreConfig {
  path: string;
  metricsTable: string;
  networkStatsTable: string;
  /** Clock used for time-window queries. */
  now: () => Date;
}

export interface CliConfig {
  db?: string;
  interval?: string;
  hours?: number;
  logLevel?: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  pull?: {
    host?: string;
    user?: string;
    port?: number;
    remotePath?: string;
    localPath?: string;
    identity?: string;
  };
}
