import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_SAMPLE_INTERVAL, HOSTPULSE_DB_FILE, getLogger, setLogLevel } from '@hostpulse/shared';
import type { LogLevel } from '@hostpulse/shared';
import { HostMonitor, MetricsStore, SystemSampler } from '@hostpulse/core';
import { loadCliConfig, parseLogLevel } from '../utils/config.js';

interface MonitorOptions {
  interval?: string;
  db?: string;
  logLevel?: LogLevel;
}

export function createMonitorCommand(): Command {
  return new Command('monitor')
    .description('Sample host health on an interval and record it')
    .option('--interval <duration>', `Time between samples (default: ${DEFAULT_SAMPLE_INTERVAL})`)
    .option('--db <path>', `SQLite database path (default: ${HOSTPULSE_DB_FILE})`)
    .option('--log-level <level>', 'trace, debug, info, warn, error or fatal', parseLogLevel)
    .action(async (options: MonitorOptions) => {
      try {
        const config = loadCliConfig();
        const level = options.logLevel ?? config.logLevel;
        if (level !== undefined) {
          setLogLevel(level);
        }

        const path = options.db ?? config.db ?? HOSTPULSE_DB_FILE;
        const store = new MetricsStore({ path });
        const monitor = new HostMonitor(new SystemSampler(), store, {
          interval: options.interval ?? config.interval ?? DEFAULT_SAMPLE_INTERVAL,
        });

        console.log(chalk.bold(`\n  Recording host health to ${path}`));
        console.log(chalk.gray('  Press Ctrl+C to stop\n'));
        monitor.start();

        await new Promise<void>((resolve) => {
          const shutdown = (signal: NodeJS.Signals): void => {
            process.off('SIGINT', shutdown);
            process.off('SIGTERM', shutdown);
            monitor.stop();
            getLogger().info({ signal }, 'Received shutdown signal');
            resolve();
          };
          process.on('SIGINT', shutdown);
          process.on('SIGTERM', shutdown);
        });

        const { samples, failures } = monitor.getStats();
        console.log(chalk.gray(`\n  Stopped after ${samples} samples (${failures} failed)\n`));
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(chalk.red(`Error: ${msg}`));
        process.exitCode = 1;
      }
    });
}
