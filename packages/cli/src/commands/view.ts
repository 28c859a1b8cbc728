import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CHART_POINTS, DEFAULT_TIMESPAN_HOURS, HOSTPULSE_DB_FILE } from '@hostpulse/shared';
import { MetricsStore, filterInterfaces, reshapeSeries, smoothSeries } from '@hostpulse/core';
import { loadCliConfig, parseHours, parsePositiveCount } from '../utils/config.js';
import { renderInterfaceTotals, renderLatestTable, renderSeriesTable } from '../ui/Table.js';

interface ViewOptions {
  hours?: number;
  db?: string;
  interface?: string;
  points: number;
  smooth: number;
  json?: boolean;
}

export function createViewCommand(): Command {
  return new Command('view')
    .description('Show host health collected over the last hours')
    .option(
      '--hours <hours>',
      `Hours of data to display (default: ${DEFAULT_TIMESPAN_HOURS})`,
      parseHours,
    )
    .option('--db <path>', `SQLite database path (default: ${HOSTPULSE_DB_FILE})`)
    .option('--interface <name>', 'Only show this network interface')
    .option('--points <n>', 'Maximum rows in the trend table', parsePositiveCount, DEFAULT_CHART_POINTS)
    .option('--smooth <n>', 'Moving-average window for the trend table', parsePositiveCount, 1)
    .option('--json', 'Output as JSON')
    .action((options: ViewOptions) => {
      try {
        const config = loadCliConfig();
        const hours = options.hours ?? config.hours ?? DEFAULT_TIMESPAN_HOURS;
        const store = new MetricsStore({ path: options.db ?? config.db ?? HOSTPULSE_DB_FILE });

        const snapshots = store.getByTimespan(hours);
        if (snapshots.length === 0) {
          console.log(chalk.gray(`No data found for the last ${hours} hours`));
          return;
        }

        const series = reshapeSeries(snapshots);
        let interfaces = series.interfaces;
        let missingInterface = false;

        if (options.interface) {
          interfaces = filterInterfaces(series.interfaces, options.interface);
          missingInterface = Object.keys(interfaces).length === 0;
        }

        if (options.json) {
          console.log(JSON.stringify({ hours, samples: snapshots.length, ...series, interfaces }, null, 2));
          return;
        }

        console.log(chalk.bold(`\n  Host health, last ${hours}h (${snapshots.length} samples)\n`));
        console.log(renderLatestTable(series.fields));

        console.log(chalk.bold('\n  Trend\n'));
        console.log(renderSeriesTable(smoothSeries(series, options.smooth), options.points));

        if (missingInterface) {
          const available = Object.keys(series.interfaces);
          console.log(
            chalk.yellow(
              `\n  Interface ${options.interface} not found. Available interfaces: ${
                available.length > 0 ? available.join(', ') : 'none'
              }`,
            ),
          );
        } else if (Object.keys(interfaces).length > 0) {
          console.log(chalk.bold('\n  Network\n'));
          console.log(renderInterfaceTotals(interfaces));
        }
        console.log('');
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(chalk.red(`Error: ${msg}`));
        process.exitCode = 1;
      }
    });
}
