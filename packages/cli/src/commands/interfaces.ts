import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_TIMESPAN_HOURS, HOSTPULSE_DB_FILE } from '@hostpulse/shared';
import { MetricsStore } from '@hostpulse/core';
import { loadCliConfig, parseHours } from '../utils/config.js';
import { renderInterfaceTable } from '../ui/Table.js';

interface InterfacesOptions {
  hours?: number;
  db?: string;
  json?: boolean;
}

export function createInterfacesCommand(): Command {
  return new Command('interfaces')
    .alias('iface')
    .argument('<name>', 'Network interface, e.g. eth0')
    .description('Show the counters of one network interface')
    .option(
      '--hours <hours>',
      `Hours of data to display (default: ${DEFAULT_TIMESPAN_HOURS})`,
      parseHours,
    )
    .option('--db <path>', `SQLite database path (default: ${HOSTPULSE_DB_FILE})`)
    .option('--json', 'Output as JSON')
    .action((name: string, options: InterfacesOptions) => {
      try {
        const config = loadCliConfig();
        const hours = options.hours ?? config.hours ?? DEFAULT_TIMESPAN_HOURS;
        const store = new MetricsStore({ path: options.db ?? config.db ?? HOSTPULSE_DB_FILE });
        const rows = store.getByInterfaceAndTimespan(name, hours);

        if (options.json) {
          console.log(JSON.stringify(rows, null, 2));
          return;
        }

        if (rows.length === 0) {
          const available = store.listInterfaces(hours);
          console.log(
            chalk.yellow(
              `Interface ${name} not found. Available interfaces: ${
                available.length > 0 ? available.join(', ') : 'none'
              }`,
            ),
          );
          return;
        }

        console.log(chalk.bold(`\n  ${name}, last ${hours}h (${rows.length} samples)\n`));
        console.log(renderInterfaceTable(rows));
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(chalk.red(`Error: ${msg}`));
        process.exitCode = 1;
      }
    });
}
