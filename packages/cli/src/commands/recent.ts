import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_RECENT_LIMIT, HOSTPULSE_DB_FILE } from '@hostpulse/shared';
import { MetricsStore } from '@hostpulse/core';
import { loadCliConfig, parseCount } from '../utils/config.js';
import { renderRecentTable } from '../ui/Table.js';

interface RecentOptions {
  limit: number;
  db?: string;
  json?: boolean;
}

export function createRecentCommand(): Command {
  return new Command('recent')
    .description('List the newest snapshots')
    .option('-n, --limit <n>', 'Number of snapshots', parseCount, DEFAULT_RECENT_LIMIT)
    .option('--db <path>', `SQLite database path (default: ${HOSTPULSE_DB_FILE})`)
    .option('--json', 'Output as JSON')
    .action((options: RecentOptions) => {
      try {
        const config = loadCliConfig();
        const store = new MetricsStore({ path: options.db ?? config.db ?? HOSTPULSE_DB_FILE });
        const snapshots = store.getRecent(options.limit);

        if (options.json) {
          console.log(JSON.stringify(snapshots, null, 2));
          return;
        }

        if (snapshots.length === 0) {
          console.log(chalk.gray('\n  No snapshots recorded yet. Start one with: hostpulse monitor\n'));
          return;
        }

        console.log(renderRecentTable(snapshots));
        console.log(chalk.gray(`  ${snapshots.length} of ${store.count()} snapshots`));
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(chalk.red(`Error: ${msg}`));
        process.exitCode = 1;
      }
    });
}
