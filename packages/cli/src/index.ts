#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { HOSTPULSE_VERSION } from '@hostpulse/shared';
import { createMonitorCommand } from './commands/monitor.js';
import { createViewCommand } from './commands/view.js';
import { createRecentCommand } from './commands/recent.js';
import { createInterfacesCommand } from './commands/interfaces.js';
import { createPullCommand } from './commands/pull.js';

const program = new Command();

program
  .name('hostpulse')
  .version(HOSTPULSE_VERSION, '-v, --version')
  .description(chalk.bold('hostpulse') + ' records and shows single-board computer health')
  .addCommand(createMonitorCommand())
  .addCommand(createViewCommand(), { isDefault: true })
  .addCommand(createRecentCommand())
  .addCommand(createInterfacesCommand())
  .addCommand(createPullCommand());

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`Error: ${msg}`));
  process.exitCode = 1;
});
