import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { DEFAULT_PULL_HOST, DEFAULT_PULL_USER } from '@hostpulse/shared';
import { pullDatabase, resolvePullOptions } from '@hostpulse/core';
import { loadCliConfig, parsePort } from '../utils/config.js';

interface PullCommandOptions {
  host?: string;
  user?: string;
  remotePath?: string;
  localPath?: string;
  port?: number;
  identity?: string;
}

export function createPullCommand(): Command {
  return new Command('pull')
    .description('Copy the metrics database from a remote host over scp')
    .option('--host <host>', `Remote host (default: ${DEFAULT_PULL_HOST})`)
    .option('--user <user>', `Remote user (default: ${DEFAULT_PULL_USER})`)
    .option('--remote-path <path>', 'Database path on the remote host')
    .option('--local-path <path>', 'Where to store the copy')
    .option('-p, --port <port>', 'SSH port', parsePort)
    .option('-i, --identity <file>', 'SSH identity file')
    .action(async (options: PullCommandOptions) => {
      try {
        const fromFile = loadCliConfig().pull ?? {};
        const resolved = resolvePullOptions({
          host: options.host ?? fromFile.host,
          user: options.user ?? fromFile.user,
          remotePath: options.remotePath ?? fromFile.remotePath,
          localPath: options.localPath ?? fromFile.localPath,
          port: options.port ?? fromFile.port,
          identity: options.identity ?? fromFile.identity,
        });

        const spinner = ora(`Pulling database from ${resolved.user}@${resolved.host}...`).start();
        const ok = await pullDatabase(resolved);

        if (ok) {
          spinner.succeed(`Database pulled to ${resolved.localPath}`);
        } else {
          spinner.fail(`Failed to pull database from ${resolved.host}`);
          process.exitCode = 1;
        }
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(chalk.red(`Error: ${msg}`));
        process.exitCode = 1;
      }
    });
}
