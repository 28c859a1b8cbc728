import { execFile } from 'node:child_process';
import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import {
  DEFAULT_PULL_HOST,
  DEFAULT_PULL_USER,
  DEFAULT_REMOTE_DB_PATH,
  DEFAULT_SSH_PORT,
  HOSTPULSE_DB_FILE,
  getLogger,
} from '@hostpulse/shared';

const logger = getLogger();

export interface PullOptions {
  host?: string;
  user?: string;
  remotePath?: string;
  localPath?: string;
  port?: number;
  identity?: string;
}

export interface ResolvedPullOptions {
  host: string;
  user: string;
  remotePath: string;
  localPath: string;
  port: number;
  identity?: string;
}

function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export function resolvePullOptions(options: PullOptions = {}): ResolvedPullOptions {
  return {
    host: options.host ?? DEFAULT_PULL_HOST,
    user: options.user ?? DEFAULT_PULL_USER,
    remotePath: options.remotePath ?? DEFAULT_REMOTE_DB_PATH,
    localPath: resolve(expandHome(options.localPath ?? HOSTPULSE_DB_FILE)),
    port: options.port ?? DEFAULT_SSH_PORT,
    identity: options.identity ? expandHome(options.identity) : undefined,
  };
}

/** Arguments for `scp`; the port flag is only added for non-standard ports. */
export function buildScpArgs(options: ResolvedPullOptions): string[] {
  const args: string[] = [];

  if (options.port !== DEFAULT_SSH_PORT) {
    args.push('-P', String(options.port));
  }
  if (options.identity) {
    args.push('-i', options.identity);
  }

  args.push(`${options.user}@${options.host}:${options.remotePath}`, options.localPath);
  return args;
}

/**
 * Copies the database file from a remote host with `scp`. Resolves `false`
 * when the copy fails; the reason is logged.
 */
export async function pullDatabase(options: PullOptions = {}): Promise<boolean> {
  const resolved = resolvePullOptions(options);

  try {
    mkdirSync(dirname(resolved.localPath), { recursive: true });
  } catch (err) {
    logger.error({ err, localPath: resolved.localPath }, 'Cannot create local directory');
    return false;
  }

  const args = buildScpArgs(resolved);
  logger.info({ host: resolved.host, localPath: resolved.localPath }, 'Pulling database');

  return new Promise((resolvePull) => {
    execFile('scp', args, (err, _stdout, stderr) => {
      if (err) {
        logger.error({ err, stderr: stderr.trim() }, 'Error pulling database');
        resolvePull(false);
        return;
      }
      logger.info({ localPath: resolved.localPath }, 'Database pulled');
      resolvePull(true);
    });
  });
}
