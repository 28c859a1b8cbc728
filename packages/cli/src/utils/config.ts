import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { InvalidArgumentError } from 'commander';
import {
  ConfigValidationError,
  HOSTPULSE_CONFIG_FILE,
  cliConfigSchema,
  formatZodIssues,
  isLogLevel,
} from '@hostpulse/shared';
import type { LogLevel, ValidatedCliConfig } from '@hostpulse/shared';

/**
 * Reads `hostpulse.config.json` from `cwd`. A missing file is an empty
 * config; a malformed one throws `ConfigValidationError`.
 */
export function loadCliConfig(cwd: string = process.cwd()): ValidatedCliConfig {
  const file = join(cwd, HOSTPULSE_CONFIG_FILE);
  if (!existsSync(file)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError([`${HOSTPULSE_CONFIG_FILE}: ${msg}`]);
  }

  const parsed = cliConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigValidationError(formatZodIssues(parsed.error));
  }
  return parsed.data;
}

// Option parsers for commander; they receive the raw flag text.

export function parseHours(value: string): number {
  const hours = Number(value);
  if (value.trim() === '' || !Number.isFinite(hours) || hours < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of hours.');
  }
  return hours;
}

export function parseCount(value: string): number {
  const count = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(count)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return count;
}

export function parsePositiveCount(value: string): number {
  const count = parseCount(value);
  if (count < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return count;
}

export function parsePort(value: string): number {
  const port = parseCount(value);
  if (port < 1 || port > 65535) {
    throw new InvalidArgumentError('Expected a port between 1 and 65535.');
  }
  return port;
}

export function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('Expected one of trace, debug, info, warn, error, fatal.');
  }
  return value;
}
