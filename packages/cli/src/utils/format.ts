import chalk from 'chalk';
import { format, parseISO } from 'date-fns';
import { formatBytes, formatPercent, formatUptime } from '@hostpulse/shared';

export { formatBytes, formatUptime };

export function colorPercent(value: number | null): string {
  if (value === null) return chalk.gray('-');
  const str = formatPercent(value);
  if (value > 80) return chalk.red(str);
  if (value > 50) return chalk.yellow(str);
  return chalk.green(str);
}

/** Pi SoCs start throttling at 80°C and soft-limit from 60°C. */
export function formatTemperature(celsius: number | null): string {
  if (celsius === null) return chalk.gray('-');
  const str = `${celsius.toFixed(1)}°C`;
  if (celsius >= 80) return chalk.red(str);
  if (celsius >= 60) return chalk.yellow(str);
  return chalk.green(str);
}

export function formatFrequency(mhz: number | null): string {
  if (mhz === null) return chalk.gray('-');
  return mhz >= 1000 ? `${(mhz / 1000).toFixed(2)} GHz` : `${Math.round(mhz)} MHz`;
}

export function formatVoltage(volts: number | null): string {
  if (volts === null) return chalk.gray('-');
  return `${volts.toFixed(4)} V`;
}

/** Error and drop counters; anything non-zero stands out. */
export function formatCounter(value: number): string {
  return value > 0 ? chalk.red(String(value)) : chalk.gray('0');
}

export function formatTimestamp(value: string | Date): string {
  const date = typeof value === 'string' ? parseISO(value) : value;
  return format(date, 'yyyy-MM-dd HH:mm:ss');
}
