import bytesLib from 'bytes';
import msLib from 'ms';

/**
 * Parse a duration string to milliseconds.
 * Supports: '30s', '5m', '1h', '2d', '100ms', etc.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') return value;

  const result = msLib(value);
  if (result === undefined || Number.isNaN(result)) {
    throw new Error(`Invalid duration string: "${value}"`);
  }
  return result;
}

/**
 * Format a byte count using binary steps, e.g. 1536 → "1.50 KB".
 * Absent values render as "0 B".
 */
export function formatBytes(value: number | null | undefined): string {
  if (value === null || value === undefined) return '0 B';
  return (
    bytesLib.format(value, { decimalPlaces: 2, fixedDecimals: true, unitSeparator: ' ' }) ?? '0 B'
  );
}

/**
 * Format a percentage reading for display.
 */
export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * Format an uptime in seconds to a human-readable string.
 */
export function formatUptime(seconds: number): string {
  if (seconds < 60) return `${Math.floor(seconds)}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m`;
  if (seconds < 86400) return `${Math.floor(seconds / 3600)}h`;
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  return hours > 0 ? `${days}d ${hours}h` : `${days}d`;
}
