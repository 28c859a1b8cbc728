import Table from 'cli-table3';
import chalk from 'chalk';
import type {
  FieldSeries,
  InterfaceSeries,
  InterfaceStat,
  MetricField,
  MetricSeries,
  StoredSnapshot,
} from '@hostpulse/shared';
import { downsample, hasSeriesData, latestValues, primaryInterface } from '@hostpulse/core';
import {
  colorPercent,
  formatBytes,
  formatCounter,
  formatFrequency,
  formatTemperature,
  formatTimestamp,
  formatUptime,
  formatVoltage,
} from '../utils/format.js';

const TABLE_STYLE = {
  head: [],
  border: ['gray'],
};

function lastOf(values: readonly number[]): number {
  return values.length > 0 ? values[values.length - 1] : 0;
}

export function renderLatestTable(fields: FieldSeries): string {
  const latest = latestValues(fields);
  const present = (field: MetricField): number | null =>
    hasSeriesData(fields[field]) ? latest[field] : null;

  const table = new Table({
    head: [chalk.bold('metric'), chalk.bold('latest')],
    style: TABLE_STYLE,
  });

  table.push(
    ['CPU', colorPercent(present('cpuPercent'))],
    ['Memory', colorPercent(present('memoryPercent'))],
    ['Disk', colorPercent(present('diskPercent'))],
    ['Temperature', formatTemperature(present('temperature'))],
    ['CPU frequency', formatFrequency(present('cpuFrequency'))],
    ['Core voltage', formatVoltage(present('voltage'))],
  );

  return table.toString();
}

/**
 * One row per sampled point, thinned out to at most `maxPoints` rows.
 */
export function renderSeriesTable(series: MetricSeries, maxPoints: number): string {
  const { timestamps, fields } = series;
  const indices = downsample(
    timestamps.map((_, i) => i),
    maxPoints,
  );

  const table = new Table({
    head: [
      chalk.bold('time'),
      chalk.bold('cpu'),
      chalk.bold('memory'),
      chalk.bold('disk'),
      chalk.bold('temp'),
      chalk.bold('freq'),
      chalk.bold('volts'),
    ],
    style: TABLE_STYLE,
  });

  for (const i of indices) {
    table.push([
      formatTimestamp(timestamps[i]),
      colorPercent(fields.cpuPercent[i]),
      colorPercent(fields.memoryPercent[i]),
      colorPercent(fields.diskPercent[i]),
      formatTemperature(fields.temperature[i]),
      formatFrequency(fields.cpuFrequency[i]),
      formatVoltage(fields.voltage[i]),
    ]);
  }

  return table.toString();
}

/**
 * Counters are cumulative since boot, so the last sample of each interface
 * is its running total. The busiest interface is starred.
 */
export function renderInterfaceTotals(interfaces: Record<string, InterfaceSeries>): string {
  const primary = primaryInterface(interfaces);

  const table = new Table({
    head: [
      chalk.bold('interface'),
      chalk.bold('samples'),
      chalk.bold('sent'),
      chalk.bold('received'),
      chalk.bold('err in/out'),
      chalk.bold('drop in/out'),
    ],
    style: TABLE_STYLE,
  });

  for (const [name, series] of Object.entries(interfaces)) {
    table.push([
      name === primary ? chalk.bold(`${name} *`) : name,
      String(series.timestamps.length),
      formatBytes(lastOf(series.bytesSent)),
      formatBytes(lastOf(series.bytesRecv)),
      `${formatCounter(lastOf(series.errin))}/${formatCounter(lastOf(series.errout))}`,
      `${formatCounter(lastOf(series.dropin))}/${formatCounter(lastOf(series.dropout))}`,
    ]);
  }

  return table.toString();
}

export function renderRecentTable(snapshots: StoredSnapshot[]): string {
  const table = new Table({
    head: [
      chalk.bold('id'),
      chalk.bold('time'),
      chalk.bold('cpu'),
      chalk.bold('memory'),
      chalk.bold('disk'),
      chalk.bold('temp'),
      chalk.bold('uptime'),
      chalk.bold('interfaces'),
    ],
    style: TABLE_STYLE,
  });

  for (const snapshot of snapshots) {
    const names = snapshot.networkStats.map((stat) => stat.interface);
    table.push([
      String(snapshot.id),
      formatTimestamp(snapshot.timestamp),
      colorPercent(snapshot.cpuPercent),
      colorPercent(snapshot.memoryPercent),
      colorPercent(snapshot.diskPercent),
      formatTemperature(snapshot.temperature),
      formatUptime(snapshot.uptime),
      names.length > 0 ? names.join(', ') : chalk.gray('-'),
    ]);
  }

  return table.toString();
}

export function renderInterfaceTable(rows: InterfaceStat[]): string {
  const table = new Table({
    head: [
      chalk.bold('time'),
      chalk.bold('sent'),
      chalk.bold('received'),
      chalk.bold('packets out/in'),
      chalk.bold('err in/out'),
      chalk.bold('drop in/out'),
    ],
    style: TABLE_STYLE,
  });

  for (const row of rows) {
    table.push([
      formatTimestamp(row.timestamp),
      formatBytes(row.bytesSent),
      formatBytes(row.bytesRecv),
      `${row.packetsSent}/${row.packetsRecv}`,
      `${formatCounter(row.errin)}/${formatCounter(row.errout)}`,
      `${formatCounter(row.dropin)}/${formatCounter(row.dropout)}`,
    ]);
  }

  return table.toString();
}
