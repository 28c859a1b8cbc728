import { mean } from 'simple-statistics';
import type { FieldSeries, MetricField, MetricSeries } from '@hostpulse/shared';
import { hasSeriesData } from './SeriesReshaper.js';

function lastPresent(values: readonly (number | null)[]): number {
  for (let i = values.length - 1; i >= 0; i--) {
    const value = values[i];
    if (value !== null) return value;
  }
  return 0;
}

/**
 * Last present value of every field, or `0` when a field has none.
 */
export function latestValues(fields: FieldSeries): Record<MetricField, number> {
  return {
    cpuPercent: lastPresent(fields.cpuPercent),
    memoryPercent: lastPresent(fields.memoryPercent),
    diskPercent: lastPresent(fields.diskPercent),
    temperature: lastPresent(fields.temperature),
    cpuFrequency: lastPresent(fields.cpuFrequency),
    voltage: lastPresent(fields.voltage),
  };
}

/**
 * `num` indices spread evenly over `[start, end]`, truncated to integers.
 */
export function evenlySpacedIndices(start: number, end: number, num: number): number[] {
  if (num <= 1) return [start];

  const indices: number[] = [];
  const step = (end - start) / (num - 1);

  for (let i = 0; i < num; i++) {
    indices.push(Math.min(Math.floor(start + i * step), end));
  }

  return indices;
}

/**
 * Reduces a series to at most `maxPoints` entries, keeping the first and
 * last element.
 */
export function downsample<T>(values: readonly T[], maxPoints: number): T[] {
  if (maxPoints < 1) {
    throw new RangeError(`maxPoints must be at least 1, got ${maxPoints}`);
  }
  if (values.length <= maxPoints) return [...values];

  return evenlySpacedIndices(0, values.length - 1, maxPoints).map((i) => values[i]);
}

/**
 * Simple moving average. Each of the `n - window + 1` windows averages its
 * present values; a window with none yields `0`.
 */
export function movingAverage(values: readonly (number | null)[], window: number): number[] {
  if (!Number.isInteger(window) || window < 1) {
    throw new RangeError(`window must be a positive integer, got ${window}`);
  }

  const averages: number[] = [];
  for (let i = 0; i + window <= values.length; i++) {
    const present = values.slice(i, i + window).filter((v): v is number => v !== null);
    averages.push(present.length > 0 ? mean(present) : 0);
  }

  return averages;
}

/**
 * Replaces every field with its moving average over `window` samples and
 * drops the leading timestamps that have no full window behind them. Fields
 * without any reading stay all-null.
 */
export function smoothSeries(series: MetricSeries, window: number): MetricSeries {
  if (window <= 1) return series;

  const smooth = (values: (number | null)[]): (number | null)[] =>
    hasSeriesData(values) ? movingAverage(values, window) : values.slice(window - 1);

  const { fields } = series;
  return {
    timestamps: series.timestamps.slice(window - 1),
    fields: {
      cpuPercent: smooth(fields.cpuPercent),
      memoryPercent: smooth(fields.memoryPercent),
      diskPercent: smooth(fields.diskPercent),
      temperature: smooth(fields.temperature),
      cpuFrequency: smooth(fields.cpuFrequency),
      voltage: smooth(fields.voltage),
    },
    interfaces: series.interfaces,
  };
}
