import { parseISO } from 'date-fns';
import { COUNTER_FIELDS, METRIC_FIELDS } from '@hostpulse/shared';
import type {
  FieldSeries,
  InterfaceSeries,
  MetricSeries,
  StoredSnapshot,
} from '@hostpulse/shared';

function emptyFieldSeries(): FieldSeries {
  return {
    cpuPercent: [],
    memoryPercent: [],
    diskPercent: [],
    temperature: [],
    cpuFrequency: [],
    voltage: [],
  };
}

function emptyInterfaceSeries(): InterfaceSeries {
  return {
    timestamps: [],
    bytesSent: [],
    bytesRecv: [],
    packetsSent: [],
    packetsRecv: [],
    errin: [],
    errout: [],
    dropin: [],
    dropout: [],
  };
}

/**
 * Turns row-oriented snapshots into one array per field, aligned by index
 * with `timestamps`. Absent readings stay `null`.
 *
 * Interfaces get their own timestamp arrays because an interface is only
 * present in the snapshots that observed it.
 */
export function reshapeSeries(snapshots: readonly StoredSnapshot[]): MetricSeries {
  const timestamps: Date[] = [];
  const fields = emptyFieldSeries();
  const interfaces: Record<string, InterfaceSeries> = {};

  for (const snapshot of snapshots) {
    const timestamp = parseISO(snapshot.timestamp);
    timestamps.push(timestamp);

    for (const field of METRIC_FIELDS) {
      fields[field].push(snapshot[field]);
    }

    for (const stat of snapshot.networkStats) {
      let series = interfaces[stat.interface];
      if (!series) {
        series = emptyInterfaceSeries();
        interfaces[stat.interface] = series;
      }

      series.timestamps.push(timestamp);
      for (const counter of COUNTER_FIELDS) {
        series[counter].push(stat[counter]);
      }
    }
  }

  return { timestamps, fields, interfaces };
}

/**
 * Narrows the interface map to a single entry. An empty name keeps every
 * interface; an unknown one yields `{}`.
 */
export function filterInterfaces(
  interfaces: Readonly<Record<string, InterfaceSeries>>,
  name: string,
): Record<string, InterfaceSeries> {
  if (!name) return { ...interfaces };

  const series = interfaces[name];
  return series ? { [name]: series } : {};
}

export function hasSeriesData(values: readonly (number | null)[]): boolean {
  return values.some((v) => v !== null);
}

/** Interface with the most traffic in the window, or `null` when there is none. */
export function primaryInterface(
  interfaces: Readonly<Record<string, InterfaceSeries>>,
): string | null {
  let best: string | null = null;
  let bestTotal = -1;

  for (const [name, series] of Object.entries(interfaces)) {
    const total =
      series.bytesSent.reduce((a, b) => a + b, 0) + series.bytesRecv.reduce((a, b) => a + b, 0);
    if (total > bestTotal) {
      best = name;
      bestTotal = total;
    }
  }

  return best;
}
