import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { MetricSnapshotInput, NetworkCounters } from '@hostpulse/shared';
import {
  ConfigValidationError,
  InvalidQueryError,
  StorageError,
} from '@hostpulse/shared';

vi.mock('@hostpulse/shared', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@hostpulse/shared')>();
  return {
    ...actual,
    getLogger: () => ({
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
      trace: vi.fn(),
      fatal: vi.fn(),
    }),
  };
});

import { MetricsStore } from '../store/MetricsStore.js';
import { MetricsRepository } from '../db/repositories/MetricsRepository.js';

const NOW = new Date('2024-03-02T00:00:00.000Z');

function hoursAgo(hours: number): string {
  return new Date(NOW.getTime() - hours * 3_600_000).toISOString();
}

function snapshot(timestamp: string, overrides: Partial<MetricSnapshotInput> = {}): MetricSnapshotInput {
  return {
    timestamp,
    cpuPercent: 20,
    memoryPercent: 35.5,
    diskPercent: 61,
    uptime: 86400,
    temperature: 51.2,
    cpuFrequency: 1800,
    voltage: 0.86,
    ...overrides,
  };
}

function counters(bytesSent: number): NetworkCounters {
  return {
    bytesSent,
    bytesRecv: bytesSent * 3,
    packetsSent: 10,
    packetsRecv: 20,
    errin: 0,
    errout: 0,
    dropin: 0,
    dropout: 0,
  };
}

describe('MetricsStore', () => {
  let dir: string;
  let store: MetricsStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'hostpulse-store-'));
    store = new MetricsStore({ path: join(dir, 'metrics.db'), now: () => NOW });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('constructor', () => {
    it('should apply default table names', () => {
      const config = store.getConfig();

      expect(config.metricsTable).toBe('health_metrics');
      expect(config.networkStatsTable).toBe('network_stats');
      expect(config.now()).toBe(NOW);
    });

    it('should reject table names that are not plain identifiers', () => {
      expect(
        () => new MetricsStore({ path: join(dir, 'bad.db'), metricsTable: 'metrics; DROP' }),
      ).toThrow(ConfigValidationError);
    });

    it('should reject identical table names', () => {
      expect(
        () =>
          new MetricsStore({
            path: join(dir, 'same.db'),
            metricsTable: 'samples',
            networkStatsTable: 'samples',
          }),
      ).toThrow('networkStatsTable: metricsTable and networkStatsTable must differ');
    });

    it('should refuse an in-memory database', () => {
      expect(() => new MetricsStore({ path: ':memory:' })).toThrow(
        'Configuration validation failed:\npath: must be a database file, not :memory:',
      );
    });

    it('should wrap open failures in a StorageError', () => {
      expect(() => new MetricsStore({ path: dir })).toThrow(StorageError);
    });

    it('should reopen an existing database without losing rows', () => {
      store.insert(snapshot(hoursAgo(1)));

      const reopened = new MetricsStore({ path: join(dir, 'metrics.db'), now: () => NOW });

      expect(reopened.count()).toBe(1);
    });

    it('should keep custom tables apart from the default ones', () => {
      const path = join(dir, 'metrics.db');
      const custom = new MetricsStore({
        path,
        metricsTable: 'pi_metrics',
        networkStatsTable: 'pi_network',
        now: () => NOW,
      });

      custom.insert(snapshot(hoursAgo(1)), { eth0: counters(5) });

      expect(custom.count()).toBe(1);
      expect(store.count()).toBe(0);
    });
  });

  describe('insert', () => {
    it('should store a snapshot and return its id', () => {
      const result = store.insert(snapshot(hoursAgo(1)), { eth0: counters(100) });

      expect(result).toEqual({ ok: true, id: 1 });
    });

    it('should round-trip every field', () => {
      store.insert(snapshot(hoursAgo(1)), { eth0: counters(100) });

      const [stored] = store.getRecent(1);

      expect(stored).toEqual({
        id: 1,
        timestamp: hoursAgo(1),
        cpuPercent: 20,
        memoryPercent: 35.5,
        diskPercent: 61,
        uptime: 86400,
        temperature: 51.2,
        cpuFrequency: 1800,
        voltage: 0.86,
        networkStats: [
          {
            id: 1,
            metricId: 1,
            interface: 'eth0',
            bytesSent: 100,
            bytesRecv: 300,
            packetsSent: 10,
            packetsRecv: 20,
            errin: 0,
            errout: 0,
            dropin: 0,
            dropout: 0,
          },
        ],
      });
    });

    it('should store omitted optional readings as null', () => {
      store.insert({
        timestamp: hoursAgo(1),
        cpuPercent: 1,
        memoryPercent: 2,
        diskPercent: 3,
        uptime: 4,
      });

      const [stored] = store.getRecent(1);

      expect(stored.temperature).toBeNull();
      expect(stored.cpuFrequency).toBeNull();
      expect(stored.voltage).toBeNull();
      expect(stored.networkStats).toEqual([]);
    });

    it('should not range-check percentages', () => {
      const result = store.insert(snapshot(hoursAgo(1), { cpuPercent: 250, diskPercent: -3 }));

      expect(result.ok).toBe(true);
    });

    it('should reject a non-finite reading without writing', () => {
      const result = store.insert(snapshot(hoursAgo(1), { cpuPercent: Number.NaN }));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.reason).toBe('validation');
        expect(result.error).toMatch(/^Snapshot validation failed: cpuPercent: /);
      }
      expect(store.count()).toBe(0);
    });

    it('should reject a malformed timestamp', () => {
      const result = store.insert(snapshot('yesterday'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.reason).toBe('validation');
        expect(result.error).toContain('timestamp: ');
      }
    });

    it.each([
      ['an offset', '2024-03-01T23:30:00.000+02:00'],
      ['whole seconds', '2024-03-02T00:00:00Z'],
      ['no zone', '2024-03-01T23:30:00.000'],
    ])('should reject a timestamp with %s', (_label, timestamp) => {
      const result = store.insert(snapshot(timestamp));

      expect(result).toEqual({
        ok: false,
        reason: 'validation',
        error:
          'Snapshot validation failed: timestamp: must be a UTC timestamp with milliseconds, e.g. 2024-03-01T10:00:00.000Z',
      });
      expect(store.count()).toBe(0);
    });

    it('should reject negative or fractional counters', () => {
      const result = store.insert(snapshot(hoursAgo(1)), {
        eth0: { ...counters(10), bytesSent: -1 },
        wlan0: { ...counters(10), dropin: 0.5 },
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.reason).toBe('validation');
        expect(result.error).toContain('network.eth0.bytesSent: ');
        expect(result.error).toContain('network.wlan0.dropin: ');
      }
      expect(store.count()).toBe(0);
    });

    it('should roll back the snapshot when an interface row fails', () => {
      vi.spyOn(MetricsRepository.prototype, 'insertNetworkStat').mockImplementation(() => {
        throw new Error('disk full');
      });

      const result = store.insert(snapshot(hoursAgo(1)), {
        eth0: counters(1),
        wlan0: counters(2),
      });

      expect(result).toEqual({ ok: false, reason: 'storage', error: 'disk full' });
      vi.restoreAllMocks();
      expect(store.count()).toBe(0);
      expect(store.getRecent(5)).toEqual([]);
    });

    it('should keep interface rows in insertion order', () => {
      store.insert(snapshot(hoursAgo(1)), {
        wlan0: counters(1),
        eth0: counters(2),
        lo: counters(3),
      });

      const [stored] = store.getRecent(1);

      expect(stored.networkStats.map((s) => s.interface)).toEqual(['wlan0', 'eth0', 'lo']);
    });
  });

  describe('log', () => {
    it('should report success as a boolean', () => {
      expect(store.log(snapshot(hoursAgo(1)))).toBe(true);
      expect(store.log(snapshot('not-a-date'))).toBe(false);
    });
  });

  describe('getRecent', () => {
    beforeEach(() => {
      store.insert(snapshot(hoursAgo(3)));
      store.insert(snapshot(hoursAgo(1)));
      store.insert(snapshot(hoursAgo(2)));
    });

    it('should return newest first', () => {
      expect(store.getRecent(2).map((s) => s.timestamp)).toEqual([hoursAgo(1), hoursAgo(2)]);
    });

    it('should return every row when the limit exceeds the total', () => {
      expect(store.getRecent(10)).toHaveLength(3);
    });

    it('should return an empty array for a zero limit', () => {
      expect(store.getRecent(0)).toEqual([]);
    });

    it('should reject negative and fractional limits', () => {
      expect(() => store.getRecent(-1)).toThrow(InvalidQueryError);
      expect(() => store.getRecent(1.5)).toThrow(InvalidQueryError);
    });
  });

  describe('getByTimespan', () => {
    it('should return snapshots in the window oldest first', () => {
      store.insert(snapshot(hoursAgo(2)));
      store.insert(snapshot(hoursAgo(30)));
      store.insert(snapshot(hoursAgo(5)));

      expect(store.getByTimespan(24).map((s) => s.timestamp)).toEqual([
        hoursAgo(5),
        hoursAgo(2),
      ]);
    });

    it('should exclude the lower bound and include now', () => {
      store.insert(snapshot(hoursAgo(24)));
      store.insert(snapshot(hoursAgo(0)));

      expect(store.getByTimespan(24).map((s) => s.timestamp)).toEqual([NOW.toISOString()]);
    });

    it('should exclude snapshots later than now', () => {
      store.insert(snapshot(hoursAgo(-1)));

      expect(store.getByTimespan(24)).toEqual([]);
    });

    it('should return an empty array for zero hours', () => {
      store.insert(snapshot(hoursAgo(0)));

      expect(store.getByTimespan(0)).toEqual([]);
    });

    it('should accept fractional hours', () => {
      store.insert(snapshot(hoursAgo(0.25)));
      store.insert(snapshot(hoursAgo(1)));

      expect(store.getByTimespan(0.5).map((s) => s.timestamp)).toEqual([hoursAgo(0.25)]);
    });

    it('should reject negative or non-finite hours', () => {
      expect(() => store.getByTimespan(-1)).toThrow(InvalidQueryError);
      expect(() => store.getByTimespan(Number.POSITIVE_INFINITY)).toThrow(InvalidQueryError);
    });

    it('should attach each snapshot its own interfaces', () => {
      store.insert(snapshot(hoursAgo(2)), { eth0: counters(1) });
      store.insert(snapshot(hoursAgo(1)), { wlan0: counters(2), eth0: counters(3) });

      expect(
        store.getByTimespan(24).map((s) => s.networkStats.map((n) => `${n.interface}:${n.bytesSent}`)),
      ).toEqual([['eth0:1'], ['wlan0:2', 'eth0:3']]);
    });
  });

  describe('getByInterfaceAndTimespan', () => {
    beforeEach(() => {
      store.insert(snapshot(hoursAgo(30)), { eth0: counters(1) });
      store.insert(snapshot(hoursAgo(3)), { eth0: counters(2), wlan0: counters(9) });
      store.insert(snapshot(hoursAgo(1)), { eth0: counters(4) });
    });

    it('should return rows for one interface oldest first', () => {
      const rows = store.getByInterfaceAndTimespan('eth0', 24);

      expect(rows.map((r) => [r.timestamp, r.bytesSent])).toEqual([
        [hoursAgo(3), 2],
        [hoursAgo(1), 4],
      ]);
      expect(rows.every((r) => r.interface === 'eth0')).toBe(true);
    });

    it('should not mix in other interfaces', () => {
      const rows = store.getByInterfaceAndTimespan('wlan0', 24);

      expect(rows).toHaveLength(1);
      expect(rows[0].bytesSent).toBe(9);
      expect(rows[0].metricId).toBe(2);
    });

    it('should return an empty array for an unknown interface', () => {
      expect(store.getByInterfaceAndTimespan('usb0', 24)).toEqual([]);
    });
  });

  describe('listInterfaces', () => {
    it('should list interfaces seen in the window', () => {
      store.insert(snapshot(hoursAgo(30)), { usb0: counters(1) });
      store.insert(snapshot(hoursAgo(1)), { wlan0: counters(1), eth0: counters(1) });

      expect(store.listInterfaces(24)).toEqual(['eth0', 'wlan0']);
    });
  });

  describe('windowFor', () => {
    it('should read the clock once per query', () => {
      const now = vi.fn(() => NOW);
      const clocked = new MetricsStore({ path: join(dir, 'metrics.db'), now });

      clocked.getByTimespan(24);

      expect(now).toHaveBeenCalledTimes(1);
    });

    it('should derive both bounds from the same instant', () => {
      expect(store.windowFor(6)).toEqual({
        after: '2024-03-01T18:00:00.000Z',
        until: '2024-03-02T00:00:00.000Z',
      });
    });
  });
});
