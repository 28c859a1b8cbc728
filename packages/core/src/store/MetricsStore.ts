import type {
  InsertResult,
  InterfaceStat,
  MetricSnapshotInput,
  NetworkData,
  StoreConfig,
  StoreConfigInput,
  StoredSnapshot,
} from '@hostpulse/shared';
import {
  ConfigValidationError,
  InvalidQueryError,
  SnapshotValidationError,
  StorageError,
  formatZodIssues,
  getLogger,
  metricSnapshotSchema,
  networkDataSchema,
  storeConfigSchema,
} from '@hostpulse/shared';
import { withDatabase } from '../db/Database.js';
import { runMigrations } from '../db/migrations/index.js';
import type { MetricsTables } from '../db/migrations/index.js';
import { MetricsRepository } from '../db/repositories/MetricsRepository.js';

const logger = getLogger();

const HOUR_MS = 3_600_000;

export interface TimeWindow {
  /** Exclusive lower bound. */
  after: string;
  /** Inclusive upper bound. */
  until: string;
}

/**
 * Append-only store of metric snapshots and their per-interface counters.
 *
 * Each call opens the database file, does its work and closes it again, so a
 * long-running sampler never holds a handle between ticks.
 */
export class MetricsStore {
  private readonly config: StoreConfig;
  private readonly tables: MetricsTables;

  constructor(options: StoreConfigInput = {}) {
    const { now, ...rest } = options;
    const parsed = storeConfigSchema.safeParse(rest);
    if (!parsed.success) {
      throw new ConfigValidationError(formatZodIssues(parsed.error));
    }

    this.config = { ...parsed.data, now: now ?? (() => new Date()) };
    this.tables = {
      metrics: this.config.metricsTable,
      networkStats: this.config.networkStatsTable,
    };

    this.setup();
  }

  getConfig(): Readonly<StoreConfig> {
    return this.config;
  }

  /** Creates missing tables and columns; existing rows are left untouched. */
  setup(): void {
    try {
      withDatabase(this.config.path, (db) => runMigrations(db, this.tables));
    } catch (err) {
      throw new StorageError(`Failed to prepare database at ${this.config.path}`, err);
    }
    logger.debug({ path: this.config.path }, 'Database setup complete');
  }

  /**
   * Validates and writes one snapshot with its interface counters. Nothing
   * is written unless every row is.
   */
  insert(snapshot: MetricSnapshotInput, networkData: NetworkData = {}): InsertResult {
    const snapshotResult = metricSnapshotSchema.safeParse(snapshot);
    const networkResult = networkDataSchema.safeParse(networkData);

    const errors = [
      ...(snapshotResult.success ? [] : formatZodIssues(snapshotResult.error)),
      ...(networkResult.success
        ? []
        : formatZodIssues(networkResult.error).map((issue) => `network.${issue}`)),
    ];

    if (!snapshotResult.success || !networkResult.success) {
      const error = new SnapshotValidationError(errors);
      logger.warn({ errors }, 'Metrics validation error');
      return { ok: false, reason: 'validation', error: error.message };
    }

    try {
      const id = this.withRepository((repo) =>
        repo.insertSnapshot(snapshotResult.data, networkResult.data),
      );
      logger.debug({ id, interfaces: Object.keys(networkResult.data).length }, 'Logged metrics');
      return { ok: true, id };
    } catch (err) {
      logger.error({ err }, 'Error logging metrics');
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, reason: 'storage', error: message };
    }
  }

  log(snapshot: MetricSnapshotInput, networkData: NetworkData = {}): boolean {
    return this.insert(snapshot, networkData).ok;
  }

  getRecent(limit: number): StoredSnapshot[] {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new InvalidQueryError(`limit must be a non-negative integer, got ${limit}`);
    }
    if (limit === 0) return [];

    return this.read((repo) => repo.findRecent(limit));
  }

  getByTimespan(hours: number): StoredSnapshot[] {
    const window = this.windowFor(hours);
    return this.read((repo) => repo.findInWindow(window.after, window.until));
  }

  getByInterfaceAndTimespan(name: string, hours: number): InterfaceStat[] {
    const window = this.windowFor(hours);
    return this.read((repo) => repo.findInterfaceInWindow(name, window.after, window.until));
  }

  listInterfaces(hours: number): string[] {
    const window = this.windowFor(hours);
    return this.read((repo) => repo.listInterfaces(window.after, window.until));
  }

  count(): number {
    return this.read((repo) => repo.count());
  }

  /**
   * Resolves "the last `hours` hours" against one reading of the clock.
   */
  windowFor(hours: number): TimeWindow {
    if (!Number.isFinite(hours) || hours < 0) {
      throw new InvalidQueryError(`hours must be a non-negative number, got ${hours}`);
    }

    const now = this.config.now();
    return {
      after: new Date(now.getTime() - hours * HOUR_MS).toISOString(),
      until: now.toISOString(),
    };
  }

  private read<T>(fn: (repo: MetricsRepository) => T): T {
    try {
      return this.withRepository(fn);
    } catch (err) {
      logger.error({ err }, 'Error reading metrics');
      throw new StorageError(`Failed to read metrics from ${this.config.path}`, err);
    }
  }

  private withRepository<T>(fn: (repo: MetricsRepository) => T): T {
    return withDatabase(this.config.path, (db) => fn(new MetricsRepository(db, this.tables)));
  }
}
