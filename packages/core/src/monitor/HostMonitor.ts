import type { InsertResult, MetricSnapshotInput, NetworkData } from '@hostpulse/shared';
import { DEFAULT_SAMPLE_INTERVAL, getLogger, parseDuration } from '@hostpulse/shared';
import type { Sample } from '../metrics/SystemSampler.js';

const logger = getLogger();

export interface SampleSource {
  sample(): Promise<Sample>;
}

export interface SnapshotSink {
  insert(snapshot: MetricSnapshotInput, networkData?: NetworkData): InsertResult;
}

export interface HostMonitorOptions {
  /** Milliseconds or a duration string such as '60s'. */
  interval?: number | string;
}

export interface HostMonitorStats {
  samples: number;
  failures: number;
  lastSampleAt: string | null;
}

/**
 * Samples the host on a fixed interval and appends each sample to the store.
 * A failed sample or insert is logged and the loop carries on.
 */
export class HostMonitor {
  private source: SampleSource;
  private sink: SnapshotSink;
  private interval: number;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private stats: HostMonitorStats = { samples: 0, failures: 0, lastSampleAt: null };

  constructor(source: SampleSource, sink: SnapshotSink, options: HostMonitorOptions = {}) {
    this.source = source;
    this.sink = sink;
    this.interval = parseDuration(options.interval ?? DEFAULT_SAMPLE_INTERVAL);
    if (!Number.isFinite(this.interval) || this.interval <= 0) {
      throw new RangeError(`Sampling interval must be positive, got ${this.interval}ms`);
    }
  }

  start(): void {
    if (this.timer) return;

    this.schedule();
    this.timer = setInterval(() => this.schedule(), this.interval);
    logger.info({ interval: this.interval }, 'Starting health monitoring');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info(this.getStats(), 'Monitoring stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getStats(): HostMonitorStats {
    return { ...this.stats };
  }

  /**
   * Takes and stores one sample. Resolves `false` on any failure; never rejects.
   */
  async tick(): Promise<boolean> {
    if (this.running) {
      logger.warn('Previous sample still in progress, skipping tick');
      return false;
    }

    this.running = true;
    try {
      const { snapshot, network } = await this.source.sample();
      const result = this.sink.insert(snapshot, network);

      if (!result.ok) {
        this.stats.failures++;
        logger.error({ reason: result.reason, error: result.error }, 'Failed to log metrics');
        return false;
      }

      this.stats.samples++;
      this.stats.lastSampleAt = snapshot.timestamp;
      logger.debug({ id: result.id, snapshot }, 'Logged metrics');
      return true;
    } catch (err) {
      this.stats.failures++;
      logger.error({ err }, 'Error collecting metrics');
      return false;
    } finally {
      this.running = false;
    }
  }

  private schedule(): void {
    this.tick().catch((err: unknown) => {
      logger.error({ err }, 'Unexpected monitoring error');
    });
  }
}
