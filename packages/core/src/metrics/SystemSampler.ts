import { cpus, freemem, totalmem, uptime } from 'node:os';
import { readFile, statfs } from 'node:fs/promises';
import { execFile } from 'node:child_process';
import { setTimeout as delay } from 'node:timers/promises';
import type { MetricSnapshot, NetworkData } from '@hostpulse/shared';
import {
  PROC_MEMINFO_FILE,
  PROC_NET_DEV_FILE,
  THERMAL_ZONE_FILE,
  getLogger,
} from '@hostpulse/shared';

const logger = getLogger();

export interface Sample {
  snapshot: MetricSnapshot;
  network: NetworkData;
}

export interface SystemSamplerOptions {
  /** How long CPU usage is measured over, in ms. */
  cpuSampleMs?: number;
  /** Filesystem whose usage is reported as disk percent. */
  mountPoint?: string;
}

interface CpuTimes {
  idle: number;
  total: number;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Memory in use as a percentage, based on `MemAvailable` like `free` does.
 */
export function parseMeminfo(text: string): number | null {
  const read = (key: string): number | null => {
    const match = new RegExp(`^${key}:\\s+(\\d+)`, 'm').exec(text);
    return match ? Number(match[1]) : null;
  };

  const total = read('MemTotal');
  const available = read('MemAvailable');
  if (total === null || available === null || total === 0) return null;

  return round1(((total - available) / total) * 100);
}

/**
 * Per-interface counters from `/proc/net/dev`.
 */
export function parseNetDev(text: string): NetworkData {
  const network: NetworkData = {};

  for (const line of text.split('\n')) {
    const separator = line.indexOf(':');
    if (separator === -1) continue;

    const name = line.slice(0, separator).trim();
    const values = line
      .slice(separator + 1)
      .trim()
      .split(/\s+/)
      .map(Number);
    if (!name || values.length < 12 || values.some((v) => !Number.isInteger(v) || v < 0)) {
      continue;
    }

    network[name] = {
      bytesRecv: values[0],
      packetsRecv: values[1],
      errin: values[2],
      dropin: values[3],
      bytesSent: values[8],
      packetsSent: values[9],
      errout: values[10],
      dropout: values[11],
    };
  }

  return network;
}

/** Thermal zone readings are millidegrees Celsius. */
export function parseThermal(text: string): number | null {
  const millidegrees = Number.parseFloat(text.trim());
  return Number.isFinite(millidegrees) ? millidegrees / 1000 : null;
}

/** Parses `vcgencmd measure_volts` output such as `volt=1.2000V`. */
export function parseVoltage(output: string): number | null {
  const match = /volt=([\d.]+)V/.exec(output);
  if (!match) return null;
  const volts = Number.parseFloat(match[1]);
  return Number.isFinite(volts) ? volts : null;
}

function runCommand(command: string, args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(command, args, { timeout: 2000 }, (err, stdout) => {
      if (err) {
        reject(err);
      } else {
        resolve(stdout);
      }
    });
  });
}

function readCpuTimes(): CpuTimes[] {
  return cpus().map((cpu) => ({
    idle: cpu.times.idle,
    total: Object.values(cpu.times).reduce((a, b) => a + b, 0),
  }));
}

/**
 * Reads one snapshot of host health. Sensors that are missing on this host
 * come back as `null` (scalar readings) or `{}` (network).
 */
export class SystemSampler {
  private cpuSampleMs: number;
  private mountPoint: string;

  constructor(options: SystemSamplerOptions = {}) {
    this.cpuSampleMs = options.cpuSampleMs ?? 1000;
    this.mountPoint = options.mountPoint ?? '/';
  }

  async sample(): Promise<Sample> {
    const cpuPercent = await this.readCpuPercent();
    const [memoryPercent, diskPercent, temperature, voltage, network] = await Promise.all([
      this.readMemoryPercent(),
      this.readDiskPercent(),
      this.readTemperature(),
      this.readVoltage(),
      this.readNetwork(),
    ]);

    return {
      snapshot: {
        timestamp: new Date().toISOString(),
        cpuPercent,
        memoryPercent,
        diskPercent,
        temperature,
        cpuFrequency: this.readCpuFrequency(),
        uptime: uptime(),
        voltage,
      },
      network,
    };
  }

  private async readCpuPercent(): Promise<number> {
    const before = readCpuTimes();
    await delay(this.cpuSampleMs);
    const after = readCpuTimes();

    let busy = 0;
    let total = 0;
    for (let i = 0; i < after.length; i++) {
      const last = before[i];
      if (!last) continue;
      const totalDiff = after[i].total - last.total;
      total += totalDiff;
      busy += totalDiff - (after[i].idle - last.idle);
    }

    return total > 0 ? round1((busy / total) * 100) : 0;
  }

  private async readMemoryPercent(): Promise<number> {
    try {
      const percent = parseMeminfo(await readFile(PROC_MEMINFO_FILE, 'utf8'));
      if (percent !== null) return percent;
    } catch (err) {
      logger.debug({ err }, 'meminfo unavailable, using os.freemem');
    }

    const total = totalmem();
    return total > 0 ? round1(((total - freemem()) / total) * 100) : 0;
  }

  private async readDiskPercent(): Promise<number> {
    try {
      const stats = await statfs(this.mountPoint);
      const used = (stats.blocks - stats.bfree) * stats.bsize;
      const available = stats.bavail * stats.bsize;
      return used + available > 0 ? round1((used / (used + available)) * 100) : 0;
    } catch (err) {
      logger.debug({ err, mountPoint: this.mountPoint }, 'Disk usage unavailable');
      return 0;
    }
  }

  private async readTemperature(): Promise<number | null> {
    try {
      return parseThermal(await readFile(THERMAL_ZONE_FILE, 'utf8'));
    } catch (err) {
      logger.debug({ err }, 'CPU temperature unavailable');
      return null;
    }
  }

  private readCpuFrequency(): number | null {
    const speed = cpus()[0]?.speed ?? 0;
    return speed > 0 ? speed : null;
  }

  private async readVoltage(): Promise<number | null> {
    try {
      return parseVoltage(await runCommand('vcgencmd', ['measure_volts']));
    } catch (err) {
      logger.debug({ err }, 'Core voltage unavailable');
      return null;
    }
  }

  private async readNetwork(): Promise<NetworkData> {
    try {
      return parseNetDev(await readFile(PROC_NET_DEV_FILE, 'utf8'));
    } catch (err) {
      logger.debug({ err }, 'Network counters unavailable');
      return {};
    }
  }
}
