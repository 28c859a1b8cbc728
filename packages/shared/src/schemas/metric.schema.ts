import { z } from 'zod';

const reading = z.number().finite();
const optionalReading = reading.nullable().optional();
const counter = z.number().int().nonnegative();

// Window queries compare timestamps as text, so only the `toISOString()` form is stored.
const utcTimestamp = z.string().datetime({
  precision: 3,
  message: 'must be a UTC timestamp with milliseconds, e.g. 2024-03-01T10:00:00.000Z',
});

export const metricSnapshotSchema = z.object({
  timestamp: utcTimestamp,
  cpuPercent: reading,
  memoryPercent: reading,
  diskPercent: reading,
  uptime: reading,
  temperature: optionalReading.transform((v) => v ?? null),
  cpuFrequency: optionalReading.transform((v) => v ?? null),
  voltage: optionalReading.transform((v) => v ?? null),
});

export const networkCountersSchema = z.object({
  bytesSent: counter,
  bytesRecv: counter,
  packetsSent: counter,
  packetsRecv: counter,
  errin: counter,
  errout: counter,
  dropin: counter,
  dropout: counter,
});

export const networkDataSchema = z.record(z.string().min(1), networkCountersSchema);

export type ValidatedSnapshot = z.infer<typeof metricSnapshotSchema>;
export type ValidatedNetworkData = z.infer<typeof networkDataSchema>;
