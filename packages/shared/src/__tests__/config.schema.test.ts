import { describe, it, expect } from 'vitest';
import { storeConfigSchema, cliConfigSchema, pullConfigSchema } from '../schemas/config.schema.js';
import { HOSTPULSE_DB_FILE } from '../constants.js';

describe('storeConfigSchema', () => {
  it('should fill every default from an empty object', () => {
    const result = storeConfigSchema.parse({});
    expect(result).toEqual({
      path: HOSTPULSE_DB_FILE,
      metricsTable: 'health_metrics',
      networkStatsTable: 'network_stats',
    });
  });

  it('should accept overridden table names', () => {
    const result = storeConfigSchema.parse({
      path: '/tmp/test.db',
      metricsTable: 'samples',
      networkStatsTable: 'sample_ifaces',
    });
    expect(result.metricsTable).toBe('samples');
    expect(result.networkStatsTable).toBe('sample_ifaces');
  });

  it('should reject table names that are not plain identifiers', () => {
    const result = storeConfigSchema.safeParse({ metricsTable: 'metrics; DROP TABLE x' });
    expect(result.success).toBe(false);
  });

  it('should reject identical table names', () => {
    const result = storeConfigSchema.safeParse({
      metricsTable: 'samples',
      networkStatsTable: 'samples',
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['networkStatsTable']);
    }
  });

  it('should reject an in-memory database path', () => {
    const result = storeConfigSchema.safeParse({ path: ':memory:' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['path']);
      expect(result.error.issues[0].message).toBe('must be a database file, not :memory:');
    }
  });
});

describe('cliConfigSchema', () => {
  it('should accept a complete config file', () => {
    const result = cliConfigSchema.safeParse({
      db: './pi.db',
      interval: '30s',
      hours: 12,
      logLevel: 'debug',
      pull: { host: 'pi.local', user: 'pi', port: 2222 },
    });
    expect(result.success).toBe(true);
  });

  it('should reject unknown keys', () => {
    const result = cliConfigSchema.safeParse({ database: './pi.db' });
    expect(result.success).toBe(false);
  });

  it('should reject a non-positive hours value', () => {
    expect(cliConfigSchema.safeParse({ hours: 0 }).success).toBe(false);
  });

  it('should reject an unknown log level', () => {
    expect(cliConfigSchema.safeParse({ logLevel: 'verbose' }).success).toBe(false);
  });
});

describe('pullConfigSchema', () => {
  it('should reject ports outside the TCP range', () => {
    expect(pullConfigSchema.safeParse({ port: 70000 }).success).toBe(false);
    expect(pullConfigSchema.safeParse({ port: 22 }).success).toBe(true);
  });
});
