import { z } from 'zod';
import {
  DEFAULT_METRICS_TABLE,
  DEFAULT_NETWORK_STATS_TABLE,
  HOSTPULSE_DB_FILE,
} from '../constants.js';

const tableName = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier');

export const storeConfigSchema = z
  .object({
    // Every operation opens its own connection, so the path must name a file.
    path: z
      .string()
      .min(1)
      .refine((path) => path !== ':memory:', 'must be a database file, not :memory:')
      .default(HOSTPULSE_DB_FILE),
    metricsTable: tableName.default(DEFAULT_METRICS_TABLE),
    networkStatsTable: tableName.default(DEFAULT_NETWORK_STATS_TABLE),
  })
  .refine((cfg) => cfg.metricsTable !== cfg.networkStatsTable, {
    message: 'metricsTable and networkStatsTable must differ',
    path: ['networkStatsTable'],
  });

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const pullConfigSchema = z.object({
  host: z.string().min(1).optional(),
  user: z.string().min(1).optional(),
  port: z.number().int().positive().max(65535).optional(),
  remotePath: z.string().min(1).optional(),
  localPath: z.string().min(1).optional(),
  identity: z.string().min(1).optional(),
});

export const cliConfigSchema = z
  .object({
    db: z.string().min(1).optional(),
    interval: z.string().min(1).optional(),
    hours: z.number().positive().optional(),
    logLevel: logLevelSchema.optional(),
    pull: pullConfigSchema.optional(),
  })
  .strict();

export type StoreConfigInput = z.input<typeof storeConfigSchema> & { now?: () => Date };
export type ValidatedCliConfig = z.infer<typeof cliConfigSchema>;
