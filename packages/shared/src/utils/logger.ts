import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  destination?: string;
}

export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  const { name = 'hostpulse', level = 'info', pretty = false, destination } = options;

  const transport = pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      }
    : undefined;

  const dest = destination ? pino.destination(destination) : undefined;

  return pino(
    {
      name,
      level,
      transport: dest ? undefined : transport,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    dest,
  );
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

let defaultLogger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!defaultLogger) {
    const envLevel = process.env.HOSTPULSE_LOG_LEVEL ?? '';
    const env = process.env.NODE_ENV;
    defaultLogger = createLogger({
      level: isLogLevel(envLevel) ? envLevel : 'info',
      pretty: env !== 'production' && env !== 'test',
    });
  }
  return defaultLogger;
}

/**
 * Changes the level of the shared logger in place. Modules hold on to the
 * instance returned by `getLogger()`, so swapping it would not reach them.
 */
export function setLogLevel(level: LogLevel): void {
  getLogger().level = level;
}

export function setDefaultLogger(logger: pino.Logger): void {
  defaultLogger = logger;
}
