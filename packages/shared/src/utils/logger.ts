import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  /** File path, or a file descriptor such as 2 for stderr. */
  destination?: string | number;
}

export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  const { name = 'tickscope', level = 'info', pretty = false, destination } = options;

  const transport = pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      }
    : undefined;

  const dest = destination !== undefined ? pino.destination(destination) : undefined;

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

let defaultLogger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger({ destination: 2 });
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: pino.Logger): void {
  defaultLogger = logger;
}
