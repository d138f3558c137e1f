import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export const LogLevel = {
   TRACE: 'trace',
   DEBUG: 'debug',
   INFO: 'info',
   WARN: 'warn',
   ERROR: 'error',
   FATAL: 'fatal',
   SILENT: 'silent',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export interface LoggerConfig {
   level: LogLevel;
   /** Logger name, emitted as `name` on every line */
   name?: string;
   /** Additional base context */
   base?: Record<string, unknown>;
}

const isLogLevel = (value: string): value is LogLevel =>
   Object.values<string>(LogLevel).includes(value);

/**
 * Create a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
   const options: LoggerOptions = {
      level: config.level,
      name: config.name ?? 'mqbridge',
      base: { ...config.base },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
         level: (label) => ({ level: label }),
      },
   };
   return pino(options);
}

function levelFromEnv(): LogLevel {
   const raw = process.env.MQBRIDGE_LOG_LEVEL?.toLowerCase();
   return raw && isLogLevel(raw) ? raw : LogLevel.INFO;
}

let defaultLogger: Logger = createLogger({ level: levelFromEnv() });

/**
 * Replace the process-wide default logger
 */
export function setDefaultLogger(logger: Logger): void {
   defaultLogger = logger;
}

export function getLogger(): Logger {
   return defaultLogger;
}

/**
 * Child of `parent` (or of the default logger) tagged with a component name
 */
export function componentLogger(
   component: string,
   parent?: Logger,
   bindings: Record<string, unknown> = {},
): Logger {
   return (parent ?? defaultLogger).child({ component, ...bindings });
}
