/**
 * Root logger
 *
 * Owns the process-wide pino instance. Subsystem loggers derive from it,
 * so reconfiguring here (level, pretty output) reaches every component.
 */

import { pino, type Logger } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export const LOG_LEVEL_ENV = 'GPUFANCTL_LOG_LEVEL';

export interface LoggingOptions {
  level?: LogLevel;
  /** Human-readable colored output through pino-pretty */
  pretty?: boolean;
}

let rootLogger: Logger | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function resolveLevel(level?: LogLevel): LogLevel {
  if (level) {
    return level;
  }
  const fromEnv = process.env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (fromEnv && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return 'info';
}

export function createLogger(options: LoggingOptions = {}): Logger {
  const level = resolveLevel(options.level);

  if (options.pretty) {
    return pino({
      name: 'gpufanctl',
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard' },
      },
    });
  }

  return pino({ name: 'gpufanctl', level });
}

/**
 * Replaces the root logger with one built from the given options
 */
export function configureLogging(options: LoggingOptions): Logger {
  rootLogger = createLogger(options);
  return rootLogger;
}

export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}

export function setLogger(logger: Logger): void {
  rootLogger = logger;
}

export function logError(message: string, meta?: Record<string, unknown>): void {
  getLogger().error(meta ?? {}, message);
}
