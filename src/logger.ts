/**
 * Structured Logging Module
 *
 * pino-based logging with scoped child loggers. Pretty-prints through
 * pino-pretty outside production, plain JSON lines otherwise.
 */

import pino, { Logger } from 'pino';
import { logLevelSchema, LogLevel } from './config-schema';

export type { LogLevel };

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

let rootLogger: Logger | null = null;

function levelFromEnv(): LogLevel | undefined {
  const parsed = logLevelSchema.safeParse(process.env.LOG_LEVEL);
  return parsed.success ? parsed.data : undefined;
}

function prettyFromEnv(): boolean {
  const flag = process.env.LOG_PRETTY;
  if (flag !== undefined) return flag === 'true' || flag === '1';
  return process.env.NODE_ENV !== 'production';
}

/**
 * Initialize the root logger. Call once at startup; calling again
 * replaces the root, already-created child loggers keep the old one.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? levelFromEnv() ?? 'info';
  const pretty = config.pretty ?? prettyFromEnv();

  if (pretty) {
    rootLogger = pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          messageFormat: '[{module}] {msg}',
          destination: 2,
        },
      },
    });
  } else {
    rootLogger = pino({ level }, pino.destination(2));
  }
  return rootLogger;
}

/**
 * Get the root logger instance.
 * Auto-initializes if not already initialized.
 */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module.
 */
export function getLogger(module: string): Logger {
  return getRootLogger().child({ module });
}
