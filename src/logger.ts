/**
 * Structured Logging Module
 *
 * Provides pino-based structured logging with scoped child loggers.
 * Supports JSON output for production and pretty-printing for development.
 */

import pino, { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

let rootLogger: Logger | null = null;

function levelFromEnv(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.find(l => l === raw);
}

/**
 * Initialize the root logger. Call once at startup.
 * LOG_LEVEL in the environment wins over the configured level.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = levelFromEnv() ?? config.level ?? 'info';
  const pretty = config.pretty ?? (process.env.NODE_ENV !== 'production' && process.stdout.isTTY === true);

  if (pretty) {
    rootLogger = pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          messageFormat: '[{module}] {msg}',
        },
      },
    });
  } else {
    rootLogger = pino({ level });
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
 * Auto-initializes if not already initialized.
 */
export function getLogger(module: string): Logger {
  return getRootLogger().child({ module });
}
