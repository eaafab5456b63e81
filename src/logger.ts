/**
 * Structured Logging Module
 *
 * pino-based structured logging with scoped child loggers.
 * JSON output in production, pretty-printed output everywhere else.
 */

import pino, { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

let rootLogger: Logger | null = null;
const moduleLoggers: Set<Logger> = new Set();

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

function levelFromEnv(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL;
  return isLogLevel(raw) ? raw : undefined;
}

/**
 * Initialize the root logger. Call once at startup; calling again replaces
 * the root for loggers created afterwards.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? levelFromEnv() ?? 'info';
  const pretty = config.pretty ?? (process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test');

  if (pretty && level !== 'silent') {
    rootLogger = pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
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
 * Get a scoped logger for a specific module.
 * Auto-initializes if not already initialized.
 */
export function getLogger(module: string): Logger {
  const logger = getRootLogger().child({ module });
  moduleLoggers.add(logger);
  return logger;
}

/**
 * Change the level of the root and every module logger already handed out.
 */
export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
  for (const logger of moduleLoggers) {
    logger.level = level;
  }
}

/**
 * Get the root logger instance.
 */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}
