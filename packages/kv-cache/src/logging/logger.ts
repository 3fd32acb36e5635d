import { pino, type DestinationStream, type Level, type Logger } from 'pino';
import { loadLoggingConfig, type LoggingConfig } from './config.js';

/**
 * Application log levels.
 */
export type LogLevel = 'debug' | 'info' | 'warning' | 'error' | 'critical';

const pinoLevels: Record<LogLevel, Level> = {
  debug: 'debug',
  info: 'info',
  warning: 'warn',
  error: 'error',
  critical: 'fatal',
};

/**
 * Maps an application log level onto pino's level names.
 */
export const toPinoLevel = (level: LogLevel): Level => pinoLevels[level];

/**
 * Options for creating a logger.
 */
export interface LoggerOptions {
  /** Level override; defaults to the environment configuration */
  readonly level?: LoggingConfig['level'];
  /** Destination for log lines (default: stdout) */
  readonly destination?: DestinationStream;
}

/**
 * Creates a structured logger named `kv-cache:<name>`.
 *
 * @example
 * ```typescript
 * const logger = createLogger('purge', { level: 'debug' });
 * logger.debug({ removed: 3 }, 'Purged expired cache entries');
 * ```
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const opts = {
    name: `kv-cache:${name}`,
    level: options.level ?? loadLoggingConfig().level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  return options.destination === undefined ? pino(opts) : pino(opts, options.destination);
}

/**
 * Logger that discards everything.
 */
export const createSilentLogger = (): Logger => pino({ enabled: false });

/**
 * Logs a message at an application log level.
 */
export const logAt = (
  logger: Logger,
  level: LogLevel,
  message: string,
  fields: Record<string, unknown> = {}
): void => {
  logger[toPinoLevel(level)](fields, message);
};
