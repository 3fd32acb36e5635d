/**
 * Structured logging.
 *
 * @packageDocumentation
 */

export { createLogger, createSilentLogger, logAt, toPinoLevel } from './logger.js';
export type { LogLevel, LoggerOptions } from './logger.js';
export { loadLoggingConfig, LOG_LEVEL_ENV } from './config.js';
export type { LoggingConfig } from './config.js';
