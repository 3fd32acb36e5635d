import { z } from 'zod';

/** Environment variable selecting the log level */
export const LOG_LEVEL_ENV = 'KV_CACHE_LOG_LEVEL';

const DEFAULT_LOG_LEVEL = 'info';

const levelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Logging configuration.
 */
export interface LoggingConfig {
  /** Minimum pino level to emit */
  readonly level: z.infer<typeof levelSchema>;
}

/**
 * Reads logging configuration from environment variables.
 *
 * Optional env vars:
 * - KV_CACHE_LOG_LEVEL: fatal | error | warn | info | debug | trace | silent (default: info)
 *
 * @throws Error when KV_CACHE_LOG_LEVEL holds an unknown level
 */
export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const raw = env[LOG_LEVEL_ENV];
  if (raw === undefined || raw.length === 0) {
    return { level: DEFAULT_LOG_LEVEL };
  }

  const parsed = levelSchema.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    throw new Error(`${LOG_LEVEL_ENV} must be one of ${levelSchema.options.join(', ')}`);
  }

  return { level: parsed.data };
}
