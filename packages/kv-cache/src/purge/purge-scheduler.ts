import { createLogger } from '../logging/logger.js';
import { systemClock } from '../types.js';
import type { PurgePolicy, PurgeScheduler, PurgeSchedulerOptions } from './types.js';

/** Default purge policy: one sweep per 30s, 2s after the request, 200 files max */
export const DEFAULT_PURGE_POLICY: PurgePolicy = {
  minIntervalMs: 30_000,
  delayMs: 2_000,
  limit: 200,
};

/**
 * Creates a scheduler that runs purge sweeps in the background.
 *
 * Throttling keys off the time a request was accepted, not when the sweep
 * finished. A sweep that comes due while the previous one is still running is
 * skipped, so sweeps never overlap. Sweep outcomes are logged, never thrown.
 *
 * @example
 * ```typescript
 * const scheduler = createPurgeScheduler({
 *   sweep: () => purgeExpiredFiles({ directory, now: Date.now(), limit: 200 }),
 * });
 * scheduler.schedule(); // sweep runs ~2s later
 * scheduler.schedule(); // dropped: within 30s of the previous request
 * ```
 */
export const createPurgeScheduler = (options: PurgeSchedulerOptions): PurgeScheduler => {
  const {
    sweep,
    clock = systemClock,
    logger = createLogger('purge'),
    minIntervalMs = DEFAULT_PURGE_POLICY.minIntervalMs,
    delayMs = DEFAULT_PURGE_POLICY.delayMs,
  } = options;

  let lastScheduledAt: number | undefined;
  let pending: NodeJS.Timeout | undefined;
  let running = false;

  const runSweep = (): void => {
    pending = undefined;
    if (running) {
      logger.debug('Skipping purge sweep: previous sweep still running');
      return;
    }

    running = true;
    void sweep().then(
      (result) => {
        running = false;
        if (result.isOk()) {
          logger.debug({ removed: result.value }, 'Purged expired cache entries');
        } else {
          logger.warn({ err: result.error }, 'Purge sweep failed');
        }
      },
      (error: unknown) => {
        running = false;
        logger.warn({ err: error }, 'Purge sweep failed');
      }
    );
  };

  const cancel = (): void => {
    if (pending !== undefined) {
      clearTimeout(pending);
      pending = undefined;
    }
  };

  const schedule = (): void => {
    const now = clock();
    if (lastScheduledAt !== undefined && now - lastScheduledAt < minIntervalMs) {
      return;
    }

    lastScheduledAt = now;
    cancel();
    pending = setTimeout(runSweep, delayMs);
    // Background work must not keep the process alive
    pending.unref();
  };

  return {
    schedule,
    cancel,
    isPending: () => pending !== undefined,
  };
};
