import type { Result } from 'neverthrow';
import type { Logger } from 'pino';
import type { CacheError } from '../cache/errors.js';
import type { SerialExecutor } from '../concurrency/serial-executor.js';
import type { Clock } from '../types.js';

/**
 * Background purge tuning.
 */
export interface PurgePolicy {
  /** Minimum time between two accepted schedule requests */
  readonly minIntervalMs: number;
  /** Delay between an accepted request and the sweep */
  readonly delayMs: number;
  /** Maximum number of entries one sweep removes */
  readonly limit: number;
}

/**
 * Options for {@link createPurgeScheduler}.
 */
export interface PurgeSchedulerOptions {
  /** Runs one sweep and reports how many entries it removed */
  readonly sweep: () => Promise<Result<number, CacheError>>;
  /** Time source used for throttling (default: Date.now) */
  readonly clock?: Clock;
  /** Receives sweep outcomes (default: `kv-cache:purge`) */
  readonly logger?: Logger;
  readonly minIntervalMs?: number;
  readonly delayMs?: number;
}

/**
 * Throttled, delayed, cancellable trigger for purge sweeps.
 */
export interface PurgeScheduler {
  /**
   * Requests a sweep. Dropped when the previous accepted request is more
   * recent than `minIntervalMs`; otherwise replaces any pending sweep.
   */
  readonly schedule: () => void;

  /**
   * Cancels the pending sweep, if any. A running sweep is not interrupted.
   */
  readonly cancel: () => void;

  /**
   * Whether a sweep is waiting for its delay to elapse.
   */
  readonly isPending: () => boolean;
}

/**
 * Options for {@link purgeExpiredFiles}.
 */
export interface PurgeExpiredFilesOptions {
  /** Directory to sweep */
  readonly directory: string;
  /** Instant (epoch milliseconds) entries are compared against */
  readonly now: number;
  /** Maximum number of files to delete */
  readonly limit: number;
  /** Only files with this extension are inspected (default: `.cache`) */
  readonly extension?: string;
  /** Executor each file's read-and-delete step runs on */
  readonly guard?: SerialExecutor;
}
