import type { Result } from 'neverthrow';
import type { Logger } from 'pino';
import type { CacheError } from '../cache/errors.js';
import type { PurgePolicy } from '../purge/types.js';
import type { Clock } from '../types.js';

/**
 * Raw byte store keyed by arbitrary strings.
 *
 * Every backend (file, in-memory, no-op) and every decorator (expiration)
 * implements this interface. Operations resolve to `ok(undefined)` for
 * absent keys and to `err` only when the underlying I/O fails.
 */
export interface CacheStore {
  /**
   * Reads the bytes stored for a key.
   * @param key - The cache key
   * @returns The stored bytes, or undefined if the key is absent
   */
  readonly readData: (key: string) => Promise<Result<Uint8Array | undefined, CacheError>>;

  /**
   * Replaces (or creates) the bytes stored for a key.
   * @param data - Bytes to store
   * @param key - The cache key
   */
  readonly writeData: (data: Uint8Array, key: string) => Promise<Result<void, CacheError>>;

  /**
   * Deletes a key. Deleting an absent key succeeds.
   * @param key - The cache key
   */
  readonly remove: (key: string) => Promise<Result<void, CacheError>>;

  /**
   * Deletes a key only while it still holds `expected`, checked and deleted
   * as one step.
   * @param key - The cache key
   * @param expected - Bytes a previous read returned
   * @returns Whether the entry was deleted
   */
  readonly removeIf: (key: string, expected: Uint8Array) => Promise<Result<boolean, CacheError>>;

  /**
   * Deletes every key.
   */
  readonly removeAll: () => Promise<Result<void, CacheError>>;
}

/**
 * Options for creating a file-backed store.
 */
export interface FileCacheStoreOptions {
  /** Directory holding one file per key (default: {@link defaultCacheDirectory}) */
  readonly directory?: string;
  /** Time source for purge throttling and expiration checks (default: Date.now) */
  readonly clock?: Clock;
  /** Logger for background purge results (default: `kv-cache:purge`) */
  readonly logger?: Logger;
  /** Overrides for the background purge policy */
  readonly purge?: Partial<PurgePolicy>;
}

/**
 * File-backed store with background purging of expired envelopes.
 */
export interface FileCacheStore extends CacheStore {
  /** Directory this store reads and writes */
  readonly directory: string;

  /**
   * Runs one purge sweep now, bypassing the throttle and delay.
   * @returns Number of expired entries removed
   */
  readonly purgeExpired: () => Promise<Result<number, CacheError>>;

  /**
   * Cancels any pending background purge. Safe to call more than once.
   */
  readonly close: () => void;
}
