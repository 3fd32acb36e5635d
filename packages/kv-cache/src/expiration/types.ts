import type { Result } from 'neverthrow';
import type { CacheError } from '../cache/errors.js';
import type { CacheStore } from '../storage/types.js';
import type { Clock, Expiry } from '../types.js';

/**
 * Options for {@link withExpiration}.
 */
export interface ExpirationOptions {
  /**
   * TTL applied to every plain `writeData`. When omitted, plain writes store
   * the bytes unchanged and never expire.
   */
  readonly defaultTtlMs?: number;
  /** Time source (default: Date.now) */
  readonly clock?: Clock;
}

/**
 * Store that understands expiration envelopes.
 */
export interface ExpiringCacheStore extends CacheStore {
  /**
   * Writes bytes with an explicit expiration, regardless of the default TTL.
   * @param data - Bytes to store
   * @param key - The cache key
   * @param expiry - Absolute instant or duration from now
   */
  readonly writeDataExpiring: (
    data: Uint8Array,
    key: string,
    expiry: Expiry
  ) => Promise<Result<void, CacheError>>;
}
