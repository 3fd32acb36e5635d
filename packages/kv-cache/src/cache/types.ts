import type { Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';
import type { ExpirationOptions, ExpiringCacheStore } from '../expiration/types.js';
import type { FileCacheStoreOptions } from '../storage/types.js';
import type { Expiry } from '../types.js';
import type { ValueCodec } from './codec.js';
import type { CacheError } from './errors.js';

/**
 * Single entry point for application code: raw byte operations plus
 * structured values encoded through a {@link ValueCodec}.
 */
export interface CacheClient extends ExpiringCacheStore {
  /**
   * Reads and decodes a value.
   * @param key - The cache key
   * @param schema - Shape the decoded value must match
   * @returns The value, undefined if absent or expired, or FETCH_FAILED when
   *   the stored bytes cannot be decoded into `schema`
   */
  readonly read: <T>(
    key: string,
    schema: ZodType<T, ZodTypeDef, unknown>
  ) => Promise<Result<T | undefined, CacheError>>;

  /**
   * Encodes and writes a value.
   * @param value - The value to store
   * @param key - The cache key
   * @param expiry - Optional explicit expiration, overriding the default TTL
   * @returns SAVE_FAILED when the value cannot be encoded or written
   */
  readonly write: <T>(value: T, key: string, expiry?: Expiry) => Promise<Result<void, CacheError>>;
}

/**
 * Options for {@link createCacheClient}.
 */
export interface CacheClientOptions extends ExpirationOptions {
  /** Structured value codec (default: UTF-8 JSON) */
  readonly codec?: ValueCodec;
}

/**
 * Options for {@link createFileCacheClient}.
 */
export interface FileCacheClientOptions extends FileCacheStoreOptions, CacheClientOptions {}

/**
 * Cache client backed by files, with access to the purge lifecycle.
 */
export interface FileCacheClient extends CacheClient {
  readonly directory: string;
  /** Runs one purge sweep now */
  readonly purgeExpired: () => Promise<Result<number, CacheError>>;
  /** Cancels any pending background purge */
  readonly close: () => void;
}
