import { ok, err, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';
import { withExpiration } from '../expiration/expiring.js';
import { createFileCacheStore } from '../storage/file-store.js';
import { createMemoryCacheStore } from '../storage/memory-store.js';
import { noopCacheStore } from '../storage/noop-store.js';
import type { CacheStore } from '../storage/types.js';
import type { Expiry } from '../types.js';
import { jsonCodec } from './codec.js';
import { createFetchError, createSaveError, type CacheError } from './errors.js';
import type {
  CacheClient,
  CacheClientOptions,
  FileCacheClient,
  FileCacheClientOptions,
} from './types.js';

/**
 * Creates a cache client on top of any store.
 *
 * The store is always wrapped with {@link withExpiration}: without a default
 * TTL plain writes stay byte-for-byte identical, and envelopes written with an
 * explicit expiry are still unwrapped on read.
 *
 * @param store - Backend holding the bytes
 * @param options - Default TTL, clock and value codec
 * @returns A CacheClient instance
 *
 * @example
 * ```typescript
 * const User = z.object({ name: z.string(), count: z.number() });
 * const cache = createCacheClient(createMemoryCacheStore());
 *
 * await cache.write({ name: 'hello', count: 42 }, 'currentUser');
 * const result = await cache.read('currentUser', User);
 * if (result.isOk() && result.value !== undefined) {
 *   console.log(result.value.name);
 * }
 * ```
 */
export const createCacheClient = (
  store: CacheStore,
  options: CacheClientOptions = {}
): CacheClient => {
  const { codec = jsonCodec } = options;
  const expiring = withExpiration(store, options);

  const read = async <T>(
    key: string,
    schema: ZodType<T, ZodTypeDef, unknown>
  ): Promise<Result<T | undefined, CacheError>> => {
    const raw = await expiring.readData(key);
    if (raw.isErr()) {
      return err(raw.error);
    }
    if (raw.value === undefined) {
      return ok(undefined);
    }

    let decoded: unknown;
    try {
      decoded = codec.decode(raw.value);
    } catch (error) {
      return err(createFetchError('Failed to decode cached value', error));
    }

    const parsed = schema.safeParse(decoded);
    if (!parsed.success) {
      return err(createFetchError('Cached value does not match the expected shape', parsed.error));
    }
    return ok(parsed.data);
  };

  const write = async <T>(
    value: T,
    key: string,
    expiry?: Expiry
  ): Promise<Result<void, CacheError>> => {
    let data: Uint8Array;
    try {
      data = codec.encode(value);
    } catch (error) {
      return err(createSaveError('Failed to encode value', error));
    }

    return expiry === undefined
      ? expiring.writeData(data, key)
      : expiring.writeDataExpiring(data, key, expiry);
  };

  return {
    ...expiring,
    read,
    write,
  };
};

/**
 * Creates a file-backed cache client.
 *
 * The same clock drives expiration on read and the background purge.
 *
 * @throws Error when no logger is given and KV_CACHE_LOG_LEVEL holds an unknown level
 *
 * @example
 * ```typescript
 * const cache = createFileCacheClient({ defaultTtlMs: 10 * 60 * 1000 });
 * await cache.writeData(bytes, 'thumbnail:42');
 * // ...
 * cache.close();
 * ```
 */
export const createFileCacheClient = (options: FileCacheClientOptions = {}): FileCacheClient => {
  const store = createFileCacheStore(options);

  return {
    ...createCacheClient(store, options),
    directory: store.directory,
    purgeExpired: store.purgeExpired,
    close: store.close,
  };
};

/**
 * Creates an in-memory cache client with no durability.
 */
export const createMemoryCacheClient = (options: CacheClientOptions = {}): CacheClient =>
  createCacheClient(createMemoryCacheStore(), options);

/**
 * Cache client that discards writes and reports every key as absent.
 */
export const noopCacheClient: CacheClient = createCacheClient(noopCacheStore);
