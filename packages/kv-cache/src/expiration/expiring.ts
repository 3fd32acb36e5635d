import { ok, err, type Result } from 'neverthrow';
import type { CacheError } from '../cache/errors.js';
import { classifyStoredValue, encodeEnvelope, isExpired } from '../envelope/envelope.js';
import type { CacheStore } from '../storage/types.js';
import { resolveExpiry, systemClock, type Expiry } from '../types.js';
import type { ExpirationOptions, ExpiringCacheStore } from './types.js';

/**
 * Adds TTL semantics to any store without the store knowing about expiration.
 *
 * - Reads unwrap envelopes. An expired envelope is removed from the wrapped
 *   store and reported as absent. Bytes that are not a valid envelope are
 *   returned unchanged.
 * - Plain writes are wrapped with `clock() + defaultTtlMs` when a default TTL
 *   is configured, and stored byte-for-byte otherwise.
 * - `writeDataExpiring` always wraps.
 * - `remove`, `removeIf` and `removeAll` pass through.
 *
 * Errors from the wrapped store are returned unchanged.
 *
 * @param store - Store to decorate
 * @param options - Default TTL and clock
 * @returns An ExpiringCacheStore instance
 *
 * @example
 * ```typescript
 * const store = withExpiration(createFileCacheStore(), { defaultTtlMs: 60_000 });
 * await store.writeData(bytes, 'session');          // expires in one minute
 * await store.writeDataExpiring(bytes, 'daily', { expiresInMs: 86_400_000 });
 * ```
 */
export const withExpiration = (
  store: CacheStore,
  options: ExpirationOptions = {}
): ExpiringCacheStore => {
  const { defaultTtlMs, clock = systemClock } = options;

  const writeWrapped = async (
    data: Uint8Array,
    key: string,
    expiresAt: number
  ): Promise<Result<void, CacheError>> => {
    const encoded = encodeEnvelope(data, expiresAt);
    if (encoded.isErr()) {
      return err(encoded.error);
    }
    return store.writeData(encoded.value, key);
  };

  const readData = async (key: string): Promise<Result<Uint8Array | undefined, CacheError>> => {
    const raw = await store.readData(key);
    if (raw.isErr() || raw.value === undefined) {
      return raw;
    }

    const stored = classifyStoredValue(raw.value);
    if (stored.kind === 'raw') {
      return ok(stored.bytes);
    }

    if (isExpired(stored, clock())) {
      // A write queued since the read keeps its newer bytes
      const removed = await store.removeIf(key, raw.value);
      return removed.map(() => undefined);
    }

    return ok(stored.payload);
  };

  const writeData = (data: Uint8Array, key: string): Promise<Result<void, CacheError>> => {
    if (defaultTtlMs === undefined) {
      return store.writeData(data, key);
    }
    return writeWrapped(data, key, clock() + defaultTtlMs);
  };

  const writeDataExpiring = (
    data: Uint8Array,
    key: string,
    expiry: Expiry
  ): Promise<Result<void, CacheError>> => writeWrapped(data, key, resolveExpiry(expiry, clock));

  return {
    readData,
    writeData,
    writeDataExpiring,
    remove: (key) => store.remove(key),
    removeIf: (key, expected) => store.removeIf(key, expected),
    removeAll: () => store.removeAll(),
  };
};
