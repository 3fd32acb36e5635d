import { ok, type Result } from 'neverthrow';
import type { CacheError } from '../cache/errors.js';
import { createSerialExecutor } from '../concurrency/serial-executor.js';
import type { CacheStore } from './types.js';

/**
 * Creates an in-memory cache store.
 *
 * Entries live in a Map guarded by a serial executor, the same discipline
 * the file store uses, and are lost when the process exits. Bytes are copied
 * on the way in and out so callers cannot mutate stored entries.
 *
 * @returns A CacheStore instance
 *
 * @example
 * ```typescript
 * const store = createMemoryCacheStore();
 * await store.writeData(new TextEncoder().encode('value'), 'key');
 * const result = await store.readData('key');
 * ```
 */
export const createMemoryCacheStore = (): CacheStore => {
  const store = new Map<string, Uint8Array>();
  const executor = createSerialExecutor();

  const readData = (key: string): Promise<Result<Uint8Array | undefined, CacheError>> =>
    executor.run(() => {
      const bytes = store.get(key);
      return Promise.resolve(ok(bytes === undefined ? undefined : bytes.slice()));
    });

  const writeData = (data: Uint8Array, key: string): Promise<Result<void, CacheError>> =>
    executor.run(() => {
      store.set(key, data.slice());
      return Promise.resolve(ok(undefined));
    });

  const remove = (key: string): Promise<Result<void, CacheError>> =>
    executor.run(() => {
      store.delete(key);
      return Promise.resolve(ok(undefined));
    });

  const removeIf = (key: string, expected: Uint8Array): Promise<Result<boolean, CacheError>> =>
    executor.run(() => {
      const current = store.get(key);
      if (current === undefined || !Buffer.from(current).equals(expected)) {
        return Promise.resolve(ok(false));
      }
      store.delete(key);
      return Promise.resolve(ok(true));
    });

  const removeAll = (): Promise<Result<void, CacheError>> =>
    executor.run(() => {
      store.clear();
      return Promise.resolve(ok(undefined));
    });

  return {
    readData,
    writeData,
    remove,
    removeIf,
    removeAll,
  };
};
