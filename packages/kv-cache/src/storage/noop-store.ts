import { ok } from 'neverthrow';
import type { CacheStore } from './types.js';

/**
 * Store that discards writes and never finds anything.
 *
 * For contexts that need the cache interface without any I/O.
 */
export const noopCacheStore: CacheStore = {
  readData: () => Promise.resolve(ok(undefined)),
  writeData: () => Promise.resolve(ok(undefined)),
  remove: () => Promise.resolve(ok(undefined)),
  removeIf: () => Promise.resolve(ok(false)),
  removeAll: () => Promise.resolve(ok(undefined)),
};
