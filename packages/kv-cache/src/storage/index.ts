/**
 * Raw byte storage backends.
 *
 * @packageDocumentation
 */

export {
  createFileCacheStore,
  defaultCacheDirectory,
  DEFAULT_CACHE_SUBDIRECTORY,
} from './file-store.js';
export { createMemoryCacheStore } from './memory-store.js';
export { noopCacheStore } from './noop-store.js';
export { hashKey, cacheFileName, CACHE_FILE_EXTENSION } from './key-hash.js';
export type { CacheStore, FileCacheStore, FileCacheStoreOptions } from './types.js';
