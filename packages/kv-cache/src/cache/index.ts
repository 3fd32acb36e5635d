/**
 * Cache facade.
 *
 * @packageDocumentation
 */

export {
  createCacheClient,
  createFileCacheClient,
  createMemoryCacheClient,
  noopCacheClient,
} from './cache-client.js';
export { jsonCodec } from './codec.js';
export type { ValueCodec } from './codec.js';
export {
  cacheErrorMessage,
  createDeleteError,
  createFetchError,
  createSaveError,
  isRecoverable,
} from './errors.js';
export type { CacheError, CacheErrorCode } from './errors.js';
export type {
  CacheClient,
  CacheClientOptions,
  FileCacheClient,
  FileCacheClientOptions,
} from './types.js';
