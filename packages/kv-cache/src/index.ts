/**
 * kv-cache - Persistent key-value byte cache with optional expiration
 *
 * @packageDocumentation
 */

// Public types
export type { Clock, Expiry } from './types.js';
export { resolveExpiry, systemClock } from './types.js';

// ============================================================================
// CORE: Cache Facade
// ============================================================================

export {
  createCacheClient,
  createFileCacheClient,
  createMemoryCacheClient,
  noopCacheClient,
  jsonCodec,
} from './cache/index.js';
export type {
  CacheClient,
  CacheClientOptions,
  FileCacheClient,
  FileCacheClientOptions,
  ValueCodec,
} from './cache/index.js';

// ============================================================================
// CORE: Errors
// ============================================================================

export {
  cacheErrorMessage,
  createDeleteError,
  createFetchError,
  createSaveError,
  isRecoverable,
} from './cache/index.js';
export type { CacheError, CacheErrorCode } from './cache/index.js';

// ============================================================================
// Storage Backends
// ============================================================================

export {
  createFileCacheStore,
  createMemoryCacheStore,
  noopCacheStore,
  defaultCacheDirectory,
  DEFAULT_CACHE_SUBDIRECTORY,
  hashKey,
  cacheFileName,
  CACHE_FILE_EXTENSION,
} from './storage/index.js';
export type { CacheStore, FileCacheStore, FileCacheStoreOptions } from './storage/index.js';

// ============================================================================
// Expiration
// ============================================================================

export { withExpiration } from './expiration/index.js';
export type { ExpirationOptions, ExpiringCacheStore } from './expiration/index.js';

export {
  MAGIC_PREFIX,
  classifyStoredValue,
  decodeEnvelope,
  encodeEnvelope,
  hasMagicPrefix,
  isExpired,
} from './envelope/index.js';
export type { CacheEnvelope, StoredValue } from './envelope/index.js';

// ============================================================================
// Background Purge
// ============================================================================

export { createPurgeScheduler, purgeExpiredFiles, DEFAULT_PURGE_POLICY } from './purge/index.js';
export type {
  PurgeExpiredFilesOptions,
  PurgePolicy,
  PurgeScheduler,
  PurgeSchedulerOptions,
} from './purge/index.js';

// ============================================================================
// Utilities
// ============================================================================

export { createSerialExecutor } from './concurrency/index.js';
export type { SerialExecutor } from './concurrency/index.js';

export {
  createLogger,
  createSilentLogger,
  logAt,
  toPinoLevel,
  loadLoggingConfig,
  LOG_LEVEL_ENV,
} from './logging/index.js';
export type { LogLevel, LoggerOptions, LoggingConfig } from './logging/index.js';

export {
  buildJsonRequest,
  createNetworkClient,
  isRecoverableNetworkError,
} from './http/index.js';
export type {
  HttpMethod,
  NetworkClient,
  NetworkClientOptions,
  NetworkError,
  NetworkErrorType,
  NetworkRequest,
} from './http/index.js';
