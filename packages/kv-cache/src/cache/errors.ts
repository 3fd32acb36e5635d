/**
 * Error codes for cache operation failures.
 *
 * Absence is never an error: a missing key, a key removed twice and an
 * expired entry all resolve to `ok(undefined)`.
 */
export type CacheErrorCode = 'SAVE_FAILED' | 'FETCH_FAILED' | 'DELETE_FAILED';

/**
 * Error returned by every fallible cache operation.
 */
export interface CacheError {
  readonly code: CacheErrorCode;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Default user-facing messages for each error code.
 */
const defaultMessages: Record<CacheErrorCode, string> = {
  SAVE_FAILED: 'Failed to save data',
  FETCH_FAILED: 'Failed to load data',
  DELETE_FAILED: 'Failed to delete data',
};

/**
 * Returns the default user-facing message for an error code.
 */
export const cacheErrorMessage = (code: CacheErrorCode): string => defaultMessages[code];

const createCacheError = (code: CacheErrorCode, message: string, cause?: unknown): CacheError => {
  const base = { code, message: message || defaultMessages[code] };

  if (cause !== undefined) {
    return { ...base, cause };
  }

  return base;
};

/**
 * Creates a SAVE_FAILED error (file write, directory creation or value encoding).
 *
 * @param message - Error message
 * @param cause - Original error
 */
export const createSaveError = (message: string, cause?: unknown): CacheError =>
  createCacheError('SAVE_FAILED', message, cause);

/**
 * Creates a FETCH_FAILED error (file read or value decoding).
 *
 * @param message - Error message
 * @param cause - Original error
 */
export const createFetchError = (message: string, cause?: unknown): CacheError =>
  createCacheError('FETCH_FAILED', message, cause);

/**
 * Creates a DELETE_FAILED error (single-key or bulk deletion).
 *
 * @param message - Error message
 * @param cause - Original error
 */
export const createDeleteError = (message: string, cause?: unknown): CacheError =>
  createCacheError('DELETE_FAILED', message, cause);

/**
 * Persistence failures are never worth retrying blindly; the caller decides
 * whether to fall back to the source of truth.
 */
export const isRecoverable = (_error: CacheError): boolean => false;

/**
 * Extracts the Node.js error code (`ENOENT`, `EACCES`, ...) from an unknown error.
 */
export const errnoCode = (error: unknown): string | undefined => {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};
