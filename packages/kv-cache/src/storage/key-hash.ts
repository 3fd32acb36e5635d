import { createHash } from 'node:crypto';

/** Extension of every cache entry file */
export const CACHE_FILE_EXTENSION = '.cache';

/**
 * Maps an arbitrary key to a filesystem-safe identifier: the lowercase hex
 * SHA-256 digest of its UTF-8 bytes.
 */
export const hashKey = (key: string): string => createHash('sha256').update(key, 'utf8').digest('hex');

/**
 * File name (without directory) storing the entry for a key.
 */
export const cacheFileName = (key: string): string => `${hashKey(key)}${CACHE_FILE_EXTENSION}`;
