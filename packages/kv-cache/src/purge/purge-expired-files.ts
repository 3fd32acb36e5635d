import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import { createFetchError, errnoCode, type CacheError } from '../cache/errors.js';
import { decodeEnvelope, isExpired } from '../envelope/envelope.js';
import { CACHE_FILE_EXTENSION } from '../storage/key-hash.js';
import type { PurgeExpiredFilesOptions } from './types.js';

/**
 * Deletes one file if it holds an expired envelope.
 *
 * Read and delete failures skip the file; a later sweep will see it again.
 */
const removeIfExpired = async (file: string, now: number): Promise<boolean> => {
  let bytes: Uint8Array;
  try {
    bytes = await fs.readFile(file);
  } catch {
    return false;
  }

  const envelope = decodeEnvelope(bytes);
  if (envelope === undefined || !isExpired(envelope, now)) {
    return false;
  }

  try {
    await fs.unlink(file);
    return true;
  } catch {
    return false;
  }
};

/**
 * Scans a cache directory and deletes expired envelope files.
 *
 * Best effort: raw files, undecodable envelopes, envelopes without an
 * expiration and envelopes expiring after `now` are left alone, and per-file
 * failures are skipped. At most `limit` files are deleted per call.
 *
 * @returns Result with the number of files removed; FETCH_FAILED only when the
 *   directory itself cannot be listed
 */
export const purgeExpiredFiles = async (
  options: PurgeExpiredFilesOptions
): Promise<Result<number, CacheError>> => {
  const { directory, now, limit, extension = CACHE_FILE_EXTENSION, guard } = options;

  let names: string[];
  try {
    names = await fs.readdir(directory);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return ok(0);
    }
    return err(createFetchError(`Failed to list cache directory ${directory}`, error));
  }

  let removed = 0;
  for (const name of names) {
    if (removed >= limit) {
      break;
    }
    if (!name.endsWith(extension)) {
      continue;
    }

    const file = path.join(directory, name);
    const step = (): Promise<boolean> => removeIfExpired(file, now);
    const deleted = guard === undefined ? await step() : await guard.run(step);
    if (deleted) {
      removed += 1;
    }
  }

  return ok(removed);
};
