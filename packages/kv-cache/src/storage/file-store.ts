import { promises as fs } from 'node:fs';
import { randomBytes } from 'node:crypto';
import os from 'node:os';
import path from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import {
  createDeleteError,
  createFetchError,
  createSaveError,
  errnoCode,
  type CacheError,
} from '../cache/errors.js';
import { createSerialExecutor } from '../concurrency/serial-executor.js';
import { hasMagicPrefix } from '../envelope/envelope.js';
import { createLogger } from '../logging/logger.js';
import { purgeExpiredFiles } from '../purge/purge-expired-files.js';
import { createPurgeScheduler, DEFAULT_PURGE_POLICY } from '../purge/purge-scheduler.js';
import { systemClock } from '../types.js';
import { cacheFileName } from './key-hash.js';
import type { FileCacheStore, FileCacheStoreOptions } from './types.js';

/** Subdirectory appended to the platform cache location */
export const DEFAULT_CACHE_SUBDIRECTORY = 'KvCache';

/**
 * Resolves the default cache directory.
 *
 * Uses `$XDG_CACHE_HOME` when set, otherwise the platform cache location
 * (`~/Library/Caches` on macOS, `%LOCALAPPDATA%` on Windows, `~/.cache`
 * elsewhere), falling back to the OS temp directory without a home directory.
 */
export const defaultCacheDirectory = (
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  homeDirectory: string = os.homedir()
): string => {
  const xdg = env['XDG_CACHE_HOME'];
  const localAppData = env['LOCALAPPDATA'];

  let base: string;
  if (xdg !== undefined && xdg.length > 0) {
    base = xdg;
  } else if (platform === 'win32' && localAppData !== undefined && localAppData.length > 0) {
    base = localAppData;
  } else if (homeDirectory.length === 0) {
    base = os.tmpdir();
  } else if (platform === 'darwin') {
    base = path.join(homeDirectory, 'Library', 'Caches');
  } else {
    base = path.join(homeDirectory, '.cache');
  }

  return path.join(base, DEFAULT_CACHE_SUBDIRECTORY);
};

/**
 * Views a Node buffer as a plain Uint8Array without copying.
 */
const asBytes = (buffer: Buffer): Uint8Array =>
  new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);

/**
 * Writes to a sibling temporary file, then renames it over the target so
 * readers never observe a partially written entry.
 */
const writeFileAtomically = async (target: string, data: Uint8Array): Promise<void> => {
  const temporary = path.join(
    path.dirname(target),
    `.${path.basename(target)}.${randomBytes(6).toString('hex')}.tmp`
  );

  try {
    await fs.writeFile(temporary, data);
    await fs.rename(temporary, target);
  } catch (error) {
    await fs.rm(temporary, { force: true });
    throw error;
  }
};

/**
 * Creates a file-backed cache store.
 *
 * Each key is stored in `<directory>/<sha256(key)>.cache`. All operations of
 * one instance run one at a time in call order; separate instances (or
 * processes) sharing a directory are not coordinated.
 *
 * Reading or writing envelope bytes schedules a throttled background sweep
 * that deletes expired entries.
 *
 * @param options - Store configuration
 * @returns A FileCacheStore instance
 * @throws Error when no logger is given and KV_CACHE_LOG_LEVEL holds an unknown level
 *
 * @example
 * ```typescript
 * const store = createFileCacheStore({ directory: '/tmp/my-cache' });
 * await store.writeData(new Uint8Array([1, 2, 3]), 'k1');
 * const result = await store.readData('k1');
 * if (result.isOk() && result.value !== undefined) {
 *   // result.value is Uint8Array [1, 2, 3]
 * }
 * store.close();
 * ```
 */
export const createFileCacheStore = (options: FileCacheStoreOptions = {}): FileCacheStore => {
  const directory = options.directory ?? defaultCacheDirectory();
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? createLogger('purge');
  const policy = { ...DEFAULT_PURGE_POLICY, ...options.purge };
  const executor = createSerialExecutor();

  const fileFor = (key: string): string => path.join(directory, cacheFileName(key));

  const sweep = (): Promise<Result<number, CacheError>> =>
    purgeExpiredFiles({ directory, now: clock(), limit: policy.limit, guard: executor });

  const scheduler = createPurgeScheduler({
    sweep,
    clock,
    logger,
    minIntervalMs: policy.minIntervalMs,
    delayMs: policy.delayMs,
  });

  const readData = (key: string): Promise<Result<Uint8Array | undefined, CacheError>> =>
    executor.run(async (): Promise<Result<Uint8Array | undefined, CacheError>> => {
      const file = fileFor(key);

      let bytes: Uint8Array;
      try {
        bytes = asBytes(await fs.readFile(file));
      } catch (error) {
        if (errnoCode(error) === 'ENOENT') {
          return ok(undefined);
        }
        return err(createFetchError(`Failed to read cache file ${file}`, error));
      }

      if (hasMagicPrefix(bytes)) {
        scheduler.schedule();
      }
      return ok(bytes);
    });

  const writeData = (data: Uint8Array, key: string): Promise<Result<void, CacheError>> =>
    executor.run(async (): Promise<Result<void, CacheError>> => {
      try {
        await fs.mkdir(directory, { recursive: true });
      } catch (error) {
        return err(createSaveError(`Failed to create cache directory ${directory}`, error));
      }

      const file = fileFor(key);
      try {
        await writeFileAtomically(file, data);
      } catch (error) {
        return err(createSaveError(`Failed to write cache file ${file}`, error));
      }

      if (hasMagicPrefix(data)) {
        scheduler.schedule();
      }
      return ok(undefined);
    });

  const remove = (key: string): Promise<Result<void, CacheError>> =>
    executor.run(async (): Promise<Result<void, CacheError>> => {
      const file = fileFor(key);
      try {
        await fs.unlink(file);
      } catch (error) {
        if (errnoCode(error) !== 'ENOENT') {
          return err(createDeleteError(`Failed to delete cache file ${file}`, error));
        }
      }
      return ok(undefined);
    });

  const removeIf = (key: string, expected: Uint8Array): Promise<Result<boolean, CacheError>> =>
    executor.run(async (): Promise<Result<boolean, CacheError>> => {
      const file = fileFor(key);
      try {
        const current = await fs.readFile(file);
        if (!current.equals(expected)) {
          return ok(false);
        }
        await fs.unlink(file);
        return ok(true);
      } catch (error) {
        if (errnoCode(error) === 'ENOENT') {
          return ok(false);
        }
        return err(createDeleteError(`Failed to delete cache file ${file}`, error));
      }
    });

  const removeAll = (): Promise<Result<void, CacheError>> =>
    executor.run(async (): Promise<Result<void, CacheError>> => {
      let names: string[];
      try {
        names = await fs.readdir(directory);
      } catch (error) {
        if (errnoCode(error) === 'ENOENT') {
          return ok(undefined);
        }
        return err(createDeleteError(`Failed to list cache directory ${directory}`, error));
      }

      const failures: unknown[] = [];
      for (const name of names) {
        try {
          await fs.rm(path.join(directory, name), { recursive: true, force: true });
        } catch (error) {
          failures.push(error);
        }
      }

      if (failures.length > 0) {
        return err(
          createDeleteError(
            `Failed to delete ${String(failures.length)} of ${String(names.length)} cache files`,
            failures[0]
          )
        );
      }
      return ok(undefined);
    });

  return {
    directory,
    readData,
    writeData,
    remove,
    removeIf,
    removeAll,
    purgeExpired: sweep,
    close: scheduler.cancel,
  };
};
