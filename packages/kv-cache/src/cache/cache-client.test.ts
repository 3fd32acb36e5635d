import { promises as fs } from 'node:fs';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  createCacheClient,
  createFileCacheClient,
  createMemoryCacheClient,
  noopCacheClient,
} from './cache-client.js';
import type { ValueCodec } from './codec.js';
import { hasMagicPrefix } from '../envelope/envelope.js';
import { createSilentLogger } from '../logging/logger.js';
import { cacheFileName } from '../storage/key-hash.js';
import { createMemoryCacheStore } from '../storage/memory-store.js';
import {
  bytesOf,
  createTempDirectory,
  listFiles,
  removeTempDirectory,
  EPOCH_2024_MS,
  ONE_MINUTE_MS,
} from '../test/fixtures.js';
import { createFakeTimer } from '../test/mocks.js';

const Greeting = z.object({ name: z.string(), count: z.number() });

describe('createCacheClient', () => {
  describe('read', () => {
    describe('given a value written with write', () => {
      it('returns the decoded, validated value', async () => {
        const cache = createMemoryCacheClient();
        await cache.write({ name: 'hello', count: 42 }, 'greeting');

        const result = await cache.read('greeting', Greeting);

        expect(result._unsafeUnwrap()).toEqual({ name: 'hello', count: 42 });
      });
    });

    describe('given a missing key', () => {
      it('returns ok(undefined)', async () => {
        const cache = createMemoryCacheClient();

        expect((await cache.read('missing', Greeting))._unsafeUnwrap()).toBeUndefined();
      });
    });

    describe('given a stored value of another shape', () => {
      it('returns FETCH_FAILED', async () => {
        const cache = createMemoryCacheClient();
        await cache.write({ name: 1 }, 'greeting');

        const error = (await cache.read('greeting', Greeting))._unsafeUnwrapErr();

        expect(error.code).toBe('FETCH_FAILED');
        expect(error.message).toBe('Cached value does not match the expected shape');
      });
    });

    describe('given bytes that are not JSON', () => {
      it('returns FETCH_FAILED', async () => {
        const cache = createMemoryCacheClient();
        await cache.writeData(bytesOf('{oops'), 'greeting');

        const error = (await cache.read('greeting', Greeting))._unsafeUnwrapErr();

        expect(error.code).toBe('FETCH_FAILED');
        expect(error.message).toBe('Failed to decode cached value');
      });
    });

    describe('given bytes that are not UTF-8', () => {
      it('returns FETCH_FAILED', async () => {
        const cache = createMemoryCacheClient();
        await cache.writeData(new Uint8Array([0xff, 0xfe]), 'greeting');

        expect((await cache.read('greeting', z.unknown()))._unsafeUnwrapErr().code).toBe(
          'FETCH_FAILED'
        );
      });
    });
  });

  describe('write', () => {
    describe('given undefined', () => {
      it('returns SAVE_FAILED', async () => {
        const cache = createMemoryCacheClient();

        const error = (await cache.write(undefined, 'k'))._unsafeUnwrapErr();

        expect(error.code).toBe('SAVE_FAILED');
        expect(error.message).toBe('Failed to encode value');
      });
    });

    describe('given a BigInt', () => {
      it('returns SAVE_FAILED', async () => {
        const cache = createMemoryCacheClient();

        expect((await cache.write(10n, 'k'))._unsafeUnwrapErr().code).toBe('SAVE_FAILED');
      });
    });

    describe('given no expiry and no default TTL', () => {
      it('stores the JSON bytes unwrapped', async () => {
        const store = createMemoryCacheStore();
        const cache = createCacheClient(store);

        await cache.write({ name: 'hello', count: 42 }, 'greeting');

        expect((await store.readData('greeting'))._unsafeUnwrap()).toEqual(
          bytesOf('{"name":"hello","count":42}')
        );
      });
    });

    describe('given an explicit expiry', () => {
      it('expires the value at the resolved instant', async () => {
        const timer = createFakeTimer(EPOCH_2024_MS);
        const cache = createCacheClient(createMemoryCacheStore(), { clock: timer.now });

        await cache.write({ name: 'hello', count: 42 }, 'greeting', { expiresInMs: 1_000 });
        timer.advance(999);
        expect((await cache.read('greeting', Greeting))._unsafeUnwrap()).toEqual({
          name: 'hello',
          count: 42,
        });

        timer.advance(1);
        expect((await cache.read('greeting', Greeting))._unsafeUnwrap()).toBeUndefined();
      });
    });

    describe('given a default TTL', () => {
      it('applies it to plain writes', async () => {
        const timer = createFakeTimer(EPOCH_2024_MS);
        const cache = createMemoryCacheClient({ defaultTtlMs: ONE_MINUTE_MS, clock: timer.now });

        await cache.write('value', 'k');
        timer.advance(ONE_MINUTE_MS);

        expect((await cache.read('k', z.string()))._unsafeUnwrap()).toBeUndefined();
      });
    });
  });

  describe('given a custom codec', () => {
    it('uses it in both directions', async () => {
      const upperCodec: ValueCodec = {
        encode: (value) => bytesOf(String(value).toUpperCase()),
        decode: (bytes) => new TextDecoder().decode(bytes).toLowerCase(),
      };
      const store = createMemoryCacheStore();
      const cache = createCacheClient(store, { codec: upperCodec });

      await cache.write('hello', 'k');

      expect((await store.readData('k'))._unsafeUnwrap()).toEqual(bytesOf('HELLO'));
      expect((await cache.read('k', z.string()))._unsafeUnwrap()).toBe('hello');
    });
  });
});

describe('noopCacheClient', () => {
  it('accepts writes and never returns data', async () => {
    expect((await noopCacheClient.write({ name: 'hello', count: 42 }, 'k')).isOk()).toBe(true);
    expect((await noopCacheClient.read('k', Greeting))._unsafeUnwrap()).toBeUndefined();
  });
});

describe('createFileCacheClient', () => {
  it('persists envelopes to disk and deletes them once expired', async () => {
    const directory = await createTempDirectory();
    const timer = createFakeTimer(EPOCH_2024_MS);
    const cache = createFileCacheClient({
      directory,
      defaultTtlMs: ONE_MINUTE_MS,
      clock: timer.now,
      logger: createSilentLogger(),
      purge: { minIntervalMs: 3_600_000, delayMs: 3_600_000 },
    });

    try {
      await cache.write({ name: 'hello', count: 42 }, 'greeting');
      const onDisk = await fs.readFile(path.join(directory, cacheFileName('greeting')));
      expect(hasMagicPrefix(onDisk)).toBe(true);
      expect(cache.directory).toBe(directory);

      timer.advance(ONE_MINUTE_MS);

      expect((await cache.read('greeting', Greeting))._unsafeUnwrap()).toBeUndefined();
      expect(await listFiles(directory)).toEqual([]);
    } finally {
      cache.close();
      await removeTempDirectory(directory);
    }
  });

  it('purges expired entries on demand using the same clock', async () => {
    const directory = await createTempDirectory();
    const timer = createFakeTimer(EPOCH_2024_MS);
    const cache = createFileCacheClient({
      directory,
      clock: timer.now,
      logger: createSilentLogger(),
      purge: { minIntervalMs: 3_600_000, delayMs: 3_600_000 },
    });

    try {
      await cache.write('short', 'short', { expiresInMs: 1_000 });
      await cache.write('long', 'long', { expiresInMs: ONE_MINUTE_MS });
      timer.advance(1_000);

      expect((await cache.purgeExpired())._unsafeUnwrap()).toBe(1);
      expect(await listFiles(directory)).toEqual([cacheFileName('long')]);
    } finally {
      cache.close();
      await removeTempDirectory(directory);
    }
  });
});
