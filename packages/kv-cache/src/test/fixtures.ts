/**
 * Shared test fixtures and constants.
 */

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { MAGIC_PREFIX } from '../envelope/envelope.js';

// ============================================================================
// Time Constants
// ============================================================================

/** One second in milliseconds */
export const ONE_SECOND_MS = 1000;

/** One minute in milliseconds */
export const ONE_MINUTE_MS = 60 * ONE_SECOND_MS;

/** 2024-01-01T00:00:00.000Z, fixed for determinism */
export const EPOCH_2024_MS = Date.UTC(2024, 0, 1);

// ============================================================================
// Bytes
// ============================================================================

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

/** UTF-8 bytes of a string */
export const bytesOf = (text: string): Uint8Array => textEncoder.encode(text);

/** String decoded from UTF-8 bytes */
export const textOf = (bytes: Uint8Array): string => textDecoder.decode(bytes);

/** Magic prefix followed by an arbitrary UTF-8 body */
export const withMagicPrefix = (body: string): Uint8Array => {
  const encoded = bytesOf(body);
  const bytes = new Uint8Array(MAGIC_PREFIX.length + encoded.length);
  bytes.set(MAGIC_PREFIX, 0);
  bytes.set(encoded, MAGIC_PREFIX.length);
  return bytes;
};

// ============================================================================
// Temporary Directories
// ============================================================================

/** Creates a fresh, empty directory under the OS temp directory */
export const createTempDirectory = (): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), 'kv-cache-test-'));

/** Removes a directory created by {@link createTempDirectory} */
export const removeTempDirectory = (directory: string): Promise<void> =>
  fs.rm(directory, { recursive: true, force: true });

/** Names of the files currently in a directory, sorted */
export const listFiles = async (directory: string): Promise<string[]> =>
  (await fs.readdir(directory)).sort();
