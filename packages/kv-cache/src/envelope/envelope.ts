import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { createSaveError, type CacheError } from '../cache/errors.js';
import type { CacheEnvelope, StoredValue } from './types.js';

/** ASCII "FVCache1": marks bytes as an expiration envelope rather than raw payload */
export const MAGIC_PREFIX = new Uint8Array([0x46, 0x56, 0x43, 0x61, 0x63, 0x68, 0x65, 0x31]);

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * JSON body following the magic prefix.
 * `expiresAt` is written as ISO-8601; epoch milliseconds are accepted on read.
 */
const envelopeSchema = z.object({
  expiresAt: z.union([z.string().datetime({ offset: true }), z.number().finite()]).nullish(),
  payload: z.string().regex(BASE64_PATTERN),
});

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

const toTimestamp = (value: string | number | null | undefined): number | undefined => {
  if (value === null || value === undefined) {
    return undefined;
  }
  return typeof value === 'number' ? value : Date.parse(value);
};

/**
 * Checks whether bytes start with the envelope magic prefix.
 *
 * Only the prefix is inspected; the remainder may still fail to decode.
 */
export const hasMagicPrefix = (bytes: Uint8Array): boolean => {
  if (bytes.length <= MAGIC_PREFIX.length) {
    return false;
  }
  return MAGIC_PREFIX.every((byte, index) => bytes[index] === byte);
};

/**
 * Wraps a payload and optional expiration instant into envelope bytes.
 *
 * @param payload - Raw payload bytes
 * @param expiresAt - Expiration instant in epoch milliseconds; omit for "never expires"
 * @returns Result with the encoded bytes, or SAVE_FAILED if the timestamp cannot be serialized
 *
 * @example
 * ```typescript
 * const result = encodeEnvelope(new TextEncoder().encode('value'), Date.now() + 60_000);
 * if (result.isOk()) {
 *   await store.writeData(result.value, 'key');
 * }
 * ```
 */
export const encodeEnvelope = (
  payload: Uint8Array,
  expiresAt?: number
): Result<Uint8Array, CacheError> => {
  let json: string;
  try {
    json = JSON.stringify({
      expiresAt: expiresAt === undefined ? undefined : new Date(expiresAt).toISOString(),
      payload: Buffer.from(payload).toString('base64'),
    });
  } catch (error) {
    return err(createSaveError('Failed to encode cache envelope', error));
  }

  const body = textEncoder.encode(json);
  const bytes = new Uint8Array(MAGIC_PREFIX.length + body.length);
  bytes.set(MAGIC_PREFIX, 0);
  bytes.set(body, MAGIC_PREFIX.length);
  return ok(bytes);
};

/**
 * Decodes envelope bytes.
 *
 * Never throws: returns undefined for input without the prefix and for
 * prefixed input whose body is not a valid envelope.
 */
export const decodeEnvelope = (bytes: Uint8Array): CacheEnvelope | undefined => {
  if (!hasMagicPrefix(bytes)) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(textDecoder.decode(bytes.subarray(MAGIC_PREFIX.length)));
  } catch {
    return undefined;
  }

  const result = envelopeSchema.safeParse(parsed);
  if (!result.success) {
    return undefined;
  }

  return {
    expiresAt: toTimestamp(result.data.expiresAt),
    payload: new Uint8Array(Buffer.from(result.data.payload, 'base64')),
  };
};

/**
 * Classifies stored bytes so downstream logic never re-inspects the prefix.
 */
export const classifyStoredValue = (bytes: Uint8Array): StoredValue => {
  const envelope = decodeEnvelope(bytes);
  if (envelope === undefined) {
    return { kind: 'raw', bytes };
  }
  return { kind: 'wrapped', ...envelope };
};

/**
 * Whether an envelope's expiration instant has been reached.
 */
export const isExpired = (envelope: CacheEnvelope, now: number): boolean =>
  envelope.expiresAt !== undefined && envelope.expiresAt <= now;
