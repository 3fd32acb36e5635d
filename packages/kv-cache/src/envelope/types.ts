/**
 * Decoded expiration envelope.
 */
export interface CacheEnvelope {
  /** Expiration instant in epoch milliseconds; undefined means never expires */
  readonly expiresAt: number | undefined;
  /** Original payload bytes */
  readonly payload: Uint8Array;
}

/**
 * Bytes as found in storage, classified by their magic prefix.
 *
 * Prefixed bytes that fail to decode are classified as `raw` and never expire.
 */
export type StoredValue =
  | {
      readonly kind: 'raw';
      readonly bytes: Uint8Array;
    }
  | ({
      readonly kind: 'wrapped';
    } & CacheEnvelope);
