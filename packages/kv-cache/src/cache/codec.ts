/**
 * Converts application values to bytes and back.
 *
 * Implementations throw on failure; the cache client maps encode failures to
 * SAVE_FAILED and decode failures to FETCH_FAILED.
 */
export interface ValueCodec {
  readonly encode: (value: unknown) => Uint8Array;
  readonly decode: (bytes: Uint8Array) => unknown;
}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * UTF-8 JSON codec.
 *
 * Rejects values JSON cannot represent at the top level (`undefined`,
 * functions, symbols) instead of silently storing nothing.
 */
export const jsonCodec: ValueCodec = {
  encode: (value) => {
    const json: unknown = JSON.stringify(value);
    if (typeof json !== 'string') {
      throw new TypeError(`Cannot encode ${typeof value} as JSON`);
    }
    return textEncoder.encode(json);
  },
  decode: (bytes) => {
    const parsed: unknown = JSON.parse(textDecoder.decode(bytes));
    return parsed;
  },
};
