/**
 * Expiration envelope wire format.
 *
 * @packageDocumentation
 */

export {
  MAGIC_PREFIX,
  classifyStoredValue,
  decodeEnvelope,
  encodeEnvelope,
  hasMagicPrefix,
  isExpired,
} from './envelope.js';
export type { CacheEnvelope, StoredValue } from './types.js';
