export { withExpiration } from './expiring.js';
export type { ExpirationOptions, ExpiringCacheStore } from './types.js';
