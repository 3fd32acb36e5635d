/**
 * Time source returning epoch milliseconds.
 *
 * Injected wherever expiration is evaluated so tests can move time
 * deterministically.
 */
export type Clock = () => number;

/**
 * Default clock backed by `Date.now`.
 */
export const systemClock: Clock = () => Date.now();

/**
 * Expiration for a single write: an absolute instant or a duration from now.
 */
export type Expiry =
  | {
      /** Absolute expiration instant (epoch milliseconds) */
      readonly expiresAt: number;
    }
  | {
      /** Duration in milliseconds, measured from the clock at write time */
      readonly expiresInMs: number;
    };

/**
 * Resolves an expiry to an absolute epoch-milliseconds instant.
 */
export const resolveExpiry = (expiry: Expiry, clock: Clock): number =>
  'expiresAt' in expiry ? expiry.expiresAt : clock() + expiry.expiresInMs;
