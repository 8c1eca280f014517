import type { TokenLifetime } from './types.js';

/**
 * Seconds before expiry at which a token is already treated as stale.
 */
export const VALIDITY_MARGIN_SECONDS = 5;

/**
 * Current time in whole seconds since the epoch.
 */
export const nowInSeconds = (): number => Math.floor(Date.now() / 1000);

/**
 * Checks whether a token can still be handed out.
 *
 * A placeholder with `expiresAt = 0` is never valid.
 *
 * @param token - The token to check
 * @param now - Current time in seconds (default: now)
 * @returns true if the token expires at least 5 seconds after `now`
 */
export const isTokenValid = (token: TokenLifetime, now: number = nowInSeconds()): boolean =>
  token.expiresAt >= now + VALIDITY_MARGIN_SECONDS;
