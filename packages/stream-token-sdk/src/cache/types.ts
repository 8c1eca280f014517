import type { Result } from 'neverthrow';
import type { TokenLifetime } from '../tokens/types.js';

/**
 * Issues a fresh token for a cache slot.
 */
export type TokenSupplier<T, E> = () => Promise<Result<T, E>>;

/**
 * In-memory store of the most recently issued token per identity.
 *
 * Entries are created on first successful fetch and overwritten when found
 * expired. There is no eviction and no capacity bound.
 */
export interface TokenCache<T extends TokenLifetime, E> {
  /**
   * Gets a valid token from the cache.
   * @param key - The cache key
   * @returns The cached token, or undefined if absent or no longer valid
   */
  readonly get: (key: string) => T | undefined;

  /**
   * Returns the cached token if valid; otherwise fetches one.
   *
   * Concurrent calls for the same key share a single fetch. Fetches for other
   * keys are not blocked. A failed fetch leaves the entry as it was.
   *
   * @param key - The cache key
   * @param supplier - Issues a fresh token
   * @returns Result with a valid token, or the supplier's error
   */
  readonly getOrFetch: (key: string, supplier: TokenSupplier<T, E>) => Promise<Result<T, E>>;

  /**
   * Deletes a token from the cache.
   * @param key - The cache key
   * @returns true if the key existed, false otherwise
   */
  readonly delete: (key: string) => boolean;

  /**
   * Clears all tokens from the cache. Fetches already in flight still
   * complete and store their token.
   */
  readonly clear: () => void;

  /** Number of entries, valid or not */
  readonly size: () => number;
}
