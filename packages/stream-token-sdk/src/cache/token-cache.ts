import { ok, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import type { TokenLifetime } from '../tokens/types.js';
import { isTokenValid, nowInSeconds } from '../tokens/validity.js';
import { createLogger } from '../logging/logger.js';
import type { TokenCache, TokenSupplier } from './types.js';

/**
 * Options for creating a token cache.
 */
export interface TokenCacheOptions {
  /** Name used in log lines, e.g. "access-token" */
  readonly name?: string;
  /** Logger (default: a new logger) */
  readonly logger?: Logger;
}

/**
 * Creates an in-memory token cache with per-key single-flight fetching.
 *
 * @param options - Optional cache configuration
 * @returns A TokenCache instance
 *
 * @example
 * ```typescript
 * const cache = createTokenCache<AccessToken, TokenError>({ name: 'access-token' });
 * const result = await cache.getOrFetch(key, () => fetchAccessToken(request));
 * ```
 */
export const createTokenCache = <T extends TokenLifetime, E>(
  options: TokenCacheOptions = {}
): TokenCache<T, E> => {
  const name = options.name ?? 'token';
  const logger = (options.logger ?? createLogger()).child({ cache: name });
  const store = new Map<string, T>();
  const inflight = new Map<string, Promise<Result<T, E>>>();

  const get = (key: string): T | undefined => {
    const token = store.get(key);
    if (token === undefined) {
      return undefined;
    }
    return isTokenValid(token, nowInSeconds()) ? token : undefined;
  };

  const fetchInto = (key: string, supplier: TokenSupplier<T, E>): Promise<Result<T, E>> => {
    const request = supplier()
      .then((result) => {
        if (result.isOk()) {
          store.set(key, result.value);
          logger.trace({ key, expiresAt: result.value.expiresAt }, 'Stored fresh token');
        }
        return result;
      })
      .finally(() => {
        inflight.delete(key);
      });

    inflight.set(key, request);
    return request;
  };

  const getOrFetch = async (key: string, supplier: TokenSupplier<T, E>): Promise<Result<T, E>> => {
    const cached = get(key);
    if (cached !== undefined) {
      logger.trace({ key }, 'Valid token found in cache');
      return ok(cached);
    }

    const pending = inflight.get(key);
    if (pending !== undefined) {
      logger.trace({ key }, 'Joining in-flight fetch');
      return pending;
    }

    logger.trace({ key, cached: store.has(key) }, 'No valid token in cache, fetching');
    return fetchInto(key, supplier);
  };

  const deleteKey = (key: string): boolean => {
    return store.delete(key);
  };

  const clear = (): void => {
    store.clear();
  };

  const size = (): number => store.size;

  return {
    get,
    getOrFetch,
    delete: deleteKey,
    clear,
    size,
  };
};
