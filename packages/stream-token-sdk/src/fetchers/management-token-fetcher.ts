/**
 * OAuth client-credentials tokens for the management (control-plane REST) API.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { HttpClient } from '../http/types.js';
import { createFetchClient } from '../http/fetch-client.js';
import { createLogger } from '../logging/logger.js';
import { createTokenCache } from '../cache/token-cache.js';
import { generateCacheKey } from '../cache/cache-key.js';
import { createMalformedClaimsError, fromHttpError, type TokenError } from '../errors.js';
import { nowInSeconds } from '../tokens/validity.js';
import type {
  ManagementToken,
  ManagementTokenFetcher,
  ManagementTokenFetcherConfig,
} from './types.js';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().int().nonnegative(),
});

/**
 * Creates a management API token fetcher.
 *
 * The token's expiry is computed locally as the fetch time plus
 * `expires_in`; the access token itself is opaque.
 *
 * @param config - Token endpoint and client credentials
 * @param httpClient - HTTP client (optional)
 * @param logger - Logger (optional)
 * @returns ManagementTokenFetcher instance
 *
 * @example
 * ```typescript
 * const fetcher = createManagementTokenFetcher(loadManagementFetcherConfig());
 * const header = await fetcher.getToken();
 * if (header.isOk()) {
 *   await fetch(url, { headers: { Authorization: header.value } });
 * }
 * ```
 */
export const createManagementTokenFetcher = (
  config: ManagementTokenFetcherConfig,
  httpClient: HttpClient = createFetchClient(),
  logger: Logger = createLogger()
): ManagementTokenFetcher => {
  const cache = createTokenCache<ManagementToken, TokenError>({ name: 'management-token', logger });
  const key = generateCacheKey(config.tokenUrl, config.clientId);

  const fetchToken = async (): Promise<Result<ManagementToken, TokenError>> => {
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: config.clientId,
      client_secret: config.clientSecret,
    });

    logger.debug({ url: config.tokenUrl, clientId: config.clientId }, 'Requesting management token');
    const fetchedAt = nowInSeconds();
    const response = await httpClient.json<unknown>({
      url: config.tokenUrl,
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: body.toString(),
    });

    if (response.isErr()) {
      return err(fromHttpError(response.error));
    }

    const parsed = tokenResponseSchema.safeParse(response.value.body);
    if (!parsed.success) {
      return err(
        createMalformedClaimsError(
          'Token response is missing access_token or expires_in',
          parsed.error
        )
      );
    }

    logger.debug({ expiresIn: parsed.data.expires_in }, 'Issued management token');
    return ok({
      raw: parsed.data.access_token,
      expiresAt: fetchedAt + parsed.data.expires_in,
      expiresIn: parsed.data.expires_in,
    });
  };

  const getToken = async (): Promise<Result<string, TokenError>> => {
    const token = await cache.getOrFetch(key, fetchToken);
    return token.map((value) => `Bearer ${value.raw}`);
  };

  return { getToken };
};
