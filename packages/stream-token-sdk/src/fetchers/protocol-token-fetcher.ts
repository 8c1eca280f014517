/**
 * Protocol token fetcher for a device that authenticates with its own API key.
 *
 * @packageDocumentation
 */

import { createHash } from 'node:crypto';
import { err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import type { HttpClient } from '../http/types.js';
import { createFetchClient } from '../http/fetch-client.js';
import { createLogger } from '../logging/logger.js';
import { createTokenCache } from '../cache/token-cache.js';
import { generateCacheKey } from '../cache/cache-key.js';
import type { TokenError } from '../errors.js';
import { redactToken } from '../tokens/codec.js';
import { createIssuanceClient } from '../tokens/issuance-client.js';
import { parseAccessToken, type AccessToken } from '../tokens/access-token.js';
import type { TopicPermission } from '../tokens/permissions.js';
import { parseProtocolToken, type ProtocolToken } from '../tokens/protocol-token.js';
import { validateClientId } from '../validation/client-id.js';
import type { ProtocolTokenFetcher, ProtocolTokenFetcherConfig } from './types.js';

/**
 * Identifier sent to the protocol-token endpoint in place of the client id:
 * the lowercase hex SHA-256 digest of it.
 */
export const hashClientId = (clientId: string): string =>
  createHash('sha256').update(clientId).digest('hex');

/**
 * Creates a protocol token fetcher.
 *
 * Protocol tokens are cached per client id. The requested permissions only
 * shape the request that fills an empty or expired slot.
 *
 * @param config - Tenant, API key and endpoints
 * @param httpClient - HTTP client (optional)
 * @param logger - Logger (optional)
 * @returns ProtocolTokenFetcher instance
 *
 * @example
 * ```typescript
 * const fetcher = createProtocolTokenFetcher(loadProtocolFetcherConfig());
 * const token = await fetcher.getToken('sensor-01');
 * ```
 */
export const createProtocolTokenFetcher = (
  config: ProtocolTokenFetcherConfig,
  httpClient: HttpClient = createFetchClient(),
  logger: Logger = createLogger()
): ProtocolTokenFetcher => {
  const issuance = createIssuanceClient(httpClient, logger);
  const accessTokens = createTokenCache<AccessToken, TokenError>({ name: 'access-token', logger });
  const protocolTokens = createTokenCache<ProtocolToken, TokenError>({
    name: 'protocol-token',
    logger,
  });
  const accessKey = generateCacheKey(config.tenant, config.tenant);

  const fetchAccessToken = async (): Promise<Result<AccessToken, TokenError>> => {
    const response = await issuance.issue({
      url: config.authUrl,
      credentials: { scheme: 'apikey', apiKey: config.apiKey },
      body: { tenant: config.tenant },
    });
    return response.andThen(parseAccessToken);
  };

  const fetchProtocolToken = async (
    clientId: string,
    permissions: readonly TopicPermission[] | undefined
  ): Promise<Result<ProtocolToken, TokenError>> => {
    const access = await accessTokens.getOrFetch(accessKey, fetchAccessToken);
    if (access.isErr()) {
      return err(access.error);
    }

    const response = await issuance.issue({
      url: config.protocolUrl,
      credentials: { scheme: 'bearer', token: access.value.raw },
      body: {
        id: hashClientId(clientId),
        tenant: config.tenant,
        ...(permissions !== undefined && { claims: permissions }),
      },
    });

    const token: Result<ProtocolToken, TokenError> = response.andThen(parseProtocolToken);
    if (token.isOk()) {
      logger.debug(
        { clientId, token: redactToken(token.value.raw), expiresAt: token.value.expiresAt },
        'Issued protocol token'
      );
    }
    return token;
  };

  const getToken = async (
    clientId: string,
    permissions?: readonly TopicPermission[]
  ): Promise<Result<ProtocolToken, TokenError>> => {
    const valid = validateClientId(clientId);
    if (valid.isErr()) {
      return err(valid.error);
    }

    return protocolTokens.getOrFetch(clientId, () => fetchProtocolToken(clientId, permissions));
  };

  return {
    getToken,
    clearCache: () => {
      protocolTokens.clear();
      accessTokens.clear();
    },
  };
};
