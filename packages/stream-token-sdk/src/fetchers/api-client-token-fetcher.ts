/**
 * Token broker for an API client.
 *
 * The API client holds the tenant's API key and issues data-access tokens on
 * behalf of downstream clients (typically devices or browser sessions) that
 * must never see the key.
 *
 * @packageDocumentation
 */

import { err, Result } from 'neverthrow';
import type { Logger } from 'pino';
import type { HttpClient } from '../http/types.js';
import { createFetchClient } from '../http/fetch-client.js';
import { createLogger } from '../logging/logger.js';
import { createTokenCache } from '../cache/token-cache.js';
import { generateCacheKey } from '../cache/cache-key.js';
import { ensureHttpsPrefix } from '../config/config.js';
import { createInvalidRequestError, type TokenError } from '../errors.js';
import { redactToken } from '../tokens/codec.js';
import { createIssuanceClient } from '../tokens/issuance-client.js';
import { parseAccessToken, STREAM_TOKEN_CLAIM, type AccessToken } from '../tokens/access-token.js';
import { parseDataAccessToken, type DataAccessToken } from '../tokens/data-access-token.js';
import type { IssuanceCredentials } from '../tokens/types.js';
import { validateClientId } from '../validation/client-id.js';
import type {
  AccessTokenRequest,
  ApiClientTokenFetcher,
  ApiClientTokenFetcherConfig,
  DataAccessTokenRequest,
} from './types.js';

/** Path of the data-access endpoint below the host named by an access token. */
export const DATA_ACCESS_TOKEN_PATH = '/datastreams/v0/mqtt/token';

const accessTokenBody = (request: AccessTokenRequest): Record<string, unknown> => ({
  tenant: request.tenant,
  ...(request.exp !== undefined && { exp: request.exp }),
  ...(request.claims !== undefined && { claims: { [STREAM_TOKEN_CLAIM]: request.claims } }),
});

const dataAccessTokenBody = (request: DataAccessTokenRequest): Record<string, unknown> => ({
  tenant: request.tenant,
  id: request.clientId,
  ...(request.exp !== undefined && { exp: request.exp }),
  ...(request.permissions !== undefined && { claims: request.permissions }),
  ...(request.clientClaims !== undefined && { dshclc: request.clientClaims }),
});

/**
 * Cache identity of an access token: the tenant and the client it is scoped
 * to, which is the tenant itself for unscoped tokens.
 */
export const accessTokenCacheKey = (request: AccessTokenRequest): string =>
  generateCacheKey(request.tenant, request.claims?.id ?? request.tenant);

/**
 * Cache identity of a data-access token. The requested expiry is not part of it.
 *
 * Permissions are reduced to fixed-order tuples and client claims are hashed
 * with sorted keys, so property order never splits a slot. Throws when the
 * client claims cannot be serialised.
 */
export const dataAccessTokenCacheKey = (request: DataAccessTokenRequest): string =>
  generateCacheKey(
    request.tenant,
    request.clientId,
    request.permissions?.map(({ action, resource }) => [
      action,
      resource.type,
      resource.stream,
      resource.prefix,
      resource.topic,
    ]) ?? null,
    request.clientClaims ?? null
  );

const safeDataAccessTokenCacheKey = Result.fromThrowable(
  dataAccessTokenCacheKey,
  createInvalidRequestError
);

/**
 * Creates a token fetcher for an API client.
 *
 * @param config - API key and endpoints
 * @param httpClient - HTTP client (optional)
 * @param logger - Logger (optional)
 * @returns ApiClientTokenFetcher instance
 *
 * @example
 * ```typescript
 * const fetcher = createApiClientTokenFetcher(loadApiClientFetcherConfig());
 *
 * const result = await fetcher.getOrFetchDataAccessToken({
 *   tenant: 'my-tenant',
 *   clientId: 'sensor-01',
 *   permissions: [createTopicPermission('subscribe', 'weather', '/tt', '#')],
 * });
 *
 * if (result.isOk()) {
 *   connect(result.value.claims.endpoint, mqttPort(result.value), result.value.raw);
 * }
 * ```
 */
export const createApiClientTokenFetcher = (
  config: ApiClientTokenFetcherConfig,
  httpClient: HttpClient = createFetchClient(),
  logger: Logger = createLogger()
): ApiClientTokenFetcher => {
  const issuance = createIssuanceClient(httpClient, logger);
  const accessTokens = createTokenCache<AccessToken, TokenError>({ name: 'access-token', logger });
  const dataAccessTokens = createTokenCache<DataAccessToken, TokenError>({
    name: 'data-access-token',
    logger,
  });

  const accessCredentials: IssuanceCredentials =
    config.authScheme === 'bearer'
      ? { scheme: 'bearer', token: config.apiKey }
      : { scheme: 'apikey', apiKey: config.apiKey };

  const fetchAccessToken = async (
    request: AccessTokenRequest
  ): Promise<Result<AccessToken, TokenError>> => {
    const response = await issuance.issue({
      url: config.authUrl,
      credentials: accessCredentials,
      body: accessTokenBody(request),
    });

    const token: Result<AccessToken, TokenError> = response.andThen(parseAccessToken);
    if (token.isOk()) {
      logger.debug(
        {
          tenant: request.tenant,
          token: redactToken(token.value.raw),
          expiresAt: token.value.expiresAt,
        },
        'Issued access token'
      );
    }
    return token;
  };

  const getOrFetchAccessToken = async (
    request: AccessTokenRequest
  ): Promise<Result<AccessToken, TokenError>> =>
    accessTokens.getOrFetch(accessTokenCacheKey(request), () => fetchAccessToken(request));

  const fetchDataAccessToken = async (
    request: DataAccessTokenRequest
  ): Promise<Result<DataAccessToken, TokenError>> => {
    const clientId = validateClientId(request.clientId);
    if (clientId.isErr()) {
      return err(clientId.error);
    }

    const access = await getOrFetchAccessToken({ tenant: request.tenant });
    if (access.isErr()) {
      return err(access.error);
    }

    const url =
      config.dataAccessUrl ??
      `${ensureHttpsPrefix(access.value.claims.endpoint)}${DATA_ACCESS_TOKEN_PATH}`;

    const response = await issuance.issue({
      url,
      credentials: { scheme: 'bearer', token: access.value.raw },
      body: dataAccessTokenBody(request),
    });

    const token: Result<DataAccessToken, TokenError> = response.andThen(parseDataAccessToken);
    if (token.isOk()) {
      logger.debug(
        {
          tenant: request.tenant,
          clientId: request.clientId,
          token: redactToken(token.value.raw),
          expiresAt: token.value.expiresAt,
        },
        'Issued data-access token'
      );
    }
    return token;
  };

  const getOrFetchDataAccessToken = async (
    request: DataAccessTokenRequest
  ): Promise<Result<DataAccessToken, TokenError>> => {
    const key = safeDataAccessTokenCacheKey(request);
    if (key.isErr()) {
      logger.debug({ tenant: request.tenant, clientId: request.clientId }, key.error.message);
      return err(key.error);
    }

    return dataAccessTokens.getOrFetch(key.value, () => fetchDataAccessToken(request));
  };

  return {
    fetchAccessToken,
    getOrFetchAccessToken,
    fetchDataAccessToken,
    getOrFetchDataAccessToken,
    clearAccessTokenCache: () => {
      accessTokens.clear();
    },
    clearDataAccessTokenCache: () => {
      dataAccessTokens.clear();
    },
    clearCache: () => {
      accessTokens.clear();
      dataAccessTokens.clear();
    },
  };
};
