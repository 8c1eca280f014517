/**
 * Stream Token SDK - acquisition and caching of short-lived streaming platform tokens
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE: Token Fetchers
// ============================================================================

export {
  createApiClientTokenFetcher,
  createProtocolTokenFetcher,
  createManagementTokenFetcher,
  accessTokenCacheKey,
  dataAccessTokenCacheKey,
  hashClientId,
  DATA_ACCESS_TOKEN_PATH,
} from './fetchers/index.js';
export type {
  AccessCredentialScheme,
  ApiClientTokenFetcherConfig,
  ProtocolTokenFetcherConfig,
  ManagementTokenFetcherConfig,
  AccessTokenRequest,
  DataAccessTokenRequest,
  ApiClientTokenFetcher,
  ProtocolTokenFetcher,
  ManagementToken,
  ManagementTokenFetcher,
} from './fetchers/index.js';

// ============================================================================
// CORE: Tokens
// ============================================================================

export {
  isTokenValid,
  nowInSeconds,
  VALIDITY_MARGIN_SECONDS,
  splitToken,
  decodeClaims,
  parseSignedToken,
  redactToken,
  topicActionSchema,
  topicPermissionSchema,
  createTopicPermission,
  fullyQualifiedTopicName,
  STREAM_TOKEN_CLAIM,
  streamTokenClaimSchema,
  parseAccessToken,
  accessTokenClientId,
  DEFAULT_MQTT_PORT,
  DEFAULT_WEBSOCKET_PORT,
  brokerPortsSchema,
  parseDataAccessToken,
  mqttPort,
  websocketPort,
  websocketEndpoint,
  parseProtocolToken,
  createIssuanceClient,
  credentialHeaders,
} from './tokens/index.js';
export type {
  TokenLifetime,
  SignedToken,
  BaseClaims,
  IssuanceCredentials,
  JsonValue,
  TokenSegments,
  TopicAction,
  TopicResource,
  TopicPermission,
  AccessToken,
  AccessTokenClaims,
  StreamTokenClaim,
  DataAccessToken,
  DataAccessTokenClaims,
  BrokerPorts,
  ProtocolToken,
  ProtocolTokenClaims,
  IssuanceClient,
  IssuanceRequest,
  IssuanceError,
} from './tokens/index.js';

// ============================================================================
// CORE: Errors
// ============================================================================

export {
  fromHttpError,
  createMalformedTokenError,
  createMalformedClaimsError,
  createInvalidRequestError,
} from './errors.js';
export type {
  TokenError,
  TokenErrorCode,
  TransportError,
  IssuanceRejectedError,
  MalformedTokenError,
  MalformedClaimsError,
  InvalidClientIdError,
  InvalidRequestError,
} from './errors.js';

// ============================================================================
// UTILITIES: Validation
// ============================================================================

export { validateClientId, MAX_CLIENT_ID_LENGTH } from './validation/index.js';

// ============================================================================
// UTILITIES: Caching
// ============================================================================

export { createTokenCache, generateCacheKey, canonicalize } from './cache/index.js';
export type { TokenCache, TokenSupplier, TokenCacheOptions } from './cache/index.js';

// ============================================================================
// UTILITIES: Configuration
// ============================================================================

export {
  ensureHttpsPrefix,
  loadApiClientFetcherConfig,
  loadProtocolFetcherConfig,
  loadManagementFetcherConfig,
} from './config/index.js';
export type {
  ApiClientFetcherConfigOptions,
  ProtocolFetcherConfigOptions,
  ManagementFetcherConfigOptions,
} from './config/index.js';

// ============================================================================
// UTILITIES: Logging
// ============================================================================

export { createLogger, resolveLogLevel, LOG_LEVEL_ENV } from './logging/index.js';
export type { Logger, LevelWithSilent, LoggerOptions } from './logging/index.js';

// ============================================================================
// UTILITIES: HTTP Client
// ============================================================================

export { createFetchClient } from './http/index.js';
export type {
  HttpClient,
  HttpClientOptions,
  HttpRequest,
  HttpResponse,
  HttpError,
} from './http/index.js';
