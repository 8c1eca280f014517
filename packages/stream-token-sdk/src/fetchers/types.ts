import type { Result } from 'neverthrow';
import type { TokenError } from '../errors.js';
import type { AccessToken, StreamTokenClaim } from '../tokens/access-token.js';
import type { DataAccessToken } from '../tokens/data-access-token.js';
import type { TopicPermission } from '../tokens/permissions.js';
import type { ProtocolToken } from '../tokens/protocol-token.js';
import type { JsonValue, TokenLifetime } from '../tokens/types.js';

// ============================================================================
// Configuration
// ============================================================================

/**
 * How the API key is presented to the access-token endpoint.
 *
 * - `apikey`: sent in the `apikey` header
 * - `bearer`: sent as `Authorization: Bearer <key>`
 */
export type AccessCredentialScheme = 'apikey' | 'bearer';

/**
 * Configuration for the API client token fetcher.
 */
export interface ApiClientTokenFetcherConfig {
  /** API key of the tenant's API client */
  readonly apiKey: string;
  /** Access-token endpoint URL */
  readonly authUrl: string;
  /**
   * Data-access token endpoint URL.
   * When omitted, it is derived from the `endpoint` claim of the access token.
   */
  readonly dataAccessUrl?: string | undefined;
  /** Credential scheme for the access-token endpoint (default: "apikey") */
  readonly authScheme?: AccessCredentialScheme | undefined;
}

/**
 * Configuration for the protocol token fetcher.
 */
export interface ProtocolTokenFetcherConfig {
  /** Tenant the device belongs to */
  readonly tenant: string;
  /** API key used to obtain the tenant's access token */
  readonly apiKey: string;
  /** Access-token endpoint URL */
  readonly authUrl: string;
  /** Protocol-token endpoint URL */
  readonly protocolUrl: string;
}

/**
 * Configuration for the management API token fetcher.
 */
export interface ManagementTokenFetcherConfig {
  /** OAuth token endpoint URL */
  readonly tokenUrl: string;
  /** OAuth client id */
  readonly clientId: string;
  /** OAuth client secret */
  readonly clientSecret: string;
}

// ============================================================================
// Requests
// ============================================================================

/**
 * Request for a control-plane access token.
 */
export interface AccessTokenRequest {
  /** Tenant to issue the token for */
  readonly tenant: string;
  /** Requested expiry (Unix timestamp, seconds). Not part of the cache identity. */
  readonly exp?: number | undefined;
  /** Restricts the token to a client */
  readonly claims?: StreamTokenClaim | undefined;
}

/**
 * Request for a data-access token on behalf of a client.
 */
export interface DataAccessTokenRequest {
  /** Tenant the client belongs to */
  readonly tenant: string;
  /** Client the token is issued to */
  readonly clientId: string;
  /** Requested expiry (Unix timestamp, seconds). Not part of the cache identity. */
  readonly exp?: number | undefined;
  /** Requested topic permissions */
  readonly permissions?: readonly TopicPermission[] | undefined;
  /** Free-form client claims, sent as `dshclc` */
  readonly clientClaims?: JsonValue | undefined;
}

// ============================================================================
// Fetchers
// ============================================================================

/**
 * Token broker for an API client that issues tokens on behalf of other clients.
 *
 * Keeps one cache of access tokens and one of data-access tokens.
 */
export interface ApiClientTokenFetcher {
  /**
   * Always requests a new access token, bypassing the cache.
   */
  readonly fetchAccessToken: (request: AccessTokenRequest) => Promise<Result<AccessToken, TokenError>>;

  /**
   * Returns a valid cached access token or requests a new one.
   * Cached per tenant and client id (falling back to the tenant).
   */
  readonly getOrFetchAccessToken: (
    request: AccessTokenRequest
  ) => Promise<Result<AccessToken, TokenError>>;

  /**
   * Always requests a new data-access token, bypassing its cache.
   * The access token it is exchanged with still comes from the access token cache.
   */
  readonly fetchDataAccessToken: (
    request: DataAccessTokenRequest
  ) => Promise<Result<DataAccessToken, TokenError>>;

  /**
   * Returns a valid cached data-access token or requests a new one.
   * Cached per tenant, client id, permissions and client claims.
   */
  readonly getOrFetchDataAccessToken: (
    request: DataAccessTokenRequest
  ) => Promise<Result<DataAccessToken, TokenError>>;

  readonly clearAccessTokenCache: () => void;
  readonly clearDataAccessTokenCache: () => void;
  /** Clears both caches */
  readonly clearCache: () => void;
}

/**
 * Token fetcher for a device that obtains its own protocol tokens.
 */
export interface ProtocolTokenFetcher {
  /**
   * Returns a valid cached protocol token for the client or requests a new one.
   *
   * @param clientId - Client identifier, validated before any request
   * @param permissions - Requested topic permissions (only used on a fetch)
   */
  readonly getToken: (
    clientId: string,
    permissions?: readonly TopicPermission[]
  ) => Promise<Result<ProtocolToken, TokenError>>;

  /** Clears cached protocol and access tokens */
  readonly clearCache: () => void;
}

/**
 * A management API token, as issued by the OAuth token endpoint.
 */
export interface ManagementToken extends TokenLifetime {
  /** Lifetime the endpoint granted, in seconds */
  readonly expiresIn: number;
}

/**
 * Token fetcher for the management (control-plane REST) API.
 */
export interface ManagementTokenFetcher {
  /**
   * Returns a valid `Authorization` header value, fetching a new token when
   * the cached one is within 5 seconds of expiry.
   *
   * @returns Result with `Bearer <access_token>`
   */
  readonly getToken: () => Promise<Result<string, TokenError>>;
}
