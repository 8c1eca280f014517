/**
 * Fetcher configuration
 *
 * Each loader resolves values with priority: options > environment > defaults,
 * and throws when a required value is missing. Endpoint URLs given without a
 * scheme are prefixed with `https://`.
 *
 * | Variable                        | Used by                 |
 * | ------------------------------- | ----------------------- |
 * | `STREAM_TOKEN_API_KEY`          | API client, protocol    |
 * | `STREAM_TOKEN_AUTH_URL`         | API client, protocol    |
 * | `STREAM_TOKEN_DATA_ACCESS_URL`  | API client              |
 * | `STREAM_TOKEN_TENANT`           | protocol                |
 * | `STREAM_TOKEN_PROTOCOL_URL`     | protocol                |
 * | `STREAM_TOKEN_MANAGEMENT_URL`   | management              |
 * | `STREAM_TOKEN_CLIENT_ID`        | management              |
 * | `STREAM_TOKEN_CLIENT_SECRET`    | management              |
 *
 * @packageDocumentation
 */

import type {
  AccessCredentialScheme,
  ApiClientTokenFetcherConfig,
  ManagementTokenFetcherConfig,
  ProtocolTokenFetcherConfig,
} from '../fetchers/types.js';

/**
 * Prefixes a host with `https://` unless it already has an http(s) scheme.
 *
 * @example
 * ```typescript
 * ensureHttpsPrefix('api.example.com'); // 'https://api.example.com'
 * ensureHttpsPrefix('http://localhost:8080'); // 'http://localhost:8080'
 * ```
 */
export function ensureHttpsPrefix(host: string): string {
  if (host.startsWith('http://') || host.startsWith('https://')) {
    return host;
  }
  return `https://${host}`;
}

/**
 * Options for loading the API client fetcher configuration.
 */
export interface ApiClientFetcherConfigOptions {
  /** Override API key (default: STREAM_TOKEN_API_KEY env var) */
  readonly apiKey?: string;
  /** Override access-token URL (default: STREAM_TOKEN_AUTH_URL env var) */
  readonly authUrl?: string;
  /** Override data-access URL (default: STREAM_TOKEN_DATA_ACCESS_URL env var, else derived per token) */
  readonly dataAccessUrl?: string;
  /** Override credential scheme (default: apikey) */
  readonly authScheme?: AccessCredentialScheme;
}

/**
 * Loads the API client token fetcher configuration.
 *
 * @param options - Optional overrides for configuration values
 * @returns Complete fetcher configuration
 * @throws Error if the API key or access-token URL is missing
 *
 * @example
 * ```typescript
 * // Use environment variables
 * const config = loadApiClientFetcherConfig();
 *
 * // Fully programmatic
 * const config = loadApiClientFetcherConfig({
 *   apiKey: 'my-api-key',
 *   authUrl: 'api.example.com/auth/v0/token',
 * });
 * ```
 */
export function loadApiClientFetcherConfig(
  options: ApiClientFetcherConfigOptions = {}
): ApiClientTokenFetcherConfig {
  const apiKey = options.apiKey ?? process.env['STREAM_TOKEN_API_KEY'];
  const authUrl = options.authUrl ?? process.env['STREAM_TOKEN_AUTH_URL'];
  const dataAccessUrl = options.dataAccessUrl ?? process.env['STREAM_TOKEN_DATA_ACCESS_URL'];
  const authScheme = options.authScheme ?? 'apikey';

  if (!apiKey) {
    throw new Error(
      'API key is required. Provide via options.apiKey or STREAM_TOKEN_API_KEY environment variable.'
    );
  }

  if (!authUrl) {
    throw new Error(
      'Access-token URL is required. Provide via options.authUrl or STREAM_TOKEN_AUTH_URL environment variable.'
    );
  }

  const config: ApiClientTokenFetcherConfig = {
    apiKey,
    authUrl: ensureHttpsPrefix(authUrl),
    authScheme,
  };

  if (dataAccessUrl) {
    return { ...config, dataAccessUrl: ensureHttpsPrefix(dataAccessUrl) };
  }

  return config;
}

/**
 * Options for loading the protocol fetcher configuration.
 */
export interface ProtocolFetcherConfigOptions {
  /** Override tenant (default: STREAM_TOKEN_TENANT env var) */
  readonly tenant?: string;
  /** Override API key (default: STREAM_TOKEN_API_KEY env var) */
  readonly apiKey?: string;
  /** Override access-token URL (default: STREAM_TOKEN_AUTH_URL env var) */
  readonly authUrl?: string;
  /** Override protocol-token URL (default: STREAM_TOKEN_PROTOCOL_URL env var) */
  readonly protocolUrl?: string;
}

/**
 * Loads the protocol token fetcher configuration.
 *
 * @param options - Optional overrides for configuration values
 * @returns Complete fetcher configuration
 * @throws Error if any value is missing
 */
export function loadProtocolFetcherConfig(
  options: ProtocolFetcherConfigOptions = {}
): ProtocolTokenFetcherConfig {
  const tenant = options.tenant ?? process.env['STREAM_TOKEN_TENANT'];
  const apiKey = options.apiKey ?? process.env['STREAM_TOKEN_API_KEY'];
  const authUrl = options.authUrl ?? process.env['STREAM_TOKEN_AUTH_URL'];
  const protocolUrl = options.protocolUrl ?? process.env['STREAM_TOKEN_PROTOCOL_URL'];

  if (!tenant) {
    throw new Error(
      'Tenant is required. Provide via options.tenant or STREAM_TOKEN_TENANT environment variable.'
    );
  }

  if (!apiKey) {
    throw new Error(
      'API key is required. Provide via options.apiKey or STREAM_TOKEN_API_KEY environment variable.'
    );
  }

  if (!authUrl) {
    throw new Error(
      'Access-token URL is required. Provide via options.authUrl or STREAM_TOKEN_AUTH_URL environment variable.'
    );
  }

  if (!protocolUrl) {
    throw new Error(
      'Protocol-token URL is required. Provide via options.protocolUrl or STREAM_TOKEN_PROTOCOL_URL environment variable.'
    );
  }

  return {
    tenant,
    apiKey,
    authUrl: ensureHttpsPrefix(authUrl),
    protocolUrl: ensureHttpsPrefix(protocolUrl),
  };
}

/**
 * Options for loading the management fetcher configuration.
 */
export interface ManagementFetcherConfigOptions {
  /** Override OAuth token URL (default: STREAM_TOKEN_MANAGEMENT_URL env var) */
  readonly tokenUrl?: string;
  /** Override client id (default: STREAM_TOKEN_CLIENT_ID env var) */
  readonly clientId?: string;
  /** Override client secret (default: STREAM_TOKEN_CLIENT_SECRET env var) */
  readonly clientSecret?: string;
}

/**
 * Loads the management API token fetcher configuration.
 *
 * @param options - Optional overrides for configuration values
 * @returns Complete fetcher configuration
 * @throws Error if any value is missing
 */
export function loadManagementFetcherConfig(
  options: ManagementFetcherConfigOptions = {}
): ManagementTokenFetcherConfig {
  const tokenUrl = options.tokenUrl ?? process.env['STREAM_TOKEN_MANAGEMENT_URL'];
  const clientId = options.clientId ?? process.env['STREAM_TOKEN_CLIENT_ID'];
  const clientSecret = options.clientSecret ?? process.env['STREAM_TOKEN_CLIENT_SECRET'];

  if (!tokenUrl) {
    throw new Error(
      'Token URL is required. Provide via options.tokenUrl or STREAM_TOKEN_MANAGEMENT_URL environment variable.'
    );
  }

  if (!clientId) {
    throw new Error(
      'Client ID is required. Provide via options.clientId or STREAM_TOKEN_CLIENT_ID environment variable.'
    );
  }

  if (!clientSecret) {
    throw new Error(
      'Client secret is required. Provide via options.clientSecret or STREAM_TOKEN_CLIENT_SECRET environment variable.'
    );
  }

  return {
    tokenUrl: ensureHttpsPrefix(tokenUrl),
    clientId,
    clientSecret,
  };
}
