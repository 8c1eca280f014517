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
} from './types.js';
export {
  createApiClientTokenFetcher,
  accessTokenCacheKey,
  dataAccessTokenCacheKey,
  DATA_ACCESS_TOKEN_PATH,
} from './api-client-token-fetcher.js';
export { createProtocolTokenFetcher, hashClientId } from './protocol-token-fetcher.js';
export { createManagementTokenFetcher } from './management-token-fetcher.js';
