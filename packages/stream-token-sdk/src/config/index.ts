export {
  ensureHttpsPrefix,
  loadApiClientFetcherConfig,
  loadProtocolFetcherConfig,
  loadManagementFetcherConfig,
} from './config.js';
export type {
  ApiClientFetcherConfigOptions,
  ProtocolFetcherConfigOptions,
  ManagementFetcherConfigOptions,
} from './config.js';
