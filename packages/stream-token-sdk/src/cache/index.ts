export type { TokenCache, TokenSupplier } from './types.js';
export { createTokenCache } from './token-cache.js';
export type { TokenCacheOptions } from './token-cache.js';
export { generateCacheKey, canonicalize } from './cache-key.js';
