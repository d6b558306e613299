// Public JWKS endpoint
export { createJwksRouter, DEFAULT_JWKS_PATH, DEFAULT_JWKS_CACHE_CONTROL } from './jwks-router.js';
export type { JwksRouterOptions, JwksSource } from './jwks-router.js';
