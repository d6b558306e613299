/**
 * jwks-keyring
 *
 * Signing and encrypting key management for JWT issuers: key generation,
 * automatic rotation, key history, a public JWKS document, and token
 * creation/validation on top of `jose`.
 *
 * ## Package Exports
 *
 * - `jwks-keyring` - JwksService, JwkService, stores, token handler, utilities
 * - `jwks-keyring/express` - createJwksRouter (public JWKS endpoint)
 *
 * @example
 * ```typescript
 * import { Keyv } from 'keyv';
 * import { JwksService, JwkService, KeyvStore, createTokenHandler } from 'jwks-keyring';
 *
 * const jwks = new JwksService(new KeyvStore(new Keyv()), new JwkService(), {
 *   jws: 'RS256',
 *   daysUntilExpire: 30,
 * });
 * const handler = createTokenHandler();
 *
 * const token = await handler.createToken({
 *   issuer: 'https://auth.example.com',
 *   audience: 'api',
 *   subject: 'user-123',
 *   signingCredentials: await jwks.getCurrentSigningCredentials(),
 * });
 *
 * const result = await handler.validateToken(token, {
 *   issuer: 'https://auth.example.com',
 *   audience: 'api',
 *   signingKeys: await jwks.getLastKeysCredentials('jws'),
 * });
 * ```
 *
 * @packageDocumentation
 */

// Key management
export { JwksService, ROTATION_REASONS } from './core/jwks-service.js';
export { JwkService } from './core/jwk-service.js';
export type { JwkServiceOptions, KeyGenerationOptions } from './core/jwk-service.js';
export {
  isExpired,
  revokeKeyMaterial,
  toEncryptingCredentials,
  toPublicJwk,
  toSecurityKey,
  toSigningCredentials,
} from './core/key-material.js';

// Stores
export { InMemoryStore } from './stores/in-memory-store.js';
export { KeyvStore } from './stores/keyv-store.js';
export type { KeyvStoreOptions } from './stores/keyv-store.js';

// Tokens
export { createTokenHandler, DEFAULT_TOKEN_LIFETIME_SECONDS } from './jwt/token-handler.js';
export type {
  TokenDescriptor,
  TokenHandler,
  TokenHandlerOptions,
  TokenValidationParameters,
  TokenValidationResult,
} from './jwt/token-handler.js';

// All types - from foundation types.ts
export { JWE_ALGORITHMS, JWE_ENCRYPTIONS, JWS_ALGORITHMS } from './types.js';
export type {
  JWK,
  JWKS,
  JsonWebKeyType,
  JwsAlgorithm,
  JweAlgorithm,
  JweEncryption,
  KeyMaterial,
  SecurityKey,
  SigningCredentials,
  EncryptingCredentials,
  JsonWebKeyStore,
  KeyvLike,
} from './types.js';

// Errors
export { KeyManagementError, UnsupportedAlgorithmError, ConfigurationError } from './utils/errors.js';

// Logger utilities
export { createConsoleLogger, noopLogger } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';

// Configuration
export {
  DEFAULT_JWS_ALGORITHM,
  DEFAULT_JWE_ALGORITHM,
  DEFAULT_JWE_ENCRYPTION,
  DEFAULT_DAYS_UNTIL_EXPIRE,
  DEFAULT_ALGORITHMS_TO_KEEP,
  DEFAULT_CACHE_TIME_MS,
  DEFAULT_RSA_MODULUS_LENGTH,
  DEFAULT_KEY_PREFIX,
  STORAGE_NAMESPACES,
  resolveJwksOptions,
  loadJwksOptionsFromEnv,
} from './core/config.js';
export type { JwksOptions, ResolvedJwksOptions } from './core/config.js';
