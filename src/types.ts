/**
 * Foundation types for jwks-keyring.
 *
 * This file contains all shared interfaces with ZERO internal imports.
 * All modules (core, stores, jwt, adapters) import from here.
 *
 * @packageDocumentation
 */

import type { JWK, KeyLike } from 'jose';

export type { JWK };

// ============================================================================
// Algorithms
// ============================================================================

/**
 * Which half of JOSE a key serves: signatures (JWS) or encryption (JWE).
 */
export type JsonWebKeyType = 'jws' | 'jwe';

export const JWS_ALGORITHMS = [
  'HS256',
  'HS384',
  'HS512',
  'RS256',
  'RS384',
  'RS512',
  'PS256',
  'PS384',
  'PS512',
  'ES256',
  'ES384',
  'ES512',
] as const;

export type JwsAlgorithm = (typeof JWS_ALGORITHMS)[number];

export const JWE_ALGORITHMS = ['RSA-OAEP', 'RSA-OAEP-256', 'A128KW', 'A256KW'] as const;

export type JweAlgorithm = (typeof JWE_ALGORITHMS)[number];

export const JWE_ENCRYPTIONS = [
  'A128CBC-HS256',
  'A192CBC-HS384',
  'A256CBC-HS512',
  'A128GCM',
  'A192GCM',
  'A256GCM',
] as const;

export type JweEncryption = (typeof JWE_ENCRYPTIONS)[number];

// ============================================================================
// JWKS Types
// ============================================================================

/**
 * JWKS (JSON Web Key Set) type.
 */
export interface JWKS {
  keys: JWK[];
}

// ============================================================================
// Key Types
// ============================================================================

/**
 * A key as it is persisted in a {@link JsonWebKeyStore}.
 */
export interface KeyMaterial {
  /** Storage identifier (uuid) */
  id: string;
  /** Key ID published in the `kid` header and JWKS */
  keyId: string;
  type: JsonWebKeyType;
  /** JWS algorithm, or JWE key management algorithm */
  algorithm: JwsAlgorithm | JweAlgorithm;
  /** Content encryption algorithm (JWE keys only) */
  encryption?: JweEncryption;
  /**
   * The key as a JWK. Holds the private members while the key is active
   * and only the public members once it has been revoked.
   */
  parameters: JWK;
  isRevoked: boolean;
  revokedReason?: string;
  /** Unix timestamp (ms) */
  createdAt: number;
  /** Unix timestamp (ms) */
  expiresAt: number;
}

/**
 * An imported key usable for verification (JWS) or encryption (JWE).
 * For symmetric algorithms `key` is the shared secret.
 */
export interface SecurityKey {
  keyId: string;
  type: JsonWebKeyType;
  algorithm: JwsAlgorithm | JweAlgorithm;
  key: KeyLike | Uint8Array;
  /** Public JWK (the secret JWK for symmetric keys) */
  jwk: JWK;
}

/**
 * Everything needed to sign a JWT.
 */
export interface SigningCredentials {
  kid: string;
  algorithm: JwsAlgorithm;
  /** Private key or shared secret */
  key: KeyLike | Uint8Array;
  /** The matching verification key */
  securityKey: SecurityKey;
}

/**
 * Everything needed to encrypt, and decrypt, a JWT.
 */
export interface EncryptingCredentials {
  /** Public key (or secret) tokens are encrypted to */
  key: SecurityKey;
  algorithm: JweAlgorithm;
  encryption: JweEncryption;
  /** Private key or shared secret */
  decryptionKey: KeyLike | Uint8Array;
}

// ============================================================================
// Storage Types
// ============================================================================

/**
 * Persistence for generated keys.
 */
export interface JsonWebKeyStore {
  /** Persist a newly generated key. */
  store(material: KeyMaterial): Promise<void>;

  /** Newest non-revoked key of the given type. */
  getCurrent(type: JsonWebKeyType): Promise<KeyMaterial | undefined>;

  /** Up to `quantity` keys, newest first, revoked ones included. */
  getLastKeys(quantity: number, type?: JsonWebKeyType): Promise<KeyMaterial[]>;

  get(keyId: string): Promise<KeyMaterial | undefined>;

  /**
   * Mark a key as revoked and drop its private members.
   * Unknown keys are ignored.
   */
  revoke(material: KeyMaterial, reason?: string): Promise<void>;

  clear(): Promise<void>;
}

/**
 * A Keyv-compatible store interface.
 *
 * This interface matches the essential shape of a Keyv instance without
 * requiring the exact Keyv type. This allows users to pass any Keyv instance
 * regardless of the exact version installed. Values read back are checked
 * before use, so `get` is typed as returning `unknown`.
 */
export interface KeyvLike {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttl?: number): Promise<boolean>;
  delete(key: string): Promise<boolean>;
}
