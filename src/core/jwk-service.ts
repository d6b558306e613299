import { randomBytes, randomUUID } from 'node:crypto';
import { exportJWK, generateKeyPair, generateSecret, type JWK, type KeyLike } from 'jose';

import type {
  JsonWebKeyType,
  JweAlgorithm,
  JweEncryption,
  JwsAlgorithm,
  KeyMaterial,
} from '../types.js';
import { UnsupportedAlgorithmError } from '../utils/errors.js';
import {
  DAY_MS,
  DEFAULT_DAYS_UNTIL_EXPIRE,
  DEFAULT_KEY_PREFIX,
  DEFAULT_RSA_MODULUS_LENGTH,
} from './config.js';

/**
 * Per-key settings for {@link JwkService}.
 */
export interface KeyGenerationOptions {
  /** Prepended to the random key ID. Default: `<hostname>_` */
  keyPrefix?: string;
  /** Default: 90 */
  daysUntilExpire?: number;
}

export interface JwkServiceOptions {
  /** RSA modulus length in bits. Default: 2048 */
  modulusLength?: number;
}

/**
 * Generates keys as {@link KeyMaterial}, ready to be stored.
 *
 * Asymmetric keys come from `jose`'s `generateKeyPair`, symmetric ones
 * (HS*, A*KW) from `generateSecret`. The stored JWK always carries
 * `kid`, `alg` and `use`.
 */
export class JwkService {
  private readonly modulusLength: number;

  constructor(options: JwkServiceOptions = {}) {
    this.modulusLength = options.modulusLength ?? DEFAULT_RSA_MODULUS_LENGTH;
  }

  /**
   * Generate a JWS key.
   *
   * @example
   * ```typescript
   * const material = await new JwkService().generateSigningKey('ES256', { keyPrefix: 'api_' });
   * material.parameters; // { kty: 'EC', crv: 'P-256', x, y, d, kid: 'api_...', alg: 'ES256', use: 'sig' }
   * ```
   */
  async generateSigningKey(
    algorithm: JwsAlgorithm,
    options: KeyGenerationOptions = {}
  ): Promise<KeyMaterial> {
    let key: KeyLike | Uint8Array;

    if (algorithm.startsWith('HS')) {
      key = await generateSecret(algorithm, { extractable: true });
    } else if (algorithm.startsWith('RS') || algorithm.startsWith('PS')) {
      ({ privateKey: key } = await generateKeyPair(algorithm, {
        modulusLength: this.modulusLength,
        extractable: true,
      }));
    } else if (algorithm.startsWith('ES')) {
      ({ privateKey: key } = await generateKeyPair(algorithm, { extractable: true }));
    } else {
      throw new UnsupportedAlgorithmError(algorithm);
    }

    return this.buildMaterial('jws', algorithm, await exportJWK(key), options);
  }

  /**
   * Generate a JWE key.
   * RSA-OAEP* produce an RSA key pair, A128KW/A256KW a key-wrapping secret.
   */
  async generateEncryptingKey(
    algorithm: JweAlgorithm,
    encryption: JweEncryption,
    options: KeyGenerationOptions = {}
  ): Promise<KeyMaterial> {
    let key: KeyLike | Uint8Array;

    if (algorithm.startsWith('RSA-OAEP')) {
      ({ privateKey: key } = await generateKeyPair(algorithm, {
        modulusLength: this.modulusLength,
        extractable: true,
      }));
    } else if (algorithm === 'A128KW' || algorithm === 'A256KW') {
      key = await generateSecret(algorithm, { extractable: true });
    } else {
      throw new UnsupportedAlgorithmError(algorithm);
    }

    const material = this.buildMaterial('jwe', algorithm, await exportJWK(key), options);
    return { ...material, encryption };
  }

  private buildMaterial(
    type: JsonWebKeyType,
    algorithm: JwsAlgorithm | JweAlgorithm,
    jwk: JWK,
    options: KeyGenerationOptions
  ): KeyMaterial {
    const keyId = `${options.keyPrefix ?? DEFAULT_KEY_PREFIX}${randomBytes(16).toString('base64url')}`;
    const createdAt = Date.now();
    const days = options.daysUntilExpire ?? DEFAULT_DAYS_UNTIL_EXPIRE;

    return {
      id: randomUUID(),
      keyId,
      type,
      algorithm,
      parameters: {
        ...jwk,
        kid: keyId,
        alg: algorithm,
        use: type === 'jws' ? 'sig' : 'enc',
      },
      isRevoked: false,
      createdAt,
      expiresAt: createdAt + days * DAY_MS,
    };
  }
}
