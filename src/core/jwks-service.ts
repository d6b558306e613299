import type {
  EncryptingCredentials,
  JsonWebKeyStore,
  JsonWebKeyType,
  JWK,
  JWKS,
  KeyMaterial,
  SecurityKey,
  SigningCredentials,
} from '../types.js';
import type { Logger } from '../utils/logger.js';
import { resolveJwksOptions, type JwksOptions, type ResolvedJwksOptions } from './config.js';
import type { JwkService } from './jwk-service.js';
import {
  isExpired,
  isSymmetric,
  toEncryptingCredentials,
  toPublicJwk,
  toSecurityKey,
  toSigningCredentials,
} from './key-material.js';

/** Revocation reasons recorded by automatic rotation */
export const ROTATION_REASONS = {
  EXPIRED: 'expired',
  ALGORITHM_CHANGED: 'algorithm-changed',
} as const;

interface CachedKey {
  material: KeyMaterial;
  cachedAt: number;
}

/**
 * Manages the signing and encrypting keys of an issuer.
 *
 * Every generated key is kept in the store. The newest valid key of each
 * type is the "current" key; it is rotated automatically when it expires
 * or when the configured algorithm changes. Older keys stay available for
 * validation and for the public JWKS.
 *
 * @example
 * ```typescript
 * import { Keyv } from 'keyv';
 * import { JwksService, JwkService, KeyvStore, createTokenHandler } from 'jwks-keyring';
 *
 * const jwks = new JwksService(new KeyvStore(new Keyv()), new JwkService(), { jws: 'RS256' });
 * const tokens = createTokenHandler();
 *
 * const token = await tokens.createToken({
 *   issuer: 'https://auth.example.com',
 *   subject: 'user-123',
 *   signingCredentials: await jwks.getCurrentSigningCredentials(),
 * });
 * ```
 */
export class JwksService {
  private readonly store: JsonWebKeyStore;
  private readonly jwkService: JwkService;
  private readonly options: Partial<JwksOptions>;
  private readonly defaults: ResolvedJwksOptions;
  private readonly logger: Logger;
  private readonly cache = new Map<JsonWebKeyType, CachedKey>();
  private readonly pending = new Map<string, Promise<KeyMaterial>>();

  constructor(store: JsonWebKeyStore, jwkService: JwkService, options: Partial<JwksOptions> = {}) {
    this.store = store;
    this.jwkService = jwkService;
    this.options = options;
    this.defaults = resolveJwksOptions(options);
    this.logger = this.defaults.logger;
  }

  /**
   * Generate and store a new signing key, making it the current one.
   *
   * @param options - Overrides for this call only (e.g. `{ jws: 'RS512' }`)
   */
  async generateSigningCredentials(options?: Partial<JwksOptions>): Promise<SigningCredentials> {
    const material = await this.generate('jws', this.resolve(options));
    return toSigningCredentials(material);
  }

  /**
   * Generate and store a new encrypting key, making it the current one.
   *
   * @param options - Overrides for this call only (e.g. `{ jwe: 'RSA-OAEP-256' }`)
   */
  async generateEncryptingCredentials(
    options?: Partial<JwksOptions>
  ): Promise<EncryptingCredentials> {
    const material = await this.generate('jwe', this.resolve(options));
    return toEncryptingCredentials(material);
  }

  /**
   * The current signing key, generated on first use and rotated when it
   * has expired or no longer matches the configured algorithm.
   */
  async getCurrentSigningCredentials(options?: Partial<JwksOptions>): Promise<SigningCredentials> {
    const material = await this.getCurrent('jws', this.resolve(options));
    return toSigningCredentials(material);
  }

  /**
   * The current encrypting key, with the same rotation rules as
   * {@link getCurrentSigningCredentials}.
   */
  async getCurrentEncryptingCredentials(
    options?: Partial<JwksOptions>
  ): Promise<EncryptingCredentials> {
    const material = await this.getCurrent('jwe', this.resolve(options));
    return toEncryptingCredentials(material);
  }

  /**
   * The newest keys of a type as verification (JWS) or encryption (JWE) keys.
   * Revoked keys are included so tokens they issued can still be checked;
   * revoked symmetric keys have nothing left to import and are skipped.
   *
   * @param quantity - Default: `algorithmsToKeep`
   */
  async getLastKeysCredentials(type: JsonWebKeyType, quantity?: number): Promise<SecurityKey[]> {
    const keys = await this.store.getLastKeys(quantity ?? this.defaults.algorithmsToKeep, type);
    const securityKeys: SecurityKey[] = [];
    for (const material of keys) {
      const securityKey = await toSecurityKey(material);
      if (securityKey) {
        securityKeys.push(securityKey);
      }
    }
    return securityKeys;
  }

  /**
   * Raw stored keys of both types, newest first.
   *
   * @param quantity - Default: `algorithmsToKeep` per type
   */
  async getLastKeys(quantity?: number): Promise<KeyMaterial[]> {
    return this.store.getLastKeys(quantity ?? this.defaults.algorithmsToKeep * 2);
  }

  /**
   * Revoke a key by kid. Its private members are dropped, and if it was
   * current, the next call for that type rotates.
   *
   * @returns false if no key has this kid
   */
  async revokeKey(keyId: string, reason?: string): Promise<boolean> {
    const material = await this.store.get(keyId);
    if (!material) {
      return false;
    }

    await this.store.revoke(material, reason);
    this.cache.delete(material.type);
    this.logger.info('Key revoked', { kid: keyId, type: material.type, reason });
    return true;
  }

  /**
   * Public JWKS document: the last `algorithmsToKeep` keys of each type,
   * private members removed. Symmetric keys are never published.
   */
  async getPublicJwks(): Promise<JWKS> {
    const keys: JWK[] = [];
    for (const type of ['jws', 'jwe'] as const) {
      const materials = await this.store.getLastKeys(this.defaults.algorithmsToKeep, type);
      for (const material of materials) {
        if (isSymmetric(material)) {
          continue;
        }
        keys.push({
          ...toPublicJwk(material.parameters),
          kid: material.keyId,
          alg: material.algorithm,
          use: type === 'jws' ? 'sig' : 'enc',
        });
      }
    }
    return { keys };
  }

  /** Forget the cached current keys; the store is read again on next use. */
  clearCache(): void {
    this.cache.clear();
  }

  private resolve(options?: Partial<JwksOptions>): ResolvedJwksOptions {
    return options
      ? resolveJwksOptions({ ...this.options, logger: this.logger, ...options })
      : this.defaults;
  }

  private async generate(type: JsonWebKeyType, options: ResolvedJwksOptions): Promise<KeyMaterial> {
    const generation = { keyPrefix: options.keyPrefix, daysUntilExpire: options.daysUntilExpire };
    const material =
      type === 'jws'
        ? await this.jwkService.generateSigningKey(options.jws, generation)
        : await this.jwkService.generateEncryptingKey(
            options.jwe,
            options.jweEncryption,
            generation
          );

    await this.store.store(material);
    this.cache.set(type, { material, cachedAt: Date.now() });

    options.logger.info('Key generated', {
      kid: material.keyId,
      type,
      algorithm: material.algorithm,
    });
    return material;
  }

  private async getCurrent(
    type: JsonWebKeyType,
    options: ResolvedJwksOptions
  ): Promise<KeyMaterial> {
    const cached = this.cache.get(type);
    if (
      cached &&
      Date.now() - cached.cachedAt < options.cacheTime &&
      !this.needsRotation(cached.material, options)
    ) {
      return cached.material;
    }

    const current = await this.store.getCurrent(type);
    if (current && !this.needsRotation(current, options)) {
      this.cache.set(type, { material: current, cachedAt: Date.now() });
      return current;
    }

    // Concurrent callers asking for the same algorithm share a single rotation
    const algorithm = type === 'jws' ? options.jws : `${options.jwe}+${options.jweEncryption}`;
    const pendingKey = `${type}:${current?.keyId ?? ''}:${algorithm}`;
    const inFlight = this.pending.get(pendingKey);
    if (inFlight) {
      return inFlight;
    }

    const rotation = this.rotate(type, current, options).finally(() => {
      this.pending.delete(pendingKey);
    });
    this.pending.set(pendingKey, rotation);
    return rotation;
  }

  private async rotate(
    type: JsonWebKeyType,
    current: KeyMaterial | undefined,
    options: ResolvedJwksOptions
  ): Promise<KeyMaterial> {
    if (current) {
      const reason = isExpired(current)
        ? ROTATION_REASONS.EXPIRED
        : ROTATION_REASONS.ALGORITHM_CHANGED;
      await this.store.revoke(current, reason);
      options.logger.info('Rotating key', { kid: current.keyId, type, reason });
    }
    return this.generate(type, options);
  }

  private needsRotation(material: KeyMaterial, options: ResolvedJwksOptions): boolean {
    if (material.isRevoked || isExpired(material)) {
      return true;
    }
    if (material.type === 'jws') {
      return material.algorithm !== options.jws;
    }
    return material.algorithm !== options.jwe || material.encryption !== options.jweEncryption;
  }
}
