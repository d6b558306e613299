import type { JsonWebKeyStore, JsonWebKeyType, KeyMaterial, KeyvLike } from '../types.js';
import { revokeKeyMaterial, sortNewestFirst } from '../core/key-material.js';
import { STORAGE_NAMESPACES } from '../core/config.js';
import { noopLogger, type Logger } from '../utils/logger.js';

const KEY_TYPES: readonly JsonWebKeyType[] = ['jws', 'jwe'];

function isKeyMaterial(value: unknown): value is KeyMaterial {
  return (
    typeof value === 'object' &&
    value !== null &&
    'keyId' in value &&
    typeof value.keyId === 'string' &&
    'type' in value &&
    (value.type === 'jws' || value.type === 'jwe') &&
    'parameters' in value &&
    typeof value.parameters === 'object' &&
    value.parameters !== null &&
    'algorithm' in value &&
    typeof value.algorithm === 'string' &&
    'isRevoked' in value &&
    typeof value.isRevoked === 'boolean' &&
    'createdAt' in value &&
    typeof value.createdAt === 'number' &&
    'expiresAt' in value &&
    typeof value.expiresAt === 'number'
  );
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export interface KeyvStoreOptions {
  /** Prefix for every entry this store writes. Default: 'jwks' */
  namespace?: string;
  logger?: Logger;
}

/**
 * Key store backed by any Keyv-compatible instance (in-memory, Redis, SQLite, ...).
 *
 * Each key is saved under `<namespace>:key:<kid>`; a per-type index at
 * `<namespace>:index:<type>` lists kids in insertion order so keys can be
 * listed without scanning the backend.
 *
 * @example
 * ```typescript
 * import { Keyv } from 'keyv';
 * import KeyvRedis from '@keyv/redis';
 *
 * const store = new KeyvStore(new Keyv({ store: new KeyvRedis('redis://localhost:6379') }));
 * const jwks = new JwksService(store, new JwkService());
 * ```
 */
export class KeyvStore implements JsonWebKeyStore {
  private readonly keyv: KeyvLike;
  private readonly namespace: string;
  private readonly logger: Logger;
  private writes: Promise<void> = Promise.resolve();

  constructor(keyv: KeyvLike, options: KeyvStoreOptions = {}) {
    this.keyv = keyv;
    this.namespace = options.namespace ?? STORAGE_NAMESPACES.KEYS;
    this.logger = options.logger ?? noopLogger;
  }

  async store(material: KeyMaterial): Promise<void> {
    await this.serialize(async () => {
      await this.keyv.set(this.key(material.keyId), material);
      const index = await this.readIndex(material.type);
      if (!index.includes(material.keyId)) {
        await this.keyv.set(this.indexKey(material.type), [...index, material.keyId]);
      }
    });

    this.logger.debug('Key stored', { kid: material.keyId, type: material.type });
  }

  async getCurrent(type: JsonWebKeyType): Promise<KeyMaterial | undefined> {
    const keys = await this.readKeys(type);
    return sortNewestFirst(keys).find((key) => !key.isRevoked);
  }

  async getLastKeys(quantity: number, type?: JsonWebKeyType): Promise<KeyMaterial[]> {
    const types = type ? [type] : KEY_TYPES;
    const keys: KeyMaterial[] = [];
    for (const keyType of types) {
      keys.push(...(await this.readKeys(keyType)));
    }
    return sortNewestFirst(keys).slice(0, quantity);
  }

  async get(keyId: string): Promise<KeyMaterial | undefined> {
    const value = await this.keyv.get(this.key(keyId));
    if (value === undefined) {
      return undefined;
    }
    if (!isKeyMaterial(value)) {
      this.logger.warn('Ignoring malformed key entry', { kid: keyId });
      return undefined;
    }
    return value;
  }

  async revoke(material: KeyMaterial, reason?: string): Promise<void> {
    await this.serialize(async () => {
      const stored = await this.get(material.keyId);
      if (!stored) {
        return;
      }
      await this.keyv.set(this.key(stored.keyId), revokeKeyMaterial(stored, reason));
      this.logger.debug('Key revoked', { kid: stored.keyId, reason });
    });
  }

  /**
   * Delete every key this store wrote. Other entries in the same Keyv
   * instance are left alone.
   */
  async clear(): Promise<void> {
    await this.serialize(async () => {
      for (const type of KEY_TYPES) {
        for (const keyId of await this.readIndex(type)) {
          await this.keyv.delete(this.key(keyId));
        }
        await this.keyv.delete(this.indexKey(type));
      }
    });
  }

  // Index updates are read-modify-write, so writes run one at a time.
  private serialize(task: () => Promise<void>): Promise<void> {
    const run = this.writes.then(task);
    this.writes = run.catch((error: unknown) => {
      this.logger.error('Key store write failed', error);
    });
    return run;
  }

  private async readIndex(type: JsonWebKeyType): Promise<string[]> {
    const index = await this.keyv.get(this.indexKey(type));
    return isStringArray(index) ? index : [];
  }

  private async readKeys(type: JsonWebKeyType): Promise<KeyMaterial[]> {
    const keys: KeyMaterial[] = [];
    for (const keyId of await this.readIndex(type)) {
      const material = await this.get(keyId);
      if (material) {
        keys.push(material);
      }
    }
    return keys;
  }

  private key(keyId: string): string {
    return `${this.namespace}:key:${keyId}`;
  }

  private indexKey(type: JsonWebKeyType): string {
    return `${this.namespace}:index:${type}`;
  }
}
