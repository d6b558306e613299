import type { JsonWebKeyStore, JsonWebKeyType, KeyMaterial } from '../types.js';
import { revokeKeyMaterial, sortNewestFirst } from '../core/key-material.js';

/**
 * Process-local key store.
 * Keys are lost on restart; use {@link KeyvStore} to persist them.
 * Records are copied in and out, so callers never hold the stored objects.
 */
export class InMemoryStore implements JsonWebKeyStore {
  private keys: KeyMaterial[] = [];

  async store(material: KeyMaterial): Promise<void> {
    this.keys.push(structuredClone(material));
  }

  async getCurrent(type: JsonWebKeyType): Promise<KeyMaterial | undefined> {
    const current = sortNewestFirst(this.keys).find((key) => key.type === type && !key.isRevoked);
    return current && structuredClone(current);
  }

  async getLastKeys(quantity: number, type?: JsonWebKeyType): Promise<KeyMaterial[]> {
    const matching = type ? this.keys.filter((key) => key.type === type) : this.keys;
    return sortNewestFirst(matching)
      .slice(0, quantity)
      .map((key) => structuredClone(key));
  }

  async get(keyId: string): Promise<KeyMaterial | undefined> {
    const material = this.keys.find((key) => key.keyId === keyId);
    return material && structuredClone(material);
  }

  async revoke(material: KeyMaterial, reason?: string): Promise<void> {
    const index = this.keys.findIndex((key) => key.keyId === material.keyId);
    if (index === -1) {
      return;
    }
    this.keys[index] = revokeKeyMaterial(this.keys[index], reason);
  }

  async clear(): Promise<void> {
    this.keys = [];
  }
}
