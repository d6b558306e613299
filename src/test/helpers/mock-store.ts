import { vi } from 'vitest';
import type { KeyvLike, KeyMaterial } from '../../types.js';

/**
 * Creates a mock Keyv-like store for testing.
 * Returns both the store and the underlying Map for direct data manipulation.
 */
export function createMockStore(): {
  store: KeyvLike;
  storedData: Map<string, unknown>;
} {
  const storedData = new Map<string, unknown>();

  // Values are cloned, as a serializing backend would
  const store: KeyvLike = {
    get: vi.fn((key: string) => Promise.resolve(storedData.get(key))),
    set: vi.fn((key: string, value: unknown) => {
      storedData.set(key, structuredClone(value));
      return Promise.resolve(true);
    }),
    delete: vi.fn((key: string) => Promise.resolve(storedData.delete(key))),
  };

  return { store, storedData };
}

/**
 * Builds key material without generating a key, for store tests.
 */
export function createKeyMaterial(overrides?: Partial<KeyMaterial>): KeyMaterial {
  const keyId = overrides?.keyId ?? 'kid-1';
  return {
    id: `id-${keyId}`,
    keyId,
    type: 'jws',
    algorithm: 'ES256',
    parameters: {
      kty: 'EC',
      crv: 'P-256',
      x: 'x-coordinate',
      y: 'y-coordinate',
      d: 'private-scalar',
      kid: keyId,
      alg: 'ES256',
      use: 'sig',
    },
    isRevoked: false,
    createdAt: 1_000,
    expiresAt: 1_000 + 90 * 24 * 60 * 60 * 1000,
    ...overrides,
  };
}
