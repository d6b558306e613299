import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Keyv } from 'keyv';
import { KeyvStore } from './keyv-store.js';
import { createKeyMaterial, createMockStore } from '../test/helpers/index.js';
import { noopLogger } from '../utils/logger.js';
import type { KeyvLike } from '../types.js';
import { TEST_UNKNOWN_KID } from '../test/constants.js';

describe('KeyvStore', () => {
  let keyv: KeyvLike;
  let storedData: Map<string, unknown>;
  let logger: typeof noopLogger;
  let store: KeyvStore;

  beforeEach(() => {
    ({ store: keyv, storedData } = createMockStore());
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    store = new KeyvStore(keyv, { logger });
  });

  describe('store', () => {
    it('should save the key and add it to the type index', async () => {
      const material = createKeyMaterial();

      await store.store(material);

      expect(storedData.get('jwks:key:kid-1')).toEqual(material);
      expect(storedData.get('jwks:index:jws')).toEqual(['kid-1']);
      expect(logger.debug).toHaveBeenCalledWith('Key stored', { kid: 'kid-1', type: 'jws' });
    });

    it('should not index the same kid twice', async () => {
      const material = createKeyMaterial();

      await store.store(material);
      await store.store(material);

      expect(storedData.get('jwks:index:jws')).toEqual(['kid-1']);
    });

    it('should keep every kid when stores run concurrently', async () => {
      await Promise.all([
        store.store(createKeyMaterial({ keyId: 'a' })),
        store.store(createKeyMaterial({ keyId: 'b' })),
        store.store(createKeyMaterial({ keyId: 'c' })),
      ]);

      expect(storedData.get('jwks:index:jws')).toEqual(['a', 'b', 'c']);
    });

    it('should use the configured namespace', async () => {
      const namespaced = new KeyvStore(keyv, { namespace: 'issuer-a' });

      await namespaced.store(createKeyMaterial());

      expect(storedData.has('issuer-a:key:kid-1')).toBe(true);
      expect(storedData.get('issuer-a:index:jws')).toEqual(['kid-1']);
    });

    it('should log and reject a failed write, then keep accepting writes', async () => {
      const failure = new Error('backend unavailable');
      vi.mocked(keyv.set).mockRejectedValueOnce(failure);

      await expect(store.store(createKeyMaterial())).rejects.toThrow('backend unavailable');
      expect(logger.error).toHaveBeenCalledWith('Key store write failed', failure);

      await store.store(createKeyMaterial({ keyId: 'kid-2' }));
      expect(storedData.get('jwks:index:jws')).toEqual(['kid-2']);
    });
  });

  describe('get', () => {
    it('should return undefined for an unknown kid', async () => {
      expect(await store.get(TEST_UNKNOWN_KID)).toBeUndefined();
    });

    it('should ignore malformed entries', async () => {
      storedData.set('jwks:key:broken', { keyId: 'broken' });

      expect(await store.get('broken')).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledWith('Ignoring malformed key entry', { kid: 'broken' });
    });

    it('should treat an entry without expiresAt as missing', async () => {
      const { expiresAt: _expiresAt, ...incomplete } = createKeyMaterial();
      storedData.set('jwks:key:kid-1', incomplete);
      storedData.set('jwks:index:jws', ['kid-1']);

      expect(await store.get('kid-1')).toBeUndefined();
      expect(await store.getCurrent('jws')).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledWith('Ignoring malformed key entry', { kid: 'kid-1' });
    });

    it('should treat an entry with a non-boolean isRevoked as missing', async () => {
      storedData.set('jwks:key:kid-1', { ...createKeyMaterial(), isRevoked: 'no' });

      expect(await store.get('kid-1')).toBeUndefined();
    });
  });

  describe('getCurrent', () => {
    it('should return the newest non-revoked key of the type', async () => {
      await store.store(createKeyMaterial({ keyId: 'old', createdAt: 1 }));
      const newest = createKeyMaterial({ keyId: 'new', createdAt: 2 });
      await store.store(newest);
      await store.store(createKeyMaterial({ keyId: 'enc', type: 'jwe', createdAt: 3 }));

      expect((await store.getCurrent('jws'))?.keyId).toBe('new');

      await store.revoke(newest);

      expect((await store.getCurrent('jws'))?.keyId).toBe('old');
    });

    it('should skip indexed kids whose entry is gone', async () => {
      await store.store(createKeyMaterial());
      storedData.delete('jwks:key:kid-1');

      expect(await store.getCurrent('jws')).toBeUndefined();
    });
  });

  describe('getLastKeys', () => {
    it('should merge both types, newest first', async () => {
      await store.store(createKeyMaterial({ keyId: 'sig-1', createdAt: 1 }));
      await store.store(createKeyMaterial({ keyId: 'enc-1', type: 'jwe', createdAt: 2 }));
      await store.store(createKeyMaterial({ keyId: 'sig-2', createdAt: 3 }));

      expect((await store.getLastKeys(2)).map((k) => k.keyId)).toEqual(['sig-2', 'enc-1']);
      expect((await store.getLastKeys(5, 'jws')).map((k) => k.keyId)).toEqual(['sig-2', 'sig-1']);
    });
  });

  describe('revoke', () => {
    it('should persist the revoked form of the key', async () => {
      const material = createKeyMaterial();
      await store.store(material);

      await store.revoke(material, 'compromised');

      expect(storedData.get('jwks:key:kid-1')).toEqual({
        ...material,
        parameters: {
          kty: 'EC',
          crv: 'P-256',
          x: 'x-coordinate',
          y: 'y-coordinate',
          kid: 'kid-1',
          alg: 'ES256',
          use: 'sig',
        },
        isRevoked: true,
        revokedReason: 'compromised',
      });
      expect(logger.debug).toHaveBeenCalledWith('Key revoked', {
        kid: 'kid-1',
        reason: 'compromised',
      });
    });

    it('should not write anything for an unknown kid', async () => {
      await store.revoke(createKeyMaterial({ keyId: TEST_UNKNOWN_KID }));

      expect(keyv.set).not.toHaveBeenCalled();
    });
  });

  describe('clear', () => {
    it('should delete only the entries this store wrote', async () => {
      storedData.set('sessions:abc', { user: 'someone' });
      await store.store(createKeyMaterial());
      await store.store(createKeyMaterial({ keyId: 'kid-2', type: 'jwe' }));

      await store.clear();

      expect([...storedData.keys()]).toEqual(['sessions:abc']);
    });
  });

  describe('with a Keyv instance', () => {
    it('should round-trip keys through Keyv', async () => {
      const keyvStore = new KeyvStore(new Keyv());
      const material = createKeyMaterial();

      await keyvStore.store(material);
      await keyvStore.revoke(material, 'rotated');

      const stored = await keyvStore.get('kid-1');
      expect(stored?.isRevoked).toBe(true);
      expect(stored?.parameters.d).toBeUndefined();
      expect(await keyvStore.getCurrent('jws')).toBeUndefined();
      expect((await keyvStore.getLastKeys(5)).map((k) => k.keyId)).toEqual(['kid-1']);
    });
  });
});
