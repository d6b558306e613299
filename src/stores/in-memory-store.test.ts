import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryStore } from './in-memory-store.js';
import { createKeyMaterial } from '../test/helpers/index.js';
import { TEST_UNKNOWN_KID } from '../test/constants.js';

describe('InMemoryStore', () => {
  let store: InMemoryStore;

  beforeEach(() => {
    store = new InMemoryStore();
  });

  it('should return undefined when empty', async () => {
    expect(await store.getCurrent('jws')).toBeUndefined();
    expect(await store.getLastKeys(5)).toEqual([]);
    expect(await store.get(TEST_UNKNOWN_KID)).toBeUndefined();
  });

  it('should find stored keys by kid', async () => {
    const material = createKeyMaterial();
    await store.store(material);

    expect(await store.get('kid-1')).toEqual(material);
  });

  describe('getCurrent', () => {
    it('should return the newest key of the type', async () => {
      await store.store(createKeyMaterial({ keyId: 'old', createdAt: 1 }));
      await store.store(createKeyMaterial({ keyId: 'new', createdAt: 2 }));
      await store.store(createKeyMaterial({ keyId: 'enc', type: 'jwe', createdAt: 3 }));

      expect((await store.getCurrent('jws'))?.keyId).toBe('new');
      expect((await store.getCurrent('jwe'))?.keyId).toBe('enc');
    });

    it('should skip revoked keys', async () => {
      await store.store(createKeyMaterial({ keyId: 'old', createdAt: 1 }));
      const newest = createKeyMaterial({ keyId: 'new', createdAt: 2 });
      await store.store(newest);

      await store.revoke(newest);

      expect((await store.getCurrent('jws'))?.keyId).toBe('old');
    });
  });

  describe('getLastKeys', () => {
    it('should return at most quantity keys, newest first', async () => {
      await store.store(createKeyMaterial({ keyId: 'a', createdAt: 1 }));
      await store.store(createKeyMaterial({ keyId: 'b', createdAt: 2 }));
      await store.store(createKeyMaterial({ keyId: 'c', createdAt: 3 }));

      const keys = await store.getLastKeys(2);

      expect(keys.map((k) => k.keyId)).toEqual(['c', 'b']);
    });

    it('should filter by type', async () => {
      await store.store(createKeyMaterial({ keyId: 'sig', createdAt: 1 }));
      await store.store(createKeyMaterial({ keyId: 'enc', type: 'jwe', createdAt: 2 }));

      expect((await store.getLastKeys(5, 'jws')).map((k) => k.keyId)).toEqual(['sig']);
      expect((await store.getLastKeys(5)).map((k) => k.keyId)).toEqual(['enc', 'sig']);
    });

    it('should include revoked keys', async () => {
      const material = createKeyMaterial();
      await store.store(material);
      await store.revoke(material);

      const keys = await store.getLastKeys(5);

      expect(keys).toHaveLength(1);
      expect(keys[0].isRevoked).toBe(true);
    });
  });

  describe('revoke', () => {
    it('should strip private members and record the reason', async () => {
      const material = createKeyMaterial();
      await store.store(material);

      await store.revoke(material, 'compromised');

      const stored = await store.get('kid-1');
      expect(stored?.isRevoked).toBe(true);
      expect(stored?.revokedReason).toBe('compromised');
      expect(stored?.parameters.d).toBeUndefined();
    });

    it('should ignore unknown keys', async () => {
      await store.revoke(createKeyMaterial({ keyId: TEST_UNKNOWN_KID }));

      expect(await store.getLastKeys(5)).toEqual([]);
    });
  });

  describe('copies', () => {
    it('should not be affected by edits to the stored object', async () => {
      const material = createKeyMaterial();
      await store.store(material);

      material.isRevoked = true;

      expect((await store.get('kid-1'))?.isRevoked).toBe(false);
    });

    it('should not be affected by edits to returned records', async () => {
      const material = createKeyMaterial();
      await store.store(material);
      await store.revoke(material);

      const [listed] = await store.getLastKeys(5);
      listed.isRevoked = false;
      const fetched = await store.get('kid-1');
      if (fetched) {
        fetched.parameters.d = 'restored';
      }

      expect(await store.getCurrent('jws')).toBeUndefined();
      expect((await store.get('kid-1'))?.parameters.d).toBeUndefined();
    });

    it('should hand out a copy of the current key', async () => {
      await store.store(createKeyMaterial());

      const current = await store.getCurrent('jws');
      if (current) {
        current.keyId = 'renamed';
      }

      expect((await store.getCurrent('jws'))?.keyId).toBe('kid-1');
    });
  });

  it('should remove every key on clear', async () => {
    await store.store(createKeyMaterial());
    await store.store(createKeyMaterial({ keyId: 'kid-2', type: 'jwe' }));

    await store.clear();

    expect(await store.getLastKeys(5)).toEqual([]);
  });
});
