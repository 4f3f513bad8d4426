import { describe, it, expect } from '@jest/globals';
import { MemoryKeyValueStore } from '../store/keyValueStore';

describe('MemoryKeyValueStore', () => {
  it('should keep values without a TTL', async () => {
    const store = new MemoryKeyValueStore(() => 0);
    await store.set('a', '1');
    expect(await store.get('a')).toBe('1');
    expect(await store.get('missing')).toBeNull();
  });

  it('should expire values after their TTL', async () => {
    let now = 0;
    const store = new MemoryKeyValueStore(() => now);
    await store.set('search:1', 'x', 10);

    now = 9999;
    expect(await store.get('search:1')).toBe('x');
    now = 10000;
    expect(await store.get('search:1')).toBeNull();
    expect(store.size).toBe(0);
  });

  it('should not store values with a non-positive TTL', async () => {
    const store = new MemoryKeyValueStore(() => 0);
    await store.set('a', '1');
    await store.set('a', '2', 0);
    expect(await store.get('a')).toBeNull();
  });

  it('should list live keys by prefix and sweep expired ones', async () => {
    let now = 0;
    const store = new MemoryKeyValueStore(() => now);
    await store.set('search:1', 'x', 5);
    await store.set('search:2', 'y', 50);
    await store.set('searches:owner:2', '2', 50);
    await store.set('revoked:1', 'z');

    now = 6000;
    expect((await store.keys('search:')).sort()).toEqual(['search:2']);
    expect(store.size).toBe(3);
  });

  it('should delete and clear', async () => {
    const store = new MemoryKeyValueStore();
    await store.set('a', '1');
    await store.set('b', '2');
    await store.delete('a');
    expect(await store.get('a')).toBeNull();
    await store.close();
    expect(store.size).toBe(0);
  });
});
