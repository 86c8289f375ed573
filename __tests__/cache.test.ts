import { createResultCache, InMemoryLRUAdapter, NoopCacheAdapter } from '../lib/cache';

describe('cache adapters', () => {
  test('in-memory adapter set/get/del', () => {
    const cache = new InMemoryLRUAdapter<{ a: number }>({ max: 10, ttl: 1000 });
    cache.set('k1', { a: 1 }, 500);
    expect(cache.get('k1')).toEqual({ a: 1 });
    cache.del('k1');
    expect(cache.get('k1')).toBeUndefined();
  });

  test('entries expire after their ttl', async () => {
    const cache = new InMemoryLRUAdapter<string>({ max: 10, ttl: 20 });
    cache.set('k', 'v');
    await new Promise((r) => setTimeout(r, 40));
    expect(cache.get('k')).toBeUndefined();
  });

  test('clear drops everything', () => {
    const cache = new InMemoryLRUAdapter<number>();
    cache.set('a', 1);
    cache.set('b', 2);
    cache.clear();
    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('b')).toBeUndefined();
  });

  test('createResultCache returns a no-op adapter when ttl is 0', () => {
    const cache = createResultCache<number>(0, 10);
    expect(cache).toBeInstanceOf(NoopCacheAdapter);
    cache.set('x', 1);
    expect(cache.get('x')).toBeUndefined();
  });

  test('createResultCache returns an LRU adapter for a positive ttl', () => {
    const cache = createResultCache<number>(1000, 10);
    cache.set('x', 1);
    expect(cache.get('x')).toBe(1);
  });
});
