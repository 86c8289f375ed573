import { LRUCache } from 'lru-cache';

export type CacheKey = string;

export interface CacheAdapter<V extends {}> {
  get(key: CacheKey): V | undefined;
  set(key: CacheKey, value: V, ttlMillis?: number): void;
  del(key: CacheKey): void;
  clear(): void;
}

/**
 * In-memory LRU adapter using `lru-cache` v10+.
 */
export class InMemoryLRUAdapter<V extends {}> implements CacheAdapter<V> {
  private cache: LRUCache<CacheKey, V>;

  constructor(opts?: { max?: number; ttl?: number }) {
    this.cache = new LRUCache<CacheKey, V>({
      max: opts?.max ?? 5000,
      ttl: opts?.ttl ?? 1000 * 60 * 5,
    });
  }

  get(key: CacheKey): V | undefined {
    return this.cache.get(key);
  }

  set(key: CacheKey, value: V, ttlMillis?: number): void {
    if (typeof ttlMillis === 'number') {
      this.cache.set(key, value, { ttl: ttlMillis });
    } else {
      this.cache.set(key, value);
    }
  }

  del(key: CacheKey): void {
    this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }
}

/** Adapter used when result caching is disabled. */
export class NoopCacheAdapter<V extends {}> implements CacheAdapter<V> {
  get(_key: CacheKey): V | undefined {
    return undefined;
  }
  set(_key: CacheKey, _value: V, _ttlMillis?: number): void {}
  del(_key: CacheKey): void {}
  clear(): void {}
}

export function createResultCache<V extends {}>(ttlMs: number, max: number): CacheAdapter<V> {
  if (ttlMs <= 0) return new NoopCacheAdapter<V>();
  return new InMemoryLRUAdapter<V>({ max, ttl: ttlMs });
}
