import { LRUCache } from 'lru-cache';
import { config } from './config.js';
import { updateCacheSize } from './metrics.js';

export type StoredValue = string | number;

/**
 * Host key-value store with per-key expiry. Implementations may throw when the
 * backend is unavailable; callers decide how to degrade.
 */
export interface KeyValueStore {
  get(key: string): StoredValue | undefined;
  set(key: string, value: StoredValue, ttlMs: number): void;
  delete(key: string): boolean;
  deleteByPrefix(prefix: string): number;
  size(): number;
}

export class LruKeyValueStore implements KeyValueStore {
  private cache: LRUCache<string, StoredValue>;
  private ttlMs: number;

  constructor(maxSize: number = config.cacheMaxSize, ttlSeconds: number = config.cacheTtlSec) {
    this.ttlMs = ttlSeconds * 1000;
    this.cache = new LRUCache<string, StoredValue>({
      max: maxSize,
      ttl: this.ttlMs,
      updateAgeOnGet: false,
      updateAgeOnHas: false,
    });
    updateCacheSize(0);
  }

  get(key: string): StoredValue | undefined {
    // Reading an expired entry drops it
    const value = this.cache.get(key);
    updateCacheSize(this.cache.size);
    return value;
  }

  set(key: string, value: StoredValue, ttlMs: number = this.ttlMs): void {
    this.cache.set(key, value, { ttl: ttlMs });
    updateCacheSize(this.cache.size);
  }

  delete(key: string): boolean {
    const deleted = this.cache.delete(key);
    updateCacheSize(this.cache.size);
    return deleted;
  }

  deleteByPrefix(prefix: string): number {
    // Collect first: deleting while iterating the LRU list skips entries
    const matching = [...this.cache.keys()].filter((key) => key.startsWith(prefix));
    for (const key of matching) {
      this.cache.delete(key);
    }
    updateCacheSize(this.cache.size);
    return matching.length;
  }

  size(): number {
    return this.cache.size;
  }

  getStats() {
    return {
      size: this.cache.size,
      maxSize: this.cache.max,
      ttlMs: this.ttlMs,
    };
  }

  clear(): void {
    this.cache.clear();
    updateCacheSize(0);
  }
}

export const kvStore = new LruKeyValueStore();
