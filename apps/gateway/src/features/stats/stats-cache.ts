import { createHash } from 'node:crypto';
import { Result, ok } from 'neverthrow';
import {
  type CacheKey,
  type StatsValue,
  createCacheKey,
  createStatsValue,
} from '../../core/branded-types.js';
import { ErrorCode, type GatewayError } from '../../core/errors.js';
import { type KeyValueStore, type StoredValue, kvStore } from '../../lib/cache.js';
import { config } from '../../lib/config.js';
import { childLogger } from '../../lib/logger.js';
import { trackCacheOperation } from '../../lib/metrics.js';
import { mapUnknownErrorToGatewayError } from '../../lib/result.js';

const log = childLogger('stats-cache');

export interface StatsCacheOptions {
  namespace: string;
  ttlMs: number;
}

const NUMERIC_STRING = /^\d+$/;

const toStatsValue = (stored: StoredValue): StatsValue | null => {
  if (typeof stored === 'number') {
    return Number.isSafeInteger(stored) && stored >= 0 ? createStatsValue(stored) : null;
  }

  if (!NUMERIC_STRING.test(stored)) {
    return null;
  }

  const parsed = Number.parseInt(stored, 10);
  return Number.isSafeInteger(parsed) ? createStatsValue(parsed) : null;
};

/**
 * Memoizes extracted stats values per rendered fragment. Reads and writes
 * degrade to a miss when the store throws; invalidation reports the failure.
 */
export class StatsCache {
  private readonly namespace: string;
  private readonly ttlMs: number;

  constructor(
    private readonly store: KeyValueStore,
    options: StatsCacheOptions = {
      namespace: config.cacheNamespace,
      ttlMs: config.cacheTtlSec * 1000,
    }
  ) {
    this.namespace = options.namespace;
    this.ttlMs = options.ttlMs;
  }

  keyFor(fragment: string): CacheKey {
    const digest = createHash('sha256').update(fragment, 'utf8').digest('hex');
    return createCacheKey(`${this.namespace}${digest}`);
  }

  /** Key used when one counter value was cached per site. */
  legacySlotKey(): CacheKey {
    return createCacheKey(`${this.namespace}cached_stats`);
  }

  get(key: CacheKey): StatsValue | null {
    const read = Result.fromThrowable(
      () => this.store.get(key),
      (error) => error
    )();

    if (read.isErr()) {
      log.warn({ key, error: String(read.error) }, 'Cache read failed, treating as miss');
      trackCacheOperation('miss');
      return null;
    }

    const stored = read.value;
    if (stored === undefined) {
      trackCacheOperation('miss');
      return null;
    }

    const value = toStatsValue(stored);
    if (value === null) {
      log.warn({ key }, 'Evicting corrupted cache entry');
      trackCacheOperation('evict_corrupt');
      this.deleteQuietly(key);
      trackCacheOperation('miss');
      return null;
    }

    trackCacheOperation('hit');
    return value;
  }

  put(key: CacheKey, value: StatsValue, ttlMs: number = this.ttlMs): void {
    const write = Result.fromThrowable(
      () => this.store.set(key, value, ttlMs),
      (error) => error
    )();

    if (write.isErr()) {
      log.warn({ key, error: String(write.error) }, 'Cache write failed, result not cached');
      trackCacheOperation('set_failure');
      return;
    }

    trackCacheOperation('set');
  }

  /** Removes one entry; keys outside the namespace are left alone. */
  clear(key: string): Result<boolean, GatewayError> {
    if (!key.startsWith(this.namespace)) {
      return ok(false);
    }

    return Result.fromThrowable(
      () => this.store.delete(key),
      mapUnknownErrorToGatewayError(ErrorCode.CACHE_UNAVAILABLE)
    )();
  }

  clearAll(): Result<number, GatewayError> {
    return Result.fromThrowable(
      () => this.store.deleteByPrefix(this.namespace),
      mapUnknownErrorToGatewayError(ErrorCode.CACHE_UNAVAILABLE)
    )().map((cleared) => {
      trackCacheOperation('clear');
      return cleared;
    });
  }

  private deleteQuietly(key: CacheKey): void {
    const removal = this.clear(key);
    if (removal.isErr()) {
      log.warn({ key, error: removal.error.message }, 'Failed to evict corrupted cache entry');
    }
  }
}

export const statsCache = new StatsCache(kvStore);
