import { createFileCacheProvider } from './file-provider';
import { createMemoryCacheProvider } from './memory-provider';
import type { CacheProvider } from './provider.interface';
import type { CacheDriver, CacheMeta, CacheValidator } from './types';

// =============================================================================
// PROVIDER FACTORY
// =============================================================================

export const createCacheProvider = <T>({
  driver,
  directory,
  validate,
}: {
  driver: CacheDriver;
  directory: string;
  validate: CacheValidator<T>;
}): CacheProvider<T> => {
  if (driver === 'memory') {
    return createMemoryCacheProvider<T>();
  }
  return createFileCacheProvider<T>(directory, validate);
};

// =============================================================================
// REQUEST DEDUPLICATION
// =============================================================================

/**
 * Share one in-flight promise between concurrent callers of the same key.
 * Each deduplicator tracks its own requests, keyed by cache key.
 */
export const createDeduplicator = <T>() => {
  const inFlightRequests = new Map<string, Promise<T>>();

  return (cacheKey: string, fetchFn: () => Promise<T>): Promise<T> => {
    const existing = inFlightRequests.get(cacheKey);
    if (existing) {
      return existing;
    }

    const promise = fetchFn().finally(() => {
      inFlightRequests.delete(cacheKey);
    });

    inFlightRequests.set(cacheKey, promise);
    return promise;
  };
};

// =============================================================================
// STALENESS CHECK
// =============================================================================

/**
 * Check if cache data is stale against the TTL (seconds) it was stored with
 */
export const isStale = (
  meta: CacheMeta | undefined | null,
  now: number = Date.now()
): boolean => {
  if (!meta) return true;

  const updatedAt = new Date(meta.updatedAt).getTime();
  if (Number.isNaN(updatedAt)) return true;

  const age = (now - updatedAt) / 1000;
  return age > meta.ttl;
};
