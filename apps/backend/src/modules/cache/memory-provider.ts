import { logCacheOperation } from '../../utils/metrics';
import type { CacheProvider } from './provider.interface';
import type { CacheConfig, CacheMeta } from './types';

/**
 * In-memory cache provider
 *
 * Process-local store used for tests, for the MCP server when no cache
 * directory is wanted, and whenever CACHE_DRIVER=memory.
 */
export const createMemoryCacheProvider = <T = unknown>(): CacheProvider<T> => {
  const entries = new Map<string, { data: T; meta: CacheMeta }>();

  const set = async (key: string, data: T, config: CacheConfig): Promise<boolean> => {
    entries.set(key, {
      data,
      meta: {
        updatedAt: new Date().toISOString(),
        ttl: config.ttl,
      },
    });
    logCacheOperation('set', 'memory', key, true);
    return true;
  };

  const get = async (
    key: string
  ): Promise<{ data: T | null; meta: CacheMeta | null }> => {
    const entry = entries.get(key);
    logCacheOperation('get', 'memory', key, entry !== undefined);
    if (!entry) {
      return { data: null, meta: null };
    }
    return { data: entry.data, meta: entry.meta };
  };

  const exists = async (key: string): Promise<boolean> => entries.has(key);

  const deleteItem = async (key: string): Promise<boolean> => {
    const deleted = entries.delete(key);
    logCacheOperation('delete', 'memory', key, deleted);
    return deleted;
  };

  const clear = async (): Promise<number> => {
    const count = entries.size;
    entries.clear();
    logCacheOperation('clear', 'memory', '*', count > 0);
    return count;
  };

  return {
    set,
    get,
    exists,
    delete: deleteItem,
    clear,
  };
};
