import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { logCacheOperation, logEvent } from '../../utils/metrics';
import type { CacheProvider } from './provider.interface';
import type { CacheConfig, CacheMeta, CacheValidator } from './types';

/**
 * File cache provider
 *
 * One JSON file per key under `directory`, holding `{ meta, data }`.
 * Writes go to a temp file first and are renamed into place, so a reader
 * never sees a half-written entry. Unreadable or malformed files are misses.
 */

const CACHE_FILE_EXTENSION = '.json';

const envelopeSchema = z.object({
  meta: z.object({
    updatedAt: z.string(),
    ttl: z.number(),
  }),
  data: z.unknown(),
});

/**
 * Map a cache key to a safe file name
 */
export const toCacheFileName = (key: string): string =>
  `${key.replace(/[^a-zA-Z0-9._-]/g, '_')}${CACHE_FILE_EXTENSION}`;

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export const createFileCacheProvider = <T = unknown>(
  directory: string,
  validate: CacheValidator<T>
): CacheProvider<T> => {
  const pathFor = (key: string) => join(directory, toCacheFileName(key));

  const set = async (key: string, data: T, config: CacheConfig): Promise<boolean> => {
    const path = pathFor(key);
    const tmpPath = `${path}.${process.pid}.tmp`;
    const meta: CacheMeta = {
      updatedAt: new Date().toISOString(),
      ttl: config.ttl,
    };

    try {
      await mkdir(directory, { recursive: true });
      await writeFile(tmpPath, JSON.stringify({ meta, data }), 'utf8');
      await rename(tmpPath, path);
      logCacheOperation('set', 'file', key, true);
      return true;
    } catch (error) {
      logEvent('cache_write_failed', {
        key,
        error: error instanceof Error ? error.message : String(error),
      }, 'warn');
      await rm(tmpPath, { force: true });
      return false;
    }
  };

  const get = async (
    key: string
  ): Promise<{ data: T | null; meta: CacheMeta | null }> => {
    let raw: string;
    try {
      raw = await readFile(pathFor(key), 'utf8');
    } catch (error) {
      if (!isMissingFileError(error)) {
        logEvent('cache_read_failed', {
          key,
          error: error instanceof Error ? error.message : String(error),
        }, 'warn');
      }
      logCacheOperation('get', 'file', key, false);
      return { data: null, meta: null };
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw);
    } catch {
      logEvent('cache_entry_corrupt', { key }, 'warn');
      logCacheOperation('get', 'file', key, false);
      return { data: null, meta: null };
    }

    const envelope = envelopeSchema.safeParse(parsedJson);
    const data = envelope.success ? validate(envelope.data.data) : null;
    if (!envelope.success || data === null) {
      logEvent('cache_entry_invalid', { key }, 'warn');
      logCacheOperation('get', 'file', key, false);
      return { data: null, meta: null };
    }

    logCacheOperation('get', 'file', key, true);
    return { data, meta: envelope.data.meta };
  };

  const exists = async (key: string): Promise<boolean> => {
    const result = await get(key);
    return result.data !== null;
  };

  const deleteItem = async (key: string): Promise<boolean> => {
    try {
      await rm(pathFor(key));
      logCacheOperation('delete', 'file', key, true);
      return true;
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw error;
      }
      return false;
    }
  };

  const clear = async (): Promise<number> => {
    let files: string[];
    try {
      files = await readdir(directory);
    } catch (error) {
      if (isMissingFileError(error)) return 0;
      throw error;
    }

    const cacheFiles = files.filter((file) => file.endsWith(CACHE_FILE_EXTENSION));
    await Promise.all(
      cacheFiles.map((file) => rm(join(directory, file), { force: true }))
    );
    logCacheOperation('clear', 'file', directory, cacheFiles.length > 0);
    return cacheFiles.length;
  };

  return {
    set,
    get,
    exists,
    delete: deleteItem,
    clear,
  };
};
