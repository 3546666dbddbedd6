// Types
export type { CacheProvider } from './provider.interface';
export * from './types';

// Providers
export { createFileCacheProvider, toCacheFileName } from './file-provider';
export { createMemoryCacheProvider } from './memory-provider';

// Generic Cache Manager
export {
  createCacheProvider,
  createDeduplicator,
  isStale
} from './cache-manager';
export { createCacheAdminRoutes } from './cache-admin.routes';
