export interface CacheConfig {
  ttl: number;
}

export interface CacheMeta {
  updatedAt: string;
  ttl: number;
}

export type CacheDriver = 'memory' | 'file';

/**
 * Validates a value read back from storage. Returns null to treat the entry
 * as a miss.
 */
export type CacheValidator<T> = (value: unknown) => T | null;

export const TTL = {
  TEAM_STATS: 43200, // 12 hours - Understat updates after each matchday
} as const;
