/**
 * Response cache for the API functions. Server only: never import this
 * from src/.
 */

import Redis from 'ioredis';

if (typeof window !== 'undefined') {
  throw new Error('Redis client cannot be used in browser code');
}

// Bump the version segment when a cached response shape changes
export const CACHE_KEYS = {
  BOOKS: 'books:v2',
  FACETS: 'facets:v2',
} as const;

export const CACHE_DURATION = {
  BOOKS: 60 * 60,
  FACETS: 60 * 60,
} as const;

/** Join key segments, e.g. `cacheKey(CACHE_KEYS.BOOKS, version, query)`. */
export const cacheKey = (...parts: string[]): string => parts.join(':');

let client: Redis | null = null;

/**
 * Shared client, created on first use. Null when no Redis URL is set, in
 * which case every read misses and every write is skipped.
 */
export function getRedis(): Redis | null {
  const url = process.env.READING_LIST_REDIS_URL || process.env.REDIS_URL;
  if (!url) return null;
  if (client) return client;

  client = new Redis(url, {
    lazyConnect: true,
    connectTimeout: 5000,
    commandTimeout: 5000,
    maxRetriesPerRequest: 3,
    retryStrategy: (attempt) => (attempt > 3 ? null : Math.min(attempt * 100, 1000)),
    enableReadyCheck: false,
    // A cold function should not queue commands behind a dead connection
    enableOfflineQueue: false,
  });
  client.on('error', (err: Error) => {
    console.error('Redis connection error:', err.message);
  });
  return client;
}

/** Cached JSON value, or null on a miss or any Redis failure. */
export async function getCached<T>(key: string): Promise<T | null> {
  const redis = getRedis();
  if (!redis) return null;
  try {
    const json = await redis.get(key);
    return json ? (JSON.parse(json) as T) : null;
  } catch (err) {
    console.error(`Redis get ${key} failed:`, err);
    return null;
  }
}

/** Store a JSON value for `ttlSeconds`. Resolves false when nothing was written. */
export async function setCached(key: string, value: unknown, ttlSeconds: number): Promise<boolean> {
  const redis = getRedis();
  if (!redis) return false;
  try {
    await redis.set(key, JSON.stringify(value), 'EX', ttlSeconds);
    return true;
  } catch (err) {
    console.error(`Redis set ${key} failed:`, err);
    return false;
  }
}
