/**
 * Redis connection for the shared cache.
 *
 * Callers depend on the small `CacheHandle` contract (prefixed keys, string
 * values) rather than on the driver.
 */

import { createClient, type RedisClientType } from 'redis';
import { logger } from './logger.js';
import { getErrorMessage } from './errors.js';

export interface RedisConfig {
  url: string;
  /** Milliseconds (default 5000) */
  connectTimeout?: number;
  /** Give up after this many reconnects; 0 disables reconnecting (default 10) */
  maxReconnectRetries?: number;
  /** Milliseconds between reconnects (default 1000) */
  reconnectDelay?: number;
}

let shared: RedisClientType | null = null;

/** Hide the password part of a redis:// URL */
function redact(url: string): string {
  return url.replace(/\/\/([^@/]*)@/, '//***@');
}

export async function connectRedis(target: string | RedisConfig): Promise<RedisClientType> {
  if (shared) return shared;

  const config: RedisConfig = typeof target === 'string' ? { url: target } : target;
  const { url, connectTimeout = 5000, maxReconnectRetries = 10, reconnectDelay = 1000 } = config;

  const client: RedisClientType = createClient({
    url,
    socket: {
      connectTimeout,
      reconnectStrategy: (retries: number) => {
        if (retries < maxReconnectRetries) return reconnectDelay;
        logger.error('Redis reconnect attempts exhausted', { retries });
        return new Error('Redis reconnect attempts exhausted');
      },
    },
  });
  client.on('error', (error: unknown) => {
    logger.error('Redis client error', { error: getErrorMessage(error) });
  });

  try {
    await client.connect();
  } catch (error) {
    logger.error('Failed to connect to Redis', { url: redact(url), error: getErrorMessage(error) });
    throw error;
  }

  logger.info('Redis connected', { url: redact(url) });
  shared = client;
  return client;
}

export async function checkRedisHealth(): Promise<{ healthy: boolean; latencyMs: number }> {
  if (!shared) return { healthy: false, latencyMs: -1 };

  const started = Date.now();
  try {
    await shared.ping();
    return { healthy: true, latencyMs: Date.now() - started };
  } catch (error) {
    logger.warn('Redis ping failed', { error: getErrorMessage(error) });
    return { healthy: false, latencyMs: -1 };
  }
}

export async function closeRedis(): Promise<void> {
  const client = shared;
  if (!client) return;
  shared = null;
  await client.quit();
  logger.info('Redis disconnected');
}

// ═══════════════════════════════════════════════════════════════════
// Cache Handle
// ═══════════════════════════════════════════════════════════════════

export interface CacheHandle {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<void>;
}

/**
 * Wrap a connected client as a CacheHandle. Keys are stored as `{prefix}:{key}`.
 */
export function createRedisCache(redisClient: RedisClientType, prefix: string): CacheHandle {
  const fullKey = (key: string) => `${prefix}:${key}`;
  return {
    async get(key) {
      return redisClient.get(fullKey(key));
    },
    async set(key, value, ttlSeconds) {
      if (ttlSeconds) {
        await redisClient.set(fullKey(key), value, { EX: ttlSeconds });
      } else {
        await redisClient.set(fullKey(key), value);
      }
    },
    async del(key) {
      await redisClient.del(fullKey(key));
    },
  };
}

/**
 * Read a JSON value through a cache, computing and storing it on a miss.
 * Cache failures fall through to `load`.
 */
export async function cached<T>(
  cache: CacheHandle | undefined,
  key: string,
  ttlSeconds: number,
  load: () => Promise<T>,
  revive: (raw: unknown) => T | null
): Promise<T> {
  if (!cache) return load();

  try {
    const hit = await cache.get(key);
    if (hit !== null) {
      const parsed: unknown = JSON.parse(hit);
      const revived = revive(parsed);
      if (revived !== null) return revived;
    }
  } catch (error) {
    logger.warn('Cache read failed', { key, error: getErrorMessage(error) });
  }

  const value = await load();
  try {
    await cache.set(key, JSON.stringify(value), ttlSeconds);
  } catch (error) {
    logger.warn('Cache write failed', { key, error: getErrorMessage(error) });
  }
  return value;
}
