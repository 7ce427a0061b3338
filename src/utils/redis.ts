/**
 * Shared Redis connection for the client registry and the grant store.
 */

import { Redis } from 'ioredis';
import { config } from './config.js';
import { logger } from './logger.js';

const KEY_PREFIX = 'oauth2:';

let sharedClient: Redis | null = null;

/**
 * Build a namespaced key, e.g. `redisKey('code', abc)` -> `oauth2:code:abc`.
 */
export function redisKey(namespace: string, id: string): string {
  return `${KEY_PREFIX}${namespace}:${id}`;
}

/**
 * Lazily connect to REDIS_URL. Returns null when Redis is not configured,
 * in which case callers fall back to in-memory stores.
 */
export function getRedisClient(): Redis | null {
  if (!config.redisUrl) return null;

  if (!sharedClient) {
    sharedClient = new Redis(config.redisUrl, {
      maxRetriesPerRequest: 3,
      retryStrategy(times: number) {
        const delay = Math.min(times * 100, 3000);
        logger.warn({ attempt: times, delayMs: delay }, 'Redis reconnecting');
        return delay;
      },
    });

    sharedClient.on('error', (err) => {
      logger.error({ err }, 'Redis connection error');
    });

    sharedClient.on('connect', () => {
      logger.info('Redis connected');
    });
  }

  return sharedClient;
}

/**
 * Round-trip a PING. `{ ok: false, latencyMs: 0 }` without Redis.
 */
export async function pingRedis(): Promise<{ ok: boolean; latencyMs: number }> {
  const client = getRedisClient();
  if (!client) {
    return { ok: false, latencyMs: 0 };
  }

  const start = Date.now();
  try {
    await client.ping();
    return { ok: true, latencyMs: Date.now() - start };
  } catch (err) {
    logger.warn({ err }, 'Redis ping failed');
    return { ok: false, latencyMs: Date.now() - start };
  }
}

export async function closeRedis(): Promise<void> {
  if (!sharedClient) return;

  try {
    await sharedClient.quit();
    logger.info('Redis connection closed');
  } catch (err) {
    logger.error({ err }, 'Error closing Redis connection, forcing disconnect');
    sharedClient.disconnect();
  }
  sharedClient = null;
}
