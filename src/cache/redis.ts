/**
 * Redis Connection
 * Shared ioredis client for the cache store and invalidation transport
 * @module cache/redis
 */

import { Redis } from 'ioredis';
import { createModuleLogger } from '../logging/logger.js';
import { RedisConfig, getConfig } from '../services/cache-engine/config.js';

const logger = createModuleLogger('redis');

const MAX_CONNECT_RETRIES = 3;

/**
 * Redis client singleton
 */
let client: Redis | null = null;

/**
 * Build a client with connection event logging
 */
export function createRedisClient(config: RedisConfig): Redis {
  const redis = new Redis({
    host: config.host,
    port: config.port,
    password: config.password,
    db: config.db,
    keyPrefix: config.keyPrefix,
    maxRetriesPerRequest: MAX_CONNECT_RETRIES,
    lazyConnect: true,
    retryStrategy: (times: number) => {
      if (times > MAX_CONNECT_RETRIES) {
        logger.error({ attempts: times }, `Redis connection failed after ${MAX_CONNECT_RETRIES} retries`);
        return null;
      }
      return Math.min(times * 100, 3000);
    },
  });

  redis.on('connect', () => {
    logger.info({ host: config.host, port: config.port }, 'Redis client connected');
  });

  redis.on('error', (err: Error) => {
    logger.error({ err }, 'Redis client error');
  });

  redis.on('close', () => {
    logger.debug({}, 'Redis connection closed');
  });

  return redis;
}

/**
 * Get or create the Redis client singleton from the engine configuration
 */
export function getClient(): Redis {
  if (!client) {
    client = createRedisClient(getConfig().redis);
  }

  return client;
}

/**
 * Close Redis connection
 */
export async function closeClient(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
    logger.info({}, 'Redis client closed');
  }
}

/**
 * Check Redis connectivity
 */
export async function checkConnection(): Promise<boolean> {
  try {
    await getClient().ping();
    return true;
  } catch (error) {
    logger.error({ err: error }, 'Redis health check failed');
    return false;
  }
}
