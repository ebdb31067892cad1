/**
 * Cache Engine
 * @module cache-engine
 */

export * from './services/cache-engine/index.js';
export * from './errors/index.js';
export {
  createLogger,
  createModuleLogger,
  getLogger,
  initLogger,
  resetLogger,
  type LoggerLike,
  type StructuredLogger,
  type LogContext,
} from './logging/logger.js';
export { getClient, closeClient, checkConnection, createRedisClient } from './cache/redis.js';
