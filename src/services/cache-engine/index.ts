/**
 * Cache Engine Module
 * @module services/cache-engine
 *
 * Caching middleware for data-access layers: deterministic key
 * generation, table-based dependency tracking and invalidation,
 * fleet-wide invalidation over pub/sub, a circuit breaker around the
 * store, and access-driven TTL and hot-key policy.
 */

// ============================================================================
// Interfaces
// ============================================================================

export {
  // Types
  type CacheKey,
  type CacheParameters,
  type CacheLookup,
  type StoreOperationOptions,
  type PubSubMessageHandler,
  type PubSubSubscription,
  type InvalidationResult,
  type CacheErrorHandler,
  type CacheErrorContext,
  type InvalidationMessageType,
  type InvalidationMessage,
  type InvalidationEnvelope,
  type InvalidationReceivedEvent,
  type InvalidationReceivedListener,
  type CircuitStateChange,
  type CircuitStateListener,
  type OperationMetricsSnapshot,
  type CircuitBreakerStatistics,
  type HotKeyInfo,
  type ICacheKeyGenerator,
  type ICacheStore,
  type IPubSubTransport,
  type ICacheInvalidator,
  type IDistributedCacheInvalidator,
  type ICacheAccessObserver,

  // Enums
  CircuitState,
  CacheAccessType,
  EvictionPolicy,

  // Factory functions
  createCacheKey,
  emptyInvalidationResult,
} from './interfaces.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  type CacheEngineConfig,
  type PartialCacheEngineConfig,
  type LoggingConfig,
  type ErrorHandlingConfig,
  type CircuitBreakerConfig,
  type DistributedConfig,
  type IntelligentConfig,
  type RedisConfig,
  CacheEngineEnvVars,
  CacheEngineConfigSchema,
  CacheEngineConfigValidationError,
  DEFAULT_CONFIG,
  createConfig,
  createTestConfig,
  getConfig,
  initConfig,
  resetConfig,
  validateConfig,
  isValidConfig,
  getDefaultExpirationMs,
} from './config.js';

// ============================================================================
// Errors
// ============================================================================

export {
  CacheEngineError,
  CircuitOpenError,
  FallbackFailedError,
  isCacheEngineError,
  isCircuitOpenError,
  isFallbackFailedError,
} from './errors.js';

// ============================================================================
// Key Generation
// ============================================================================

export {
  CacheKeyGenerator,
  createCacheKeyGenerator,
  canonicalizeParameters,
  DEFAULT_KEY_GENERATOR_CONFIG,
  type CacheKeyGeneratorConfig,
  type CacheKeyGeneratorDependencies,
} from './cache-key-generator.js';

// ============================================================================
// Invalidation
// ============================================================================

export {
  InvalidationTracker,
  createInvalidationTracker,
  DEFAULT_INVALIDATION_TRACKER_CONFIG,
  type InvalidationTrackerConfig,
  type InvalidationTrackerDependencies,
  type RelationResolver,
} from './invalidation-tracker.js';

export {
  DistributedInvalidationBroadcaster,
  createDistributedInvalidationBroadcaster,
  generateInstanceId,
  DEFAULT_DISTRIBUTED_INVALIDATION_CONFIG,
  type DistributedInvalidationConfig,
  type DistributedInvalidationBroadcasterDependencies,
} from './distributed-invalidation-broadcaster.js';

export {
  InvalidationRuleType,
  InvalidationRuleSchema,
  createInvalidationRule,
  applyInvalidationRule,
  buildRelationGraph,
  type InvalidationRule,
  type InvalidationRuleInput,
} from './invalidation-rules.js';

// ============================================================================
// Circuit Breaker
// ============================================================================

export {
  CacheCircuitBreaker,
  createCacheCircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER_OPTIONS,
  type CircuitBreakerOptions,
  type CircuitBreakerDependencies,
  type Fallback,
  type HealthCheckResult,
} from './circuit-breaker.js';

// ============================================================================
// Intelligent Caching
// ============================================================================

export {
  IntelligentCacheManager,
  PassThroughAccessObserver,
  createIntelligentCacheManager,
  DEFAULT_INTELLIGENT_CACHE_MANAGER_CONFIG,
  type IntelligentCacheManagerConfig,
  type IntelligentCacheManagerDependencies,
  type DetectionCycleResult,
  type IntelligentCacheStatistics,
} from './intelligent-cache-manager.js';

// ============================================================================
// Stores and Transports
// ============================================================================

export { MemoryCacheStore, createMemoryCacheStore } from './stores/memory-cache-store.js';
export {
  RedisCacheStore,
  createRedisCacheStore,
  type RedisStoreClient,
  type RedisCacheStoreOptions,
} from './stores/redis-cache-store.js';
export {
  MemoryPubSubBus,
  MemoryPubSubTransport,
  createMemoryPubSubTransport,
} from './transports/memory-pubsub-transport.js';
export {
  RedisPubSubTransport,
  createRedisPubSubTransport,
  type RedisPublisherClient,
  type RedisSubscriberClient,
  type RedisPubSubTransportDependencies,
} from './transports/redis-pubsub-transport.js';

// ============================================================================
// Engine
// ============================================================================

export {
  CacheEngine,
  createCacheEngine,
  type CacheEngineDependencies,
  type CacheWriteOptions,
} from './cache-engine.js';
