/**
 * Cache Engine
 * @module services/cache-engine/cache-engine
 *
 * Facade wiring the key generator, invalidation tracker, optional
 * distributed broadcaster, circuit breaker and optional intelligent
 * manager from one configuration. This is the surface a request layer
 * calls: generate a key, read and write through the breaker, track table
 * dependencies, invalidate, and consult access-driven policy.
 *
 * Optional collaborators are resolved once at construction. Without a
 * broadcaster the local tracker serves as the invalidator; without the
 * intelligent manager a pass-through observer answers with the default TTL.
 */

import { StructuredLogger, createModuleLogger } from '../../logging/logger.js';
import { CacheKeyGenerator } from './cache-key-generator.js';
import { CacheCircuitBreaker } from './circuit-breaker.js';
import { CacheEngineConfig, getConfig, getDefaultExpirationMs } from './config.js';
import { DistributedInvalidationBroadcaster } from './distributed-invalidation-broadcaster.js';
import { IntelligentCacheManager, PassThroughAccessObserver } from './intelligent-cache-manager.js';
import {
  CacheAccessType,
  CacheErrorHandler,
  CacheKey,
  CacheLookup,
  CacheParameters,
  HotKeyInfo,
  ICacheAccessObserver,
  ICacheInvalidator,
  ICacheStore,
  IPubSubTransport,
  InvalidationResult,
  StoreOperationOptions,
} from './interfaces.js';
import { InvalidationTracker } from './invalidation-tracker.js';
import {
  InvalidationRuleInput,
  applyInvalidationRule,
  buildRelationGraph,
  createInvalidationRule,
} from './invalidation-rules.js';

// ============================================================================
// Types
// ============================================================================

export interface CacheEngineDependencies {
  readonly store: ICacheStore;
  /** Required for distributed invalidation; ignored when it is disabled */
  readonly transport?: IPubSubTransport;
  /** Validated configuration; defaults to the process configuration */
  readonly config?: CacheEngineConfig;
  /** Rules whose related tables form the relation graph */
  readonly rules?: readonly InvalidationRuleInput[];
  readonly onError?: CacheErrorHandler;
  readonly instanceId?: string;
  readonly logger?: StructuredLogger;
}

export interface CacheWriteOptions extends StoreOperationOptions {
  /** Tables the value depends on */
  readonly tables?: readonly string[];
  /** Explicit TTL; otherwise the adaptive or default TTL applies */
  readonly ttlMs?: number;
}

const MISS: CacheLookup = { found: false };

// ============================================================================
// Cache Engine Implementation
// ============================================================================

export class CacheEngine {
  readonly keyGenerator: CacheKeyGenerator;
  readonly tracker: InvalidationTracker;
  readonly invalidator: ICacheInvalidator;
  readonly broadcaster: DistributedInvalidationBroadcaster | null;
  readonly circuitBreaker: CacheCircuitBreaker | null;
  readonly intelligentManager: IntelligentCacheManager | null;
  readonly accessObserver: ICacheAccessObserver;

  private readonly store: ICacheStore;
  private readonly config: CacheEngineConfig;
  private readonly onError?: CacheErrorHandler;
  private readonly logger: StructuredLogger;
  private initialized = false;

  constructor(deps: CacheEngineDependencies) {
    this.store = deps.store;
    this.config = deps.config ?? getConfig();
    this.onError = deps.onError;
    this.logger = deps.logger ?? createModuleLogger('cache-engine');

    const defaultExpirationMs = getDefaultExpirationMs(this.config);
    const silentFallback = this.config.errorHandling.silentFallback;

    this.keyGenerator = new CacheKeyGenerator({
      config: {
        namespace: this.config.namespace,
        version: this.config.version,
        keySeparator: this.config.keySeparator,
        trackingPrefix: this.config.trackingPrefix,
        keyMemoCapacity: this.config.keyMemoCapacity,
        logKeyGeneration: this.config.logging.logKeyGeneration,
      },
      logger: this.logger,
    });

    const relationGraph = buildRelationGraph((deps.rules ?? []).map(createInvalidationRule));

    this.tracker = new InvalidationTracker({
      store: this.store,
      keyGenerator: this.keyGenerator,
      config: {
        defaultExpirationMs,
        maxRelatedDepth: this.config.maxRelatedDepth,
        silentFallback,
        logInvalidation: this.config.logging.logInvalidation,
      },
      relations: table => relationGraph.get(table) ?? [],
      onError: deps.onError,
      logger: this.logger,
    });

    this.broadcaster =
      this.config.distributed.enabled && deps.transport
        ? new DistributedInvalidationBroadcaster({
            localInvalidator: this.tracker,
            transport: deps.transport,
            config: { namespace: this.config.namespace, silentFallback },
            instanceId: deps.instanceId,
            onError: deps.onError,
            logger: this.logger,
          })
        : null;

    if (this.config.distributed.enabled && !deps.transport) {
      this.logger.warn({}, 'Distributed invalidation enabled without a transport; invalidating locally only');
    }

    this.invalidator = this.broadcaster ?? this.tracker;

    this.circuitBreaker = this.config.circuitBreaker.enabled
      ? new CacheCircuitBreaker(`${this.config.namespace}.store`, {
          config: {
            failureThreshold: this.config.circuitBreaker.failureThreshold,
            timeoutMs: this.config.circuitBreaker.timeoutMs,
            healthCheckIntervalMs: this.config.circuitBreaker.healthCheckIntervalMs,
            metricRetentionMs: this.config.circuitBreaker.metricRetentionMs,
          },
          logger: this.logger,
        })
      : null;

    const { enabled: intelligentEnabled, ...intelligentConfig } = this.config.intelligent;
    this.intelligentManager = intelligentEnabled
      ? new IntelligentCacheManager({
          config: { ...intelligentConfig, baseTtlMs: defaultExpirationMs },
          logger: this.logger,
        })
      : null;

    this.accessObserver = this.intelligentManager ?? new PassThroughAccessObserver(defaultExpirationMs);
  }

  // =========================================================================
  // Lifecycle
  // =========================================================================

  /**
   * Start background work: peer subscription, breaker health checks and
   * hot-key detection. Idempotent.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.broadcaster?.startListening();
    this.circuitBreaker?.startHealthCheck();
    this.intelligentManager?.startHotKeyDetection();
    this.initialized = true;

    this.logger.info(
      {
        namespace: this.config.namespace,
        distributed: this.broadcaster !== null,
        circuitBreaker: this.circuitBreaker !== null,
        intelligent: this.accessObserver.enabled,
      },
      'Cache engine initialized'
    );
  }

  async shutdown(): Promise<void> {
    await Promise.all([
      this.broadcaster?.dispose(),
      this.circuitBreaker?.dispose(),
      this.intelligentManager?.dispose(),
    ]);
    this.initialized = false;
    this.logger.info({}, 'Cache engine shut down');
  }

  // =========================================================================
  // Keys
  // =========================================================================

  generateKey(operationId: string, action: string, parameters?: CacheParameters | null): CacheKey {
    return this.keyGenerator.generateKey(operationId, action, parameters);
  }

  generateTrackingKey(tableName: string): CacheKey {
    return this.keyGenerator.generateTrackingKey(tableName);
  }

  // =========================================================================
  // Reads and Writes
  // =========================================================================

  /**
   * Read through the breaker. Under silent fallback a failing or
   * short-circuited read reports a miss and is not counted as an access.
   */
  async get(key: string, options?: StoreOperationOptions): Promise<CacheLookup> {
    const lookup = await this.guarded<CacheLookup | null>('cache.get', () => this.store.get(key, options), null);
    if (lookup === null) {
      return MISS;
    }

    const accessType = lookup.found ? CacheAccessType.HIT : CacheAccessType.MISS;

    this.accessObserver.recordAccess(key, accessType);

    if (this.config.logging.logCacheHitMiss) {
      this.logger.debug({ key, result: accessType }, `Cache ${accessType}`);
    }

    return lookup;
  }

  /**
   * Write through the breaker and track the tables the value depends on.
   * Returns false when the write was skipped under silent fallback.
   */
  async set(key: string, value: string, options: CacheWriteOptions = {}): Promise<boolean> {
    const ttlMs = options.ttlMs ?? this.accessObserver.calculateAdaptiveTtl(key);
    const storeOptions: StoreOperationOptions = { signal: options.signal };

    const written = await this.guarded(
      'cache.set',
      async () => {
        await this.store.set(key, value, ttlMs, storeOptions);
        return true;
      },
      false
    );

    if (!written) {
      return false;
    }

    this.accessObserver.recordAccess(key, CacheAccessType.SET);

    if (options.tables && options.tables.length > 0) {
      await this.invalidator.trackKey(options.tables, key, storeOptions);
    }

    return true;
  }

  /**
   * Serve from cache, or run the loader and cache its result
   */
  async getOrSet(
    operationId: string,
    action: string,
    parameters: CacheParameters | null | undefined,
    loader: () => Promise<string>,
    options: CacheWriteOptions = {}
  ): Promise<string> {
    const key = this.generateKey(operationId, action, parameters);
    const lookup = await this.get(key, { signal: options.signal });

    if (lookup.found) {
      return lookup.value;
    }

    const value = await loader();
    await this.set(key, value, options);
    return value;
  }

  // =========================================================================
  // Invalidation
  // =========================================================================

  trackKey(tableNames: readonly string[], cacheKey: string, options?: StoreOperationOptions): Promise<void> {
    return this.invalidator.trackKey(tableNames, cacheKey, options);
  }

  getTrackedKeys(tableName: string, options?: StoreOperationOptions): Promise<CacheKey[]> {
    return this.invalidator.getTrackedKeys(tableName, options);
  }

  invalidate(tableName: string, options?: StoreOperationOptions): Promise<InvalidationResult> {
    return this.invalidator.invalidate(tableName, options);
  }

  invalidateByPattern(pattern: string, options?: StoreOperationOptions): Promise<InvalidationResult> {
    return this.invalidator.invalidateByPattern(pattern, options);
  }

  invalidateWithRelated(
    tableName: string,
    relatedTables: readonly string[],
    maxDepth?: number,
    options?: StoreOperationOptions
  ): Promise<InvalidationResult> {
    return this.invalidator.invalidateWithRelated(tableName, relatedTables, maxDepth, options);
  }

  invalidateBatch(tableNames: readonly string[], options?: StoreOperationOptions): Promise<InvalidationResult> {
    return this.invalidator.invalidateBatch(tableNames, options);
  }

  invalidateByPatternBatch(patterns: readonly string[], options?: StoreOperationOptions): Promise<InvalidationResult> {
    return this.invalidator.invalidateByPatternBatch(patterns, options);
  }

  applyRule(rule: InvalidationRuleInput, options?: StoreOperationOptions): Promise<InvalidationResult> {
    return applyInvalidationRule(this.invalidator, createInvalidationRule(rule), options);
  }

  // =========================================================================
  // Access Policy
  // =========================================================================

  recordAccess(key: string, accessType: CacheAccessType): void {
    this.accessObserver.recordAccess(key, accessType);
  }

  calculateAdaptiveTtl(key: string): number {
    return this.accessObserver.calculateAdaptiveTtl(key);
  }

  getHotKeys(topN?: number): HotKeyInfo[] {
    return this.accessObserver.getHotKeys(topN);
  }

  // =========================================================================
  // Helper Methods
  // =========================================================================

  /**
   * Run a store call through the breaker. Under silent fallback any failure,
   * including a breaker refusal, degrades to `degraded`; otherwise it
   * propagates unchanged.
   */
  private async guarded<T>(operation: string, work: () => Promise<T>, degraded: T): Promise<T> {
    try {
      return this.circuitBreaker ? await this.circuitBreaker.execute(operation, work) : await work();
    } catch (error) {
      if (!this.config.errorHandling.silentFallback) {
        throw error;
      }

      this.logger.warn({ err: error, operation }, 'Cache operation failed, bypassing cache');

      if (this.onError) {
        try {
          await this.onError(error, { operation, targets: [] });
        } catch (hookError) {
          this.logger.error({ err: hookError, operation }, 'Cache error handler threw');
        }
      }

      return degraded;
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createCacheEngine(deps: CacheEngineDependencies): CacheEngine {
  return new CacheEngine(deps);
}
