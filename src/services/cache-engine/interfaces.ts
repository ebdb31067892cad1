/**
 * Cache Engine Interfaces
 * @module services/cache-engine/interfaces
 *
 * Type definitions shared by the key generator, invalidation tracker,
 * distributed broadcaster, circuit breaker and intelligent cache manager,
 * plus the store and pub/sub contracts they consume.
 */

// ============================================================================
// Cache Key Types
// ============================================================================

/**
 * Branded type for cache keys to ensure type safety
 */
export type CacheKey = string & { readonly __brand: 'CacheKey' };

/**
 * Create a typed CacheKey
 */
export function createCacheKey(key: string): CacheKey {
  return key as CacheKey;
}

/**
 * Operation parameters used to derive the parameter hash.
 * Values may be primitives, dates, arrays, maps, sets or plain objects.
 */
export type CacheParameters = Readonly<Record<string, unknown>>;

export interface ICacheKeyGenerator {
  /**
   * Build the cache key for an operation invocation.
   * Identical (operationId, action, parameters) always yield the same key.
   */
  generateKey(operationId: string, action: string, parameters?: CacheParameters | null): CacheKey;

  /** Key under which the tracking set for a table is stored */
  generateTrackingKey(tableName: string): CacheKey;

  /** Base-36 hash of the filtered, normalized parameters; empty when nothing remains */
  generateParameterHash(parameters?: CacheParameters | null): string;
}

// ============================================================================
// Store Contract
// ============================================================================

export interface StoreOperationOptions {
  /** Aborts the operation; already-issued deletes are not rolled back */
  readonly signal?: AbortSignal;
}

export type CacheLookup =
  | { readonly found: true; readonly value: string }
  | { readonly found: false };

/**
 * Key-value store the engine sits on. Values are opaque serialized strings.
 */
export interface ICacheStore {
  get(key: string, options?: StoreOperationOptions): Promise<CacheLookup>;
  set(key: string, value: string, ttlMs: number, options?: StoreOperationOptions): Promise<void>;
  remove(key: string, options?: StoreOperationOptions): Promise<void>;
  /** Removes every key matching a glob pattern and returns the count removed */
  removeByPattern(pattern: string, options?: StoreOperationOptions): Promise<number>;
  exists(key: string, options?: StoreOperationOptions): Promise<boolean>;
}

// ============================================================================
// Pub/Sub Contract
// ============================================================================

export type PubSubMessageHandler = (payload: string) => void | Promise<void>;

export interface PubSubSubscription {
  readonly id: string;
  readonly channel: string;
}

export interface IPubSubTransport {
  publish(channel: string, payload: string): Promise<void>;
  subscribe(channel: string, handler: PubSubMessageHandler): Promise<PubSubSubscription>;
  unsubscribe(subscription: PubSubSubscription): Promise<void>;
  close(): Promise<void>;
}

// ============================================================================
// Invalidation
// ============================================================================

/**
 * Outcome of an invalidation call
 */
export interface InvalidationResult {
  /** Tables or patterns that were processed */
  readonly targets: readonly string[];
  /** Keys a delete was issued for */
  readonly attempted: number;
  /** Keys actually removed */
  readonly invalidated: number;
  readonly durationMs: number;
  /** Set when a backend error was absorbed by silent fallback */
  readonly failed?: boolean;
}

export function emptyInvalidationResult(targets: readonly string[]): InvalidationResult {
  return { targets, attempted: 0, invalidated: 0, durationMs: 0 };
}

export interface ICacheInvalidator {
  trackKey(tableNames: readonly string[], cacheKey: string, options?: StoreOperationOptions): Promise<void>;
  getTrackedKeys(tableName: string, options?: StoreOperationOptions): Promise<CacheKey[]>;
  invalidate(tableName: string, options?: StoreOperationOptions): Promise<InvalidationResult>;
  invalidateByPattern(pattern: string, options?: StoreOperationOptions): Promise<InvalidationResult>;
  invalidateWithRelated(
    tableName: string,
    relatedTables: readonly string[],
    maxDepth?: number,
    options?: StoreOperationOptions
  ): Promise<InvalidationResult>;
  invalidateBatch(tableNames: readonly string[], options?: StoreOperationOptions): Promise<InvalidationResult>;
  invalidateByPatternBatch(patterns: readonly string[], options?: StoreOperationOptions): Promise<InvalidationResult>;
}

/**
 * Hook invoked for backend errors swallowed under silent fallback
 */
export type CacheErrorHandler = (error: unknown, context: CacheErrorContext) => void | Promise<void>;

export interface CacheErrorContext {
  readonly operation: string;
  readonly targets: readonly string[];
}

// ============================================================================
// Distributed Invalidation
// ============================================================================

export type InvalidationMessageType = 'Table' | 'Pattern' | 'Batch';

export interface InvalidationMessage {
  readonly type: InvalidationMessageType;
  readonly tableNames: readonly string[];
  readonly pattern: string | null;
  readonly correlationId: string;
}

/**
 * Wire envelope published on `{namespace}:invalidation`
 */
export interface InvalidationEnvelope {
  readonly sourceInstanceId: string;
  readonly message: InvalidationMessage;
  /** ISO-8601 */
  readonly timestamp: string;
}

export interface InvalidationReceivedEvent {
  readonly sourceInstanceId: string;
  readonly message: InvalidationMessage;
  readonly receivedAt: Date;
}

export type InvalidationReceivedListener = (event: InvalidationReceivedEvent) => void | Promise<void>;

export interface IDistributedCacheInvalidator extends ICacheInvalidator {
  readonly instanceId: string;
  readonly channel: string;
  readonly isListening: boolean;
  startListening(): Promise<void>;
  stopListening(): Promise<void>;
  broadcastInvalidation(tableName: string, options?: StoreOperationOptions): Promise<InvalidationResult>;
  broadcastInvalidationByPattern(pattern: string, options?: StoreOperationOptions): Promise<InvalidationResult>;
  broadcastBatchInvalidation(tableNames: readonly string[], options?: StoreOperationOptions): Promise<InvalidationResult>;
  onInvalidationReceived(listener: InvalidationReceivedListener): () => void;
  dispose(): Promise<void>;
}

// ============================================================================
// Circuit Breaker
// ============================================================================

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitStateChange {
  readonly previousState: CircuitState;
  readonly newState: CircuitState;
  readonly failureCount: number;
  readonly timestamp: Date;
}

export type CircuitStateListener = (change: CircuitStateChange) => void;

export interface OperationMetricsSnapshot {
  readonly operationName: string;
  readonly totalOperations: number;
  readonly successCount: number;
  readonly failureCount: number;
  readonly averageLatencyMs: number;
  readonly lastAccess: Date;
}

export interface CircuitBreakerStatistics {
  readonly name: string;
  readonly state: CircuitState;
  readonly failureCount: number;
  readonly lastFailureTime: Date | null;
  readonly operations: readonly OperationMetricsSnapshot[];
}

// ============================================================================
// Intelligent Cache Management
// ============================================================================

export enum CacheAccessType {
  HIT = 'hit',
  MISS = 'miss',
  SET = 'set',
}

export enum EvictionPolicy {
  LRU = 'LRU',
  LFU = 'LFU',
  TTL = 'TTL',
  RANDOM = 'Random',
  FIFO = 'FIFO',
}

export interface HotKeyInfo {
  readonly key: string;
  readonly accessCount: number;
  /** Accesses per minute */
  readonly accessRate: number;
  readonly firstAccess: Date;
  readonly lastAccess: Date;
  readonly averageIntervalMs: number;
  readonly priority: number;
}

/**
 * Receives every cache access and supplies the TTL for writes.
 * The intelligent manager implements it; a pass-through stands in when it
 * is disabled.
 */
export interface ICacheAccessObserver {
  readonly enabled: boolean;
  recordAccess(key: string, accessType: CacheAccessType): void;
  calculateAdaptiveTtl(key: string): number;
  getHotKeys(topN?: number): HotKeyInfo[];
}
