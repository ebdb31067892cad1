/**
 * Distributed Invalidation Broadcaster
 * @module services/cache-engine/distributed-invalidation-broadcaster
 *
 * Mirrors local invalidations across a fleet over pub/sub.
 *
 * Every invalidation made through the broadcaster runs locally first and
 * is then published. Messages received from peers are applied through the
 * wrapped local invalidator only, so they are never re-published. Messages
 * carrying this instance's id are discarded, which prevents echo loops.
 *
 * Delivery is at-least-once and unordered. Invalidation is idempotent, and
 * a bounded set of recently applied correlation ids turns duplicate
 * deliveries into no-ops.
 *
 * Pub/Sub Channel: {namespace}:invalidation
 */

import { hostname } from 'node:os';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { getErrorMessage } from '../../errors/base.js';
import { Bulkhead } from '../../errors/recovery.js';
import { StructuredLogger, createModuleLogger } from '../../logging/logger.js';
import { CacheEngineError } from './errors.js';
import {
  CacheErrorHandler,
  CacheKey,
  ICacheInvalidator,
  IDistributedCacheInvalidator,
  IPubSubTransport,
  InvalidationEnvelope,
  InvalidationMessage,
  InvalidationMessageType,
  InvalidationReceivedEvent,
  InvalidationReceivedListener,
  InvalidationResult,
  PubSubSubscription,
  StoreOperationOptions,
} from './interfaces.js';

// ============================================================================
// Types
// ============================================================================

export interface DistributedInvalidationConfig {
  /** Channel namespace; the channel is `{namespace}:invalidation` */
  readonly namespace: string;
  /** Swallow publish failures instead of rethrowing them */
  readonly silentFallback: boolean;
  /** Correlation ids remembered for duplicate suppression */
  readonly recentMessageCapacity: number;
}

export const DEFAULT_DISTRIBUTED_INVALIDATION_CONFIG: DistributedInvalidationConfig = {
  namespace: 'app-cache',
  silentFallback: true,
  recentMessageCapacity: 1000,
};

export interface DistributedInvalidationBroadcasterDependencies {
  readonly localInvalidator: ICacheInvalidator;
  readonly transport: IPubSubTransport;
  readonly config?: Partial<DistributedInvalidationConfig>;
  /** Overrides the generated `{host}_{pid}_{suffix}` id */
  readonly instanceId?: string;
  readonly onError?: CacheErrorHandler;
  readonly logger?: StructuredLogger;
}

const InvalidationEnvelopeSchema = z.object({
  sourceInstanceId: z.string().min(1),
  message: z.object({
    type: z.enum(['Table', 'Pattern', 'Batch']),
    tableNames: z.array(z.string()),
    pattern: z.string().nullable(),
    correlationId: z.string().min(1),
  }),
  timestamp: z.string().datetime({ offset: true }),
});

/**
 * Process-unique id: host, pid and a random suffix
 */
export function generateInstanceId(): string {
  return `${hostname()}_${process.pid}_${uuidv4().replace(/-/g, '').slice(0, 8)}`;
}

// ============================================================================
// Broadcaster Implementation
// ============================================================================

export class DistributedInvalidationBroadcaster implements IDistributedCacheInvalidator {
  readonly instanceId: string;
  readonly channel: string;

  private readonly local: ICacheInvalidator;
  private readonly transport: IPubSubTransport;
  private readonly config: DistributedInvalidationConfig;
  private readonly onError?: CacheErrorHandler;
  private readonly logger: StructuredLogger;
  private readonly listeners = new Set<InvalidationReceivedListener>();
  private readonly recentCorrelationIds = new Set<string>();
  private readonly subscriptionLock = new Bulkhead('invalidation-subscription', { maxConcurrent: 1 });
  private subscription: PubSubSubscription | null = null;
  private disposed = false;

  constructor(deps: DistributedInvalidationBroadcasterDependencies) {
    this.local = deps.localInvalidator;
    this.transport = deps.transport;
    this.config = { ...DEFAULT_DISTRIBUTED_INVALIDATION_CONFIG, ...deps.config };
    this.instanceId = deps.instanceId ?? generateInstanceId();
    this.channel = `${this.config.namespace}:invalidation`;
    this.onError = deps.onError;
    this.logger = (deps.logger ?? createModuleLogger('distributed-invalidation')).child({
      instanceId: this.instanceId,
    });
  }

  get isListening(): boolean {
    return this.subscription !== null;
  }

  // =========================================================================
  // Subscription Management
  // =========================================================================

  async startListening(): Promise<void> {
    this.assertNotDisposed();

    await this.subscriptionLock.execute(async () => {
      if (this.subscription) {
        return;
      }

      this.subscription = await this.transport.subscribe(this.channel, payload => this.handleMessage(payload));
      this.logger.info({ channel: this.channel }, 'Listening for distributed invalidations');
    });
  }

  async stopListening(): Promise<void> {
    await this.subscriptionLock.execute(async () => {
      const subscription = this.subscription;
      if (!subscription) {
        return;
      }

      this.subscription = null;
      await this.transport.unsubscribe(subscription);
      this.logger.info({ channel: this.channel }, 'Stopped listening for distributed invalidations');
    });
  }

  onInvalidationReceived(listener: InvalidationReceivedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    await this.stopListening();
    this.disposed = true;
    this.listeners.clear();
    this.recentCorrelationIds.clear();
  }

  // =========================================================================
  // Broadcasting
  // =========================================================================

  async broadcastInvalidation(tableName: string, options?: StoreOperationOptions): Promise<InvalidationResult> {
    const result = await this.local.invalidate(tableName, options);
    await this.publish('Table', [tableName], null);
    return result;
  }

  async broadcastInvalidationByPattern(pattern: string, options?: StoreOperationOptions): Promise<InvalidationResult> {
    const result = await this.local.invalidateByPattern(pattern, options);
    await this.publish('Pattern', [], pattern);
    return result;
  }

  async broadcastBatchInvalidation(
    tableNames: readonly string[],
    options?: StoreOperationOptions
  ): Promise<InvalidationResult> {
    const result = await this.local.invalidateBatch(tableNames, options);
    await this.publish('Batch', tableNames, null);
    return result;
  }

  // =========================================================================
  // Invalidator Surface
  // =========================================================================

  trackKey(tableNames: readonly string[], cacheKey: string, options?: StoreOperationOptions): Promise<void> {
    return this.local.trackKey(tableNames, cacheKey, options);
  }

  getTrackedKeys(tableName: string, options?: StoreOperationOptions): Promise<CacheKey[]> {
    return this.local.getTrackedKeys(tableName, options);
  }

  invalidate(tableName: string, options?: StoreOperationOptions): Promise<InvalidationResult> {
    return this.broadcastInvalidation(tableName, options);
  }

  invalidateByPattern(pattern: string, options?: StoreOperationOptions): Promise<InvalidationResult> {
    return this.broadcastInvalidationByPattern(pattern, options);
  }

  invalidateBatch(tableNames: readonly string[], options?: StoreOperationOptions): Promise<InvalidationResult> {
    return this.broadcastBatchInvalidation(tableNames, options);
  }

  /**
   * Related invalidation runs locally, then peers receive every visited
   * table as one batch so they do not need the relation graph.
   */
  async invalidateWithRelated(
    tableName: string,
    relatedTables: readonly string[],
    maxDepth?: number,
    options?: StoreOperationOptions
  ): Promise<InvalidationResult> {
    const result = await this.local.invalidateWithRelated(tableName, relatedTables, maxDepth, options);
    if (result.targets.length > 0) {
      await this.publish('Batch', result.targets, null);
    }
    return result;
  }

  async invalidateByPatternBatch(patterns: readonly string[], options?: StoreOperationOptions): Promise<InvalidationResult> {
    const result = await this.local.invalidateByPatternBatch(patterns, options);
    await Promise.all(result.targets.map(pattern => this.publish('Pattern', [], pattern)));
    return result;
  }

  // =========================================================================
  // Message Handling
  // =========================================================================

  private async publish(
    type: InvalidationMessageType,
    tableNames: readonly string[],
    pattern: string | null
  ): Promise<void> {
    const envelope: InvalidationEnvelope = {
      sourceInstanceId: this.instanceId,
      message: {
        type,
        tableNames: [...tableNames],
        pattern,
        correlationId: uuidv4(),
      },
      timestamp: new Date().toISOString(),
    };

    try {
      await this.transport.publish(this.channel, JSON.stringify(envelope));
      this.logger.debug(
        { type, tableNames, pattern, correlationId: envelope.message.correlationId },
        'Published invalidation'
      );
    } catch (error) {
      this.logger.error({ err: error, type, tableNames, pattern }, 'Failed to publish invalidation');

      if (!this.config.silentFallback) {
        throw error;
      }
      await this.reportError(error, 'publish', pattern === null ? tableNames : [pattern]);
    }
  }

  /**
   * Decode, filter and apply one inbound payload. Never throws: decode and
   * apply failures are logged and the message is dropped.
   */
  private async handleMessage(payload: string): Promise<void> {
    const envelope = this.decode(payload);
    if (!envelope) {
      return;
    }

    const { sourceInstanceId, message } = envelope;

    if (sourceInstanceId === this.instanceId) {
      this.logger.debug({ correlationId: message.correlationId }, 'Skipping own invalidation');
      return;
    }

    if (this.recentCorrelationIds.has(message.correlationId)) {
      this.logger.debug({ correlationId: message.correlationId }, 'Skipping duplicate invalidation');
      return;
    }
    this.rememberCorrelationId(message.correlationId);

    try {
      await this.applyLocally(message);
    } catch (error) {
      this.recentCorrelationIds.delete(message.correlationId);
      this.logger.error(
        { err: error, sourceInstanceId, correlationId: message.correlationId },
        'Failed to apply remote invalidation'
      );
      return;
    }

    this.logger.debug(
      { sourceInstanceId, type: message.type, correlationId: message.correlationId },
      'Applied remote invalidation'
    );

    await this.notifyListeners({ sourceInstanceId, message, receivedAt: new Date() });
  }

  private decode(payload: string): InvalidationEnvelope | null {
    let raw: unknown;
    try {
      raw = JSON.parse(payload);
    } catch (error) {
      this.logger.warn(
        { err: CacheEngineError.messageDecodeFailed(getErrorMessage(error), payload) },
        'Dropping undecodable invalidation message'
      );
      return null;
    }

    const parsed = InvalidationEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      const reason = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
      this.logger.warn(
        { err: CacheEngineError.messageDecodeFailed(reason, payload) },
        'Dropping malformed invalidation message'
      );
      return null;
    }

    return parsed.data;
  }

  /**
   * Throws when the local invalidator reports a failure it absorbed under
   * silent fallback, so the message stays eligible for redelivery.
   */
  private async applyLocally(message: InvalidationMessage): Promise<void> {
    let results: InvalidationResult[] = [];
    switch (message.type) {
      case 'Table':
        results = await Promise.all(message.tableNames.map(table => this.local.invalidate(table)));
        break;
      case 'Pattern':
        if (message.pattern !== null) {
          results = [await this.local.invalidateByPattern(message.pattern)];
        }
        break;
      case 'Batch':
        results = [await this.local.invalidateBatch(message.tableNames)];
        break;
    }

    const failedTargets = results.filter(result => result.failed === true).flatMap(result => result.targets);
    if (failedTargets.length > 0) {
      throw CacheEngineError.backendFailure(
        'remote invalidation',
        `local invalidation failed for ${failedTargets.join(', ')}`
      );
    }
  }

  private rememberCorrelationId(correlationId: string): void {
    this.recentCorrelationIds.add(correlationId);
    if (this.recentCorrelationIds.size > this.config.recentMessageCapacity) {
      const oldest = this.recentCorrelationIds.values().next();
      if (!oldest.done) {
        this.recentCorrelationIds.delete(oldest.value);
      }
    }
  }

  private async notifyListeners(event: InvalidationReceivedEvent): Promise<void> {
    if (this.listeners.size === 0) {
      return;
    }

    const notifications = Array.from(this.listeners).map(async listener => {
      try {
        await listener(event);
      } catch (error) {
        this.logger.error({ err: error, correlationId: event.message.correlationId }, 'Invalidation listener threw');
      }
    });

    await Promise.allSettled(notifications);
  }

  private async reportError(error: unknown, operation: string, targets: readonly string[]): Promise<void> {
    if (!this.onError) {
      return;
    }
    try {
      await this.onError(error, { operation, targets });
    } catch (hookError) {
      this.logger.error({ err: hookError, operation }, 'Cache error handler threw');
    }
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw CacheEngineError.disposed('DistributedInvalidationBroadcaster');
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createDistributedInvalidationBroadcaster(
  deps: DistributedInvalidationBroadcasterDependencies
): DistributedInvalidationBroadcaster {
  return new DistributedInvalidationBroadcaster(deps);
}
