/**
 * Invalidation Tracker
 * @module services/cache-engine/invalidation-tracker
 *
 * Maintains, per table, the set of cache keys whose values depend on it and
 * performs local invalidation: single table, glob pattern, related tables
 * (depth-first with a visited set) and batches.
 *
 * Store Data Structures:
 * - Tracking set: {namespace}_{version}_table_{tableName} -> JSON array of cache keys,
 *   stored with a TTL of twice the default entry expiration so it outlives
 *   every key it tracks.
 */

import { availableParallelism } from 'node:os';
import { z } from 'zod';
import { StructuredLogger, createModuleLogger } from '../../logging/logger.js';
import { parseConfigSection } from './config.js';
import {
  CacheErrorHandler,
  CacheKey,
  ICacheInvalidator,
  ICacheKeyGenerator,
  ICacheStore,
  InvalidationResult,
  StoreOperationOptions,
  createCacheKey,
  emptyInvalidationResult,
} from './interfaces.js';

// ============================================================================
// Types
// ============================================================================

const InvalidationTrackerConfigSchema = z.object({
  defaultExpirationMs: z.number().int().min(1),
  maxRelatedDepth: z.number().int().min(1),
  silentFallback: z.boolean(),
  logInvalidation: z.boolean(),
  /** Keys deleted concurrently per batch during batch invalidation */
  batchSize: z.number().int().min(1),
});

export type InvalidationTrackerConfig = z.infer<typeof InvalidationTrackerConfigSchema>;

/**
 * Tables related to a given table, consulted while walking related
 * invalidations below the starting table.
 */
export type RelationResolver = (tableName: string) => readonly string[];

export const DEFAULT_INVALIDATION_TRACKER_CONFIG: InvalidationTrackerConfig = {
  defaultExpirationMs: 30 * 60_000,
  maxRelatedDepth: 3,
  silentFallback: true,
  logInvalidation: true,
  batchSize: Math.min(50, availableParallelism() * 2),
};

export interface InvalidationTrackerDependencies {
  readonly store: ICacheStore;
  readonly keyGenerator: ICacheKeyGenerator;
  readonly config?: Partial<InvalidationTrackerConfig>;
  readonly relations?: RelationResolver;
  readonly onError?: CacheErrorHandler;
  readonly logger?: StructuredLogger;
}

const TrackingSetSchema = z.array(z.string());

interface DeleteOutcome {
  readonly attempted: number;
  readonly invalidated: number;
}

// ============================================================================
// Invalidation Tracker Implementation
// ============================================================================

export class InvalidationTracker implements ICacheInvalidator {
  private readonly store: ICacheStore;
  private readonly keyGenerator: ICacheKeyGenerator;
  private readonly config: InvalidationTrackerConfig;
  private readonly relations: RelationResolver;
  private readonly onError?: CacheErrorHandler;
  private readonly logger: StructuredLogger;

  /** Tail of the pending tracking-set update per table */
  private readonly trackingLocks = new Map<string, Promise<void>>();

  constructor(deps: InvalidationTrackerDependencies) {
    this.store = deps.store;
    this.keyGenerator = deps.keyGenerator;
    this.config = parseConfigSection(
      InvalidationTrackerConfigSchema,
      { ...DEFAULT_INVALIDATION_TRACKER_CONFIG, ...deps.config },
      'invalidation tracker'
    );
    this.relations = deps.relations ?? (() => []);
    this.onError = deps.onError;
    this.logger = deps.logger ?? createModuleLogger('invalidation-tracker');
  }

  // =========================================================================
  // Key Tracking
  // =========================================================================

  /**
   * Record that `cacheKey` depends on each of `tableNames`.
   * Tracking failures are logged and never reach the caller.
   */
  async trackKey(tableNames: readonly string[], cacheKey: string, options?: StoreOperationOptions): Promise<void> {
    const tables = unique(tableNames);

    await Promise.all(
      tables.map(async tableName => {
        try {
          await this.withTrackingLock(tableName, async () => {
            const trackingKey = this.keyGenerator.generateTrackingKey(tableName);
            const keys = await this.readTrackingSet(trackingKey, options);

            if (keys.includes(cacheKey)) {
              return;
            }

            keys.push(cacheKey);
            await this.store.set(trackingKey, JSON.stringify(keys), this.trackingTtlMs, options);
          });
        } catch (error) {
          this.logger.warn({ err: error, tableName, cacheKey }, 'Failed to track cache key');
        }
      })
    );
  }

  /**
   * Keys currently tracked for a table; empty when the set is missing or
   * cannot be read.
   */
  async getTrackedKeys(tableName: string, options?: StoreOperationOptions): Promise<CacheKey[]> {
    try {
      const keys = await this.readTrackingSet(this.keyGenerator.generateTrackingKey(tableName), options);
      return keys.map(createCacheKey);
    } catch (error) {
      this.logger.warn({ err: error, tableName }, 'Failed to read tracked keys');
      return [];
    }
  }

  // =========================================================================
  // Invalidation
  // =========================================================================

  async invalidate(tableName: string, options?: StoreOperationOptions): Promise<InvalidationResult> {
    const started = Date.now();

    try {
      const outcome = await this.invalidateTable(tableName, options);
      return this.completed([tableName], outcome, started);
    } catch (error) {
      return this.failed('invalidate', [tableName], error);
    }
  }

  async invalidateByPattern(pattern: string, options?: StoreOperationOptions): Promise<InvalidationResult> {
    const started = Date.now();

    try {
      const removed = await this.store.removeByPattern(pattern, options);
      return this.completed([pattern], { attempted: removed, invalidated: removed }, started);
    } catch (error) {
      return this.failed('invalidateByPattern', [pattern], error);
    }
  }

  /**
   * Invalidate `tableName`, then walk its related tables depth-first.
   * Each table is invalidated at most once; expansion stops at `maxDepth`.
   * Below the starting table, relations come from the configured resolver.
   */
  async invalidateWithRelated(
    tableName: string,
    relatedTables: readonly string[],
    maxDepth: number = this.config.maxRelatedDepth,
    options?: StoreOperationOptions
  ): Promise<InvalidationResult> {
    const started = Date.now();
    const visited: string[] = [];
    const seen = new Set<string>();
    let attempted = 0;
    let invalidated = 0;

    const visit = async (table: string, related: readonly string[], depth: number): Promise<void> => {
      if (seen.has(table) || depth >= maxDepth) {
        return;
      }
      seen.add(table);
      visited.push(table);

      const outcome = await this.invalidateTable(table, options);
      attempted += outcome.attempted;
      invalidated += outcome.invalidated;

      for (const next of related) {
        await visit(next, this.relations(next), depth + 1);
      }
    };

    try {
      await visit(tableName, unique([...relatedTables, ...this.relations(tableName)]), 0);
      return this.completed(visited, { attempted, invalidated }, started);
    } catch (error) {
      return this.failed('invalidateWithRelated', visited.length > 0 ? visited : [tableName], error);
    }
  }

  /**
   * Invalidate several tables at once: tracking sets are read concurrently,
   * keys deduplicated and deleted in fixed-size batches, then every
   * tracking set is removed. A failed read aborts the batch before any
   * delete, so no tracking set is dropped while its keys survive.
   */
  async invalidateBatch(tableNames: readonly string[], options?: StoreOperationOptions): Promise<InvalidationResult> {
    const started = Date.now();
    const tables = unique(tableNames);

    if (tables.length === 0) {
      return emptyInvalidationResult([]);
    }

    try {
      const trackedSets = await Promise.all(
        tables.map(table => this.readTrackingSet(this.keyGenerator.generateTrackingKey(table), options))
      );
      const keys = unique(trackedSets.flat());

      const outcome = await this.deleteInBatches(keys, options);

      await Promise.all(
        tables.map(table => this.store.remove(this.keyGenerator.generateTrackingKey(table), options))
      );

      return this.completed(tables, outcome, started);
    } catch (error) {
      return this.failed('invalidateBatch', tables, error);
    }
  }

  /**
   * Run pattern deletes concurrently. A failing pattern is logged and does
   * not stop the others.
   */
  async invalidateByPatternBatch(patterns: readonly string[], options?: StoreOperationOptions): Promise<InvalidationResult> {
    const started = Date.now();
    const uniquePatterns = unique(patterns);

    const counts = await Promise.all(
      uniquePatterns.map(async pattern => {
        try {
          return await this.store.removeByPattern(pattern, options);
        } catch (error) {
          this.logger.warn({ err: error, pattern }, 'Pattern invalidation failed');
          return 0;
        }
      })
    );

    const removed = counts.reduce((sum, count) => sum + count, 0);
    return this.completed(uniquePatterns, { attempted: removed, invalidated: removed }, started);
  }

  // =========================================================================
  // Helper Methods
  // =========================================================================

  private get trackingTtlMs(): number {
    return this.config.defaultExpirationMs * 2;
  }

  /**
   * Delete every tracked key of one table, then the tracking set itself.
   * A key that fails to delete is logged and skipped.
   */
  private async invalidateTable(tableName: string, options?: StoreOperationOptions): Promise<DeleteOutcome> {
    const trackingKey = this.keyGenerator.generateTrackingKey(tableName);
    const keys = await this.readTrackingSet(trackingKey, options);

    let invalidated = 0;
    for (const key of keys) {
      if (await this.removeKey(key, options)) {
        invalidated++;
      }
    }

    await this.store.remove(trackingKey, options);

    return { attempted: keys.length, invalidated };
  }

  private async deleteInBatches(keys: readonly string[], options?: StoreOperationOptions): Promise<DeleteOutcome> {
    let invalidated = 0;

    for (let i = 0; i < keys.length; i += this.config.batchSize) {
      options?.signal?.throwIfAborted();

      const batch = keys.slice(i, i + this.config.batchSize);
      const results = await Promise.all(batch.map(key => this.removeKey(key, options)));
      invalidated += results.filter(Boolean).length;
    }

    return { attempted: keys.length, invalidated };
  }

  private async removeKey(key: string, options?: StoreOperationOptions): Promise<boolean> {
    options?.signal?.throwIfAborted();

    try {
      await this.store.remove(key, options);
      return true;
    } catch (error) {
      this.logger.warn({ err: error, key }, 'Failed to remove cache key');
      return false;
    }
  }

  private async readTrackingSet(trackingKey: string, options?: StoreOperationOptions): Promise<string[]> {
    const lookup = await this.store.get(trackingKey, options);
    if (!lookup.found) {
      return [];
    }

    const parsed = TrackingSetSchema.safeParse(safeJsonParse(lookup.value));
    if (!parsed.success) {
      this.logger.warn({ trackingKey }, 'Discarding malformed tracking set');
      return [];
    }

    return parsed.data;
  }

  /**
   * Serialize read-modify-write cycles on one table's tracking set
   */
  private async withTrackingLock(tableName: string, work: () => Promise<void>): Promise<void> {
    const previous = this.trackingLocks.get(tableName) ?? Promise.resolve();
    const run = previous.then(work);
    const tail = run.catch(() => undefined);

    this.trackingLocks.set(tableName, tail);

    try {
      await run;
    } finally {
      if (this.trackingLocks.get(tableName) === tail) {
        this.trackingLocks.delete(tableName);
      }
    }
  }

  private completed(targets: readonly string[], outcome: DeleteOutcome, started: number): InvalidationResult {
    const result: InvalidationResult = {
      targets,
      attempted: outcome.attempted,
      invalidated: outcome.invalidated,
      durationMs: Date.now() - started,
    };

    if (this.config.logInvalidation) {
      this.logger.invalidationCompleted({ ...result, source: 'local' });
    }

    return result;
  }

  /**
   * Backend error policy: swallow and report under silent fallback,
   * otherwise rethrow unchanged.
   */
  private async failed(operation: string, targets: readonly string[], error: unknown): Promise<InvalidationResult> {
    this.logger.invalidationFailed(targets, error);

    if (!this.config.silentFallback) {
      throw error;
    }

    if (this.onError) {
      try {
        await this.onError(error, { operation, targets });
      } catch (hookError) {
        this.logger.error({ err: hookError, operation }, 'Cache error handler threw');
      }
    }

    return { ...emptyInvalidationResult(targets), failed: true };
  }
}

// ============================================================================
// Utilities
// ============================================================================

function unique<T>(values: readonly T[]): T[] {
  return Array.from(new Set(values));
}

function safeJsonParse(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createInvalidationTracker(deps: InvalidationTrackerDependencies): InvalidationTracker {
  return new InvalidationTracker(deps);
}
