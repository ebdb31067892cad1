/**
 * Cache Engine Test Fixtures
 * @module services/cache-engine/__tests__/fixtures
 *
 * Factory functions for keys, invalidation envelopes and wired-up
 * component harnesses.
 */

import { randomUUID } from 'crypto';
import { CacheKeyGenerator } from '../cache-key-generator.js';
import type { CacheErrorHandler, ICacheStore, InvalidationEnvelope, InvalidationMessageType } from '../interfaces.js';
import { InvalidationTracker, type InvalidationTrackerConfig, type RelationResolver } from '../invalidation-tracker.js';
import { MemoryCacheStore } from '../stores/memory-cache-store.js';
import { createMockLogger, type MockLogger } from './mocks.js';

// ============================================================================
// Constants
// ============================================================================

export const TEST_NAMESPACE = 'test-cache';
export const TEST_VERSION = 'v1';
export const ONE_MINUTE_MS = 60_000;
export const THIRTY_MINUTES_MS = 30 * ONE_MINUTE_MS;

// ============================================================================
// Key Generators
// ============================================================================

export function createTestKeyGenerator(logger: MockLogger = createMockLogger()): CacheKeyGenerator {
  return new CacheKeyGenerator({
    config: { namespace: TEST_NAMESPACE, version: TEST_VERSION },
    logger,
  });
}

export function trackingKeyFor(table: string): string {
  return `${TEST_NAMESPACE}_${TEST_VERSION}_table_${table}`;
}

// ============================================================================
// Tracker Harness
// ============================================================================

export interface TrackerHarness {
  readonly store: ICacheStore;
  readonly keyGenerator: CacheKeyGenerator;
  readonly tracker: InvalidationTracker;
  readonly logger: MockLogger;
}

export interface TrackerHarnessOptions {
  readonly store?: ICacheStore;
  readonly config?: Partial<InvalidationTrackerConfig>;
  readonly relations?: RelationResolver;
  readonly onError?: CacheErrorHandler;
}

export function createTrackerHarness(options: TrackerHarnessOptions = {}): TrackerHarness {
  const logger = createMockLogger();
  const store = options.store ?? new MemoryCacheStore();
  const keyGenerator = createTestKeyGenerator(logger);
  const tracker = new InvalidationTracker({
    store,
    keyGenerator,
    config: { defaultExpirationMs: THIRTY_MINUTES_MS, ...options.config },
    relations: options.relations,
    onError: options.onError,
    logger,
  });

  return { store, keyGenerator, tracker, logger };
}

/**
 * Write a cache entry and track it under the given tables
 */
export async function seedEntry(
  harness: TrackerHarness,
  key: string,
  tables: readonly string[],
  value = 'payload'
): Promise<void> {
  await harness.store.set(key, value, THIRTY_MINUTES_MS);
  await harness.tracker.trackKey(tables, key);
}

// ============================================================================
// Invalidation Envelopes
// ============================================================================

export function createTestEnvelope(
  overrides: {
    sourceInstanceId?: string;
    type?: InvalidationMessageType;
    tableNames?: string[];
    pattern?: string | null;
    correlationId?: string;
    timestamp?: string;
  } = {}
): InvalidationEnvelope {
  return {
    sourceInstanceId: overrides.sourceInstanceId ?? 'peer-host_1234_abcd1234',
    message: {
      type: overrides.type ?? 'Table',
      tableNames: overrides.tableNames ?? ['users'],
      pattern: overrides.pattern ?? null,
      correlationId: overrides.correlationId ?? randomUUID(),
    },
    timestamp: overrides.timestamp ?? '2026-01-15T10:00:00.000Z',
  };
}
