/**
 * Intelligent Cache Manager
 * @module services/cache-engine/intelligent-cache-manager
 *
 * Observes every cache access and derives policy from it: hot-key
 * rankings, adaptive TTLs and eviction candidates. It selects keys; it
 * never deletes from the store itself.
 *
 * Formulas:
 * - accessRate    = accessCount / minutes since first access
 *                   (raw accessCount while under one minute)
 * - priority      = 0.7 * accessRate + 0.3 * max(0, 60 - minutes since last access) / 60
 * - adaptive TTL  = baseTtl * min(accessRate / hotKeyThreshold, 2) * max(hitRatio, 0.5),
 *                   clamped to [minTtl, maxTtl]
 */

import { z } from 'zod';
import { StructuredLogger, createModuleLogger } from '../../logging/logger.js';
import { IntelligentConfigSchema, parseConfigSection } from './config.js';
import { CacheEngineError } from './errors.js';
import {
  CacheAccessType,
  EvictionPolicy,
  HotKeyInfo,
  ICacheAccessObserver,
} from './interfaces.js';
import { PeriodicTask } from './utils/periodic-task.js';

// ============================================================================
// Types
// ============================================================================

const IntelligentCacheManagerConfigSchema = IntelligentConfigSchema.omit({ enabled: true }).extend({
  /** TTL used when no metrics exist, and the idle limit for TTL eviction */
  baseTtlMs: z.number().int().min(1),
});

export type IntelligentCacheManagerConfig = z.infer<typeof IntelligentCacheManagerConfigSchema>;

export const DEFAULT_INTELLIGENT_CACHE_MANAGER_CONFIG: IntelligentCacheManagerConfig = {
  baseTtlMs: 30 * 60_000,
  hotKeyThreshold: 10,
  metricRetentionMs: 86_400_000,
  maxHotKeys: 100,
  accessHistoryLimit: 1000,
  detectionIntervalMs: 60_000,
  minTtlMs: 300_000,
  maxTtlMs: 86_400_000,
};

export interface IntelligentCacheManagerDependencies {
  readonly config?: Partial<IntelligentCacheManagerConfig>;
  readonly logger?: StructuredLogger;
}

export interface DetectionCycleResult {
  readonly expiredKeys: number;
  readonly hotKeys: readonly string[];
}

export interface IntelligentCacheStatistics {
  readonly trackedKeys: number;
  readonly ttlTrackedKeys: number;
  readonly hotKeyCount: number;
  readonly detectionRunning: boolean;
}

interface KeyAccessMetrics {
  readonly firstAccess: number;
  lastAccess: number;
  accessCount: number;
  /** Most recent access timestamps, oldest first */
  readonly history: number[];
}

interface TtlMetrics {
  hitCount: number;
  missCount: number;
  totalAccess: number;
}

const PRIORITY_RATE_WEIGHT = 0.7;
const PRIORITY_RECENCY_WEIGHT = 0.3;
const RECENCY_WINDOW_MINUTES = 60;
const MAX_ACCESS_WEIGHT = 2;
const MIN_HIT_RATE_WEIGHT = 0.5;
const DETECTION_LOG_LIMIT = 10;
const MS_PER_MINUTE = 60_000;

// ============================================================================
// Intelligent Cache Manager Implementation
// ============================================================================

export class IntelligentCacheManager implements ICacheAccessObserver {
  readonly enabled = true;

  private readonly config: IntelligentCacheManagerConfig;
  private readonly logger: StructuredLogger;
  private readonly keyMetrics = new Map<string, KeyAccessMetrics>();
  private readonly ttlMetrics = new Map<string, TtlMetrics>();
  private readonly detection: PeriodicTask;
  private disposed = false;

  constructor(deps: IntelligentCacheManagerDependencies = {}) {
    this.config = parseConfigSection(
      IntelligentCacheManagerConfigSchema.refine(config => config.minTtlMs <= config.maxTtlMs, {
        message: 'minTtlMs must not exceed maxTtlMs',
        path: ['minTtlMs'],
      }),
      { ...DEFAULT_INTELLIGENT_CACHE_MANAGER_CONFIG, ...deps.config },
      'intelligent cache manager'
    );
    this.logger = deps.logger ?? createModuleLogger('intelligent-cache-manager');
    this.detection = new PeriodicTask(
      'hot-key-detection',
      () => {
        this.runDetectionCycle();
      },
      { intervalMs: this.config.detectionIntervalMs },
      this.logger
    );
  }

  // =========================================================================
  // Access Recording
  // =========================================================================

  recordAccess(key: string, accessType: CacheAccessType): void {
    if (this.disposed) {
      return;
    }

    const now = Date.now();

    let metrics = this.keyMetrics.get(key);
    if (!metrics) {
      metrics = { firstAccess: now, lastAccess: now, accessCount: 0, history: [] };
      this.keyMetrics.set(key, metrics);
    }

    metrics.accessCount++;
    metrics.lastAccess = now;
    metrics.history.push(now);
    if (metrics.history.length > this.config.accessHistoryLimit) {
      metrics.history.shift();
    }

    if (accessType === CacheAccessType.SET) {
      return;
    }

    let ttl = this.ttlMetrics.get(key);
    if (!ttl) {
      ttl = { hitCount: 0, missCount: 0, totalAccess: 0 };
      this.ttlMetrics.set(key, ttl);
    }

    ttl.totalAccess++;
    if (accessType === CacheAccessType.HIT) {
      ttl.hitCount++;
    } else {
      ttl.missCount++;
    }
  }

  /**
   * Seed metrics for keys the caller is about to populate
   */
  warmCache(keys: readonly string[]): number {
    for (const key of keys) {
      this.recordAccess(key, CacheAccessType.SET);
    }
    this.logger.info({ keyCount: keys.length }, 'Cache warm-up recorded');
    return keys.length;
  }

  // =========================================================================
  // Hot Keys
  // =========================================================================

  /**
   * Keys accessed within the retention window, ranked by access rate.
   * Never returns more than the configured maximum, whatever `topN` is.
   */
  getHotKeys(topN = 10): HotKeyInfo[] {
    const now = Date.now();
    const cutoff = now - this.config.metricRetentionMs;
    const limit = Math.max(0, Math.min(topN, this.config.maxHotKeys));

    return Array.from(this.keyMetrics)
      .filter(([, metrics]) => metrics.lastAccess > cutoff)
      .map(([key, metrics]) => this.toHotKeyInfo(key, metrics, now))
      .sort((a, b) => b.accessRate - a.accessRate)
      .slice(0, limit);
  }

  calculateKeyPriority(key: string): number {
    const metrics = this.keyMetrics.get(key);
    if (!metrics) {
      return 0;
    }
    return priorityOf(metrics, Date.now());
  }

  // =========================================================================
  // Adaptive TTL
  // =========================================================================

  /**
   * TTL for the next write of `key`, in milliseconds
   */
  calculateAdaptiveTtl(key: string): number {
    const baseTtl = this.config.baseTtlMs;
    const metrics = this.keyMetrics.get(key);
    const ttl = this.ttlMetrics.get(key);

    if (!metrics || !ttl || ttl.totalAccess === 0) {
      return baseTtl;
    }

    const accessRate = accessRateOf(metrics, Date.now());
    const accessWeight = Math.min(accessRate / this.config.hotKeyThreshold, MAX_ACCESS_WEIGHT);
    const hitRatio = ttl.hitCount / ttl.totalAccess;
    const hitRateWeight = Math.max(hitRatio, MIN_HIT_RATE_WEIGHT);

    const adjusted = baseTtl * accessWeight * hitRateWeight;
    return Math.round(Math.min(Math.max(adjusted, this.config.minTtlMs), this.config.maxTtlMs));
  }

  // =========================================================================
  // Eviction
  // =========================================================================

  /**
   * Select up to `maxItems` keys by policy and drop their metrics.
   * Deleting the entries from the store is the caller's job.
   */
  evictByPolicy(policy: EvictionPolicy, maxItems: number): string[] {
    if (maxItems <= 0) {
      return [];
    }

    const now = Date.now();
    const entries = Array.from(this.keyMetrics);
    let selected: Array<[string, KeyAccessMetrics]>;

    switch (policy) {
      case EvictionPolicy.LRU:
        selected = entries.sort(([, a], [, b]) => a.lastAccess - b.lastAccess);
        break;
      case EvictionPolicy.LFU:
        selected = entries.sort(([, a], [, b]) => a.accessCount - b.accessCount);
        break;
      case EvictionPolicy.TTL:
        selected = entries.filter(([, metrics]) => now - metrics.lastAccess > this.config.baseTtlMs);
        break;
      case EvictionPolicy.RANDOM:
        selected = shuffle(entries);
        break;
      case EvictionPolicy.FIFO:
        selected = entries.sort(([, a], [, b]) => a.firstAccess - b.firstAccess);
        break;
    }

    const victims = selected.slice(0, maxItems).map(([key]) => key);

    for (const key of victims) {
      this.keyMetrics.delete(key);
      this.ttlMetrics.delete(key);
    }

    this.logger.info({ policy, requested: maxItems, evicted: victims.length }, 'Eviction candidates selected');
    return victims;
  }

  // =========================================================================
  // Hot-Key Detection
  // =========================================================================

  startHotKeyDetection(): void {
    if (this.disposed) {
      throw CacheEngineError.disposed('IntelligentCacheManager');
    }
    this.detection.start();
    this.logger.info({ intervalMs: this.config.detectionIntervalMs }, 'Hot-key detection started');
  }

  async stopHotKeyDetection(): Promise<void> {
    await this.detection.stop();
  }

  /**
   * One sweep: purge metrics idle past the retention window and report the
   * keys at or above the hot-key threshold.
   */
  runDetectionCycle(): DetectionCycleResult {
    const now = Date.now();
    const cutoff = now - this.config.metricRetentionMs;
    let expiredKeys = 0;

    for (const [key, metrics] of Array.from(this.keyMetrics)) {
      if (metrics.lastAccess < cutoff) {
        this.keyMetrics.delete(key);
        this.ttlMetrics.delete(key);
        expiredKeys++;
      }
    }

    const hotKeys = Array.from(this.keyMetrics)
      .map(([key, metrics]) => ({ key, rate: accessRateOf(metrics, now) }))
      .filter(({ rate }) => rate >= this.config.hotKeyThreshold)
      .sort((a, b) => b.rate - a.rate)
      .slice(0, DETECTION_LOG_LIMIT)
      .map(({ key }) => key);

    if (hotKeys.length > 0) {
      this.logger.hotKeysDetected(hotKeys);
    }
    if (expiredKeys > 0) {
      this.logger.debug({ expiredKeys }, 'Purged idle key metrics');
    }

    return { expiredKeys, hotKeys };
  }

  getStatistics(): IntelligentCacheStatistics {
    const now = Date.now();
    let hotKeyCount = 0;
    for (const metrics of this.keyMetrics.values()) {
      if (accessRateOf(metrics, now) >= this.config.hotKeyThreshold) {
        hotKeyCount++;
      }
    }

    return {
      trackedKeys: this.keyMetrics.size,
      ttlTrackedKeys: this.ttlMetrics.size,
      hotKeyCount,
      detectionRunning: this.detection.isRunning,
    };
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    await this.detection.stop();
    this.keyMetrics.clear();
    this.ttlMetrics.clear();
  }

  private toHotKeyInfo(key: string, metrics: KeyAccessMetrics, now: number): HotKeyInfo {
    return {
      key,
      accessCount: metrics.accessCount,
      accessRate: accessRateOf(metrics, now),
      firstAccess: new Date(metrics.firstAccess),
      lastAccess: new Date(metrics.lastAccess),
      averageIntervalMs: averageIntervalOf(metrics),
      priority: priorityOf(metrics, now),
    };
  }
}

// ============================================================================
// Metric Helpers
// ============================================================================

function accessRateOf(metrics: KeyAccessMetrics, now: number): number {
  const elapsedMinutes = (now - metrics.firstAccess) / MS_PER_MINUTE;
  return elapsedMinutes < 1 ? metrics.accessCount : metrics.accessCount / elapsedMinutes;
}

function averageIntervalOf(metrics: KeyAccessMetrics): number {
  if (metrics.accessCount < 2) {
    return 0;
  }
  return (metrics.lastAccess - metrics.firstAccess) / (metrics.accessCount - 1);
}

function priorityOf(metrics: KeyAccessMetrics, now: number): number {
  const minutesSinceLast = (now - metrics.lastAccess) / MS_PER_MINUTE;
  const recencyScore = Math.max(0, RECENCY_WINDOW_MINUTES - minutesSinceLast) / RECENCY_WINDOW_MINUTES;
  return PRIORITY_RATE_WEIGHT * accessRateOf(metrics, now) + PRIORITY_RECENCY_WEIGHT * recencyScore;
}

function shuffle<T>(items: T[]): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(Math.random() * (i + 1));
    const current = items[i];
    items[i] = items[j];
    items[j] = current;
  }
  return items;
}

// ============================================================================
// Pass-through Observer
// ============================================================================

/**
 * Stands in for the manager when intelligent caching is disabled: records
 * nothing and always answers with the base TTL.
 */
export class PassThroughAccessObserver implements ICacheAccessObserver {
  readonly enabled = false;

  constructor(private readonly baseTtlMs: number) {}

  recordAccess(): void {
    // Intelligent caching disabled
  }

  calculateAdaptiveTtl(): number {
    return this.baseTtlMs;
  }

  getHotKeys(): HotKeyInfo[] {
    return [];
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createIntelligentCacheManager(deps?: IntelligentCacheManagerDependencies): IntelligentCacheManager {
  return new IntelligentCacheManager(deps);
}
