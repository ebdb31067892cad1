/**
 * Cache Key Generator
 * @module services/cache-engine/cache-key-generator
 *
 * Derives short, stable cache keys from an operation's identity and its
 * parameters.
 *
 * Key Patterns:
 * - Entry:    {namespace}_{version}_{operationId}_{action}_{parameterHash}
 * - Tracking: {namespace}_{version}_{trackingPrefix}_{tableName}
 *
 * Empty segments (no version, no parameters) are dropped, so a key never
 * ends with a separator.
 */

import { z } from 'zod';
import { LoggerLike, createModuleLogger } from '../../logging/logger.js';
import { parseConfigSection } from './config.js';
import { CacheEngineError } from './errors.js';
import {
  CacheKey,
  CacheParameters,
  ICacheKeyGenerator,
  createCacheKey,
} from './interfaces.js';
import { hashToBase36 } from './utils/hash.js';

// ============================================================================
// Configuration
// ============================================================================

const CacheKeyGeneratorConfigSchema = z.object({
  namespace: z.string().min(1),
  version: z.string(),
  keySeparator: z.string().min(1),
  trackingPrefix: z.string().min(1),
  /** Hard cap on memoized keys; once reached new keys bypass the memo */
  keyMemoCapacity: z.number().int().min(0),
  logKeyGeneration: z.boolean(),
});

export type CacheKeyGeneratorConfig = z.infer<typeof CacheKeyGeneratorConfigSchema>;

export const DEFAULT_KEY_GENERATOR_CONFIG: CacheKeyGeneratorConfig = {
  namespace: 'app-cache',
  version: 'v1',
  keySeparator: '_',
  trackingPrefix: 'table',
  keyMemoCapacity: 1000,
  logKeyGeneration: false,
};

export interface CacheKeyGeneratorDependencies {
  readonly config?: Partial<CacheKeyGeneratorConfig>;
  readonly logger?: LoggerLike;
}

// ============================================================================
// Parameter Normalization
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Null, undefined, blank strings and empty collections carry no identity
 */
function isEmptyParameter(value: unknown): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  if (typeof value === 'string') {
    return value.trim().length === 0;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  if (value instanceof Map || value instanceof Set) {
    return value.size === 0;
  }
  return false;
}

function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function sortedObject(entries: Array<[string, unknown]>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of entries.sort(([a], [b]) => compareOrdinal(a, b))) {
    result[key] = normalizeValue(value);
  }
  return result;
}

/**
 * Trim strings, fix date and fractional number formats, and order nested
 * object keys so equal inputs serialize identically.
 */
function normalizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) && !Number.isInteger(value) ? value.toFixed(2) : value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(normalizeValue);
  }
  if (value instanceof Set) {
    return Array.from(value, normalizeValue);
  }
  if (value instanceof Map) {
    return sortedObject(Array.from(value.entries(), ([k, v]): [string, unknown] => [String(k), v]));
  }
  if (isPlainObject(value)) {
    return sortedObject(Object.entries(value));
  }
  return value;
}

/**
 * Canonical JSON for a parameter map, or null when nothing survives filtering
 */
export function canonicalizeParameters(parameters?: CacheParameters | null): string | null {
  if (!parameters) {
    return null;
  }

  const entries = Object.entries(parameters).filter(([, value]) => !isEmptyParameter(value));
  if (entries.length === 0) {
    return null;
  }

  return JSON.stringify(sortedObject(entries));
}

// ============================================================================
// Cache Key Generator Implementation
// ============================================================================

export class CacheKeyGenerator implements ICacheKeyGenerator {
  private readonly config: CacheKeyGeneratorConfig;
  private readonly logger: LoggerLike;
  private readonly memo = new Map<string, CacheKey>();

  constructor(deps: CacheKeyGeneratorDependencies = {}) {
    this.config = parseConfigSection(
      CacheKeyGeneratorConfigSchema,
      { ...DEFAULT_KEY_GENERATOR_CONFIG, ...deps.config },
      'key generator'
    );
    this.logger = deps.logger ?? createModuleLogger('cache-key-generator');
  }

  generateKey(operationId: string, action: string, parameters?: CacheParameters | null): CacheKey {
    if (operationId.trim().length === 0) {
      throw CacheEngineError.invalidKeyInput('operationId');
    }
    if (action.trim().length === 0) {
      throw CacheEngineError.invalidKeyInput('action');
    }

    const parameterHash = this.generateParameterHash(parameters);
    // Components may contain any separator, so the memo key is a tuple encoding
    const memoKey = JSON.stringify([operationId, action, parameterHash]);

    const memoized = this.memo.get(memoKey);
    if (memoized !== undefined) {
      return memoized;
    }

    const key = this.join([this.config.namespace, this.config.version, operationId, action, parameterHash]);

    if (this.memo.size < this.config.keyMemoCapacity) {
      this.memo.set(memoKey, key);
    }

    if (this.config.logKeyGeneration) {
      this.logger.debug({ operationId, action, key }, 'Generated cache key');
    }

    return key;
  }

  generateTrackingKey(tableName: string): CacheKey {
    return this.join([this.config.namespace, this.config.version, this.config.trackingPrefix, tableName]);
  }

  generateParameterHash(parameters?: CacheParameters | null): string {
    const canonical = canonicalizeParameters(parameters);
    return canonical === null ? '' : hashToBase36(canonical);
  }

  /**
   * Number of memoized keys (never exceeds the configured capacity)
   */
  get memoSize(): number {
    return this.memo.size;
  }

  private join(segments: readonly string[]): CacheKey {
    return createCacheKey(segments.filter(segment => segment.length > 0).join(this.config.keySeparator));
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createCacheKeyGenerator(deps?: CacheKeyGeneratorDependencies): CacheKeyGenerator {
  return new CacheKeyGenerator(deps);
}
