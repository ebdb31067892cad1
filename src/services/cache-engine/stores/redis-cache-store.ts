/**
 * Redis Cache Store
 * @module services/cache-engine/stores/redis-cache-store
 *
 * Store contract over Redis. Pattern deletes walk the keyspace with SCAN
 * and delete matches in batches; they never use KEYS.
 */

import type { Redis as RedisType } from 'ioredis';
import { CacheLookup, ICacheStore, StoreOperationOptions } from '../interfaces.js';

/**
 * Subset of the ioredis command surface the store uses
 */
export interface RedisStoreClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, millisecondsToken: 'PX', milliseconds: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  exists(...keys: string[]): Promise<number>;
  scan(
    cursor: string,
    patternToken: 'MATCH',
    pattern: string,
    countToken: 'COUNT',
    count: number
  ): Promise<[cursor: string, elements: string[]]>;
}

export interface RedisCacheStoreOptions {
  /**
   * Prefix the client adds to every command key. SCAN does not apply it,
   * so the store adds it to the match pattern and strips it from results.
   */
  readonly keyPrefix?: string;
  /** SCAN COUNT hint */
  readonly scanCount?: number;
}

const DEFAULT_SCAN_COUNT = 100;

export class RedisCacheStore implements ICacheStore {
  private readonly keyPrefix: string;
  private readonly scanCount: number;

  constructor(
    private readonly client: RedisStoreClient,
    options: RedisCacheStoreOptions = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? '';
    this.scanCount = options.scanCount ?? DEFAULT_SCAN_COUNT;
  }

  async get(key: string, options?: StoreOperationOptions): Promise<CacheLookup> {
    options?.signal?.throwIfAborted();

    const value = await this.client.get(key);
    return value === null ? { found: false } : { found: true, value };
  }

  async set(key: string, value: string, ttlMs: number, options?: StoreOperationOptions): Promise<void> {
    options?.signal?.throwIfAborted();

    if (ttlMs <= 0) {
      await this.client.del(key);
      return;
    }

    await this.client.set(key, value, 'PX', Math.ceil(ttlMs));
  }

  async remove(key: string, options?: StoreOperationOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    await this.client.del(key);
  }

  async removeByPattern(pattern: string, options?: StoreOperationOptions): Promise<number> {
    const match = `${this.keyPrefix}${pattern}`;
    let cursor = '0';
    let removed = 0;

    do {
      options?.signal?.throwIfAborted();

      const [nextCursor, keys] = await this.client.scan(cursor, 'MATCH', match, 'COUNT', this.scanCount);
      cursor = nextCursor;

      if (keys.length > 0) {
        removed += await this.client.del(...keys.map(key => this.stripPrefix(key)));
      }
    } while (cursor !== '0');

    return removed;
  }

  async exists(key: string, options?: StoreOperationOptions): Promise<boolean> {
    options?.signal?.throwIfAborted();
    return (await this.client.exists(key)) > 0;
  }

  private stripPrefix(key: string): string {
    return this.keyPrefix && key.startsWith(this.keyPrefix) ? key.slice(this.keyPrefix.length) : key;
  }
}

/**
 * Create a store over an ioredis client, honoring its configured key prefix
 */
export function createRedisCacheStore(client: RedisType, options: Omit<RedisCacheStoreOptions, 'keyPrefix'> = {}): RedisCacheStore {
  return new RedisCacheStore(client, { ...options, keyPrefix: client.options.keyPrefix ?? '' });
}
