/**
 * Memory Cache Store
 * @module services/cache-engine/stores/memory-cache-store
 *
 * In-process implementation of the store contract with per-entry expiry.
 * Expired entries are dropped lazily on access or by `purgeExpired()`.
 */

import { CacheLookup, ICacheStore, StoreOperationOptions } from '../interfaces.js';
import { toGlobRegExp } from '../utils/glob.js';

interface MemoryEntry {
  readonly value: string;
  readonly expiresAt: number;
}

export class MemoryCacheStore implements ICacheStore {
  private readonly entries = new Map<string, MemoryEntry>();

  async get(key: string, options?: StoreOperationOptions): Promise<CacheLookup> {
    options?.signal?.throwIfAborted();

    const entry = this.readLive(key);
    return entry ? { found: true, value: entry.value } : { found: false };
  }

  async set(key: string, value: string, ttlMs: number, options?: StoreOperationOptions): Promise<void> {
    options?.signal?.throwIfAborted();

    if (ttlMs <= 0) {
      this.entries.delete(key);
      return;
    }

    this.entries.set(key, { value, expiresAt: Date.now() + ttlMs });
  }

  async remove(key: string, options?: StoreOperationOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    this.entries.delete(key);
  }

  async removeByPattern(pattern: string, options?: StoreOperationOptions): Promise<number> {
    options?.signal?.throwIfAborted();

    const regex = toGlobRegExp(pattern);
    let removed = 0;

    for (const key of Array.from(this.entries.keys())) {
      if (regex.test(key) && this.readLive(key)) {
        this.entries.delete(key);
        removed++;
      }
    }

    return removed;
  }

  async exists(key: string, options?: StoreOperationOptions): Promise<boolean> {
    options?.signal?.throwIfAborted();
    return this.readLive(key) !== undefined;
  }

  /**
   * Drop every expired entry and return how many were dropped
   */
  purgeExpired(): number {
    let purged = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (!this.readLive(key)) {
        purged++;
      }
    }
    return purged;
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Entry count, including entries that expired but were not yet purged
   */
  get size(): number {
    return this.entries.size;
  }

  private readLive(key: string): MemoryEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}

export function createMemoryCacheStore(): MemoryCacheStore {
  return new MemoryCacheStore();
}
