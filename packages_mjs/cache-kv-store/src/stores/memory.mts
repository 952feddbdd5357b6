/**
 * In-memory key-value backend
 */

import type {
  ClearableBackend,
  JsonValue,
  PrunableBackend,
  SaveOptions,
  StoredItem,
  TagAwareBackend,
} from '../types.mjs';
import { expiresAtFromTtl, isExpired, validateKey, validateTags } from '../capabilities.mjs';
import { logger as packageLogger, type Logger } from '../logger.mjs';

/**
 * In-memory backend with tags, pruning and optional LRU eviction
 *
 * Values are cloned on the way in and out so callers never share
 * references with the store.
 */
export class MemoryItemStore implements TagAwareBackend, PrunableBackend, ClearableBackend {
  private items: Map<string, StoredItem> = new Map();
  private tagIndex: Map<string, Set<string>> = new Map();
  private deferred: Map<string, StoredItem> = new Map();

  private readonly maxEntries: number;
  private readonly logger: Logger;

  constructor(options: MemoryItemStoreOptions = {}) {
    this.maxEntries = options.maxEntries ?? Infinity;
    this.logger = (options.logger ?? packageLogger).child({ component: 'memory-item-store' });
  }

  private deleteEntry(key: string): boolean {
    const entry = this.items.get(key);
    if (!entry) {
      return false;
    }
    for (const tag of entry.tags) {
      const keys = this.tagIndex.get(tag);
      keys?.delete(key);
      if (keys && keys.size === 0) {
        this.tagIndex.delete(tag);
      }
    }
    this.items.delete(key);
    return true;
  }

  private evictIfNeeded(): void {
    while (this.items.size >= this.maxEntries) {
      const oldestKey = this.items.keys().next().value;
      if (oldestKey === undefined) {
        return;
      }
      this.logger.debug({ key: oldestKey }, 'evicting least recently used entry');
      this.deleteEntry(oldestKey);
    }
  }

  private moveToEnd(key: string, entry: StoredItem): void {
    this.items.delete(key);
    this.items.set(key, entry);
  }

  private writeEntry(key: string, entry: StoredItem): void {
    this.deleteEntry(key);
    this.evictIfNeeded();
    this.items.set(key, entry);
    for (const tag of entry.tags) {
      let keys = this.tagIndex.get(tag);
      if (!keys) {
        keys = new Set();
        this.tagIndex.set(tag, keys);
      }
      keys.add(key);
    }
  }

  async get(key: string): Promise<JsonValue | undefined> {
    validateKey(key);

    const pending = this.deferred.get(key);
    if (pending) {
      return isExpired(pending.expiresAt) ? undefined : structuredClone(pending.value);
    }

    const entry = this.items.get(key);
    if (!entry) {
      return undefined;
    }

    if (isExpired(entry.expiresAt)) {
      this.deleteEntry(key);
      return undefined;
    }

    this.moveToEnd(key, entry);
    return structuredClone(entry.value);
  }

  async saveDeferred(key: string, value: JsonValue, options: SaveOptions = {}): Promise<boolean> {
    validateKey(key);
    const tags = [...(options.tags ?? [])];
    validateTags(tags);

    this.deferred.set(key, {
      value: structuredClone(value),
      expiresAt: expiresAtFromTtl(options.ttlSeconds),
      tags,
    });
    return true;
  }

  async commit(): Promise<boolean> {
    for (const [key, entry] of this.deferred) {
      this.writeEntry(key, entry);
    }
    this.deferred.clear();
    return true;
  }

  async delete(key: string): Promise<boolean> {
    validateKey(key);
    const wasDeferred = this.deferred.delete(key);
    const entry = this.items.get(key);
    const live = entry !== undefined && !isExpired(entry.expiresAt);
    this.deleteEntry(key);
    return wasDeferred || live;
  }

  async invalidateTags(tags: readonly string[]): Promise<boolean> {
    validateTags(tags);
    await this.commit();

    let removed = 0;
    for (const tag of tags) {
      const keys = this.tagIndex.get(tag);
      if (!keys) {
        continue;
      }
      for (const key of [...keys]) {
        if (this.deleteEntry(key)) {
          removed++;
        }
      }
    }

    this.logger.debug({ tags, removed }, 'invalidated tags');
    return true;
  }

  async prune(): Promise<boolean> {
    const now = Date.now();
    const keysToDelete: string[] = [];

    for (const [key, entry] of this.items.entries()) {
      if (isExpired(entry.expiresAt, now)) {
        keysToDelete.push(key);
      }
    }

    for (const key of keysToDelete) {
      this.deleteEntry(key);
    }

    this.logger.debug({ pruned: keysToDelete.length }, 'pruned expired entries');
    return true;
  }

  async clear(): Promise<boolean> {
    this.items.clear();
    this.tagIndex.clear();
    this.deferred.clear();
    return true;
  }

  async close(): Promise<void> {
    await this.clear();
  }

  /**
   * Get store statistics
   */
  getStats(): MemoryItemStoreStats {
    return {
      entries: this.items.size,
      pending: this.deferred.size,
      tags: this.tagIndex.size,
      maxEntries: this.maxEntries,
    };
  }
}

/**
 * Options for the memory backend
 */
export interface MemoryItemStoreOptions {
  /** Maximum number of committed entries before LRU eviction. Default: unbounded */
  maxEntries?: number;
  /** Logger. Default: package logger */
  logger?: Logger;
}

/**
 * Memory backend statistics
 */
export interface MemoryItemStoreStats {
  entries: number;
  pending: number;
  tags: number;
  maxEntries: number;
}

/**
 * Create a memory backend
 */
export function createMemoryItemStore(options?: MemoryItemStoreOptions): MemoryItemStore {
  return new MemoryItemStore(options);
}
