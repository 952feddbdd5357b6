/**
 * Redis key-value backend
 * Suitable for caches shared by several processes or machines
 */

import type { ClearableBackend, JsonValue, SaveOptions, StoredItem, TagAwareBackend } from '../types.mjs';
import { validateKey, validateTags } from '../capabilities.mjs';
import { isRecord, toJsonValue } from '../json.mjs';
import { logger as packageLogger, type Logger } from '../logger.mjs';

/**
 * Redis client interface (compatible with ioredis)
 * We define this interface to avoid hard dependency on ioredis
 */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<string | null>;
  psetex(key: string, milliseconds: number, value: string): Promise<string>;
  del(...keys: string[]): Promise<number>;
  sadd(key: string, ...members: string[]): Promise<number>;
  srem(key: string, ...members: string[]): Promise<number>;
  smembers(key: string): Promise<string[]>;
  pttl(key: string): Promise<number>;
  pexpire(key: string, milliseconds: number): Promise<number>;
  persist(key: string): Promise<number>;
  keys(pattern: string): Promise<string[]>;
  quit(): Promise<string>;
}

interface RedisPayload {
  value: JsonValue;
  tags: string[];
}

function parsePayload(raw: string): RedisPayload | undefined {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed) || !('value' in parsed)) {
      return undefined;
    }
    const tags = parsed['tags'];
    return {
      value: toJsonValue(parsed['value']),
      tags: Array.isArray(tags) ? tags.filter((tag): tag is string => typeof tag === 'string') : [],
    };
  } catch {
    return undefined;
  }
}

/**
 * Redis backend with tags and clearing
 *
 * Expiry is delegated to Redis, so this backend is not prunable. A tag set
 * expires with the longest-lived item added to it.
 */
export class RedisItemStore implements TagAwareBackend, ClearableBackend {
  private readonly client: RedisClient;
  private readonly keyPrefix: string;
  private readonly logger: Logger;
  private deferred: Map<string, { item: StoredItem; ttlMs: number | null }> = new Map();

  /**
   * Create a new RedisItemStore
   *
   * @param client - Redis client (ioredis instance)
   * @param keyPrefix - Prefix for all keys. Default: 'http-cache:'
   */
  constructor(client: RedisClient, keyPrefix: string = 'http-cache:', logger?: Logger) {
    this.client = client;
    this.keyPrefix = keyPrefix;
    this.logger = (logger ?? packageLogger).child({ component: 'redis-item-store' });
  }

  private itemKey(key: string): string {
    return `${this.keyPrefix}item:${key}`;
  }

  private tagKey(tag: string): string {
    return `${this.keyPrefix}tag:${tag}`;
  }

  private async readPayload(key: string): Promise<RedisPayload | undefined> {
    const raw = await this.client.get(this.itemKey(key));
    return raw === null ? undefined : parsePayload(raw);
  }

  private async addToTagSet(tag: string, key: string, ttlMs: number | null): Promise<void> {
    const tagKey = this.tagKey(tag);
    // -2: no set yet, -1: set without expiry
    const remaining = await this.client.pttl(tagKey);
    await this.client.sadd(tagKey, key);

    if (ttlMs === null) {
      await this.client.persist(tagKey);
    } else if (remaining === -2 || (remaining >= 0 && ttlMs > remaining)) {
      await this.client.pexpire(tagKey, ttlMs);
    }
  }

  private async removeFromTagSets(tags: readonly string[], key: string): Promise<void> {
    for (const tag of tags) {
      await this.client.srem(this.tagKey(tag), key);
    }
  }

  async get(key: string): Promise<JsonValue | undefined> {
    validateKey(key);

    const pending = this.deferred.get(key);
    if (pending) {
      return pending.ttlMs !== null && pending.ttlMs <= 0 ? undefined : structuredClone(pending.item.value);
    }

    return (await this.readPayload(key))?.value;
  }

  async saveDeferred(key: string, value: JsonValue, options: SaveOptions = {}): Promise<boolean> {
    validateKey(key);
    const tags = [...(options.tags ?? [])];
    validateTags(tags);

    const ttlSeconds = options.ttlSeconds ?? null;
    this.deferred.set(key, {
      item: { value: structuredClone(value), expiresAt: null, tags },
      ttlMs: ttlSeconds === null ? null : Math.max(0, ttlSeconds) * 1000,
    });
    return true;
  }

  async commit(): Promise<boolean> {
    const pending = [...this.deferred.entries()];
    this.deferred.clear();

    let ok = true;
    for (const [key, { item, ttlMs }] of pending) {
      const fullKey = this.itemKey(key);
      const payload = JSON.stringify({ value: item.value, tags: item.tags });
      try {
        const previous = await this.readPayload(key);
        const dropped = (previous?.tags ?? []).filter((tag) => ttlMs === 0 || !item.tags.includes(tag));
        await this.removeFromTagSets(dropped, key);

        if (ttlMs === null) {
          await this.client.set(fullKey, payload);
        } else if (ttlMs > 0) {
          await this.client.psetex(fullKey, ttlMs, payload);
        } else {
          // Already expired
          await this.client.del(fullKey);
          continue;
        }
        for (const tag of item.tags) {
          await this.addToTagSet(tag, key, ttlMs);
        }
      } catch (error) {
        ok = false;
        this.logger.warn({ key, err: error }, 'failed to write cache item');
      }
    }
    return ok;
  }

  async delete(key: string): Promise<boolean> {
    validateKey(key);
    const wasDeferred = this.deferred.delete(key);
    const payload = await this.readPayload(key);
    const removed = await this.client.del(this.itemKey(key));
    if (payload) {
      await this.removeFromTagSets(payload.tags, key);
    }
    return wasDeferred || removed > 0;
  }

  async invalidateTags(tags: readonly string[]): Promise<boolean> {
    validateTags(tags);
    await this.commit();

    for (const tag of tags) {
      const tagKey = this.tagKey(tag);
      const keys = await this.client.smembers(tagKey);
      for (const key of keys) {
        const payload = await this.readPayload(key);
        // The key may have been rewritten since with other tags
        if (payload && payload.tags.includes(tag)) {
          await this.client.del(this.itemKey(key));
          await this.removeFromTagSets(
            payload.tags.filter((other) => !tags.includes(other)),
            key
          );
        }
      }
      await this.client.del(tagKey);
    }

    this.logger.debug({ tags }, 'invalidated tags');
    return true;
  }

  async clear(): Promise<boolean> {
    this.deferred.clear();
    const keys = await this.client.keys(`${this.keyPrefix}*`);
    if (keys.length > 0) {
      await this.client.del(...keys);
    }
    return true;
  }

  /**
   * Close the store and cleanup resources
   */
  async close(): Promise<void> {
    this.deferred.clear();
    await this.client.quit();
  }
}

/**
 * Create a new RedisItemStore instance
 *
 * @param client - Redis client (ioredis instance)
 * @param keyPrefix - Prefix for all keys
 */
export function createRedisItemStore(client: RedisClient, keyPrefix?: string, logger?: Logger): RedisItemStore {
  return new RedisItemStore(client, keyPrefix, logger);
}
