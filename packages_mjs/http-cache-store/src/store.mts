/**
 * HttpCacheStore - storage for an HTTP reverse-proxy cache
 */

import {
  InvalidArgumentError,
  resolveCapabilities,
  type BackendCapabilities,
  type KeyValueBackend,
} from '@proxy-cache/cache-kv-store';
import { LockManager } from '@proxy-cache/cache-lock';
import type {
  HttpCacheStoreOptions,
  MetadataEntry,
  StoreEvent,
  StoreEventListener,
  VariantRecord,
} from './types.mjs';
import { HttpRequest, type HttpResponse } from './http.mjs';
import { generateContentDigest, getCacheKey, getVaryKey } from './hasher.mjs';
import { decodeCounter, decodeMetadata, encodeMetadata } from './codec.mjs';
import { ContentStore } from './content-store.mjs';
import { resolveStoreConfig, type ResolvedStoreConfig } from './config.mjs';
import { parseTagHeader } from './parser.mjs';
import { CLEANUP_LOCK, CONTENT_DIGEST_HEADER, COUNTER_KEY, NON_VARYING_KEY, PRUNE_LOCK } from './constants.mjs';
import { ConfigurationError, StorageError, UncacheableResponseError } from './errors.mjs';
import type { Logger } from './logger.mjs';

/**
 * HttpCacheStore - Vary-aware response store with deduplicated bodies
 *
 * Features:
 * - Cache keys shared by the http and https forms of a URL
 * - Several variants per URL, selected by the response's Vary header
 * - Bodies stored once per digest, optionally gzip-compressed
 * - Tag invalidation through the Cache-Tags response header
 * - Per-URL locks for the calling engine, maintenance locks for prune/clear
 * - Pruning of expired entries every N writes
 *
 * Locks taken with lock() belong to this instance; call cleanup() (or
 * close()) at the end of each request scope.
 *
 * @example
 * const store = new HttpCacheStore({ cacheDirectory: '/var/cache/proxy' });
 *
 * const request = HttpRequest.create('https://example.com/');
 * const cached = await store.lookup(request);
 * if (!cached) {
 *   const response = HttpResponse.create('hello world', {
 *     headers: { 'Cache-Control': 'public, max-age=120' },
 *   });
 *   await store.write(request, response);
 * }
 */
export class HttpCacheStore {
  private readonly config: ResolvedStoreConfig;
  private readonly cache: KeyValueBackend;
  private readonly capabilities: BackendCapabilities;
  private readonly locks: LockManager;
  private readonly content: ContentStore;
  private readonly logger: Logger;
  private readonly listeners: Set<StoreEventListener> = new Set();

  /**
   * @throws ConfigurationError on invalid options
   */
  constructor(options: HttpCacheStoreOptions = {}) {
    this.config = resolveStoreConfig(options);
    this.cache = this.config.cache;
    this.capabilities = resolveCapabilities(this.cache);
    this.logger = this.config.logger.child({ component: 'http-cache-store' });
    this.locks = new LockManager(this.config.lockStore, { ttlMs: this.config.lockTtlMs }, this.config.logger);
    this.content = new ContentStore(this.cache, {
      generateContentDigests: this.config.generateContentDigests,
      gzipLevel: this.config.gzipLevel,
      logger: this.config.logger,
    });
  }

  /**
   * Find the stored response matching a request
   */
  async lookup(request: HttpRequest): Promise<HttpResponse | null> {
    const key = getCacheKey(request);
    const entries = decodeMetadata(await this.cache.get(key));

    if (entries) {
      for (const [varyKey, record] of entries) {
        if (varyKey === NON_VARYING_KEY || getVaryKey(record.vary, request) === varyKey) {
          const response = await this.content.restore(record, request);
          this.logger.debug({ key, hit: response !== null }, 'lookup');
          this.emit({ type: response ? 'store:hit' : 'store:miss', key, timestamp: Date.now() });
          return response;
        }
      }
    }

    this.logger.debug({ key, hit: false }, 'lookup');
    this.emit({ type: 'store:miss', key, timestamp: Date.now() });
    return null;
  }

  /**
   * Store a response for a request
   *
   * @returns The cache key the response was stored under
   * @throws UncacheableResponseError if the response has no max-age
   * @throws StorageError if the body cannot be stored
   */
  async write(request: HttpRequest, response: HttpResponse): Promise<string> {
    const maxAge = response.getMaxAge();
    if (maxAge === null) {
      throw new UncacheableResponseError();
    }

    const digestGiven = response.getContentDigest() !== undefined;
    const digest = await this.content.ensureStored(response);

    const key = getCacheKey(request);
    const vary = response.getVary();
    const headers = response.headers.toRecord();
    delete headers['age'];

    const record: VariantRecord = { vary, headers, status: response.status, uri: request.getUri() };
    if (digest === null) {
      record.content = response.getContent().toString('base64');
    }

    let entries: MetadataEntry;
    if (vary.length === 0) {
      // A non-varying response replaces every variant
      entries = new Map([[NON_VARYING_KEY, record]]);
    } else {
      entries = decodeMetadata(await this.cache.get(key)) ?? new Map();
      entries.set(getVaryKey(vary, request), record);
      entries.delete(NON_VARYING_KEY);
    }

    const tags = parseTagHeader(response.headers.getAll(this.config.cacheTagsHeader));

    await this.autoPruneExpiredEntries();

    if (!(await this.cache.saveDeferred(key, encodeMetadata(entries), { ttlSeconds: maxAge, tags }))) {
      this.logger.warn({ key }, 'backend refused the cache entry');
    }
    if (!(await this.cache.commit())) {
      if (digest !== null && !digestGiven) {
        response.headers.delete(CONTENT_DIGEST_HEADER);
        throw new StorageError(digest);
      }
      this.logger.warn({ key }, 'backend failed to commit the cache entry');
    }

    this.logger.debug({ key, variants: entries.size, tags }, 'write');
    this.emit({ type: 'store:write', key, tags, timestamp: Date.now() });
    return key;
  }

  /**
   * Drop every variant stored for the request's URL
   *
   * Shared bodies are left to expire on their own.
   */
  async invalidate(request: HttpRequest): Promise<void> {
    const key = getCacheKey(request);
    await this.cache.delete(key);
    this.emit({ type: 'store:invalidate', key, timestamp: Date.now() });
  }

  /**
   * Drop every variant stored for a URL
   *
   * @returns Whether anything was stored
   */
  async purge(url: string): Promise<boolean> {
    const key = getCacheKey(HttpRequest.create(url));
    const existed = await this.cache.delete(key);
    this.emit({ type: 'store:purge', key, timestamp: Date.now() });
    return existed;
  }

  /**
   * Lock the request's URL for this instance
   *
   * @returns false if the lock is held, here or elsewhere
   */
  async lock(request: HttpRequest): Promise<boolean> {
    return this.locks.tryLock(getCacheKey(request));
  }

  /**
   * @returns false if the lock was not held, or was lost in the backend
   */
  async unlock(request: HttpRequest): Promise<boolean> {
    return this.locks.unlock(getCacheKey(request));
  }

  isLocked(request: HttpRequest): boolean {
    return this.locks.isLocked(getCacheKey(request));
  }

  /**
   * Release every lock this instance holds
   */
  async cleanup(): Promise<void> {
    await this.locks.releaseAll();
  }

  /**
   * Invalidate every entry written with one of the tags
   *
   * @returns false if the backend rejects a tag
   * @throws ConfigurationError if the backend has no tag support
   */
  async invalidateTags(tags: string[]): Promise<boolean> {
    const tagAware = this.capabilities.tags;
    if (!tagAware) {
      throw new ConfigurationError('Cannot invalidate tags on a cache backend that does not support tags');
    }

    try {
      const invalidated = await tagAware.invalidateTags(tags);
      this.emit({ type: 'store:tags-invalidate', tags, timestamp: Date.now() });
      return invalidated;
    } catch (error) {
      if (error instanceof InvalidArgumentError) {
        this.logger.debug({ tags, err: error }, 'tags rejected by backend');
        return false;
      }
      throw error;
    }
  }

  /**
   * Remove expired entries from the backend
   *
   * Does nothing if the backend cannot prune or another pass holds the
   * prune lock.
   */
  async prune(): Promise<void> {
    const prunable = this.capabilities.prune;
    if (!prunable) {
      return;
    }

    const result = await this.locks.withLock(PRUNE_LOCK, () => prunable.prune());
    if (!result.acquired) {
      this.logger.debug('prune already running elsewhere');
    }
    this.emit({ type: result.acquired ? 'store:prune' : 'store:prune-skipped', timestamp: Date.now() });
  }

  /**
   * Remove every entry from the backend
   *
   * Does nothing if the backend cannot clear or another pass holds the
   * cleanup lock.
   */
  async clear(): Promise<void> {
    const clearable = this.capabilities.clear;
    if (!clearable) {
      return;
    }

    const result = await this.locks.withLock(CLEANUP_LOCK, () => clearable.clear());
    if (!result.acquired) {
      this.logger.debug('clear already running elsewhere');
    }
    this.emit({ type: result.acquired ? 'store:clear' : 'store:clear-skipped', timestamp: Date.now() });
  }

  getCacheKey(request: HttpRequest): string {
    return getCacheKey(request);
  }

  getVaryKey(vary: readonly string[], request: HttpRequest): string {
    return getVaryKey(vary, request);
  }

  generateContentDigest(response: HttpResponse): Promise<string | null> {
    return generateContentDigest(response, { enabled: this.config.generateContentDigests });
  }

  /**
   * Add event listener
   */
  on(listener: StoreEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Remove event listener
   */
  off(listener: StoreEventListener): void {
    this.listeners.delete(listener);
  }

  /**
   * Release held locks and close the backend if this store created it
   */
  async close(): Promise<void> {
    await this.cleanup();
    if (this.config.ownsCache) {
      await this.cache.close();
    }
  }

  /**
   * Count writes and prune once the threshold is passed
   */
  private async autoPruneExpiredEntries(): Promise<void> {
    if (this.config.pruneThreshold === 0) {
      return;
    }

    const counter = decodeCounter(await this.cache.get(COUNTER_KEY));
    let next = counter + 1;
    if (counter > this.config.pruneThreshold) {
      await this.prune();
      next = 0;
    }

    await this.cache.saveDeferred(COUNTER_KEY, next);
  }

  private emit(event: StoreEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch {
        // Ignore listener errors
      }
    }
  }
}

/**
 * Create an HTTP cache store
 */
export function createHttpCacheStore(options?: HttpCacheStoreOptions): HttpCacheStore {
  return new HttpCacheStore(options);
}
