/**
 * @proxy-cache/http-cache-store
 *
 * Storage layer for an HTTP reverse-proxy cache:
 * - Scheme-independent cache keys
 * - Vary-aware variants (headers and cookies)
 * - Content-digest deduplication with gzip and file passthrough
 * - Tag invalidation
 * - Per-URL and maintenance locks
 * - Write-triggered pruning
 *
 * @example
 * ```typescript
 * import { HttpCacheStore, HttpRequest, HttpResponse } from '@proxy-cache/http-cache-store';
 * import { MemoryItemStore } from '@proxy-cache/cache-kv-store';
 * import { MemoryLockStore } from '@proxy-cache/cache-lock';
 *
 * const store = new HttpCacheStore({
 *   cache: new MemoryItemStore(),
 *   lockStore: new MemoryLockStore(),
 * });
 *
 * const request = HttpRequest.create('/');
 * await store.write(
 *   request,
 *   HttpResponse.create('hello world', { headers: { 'Cache-Control': 'max-age=120', 'Cache-Tags': 'home' } })
 * );
 *
 * const cached = await store.lookup(request);
 * await store.invalidateTags(['home']);
 * await store.close();
 * ```
 */

// Types
export type {
  CacheControlDirectives,
  VariantRecord,
  MetadataEntry,
  ContentEntry,
  HttpCacheStoreOptions,
  StoreEventType,
  StoreEvent,
  StoreEventListener,
} from './types.mjs';

// Errors
export { ConfigurationError, UncacheableResponseError, StorageError } from './errors.mjs';

// Constants
export {
  NON_VARYING_KEY,
  COUNTER_KEY,
  PRUNE_LOCK,
  CLEANUP_LOCK,
  CONTENT_DIGEST_HEADER,
} from './constants.mjs';

// HTTP model
export {
  HeaderBag,
  HttpRequest,
  HttpResponse,
  type HeaderValue,
  type HeadersInit,
  type HttpRequestInit,
  type HttpResponseInit,
} from './http.mjs';

// Parsing
export {
  parseCacheControl,
  parseVary,
  parseDateHeader,
  parseCookieHeader,
  parseTagHeader,
  acceptsEncoding,
} from './parser.mjs';

// Key derivation
export {
  getCacheKey,
  getVaryKey,
  generateContentDigest,
  isContentDigest,
  type ContentDigestOptions,
} from './hasher.mjs';

// Storage codec
export { encodeMetadata, decodeMetadata, encodeContent, decodeContent, decodeCounter } from './codec.mjs';

// Configuration
export { DEFAULT_STORE_CONFIG, resolveStoreConfig, type ResolvedStoreConfig } from './config.mjs';

// Stores
export { ContentStore, type ContentStoreOptions } from './content-store.mjs';
export { HttpCacheStore, createHttpCacheStore } from './store.mjs';
