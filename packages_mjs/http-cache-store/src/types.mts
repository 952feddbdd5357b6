/**
 * Types for the HTTP cache store
 */

import type { KeyValueBackend } from '@proxy-cache/cache-kv-store';
import type { LockStore } from '@proxy-cache/cache-lock';
import type { Logger } from 'pino';

/**
 * Parsed Cache-Control directives
 */
export interface CacheControlDirectives {
  /** Response must not be cached */
  noStore?: boolean;
  /** Response must be revalidated before use */
  noCache?: boolean;
  /** Maximum age in seconds */
  maxAge?: number;
  /** Shared cache maximum age in seconds */
  sMaxAge?: number;
  private?: boolean;
  public?: boolean;
  mustRevalidate?: boolean;
  proxyRevalidate?: boolean;
  noTransform?: boolean;
  staleWhileRevalidate?: number;
  staleIfError?: number;
  immutable?: boolean;
}

/**
 * One stored response of a URL, selected by its vary key
 */
export type VariantRecord = {
  /** Lower-case header names the response varies on */
  vary: string[];
  /** Lower-case header name to values, without "age" */
  headers: Record<string, string[]>;
  status: number;
  /** For debugging only */
  uri: string;
  /** Base64 body, only when content digests are disabled */
  content?: string;
};

/**
 * Every variant stored under one cache key, in write order
 */
export type MetadataEntry = Map<string, VariantRecord>;

/**
 * Deduplicated body shared by every variant with the same digest
 */
export type ContentEntry =
  | {
      kind: 'content';
      /** Highest max-age of any writer, in seconds */
      expires: number;
      encoding: 'identity' | 'gzip';
      body: Buffer;
    }
  | {
      kind: 'file';
      expires: number;
      path: string;
    };

/**
 * Options accepted by HttpCacheStore
 */
export interface HttpCacheStoreOptions {
  /** Directory for the default filesystem backend and lock files */
  cacheDirectory?: string;
  /** Key-value backend. Default: FilesystemItemStore(cacheDirectory, 'http_cache') */
  cache?: KeyValueBackend;
  /** Lock backend. Default: FileLockStore(cacheDirectory/locks) */
  lockStore?: LockStore;
  /** Writes between two prunes, 0 disables auto-pruning. Default: 500 */
  pruneThreshold?: number;
  /** Response header carrying cache tags. Default: 'Cache-Tags' */
  cacheTagsHeader?: string;
  /** Deduplicate bodies by content digest. Default: true */
  generateContentDigests?: boolean;
  /** Gzip level for stored bodies, 0 disables. Default: 0 */
  gzipLevel?: number;
  /** Backend lifetime of held locks in ms. Default: 300000 */
  lockTtlMs?: number;
  logger?: Logger;
}

/**
 * Event types for store operations
 */
export type StoreEventType =
  | 'store:hit'
  | 'store:miss'
  | 'store:write'
  | 'store:invalidate'
  | 'store:purge'
  | 'store:tags-invalidate'
  | 'store:prune'
  | 'store:prune-skipped'
  | 'store:clear'
  | 'store:clear-skipped';

/**
 * Store event
 */
export interface StoreEvent {
  type: StoreEventType;
  /** Cache key, when the event concerns one URL */
  key?: string;
  tags?: string[];
  timestamp: number;
}

/**
 * Event listener type
 */
export type StoreEventListener = (event: StoreEvent) => void;
