/**
 * Types for key-value cache backends
 */

/**
 * Values a backend can persist
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * Options for a deferred save
 */
export interface SaveOptions {
  /** Lifetime in seconds. null or omitted: the entry never expires */
  ttlSeconds?: number | null;
  /** Tags to attach to the entry */
  tags?: readonly string[];
}

/**
 * Entry as kept by a backend
 */
export interface StoredItem {
  value: JsonValue;
  /** Expiry as a Unix timestamp in ms, null for no expiry */
  expiresAt: number | null;
  tags: string[];
}

/**
 * Key-value cache backend
 *
 * Writes are deferred: saveDeferred() queues an item, commit() flushes the
 * queue. A queued item is visible to get() before it is committed.
 */
export interface KeyValueBackend {
  /**
   * Get a value, undefined on miss or expiry
   */
  get(key: string): Promise<JsonValue | undefined>;

  /**
   * Queue a value for the next commit. Returns false if the backend refuses it
   */
  saveDeferred(key: string, value: JsonValue, options?: SaveOptions): Promise<boolean>;

  /**
   * Persist all queued values
   */
  commit(): Promise<boolean>;

  /**
   * Delete a value. Returns whether it existed
   */
  delete(key: string): Promise<boolean>;

  /**
   * Release resources
   */
  close(): Promise<void>;
}

/**
 * Backend that can invalidate entries by tag
 */
export interface TagAwareBackend extends KeyValueBackend {
  invalidateTags(tags: readonly string[]): Promise<boolean>;
}

/**
 * Backend that can drop its expired entries on demand
 */
export interface PrunableBackend extends KeyValueBackend {
  prune(): Promise<boolean>;
}

/**
 * Backend that can drop all of its entries
 */
export interface ClearableBackend extends KeyValueBackend {
  clear(): Promise<boolean>;
}

/**
 * Optional capabilities of a backend, resolved once
 */
export interface BackendCapabilities {
  tags?: TagAwareBackend;
  prune?: PrunableBackend;
  clear?: ClearableBackend;
}
