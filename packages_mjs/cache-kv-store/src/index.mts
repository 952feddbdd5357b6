/**
 * @proxy-cache/cache-kv-store
 *
 * Key-value cache backends with:
 * - Deferred writes flushed by commit()
 * - Per-entry TTL
 * - Tag-based invalidation
 * - On-demand pruning of expired entries
 * - Pluggable storage (In-Memory, Filesystem, Redis)
 *
 * @example
 * ```typescript
 * import { FilesystemItemStore, resolveCapabilities } from '@proxy-cache/cache-kv-store';
 *
 * const backend = new FilesystemItemStore('/var/cache/proxy');
 *
 * await backend.saveDeferred('greeting', 'hello', { ttlSeconds: 60, tags: ['home'] });
 * await backend.commit();
 *
 * const { tags } = resolveCapabilities(backend);
 * await tags?.invalidateTags(['home']);
 * ```
 */

// Types
export type {
  JsonPrimitive,
  JsonValue,
  SaveOptions,
  StoredItem,
  KeyValueBackend,
  TagAwareBackend,
  PrunableBackend,
  ClearableBackend,
  BackendCapabilities,
} from './types.mjs';

// Errors
export { InvalidArgumentError } from './errors.mjs';

// Capabilities
export {
  RESERVED_CHARACTERS,
  isTagAware,
  isPrunable,
  isClearable,
  resolveCapabilities,
  validateKey,
  validateTags,
} from './capabilities.mjs';

// Stores
export {
  MemoryItemStore,
  createMemoryItemStore,
  type MemoryItemStoreOptions,
  type MemoryItemStoreStats,
  FilesystemItemStore,
  createFilesystemItemStore,
  RedisItemStore,
  createRedisItemStore,
  type RedisClient,
} from './stores/index.mjs';
