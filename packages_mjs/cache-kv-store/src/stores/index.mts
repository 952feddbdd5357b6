/**
 * Key-value backend implementations
 */

export {
  MemoryItemStore,
  createMemoryItemStore,
  type MemoryItemStoreOptions,
  type MemoryItemStoreStats,
} from './memory.mjs';

export { FilesystemItemStore, createFilesystemItemStore } from './filesystem.mjs';

export { RedisItemStore, createRedisItemStore, type RedisClient } from './redis.mjs';
