/**
 * @proxy-cache/cache-lock
 *
 * Non-blocking named locks for cache writers:
 * - Token-owned locks with a TTL
 * - A per-owner LockManager that refuses re-entry
 * - Pluggable storage (In-Memory, Lock files, Redis)
 *
 * @example
 * ```typescript
 * import { LockManager, FileLockStore } from '@proxy-cache/cache-lock';
 *
 * const locks = new LockManager(new FileLockStore('/var/cache/proxy/locks'));
 *
 * const result = await locks.withLock('prune-lock', async () => pruneEverything());
 * if (!result.acquired) {
 *   // someone else is pruning
 * }
 * ```
 */

export type {
  LockStore,
  LockHandle,
  LockManagerConfig,
  WithLockResult,
  LockEventType,
  LockEvent,
  LockEventListener,
} from './types.mjs';

export { LockReleasingError } from './errors.mjs';

export {
  LockManager,
  createLockManager,
  DEFAULT_LOCK_MANAGER_CONFIG,
  mergeLockManagerConfig,
} from './manager.mjs';

export {
  MemoryLockStore,
  createMemoryLockStore,
  FileLockStore,
  createFileLockStore,
  RedisLockStore,
  createRedisLockStore,
  RELEASE_SCRIPT,
  type RedisLockClient,
} from './stores/index.mjs';
