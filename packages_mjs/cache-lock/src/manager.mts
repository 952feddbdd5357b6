/**
 * Per-instance lock table on top of a LockStore
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  LockEvent,
  LockEventListener,
  LockHandle,
  LockManagerConfig,
  LockStore,
  WithLockResult,
} from './types.mjs';
import { LockReleasingError } from './errors.mjs';
import { logger as packageLogger, type Logger } from './logger.mjs';

/**
 * Default lock manager configuration
 */
export const DEFAULT_LOCK_MANAGER_CONFIG: Required<LockManagerConfig> = {
  ttlMs: 300000, // 5 minutes
  tokenGenerator: () => uuidv4(),
};

/**
 * Merge user config with defaults
 */
export function mergeLockManagerConfig(config?: LockManagerConfig): Required<LockManagerConfig> {
  return {
    ttlMs: config?.ttlMs ?? DEFAULT_LOCK_MANAGER_CONFIG.ttlMs,
    tokenGenerator: config?.tokenGenerator ?? DEFAULT_LOCK_MANAGER_CONFIG.tokenGenerator,
  };
}

/**
 * LockManager - the locks one owner currently holds
 *
 * The table is owned by a single store instance and must be torn down with
 * releaseAll() before the owner goes away; locks left behind stay in the
 * backend until their TTL runs out.
 *
 * @example
 * const locks = new LockManager(new MemoryLockStore());
 *
 * if (await locks.tryLock('md4f2a...')) {
 *   try {
 *     // revalidate the resource
 *   } finally {
 *     await locks.unlock('md4f2a...');
 *   }
 * }
 */
export class LockManager {
  private readonly config: Required<LockManagerConfig>;
  private readonly store: LockStore;
  private readonly logger: Logger;
  private readonly held: Map<string, LockHandle> = new Map();
  private readonly pending: Set<string> = new Set();
  private readonly listeners: Set<LockEventListener> = new Set();

  constructor(store: LockStore, config?: LockManagerConfig, logger?: Logger) {
    this.store = store;
    this.config = mergeLockManagerConfig(config);
    this.logger = (logger ?? packageLogger).child({ component: 'lock-manager' });
  }

  /**
   * Try to acquire a lock
   *
   * Fails fast if this manager already holds or is acquiring the same name.
   */
  async tryLock(name: string): Promise<boolean> {
    if (this.held.has(name) || this.pending.has(name)) {
      this.emit({ type: 'lock:contended', resource: name, timestamp: Date.now() });
      return false;
    }

    // Reserve the name before awaiting the backend
    this.pending.add(name);
    try {
      const token = this.config.tokenGenerator();
      const acquired = await this.store.acquire(name, token, this.config.ttlMs);

      if (!acquired) {
        this.logger.debug({ lock: name }, 'lock held elsewhere');
        this.emit({ type: 'lock:contended', resource: name, timestamp: Date.now() });
        return false;
      }

      this.held.set(name, { resource: name, token, acquiredAt: Date.now(), ttlMs: this.config.ttlMs });
      this.logger.debug({ lock: name }, 'lock acquired');
      this.emit({ type: 'lock:acquire', resource: name, timestamp: Date.now() });
      return true;
    } finally {
      this.pending.delete(name);
    }
  }

  /**
   * Release a lock held by this manager
   *
   * Returns false if the lock is not held here or if the backend no longer
   * had it; in both cases the lock is forgotten locally.
   */
  async unlock(name: string): Promise<boolean> {
    const handle = this.held.get(name);
    if (!handle) {
      return false;
    }

    try {
      await this.store.release(handle.resource, handle.token);
    } catch (error) {
      if (error instanceof LockReleasingError) {
        this.logger.warn({ lock: name }, 'lock was already released in the backend');
        this.emit({ type: 'lock:release-failed', resource: name, timestamp: Date.now() });
        return false;
      }
      throw error;
    } finally {
      this.held.delete(name);
    }

    this.logger.debug({ lock: name }, 'lock released');
    this.emit({ type: 'lock:release', resource: name, timestamp: Date.now() });
    return true;
  }

  /**
   * Check whether this manager holds a lock
   */
  isLocked(name: string): boolean {
    return this.held.has(name);
  }

  /**
   * Names of all locks held by this manager
   */
  heldLocks(): string[] {
    return [...this.held.keys()];
  }

  /**
   * Release every held lock, ignoring release failures
   */
  async releaseAll(): Promise<void> {
    const handles = [...this.held.values()];
    this.held.clear();

    for (const handle of handles) {
      try {
        await this.store.release(handle.resource, handle.token);
        this.emit({ type: 'lock:release', resource: handle.resource, timestamp: Date.now() });
      } catch (error) {
        this.logger.warn({ lock: handle.resource, err: error }, 'failed to release lock during cleanup');
        this.emit({ type: 'lock:release-failed', resource: handle.resource, timestamp: Date.now() });
      }
    }
  }

  /**
   * Run fn while holding a lock, releasing it afterwards
   *
   * Returns { acquired: false } without running fn if the lock is taken.
   */
  async withLock<T>(name: string, fn: () => Promise<T>): Promise<WithLockResult<T>> {
    if (!(await this.tryLock(name))) {
      return { acquired: false };
    }

    try {
      const value = await fn();
      return { acquired: true, value };
    } finally {
      await this.unlock(name);
    }
  }

  /**
   * Add event listener
   */
  on(listener: LockEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Remove event listener
   */
  off(listener: LockEventListener): void {
    this.listeners.delete(listener);
  }

  private emit(event: LockEvent): void {
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
 * Create a lock manager
 */
export function createLockManager(store: LockStore, config?: LockManagerConfig, logger?: Logger): LockManager {
  return new LockManager(store, config, logger);
}
