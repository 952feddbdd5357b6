/**
 * Types for cache-lock package
 */

/**
 * Lock backend
 *
 * A lock is identified by a resource name and owned by a token. Backends are
 * non-blocking: acquire() answers immediately.
 */
export interface LockStore {
  /**
   * Try to take the lock. Returns false if another token holds it
   */
  acquire(resource: string, token: string, ttlMs: number): Promise<boolean>;

  /**
   * Release the lock held by token
   *
   * @throws LockReleasingError if the token no longer holds the lock
   */
  release(resource: string, token: string): Promise<void>;

  /**
   * Check whether token currently holds the lock
   */
  exists(resource: string, token: string): Promise<boolean>;
}

/**
 * A lock granted to this process
 */
export interface LockHandle {
  resource: string;
  token: string;
  acquiredAt: number;
  ttlMs: number;
}

/**
 * Configuration for LockManager
 */
export interface LockManagerConfig {
  /** Lifetime of a lock in the backend, in milliseconds. Default: 300000 (5 minutes) */
  ttlMs?: number;
  /** Custom token generator. Default: UUID v4 */
  tokenGenerator?: () => string;
}

/**
 * Result of LockManager.withLock()
 */
export type WithLockResult<T> =
  | { acquired: true; value: T }
  | { acquired: false };

/**
 * Event types for lock operations
 */
export type LockEventType =
  | 'lock:acquire'
  | 'lock:contended'
  | 'lock:release'
  | 'lock:release-failed';

/**
 * Lock event
 */
export interface LockEvent {
  type: LockEventType;
  resource: string;
  timestamp: number;
}

/**
 * Event listener type
 */
export type LockEventListener = (event: LockEvent) => void;
