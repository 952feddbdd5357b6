/**
 * In-memory lock backend
 * Only coordinates callers sharing one process
 */

import type { LockStore } from '../types.mjs';
import { LockReleasingError } from '../errors.mjs';

interface MemoryLock {
  token: string;
  expiresAt: number;
}

export class MemoryLockStore implements LockStore {
  private locks: Map<string, MemoryLock> = new Map();

  private live(resource: string): MemoryLock | undefined {
    const lock = this.locks.get(resource);
    if (lock && lock.expiresAt <= Date.now()) {
      this.locks.delete(resource);
      return undefined;
    }
    return lock;
  }

  async acquire(resource: string, token: string, ttlMs: number): Promise<boolean> {
    const current = this.live(resource);
    if (current) {
      return current.token === token;
    }
    this.locks.set(resource, { token, expiresAt: Date.now() + ttlMs });
    return true;
  }

  async release(resource: string, token: string): Promise<void> {
    const current = this.live(resource);
    if (!current || current.token !== token) {
      throw new LockReleasingError(resource);
    }
    this.locks.delete(resource);
  }

  async exists(resource: string, token: string): Promise<boolean> {
    return this.live(resource)?.token === token;
  }

  /**
   * Number of unexpired locks
   */
  get size(): number {
    for (const resource of [...this.locks.keys()]) {
      this.live(resource);
    }
    return this.locks.size;
  }
}

export function createMemoryLockStore(): MemoryLockStore {
  return new MemoryLockStore();
}
