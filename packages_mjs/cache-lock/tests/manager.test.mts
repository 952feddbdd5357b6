/**
 * Tests for LockManager
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { pino } from 'pino';
import { LockManager, createLockManager, DEFAULT_LOCK_MANAGER_CONFIG } from '../src/manager.mjs';
import { MemoryLockStore } from '../src/stores/memory.mjs';
import { LockReleasingError } from '../src/errors.mjs';
import type { LockEvent, LockStore } from '../src/types.mjs';

const silent = pino({ level: 'silent' });

describe('LockManager', () => {
  let store: MemoryLockStore;
  let manager: LockManager;

  beforeEach(() => {
    store = new MemoryLockStore();
    manager = new LockManager(store, {}, silent);
  });

  describe('tryLock()', () => {
    it('should acquire a free lock', async () => {
      expect(await manager.tryLock('resource')).toBe(true);
      expect(manager.isLocked('resource')).toBe(true);
      expect(manager.heldLocks()).toEqual(['resource']);
    });

    it('should not re-enter a lock it already holds', async () => {
      await manager.tryLock('resource');
      expect(await manager.tryLock('resource')).toBe(false);
      expect(manager.isLocked('resource')).toBe(true);
    });

    it('should refuse a lock held by another manager', async () => {
      const other = new LockManager(store, {}, silent);
      await other.tryLock('resource');

      expect(await manager.tryLock('resource')).toBe(false);
      expect(manager.isLocked('resource')).toBe(false);
    });

    it('should let only one of two concurrent attempts win', async () => {
      const results = await Promise.all([manager.tryLock('resource'), manager.tryLock('resource')]);
      expect(results.filter(Boolean)).toHaveLength(1);
    });

    it('should use the configured TTL and token generator', async () => {
      const acquire = vi.spyOn(store, 'acquire');
      const custom = createLockManager(store, { ttlMs: 1234, tokenGenerator: () => 'fixed-token' }, silent);

      await custom.tryLock('resource');

      expect(acquire).toHaveBeenCalledWith('resource', 'fixed-token', 1234);
      expect(await store.exists('resource', 'fixed-token')).toBe(true);
    });

    it('should default to a five minute TTL', () => {
      expect(DEFAULT_LOCK_MANAGER_CONFIG.ttlMs).toBe(300000);
    });
  });

  describe('unlock()', () => {
    it('should release a held lock', async () => {
      await manager.tryLock('resource');

      expect(await manager.unlock('resource')).toBe(true);
      expect(manager.isLocked('resource')).toBe(false);
      expect(store.size).toBe(0);
    });

    it('should return false for a lock it does not hold', async () => {
      expect(await manager.unlock('resource')).toBe(false);
    });

    it('should return false and forget the lock when the backend lost it', async () => {
      const failing: LockStore = {
        acquire: async () => true,
        release: async (resource) => {
          throw new LockReleasingError(resource);
        },
        exists: async () => true,
      };
      const lossy = new LockManager(failing, {}, silent);
      await lossy.tryLock('resource');

      expect(await lossy.unlock('resource')).toBe(false);
      expect(lossy.isLocked('resource')).toBe(false);
    });

    it('should propagate other backend failures', async () => {
      const broken: LockStore = {
        acquire: async () => true,
        release: async () => {
          throw new Error('disk gone');
        },
        exists: async () => true,
      };
      const lossy = new LockManager(broken, {}, silent);
      await lossy.tryLock('resource');

      await expect(lossy.unlock('resource')).rejects.toThrow('disk gone');
      expect(lossy.isLocked('resource')).toBe(false);
    });
  });

  describe('releaseAll()', () => {
    it('should release every held lock', async () => {
      await manager.tryLock('a');
      await manager.tryLock('b');

      await manager.releaseAll();

      expect(manager.heldLocks()).toEqual([]);
      expect(store.size).toBe(0);
    });

    it('should ignore release failures', async () => {
      const broken: LockStore = {
        acquire: async () => true,
        release: async () => {
          throw new Error('disk gone');
        },
        exists: async () => true,
      };
      const lossy = new LockManager(broken, {}, silent);
      await lossy.tryLock('a');

      await expect(lossy.releaseAll()).resolves.toBeUndefined();
      expect(lossy.heldLocks()).toEqual([]);
    });
  });

  describe('withLock()', () => {
    it('should run the callback and release afterwards', async () => {
      const result = await manager.withLock('resource', async () => 42);

      expect(result).toEqual({ acquired: true, value: 42 });
      expect(manager.isLocked('resource')).toBe(false);
    });

    it('should skip the callback when the lock is taken', async () => {
      const other = new LockManager(store, {}, silent);
      await other.tryLock('resource');
      const fn = vi.fn(async () => 42);

      const result = await manager.withLock('resource', fn);

      expect(result).toEqual({ acquired: false });
      expect(fn).not.toHaveBeenCalled();
    });

    it('should release the lock when the callback throws', async () => {
      await expect(
        manager.withLock('resource', async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');
      expect(manager.isLocked('resource')).toBe(false);
    });
  });

  describe('events', () => {
    it('should emit acquire, contended and release events', async () => {
      const events: LockEvent[] = [];
      manager.on((event) => events.push(event));

      await manager.tryLock('resource');
      await manager.tryLock('resource');
      await manager.unlock('resource');

      expect(events.map((event) => event.type)).toEqual(['lock:acquire', 'lock:contended', 'lock:release']);
    });

    it('should stop emitting after unsubscribe', async () => {
      const listener = vi.fn();
      const unsubscribe = manager.on(listener);
      unsubscribe();

      await manager.tryLock('resource');
      expect(listener).not.toHaveBeenCalled();
    });

    it('should ignore listener errors', async () => {
      manager.on(() => {
        throw new Error('listener failed');
      });
      expect(await manager.tryLock('resource')).toBe(true);
    });
  });
});
