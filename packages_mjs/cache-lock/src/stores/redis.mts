/**
 * Redis lock backend
 * Coordinates processes on several machines
 */

import type { LockStore } from '../types.mjs';
import { LockReleasingError } from '../errors.mjs';

/**
 * Redis client interface (compatible with ioredis)
 * Only the commands the lock needs
 */
export interface RedisLockClient {
  set(key: string, value: string, px: 'PX', milliseconds: number, nx: 'NX'): Promise<string | null>;
  get(key: string): Promise<string | null>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
}

/**
 * Delete the key only while it still carries our token
 */
export const RELEASE_SCRIPT = `if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end`;

export class RedisLockStore implements LockStore {
  private readonly client: RedisLockClient;
  private readonly keyPrefix: string;

  /**
   * @param client - Redis client (ioredis instance)
   * @param keyPrefix - Prefix for lock keys. Default: 'http-cache:lock:'
   */
  constructor(client: RedisLockClient, keyPrefix: string = 'http-cache:lock:') {
    this.client = client;
    this.keyPrefix = keyPrefix;
  }

  private key(resource: string): string {
    return `${this.keyPrefix}${resource}`;
  }

  async acquire(resource: string, token: string, ttlMs: number): Promise<boolean> {
    const result = await this.client.set(this.key(resource), token, 'PX', Math.max(1, ttlMs), 'NX');
    if (result === 'OK') {
      return true;
    }
    return (await this.client.get(this.key(resource))) === token;
  }

  async release(resource: string, token: string): Promise<void> {
    const removed = await this.client.eval(RELEASE_SCRIPT, 1, this.key(resource), token);
    if (removed !== 1) {
      throw new LockReleasingError(resource);
    }
  }

  async exists(resource: string, token: string): Promise<boolean> {
    return (await this.client.get(this.key(resource))) === token;
  }
}

export function createRedisLockStore(client: RedisLockClient, keyPrefix?: string): RedisLockStore {
  return new RedisLockStore(client, keyPrefix);
}
