/**
 * In-process stand-in for the ioredis commands the lock store uses
 */

import type { RedisLockClient } from '../../src/stores/redis.mjs';
import { RELEASE_SCRIPT } from '../../src/stores/redis.mjs';

export class FakeRedisLockClient implements RedisLockClient {
  readonly data: Map<string, { value: string; expiresAt: number }> = new Map();

  private live(key: string): string | null {
    const entry = this.data.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= Date.now()) {
      this.data.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, _px: 'PX', milliseconds: number, _nx: 'NX'): Promise<string | null> {
    if (this.live(key) !== null) {
      return null;
    }
    this.data.set(key, { value, expiresAt: Date.now() + milliseconds });
    return 'OK';
  }

  async get(key: string): Promise<string | null> {
    return this.live(key);
  }

  async eval(script: string, _numKeys: number, ...args: string[]): Promise<unknown> {
    if (script !== RELEASE_SCRIPT) {
      throw new Error('unexpected script');
    }
    const [key, token] = args;
    if (key === undefined || this.live(key) !== token) {
      return 0;
    }
    this.data.delete(key);
    return 1;
  }
}
