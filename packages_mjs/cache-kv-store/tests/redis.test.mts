/**
 * Tests for RedisItemStore against an in-process Redis stand-in
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { pino } from 'pino';
import { RedisItemStore, createRedisItemStore } from '../src/stores/redis.mjs';
import { resolveCapabilities } from '../src/capabilities.mjs';
import { FakeRedisClient } from './helpers/fake-redis.mjs';

const silent = pino({ level: 'silent' });

describe('RedisItemStore', () => {
  let client: FakeRedisClient;
  let store: RedisItemStore;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    client = new FakeRedisClient();
    store = createRedisItemStore(client, 'test:', silent);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should write prefixed keys on commit', async () => {
    await store.saveDeferred('key', { ok: true });
    expect(client.data.size).toBe(0);

    await store.commit();

    expect(await client.get('test:item:key')).toBe('{"value":{"ok":true},"tags":[]}');
    expect(await store.get('key')).toEqual({ ok: true });
  });

  it('should delegate expiry to Redis', async () => {
    await store.saveDeferred('key', 'value', { ttlSeconds: 2 });
    await store.commit();

    vi.advanceTimersByTime(1999);
    expect(await store.get('key')).toBe('value');
    vi.advanceTimersByTime(1);
    expect(await store.get('key')).toBeUndefined();
  });

  it('should not store entries with a zero TTL', async () => {
    await store.saveDeferred('key', 'value', { ttlSeconds: 0 });
    expect(await store.get('key')).toBeUndefined();
    await store.commit();
    expect(await client.get('test:item:key')).toBeNull();
  });

  it('should track tags in sets and invalidate them', async () => {
    await store.saveDeferred('a', 1, { tags: ['news'] });
    await store.saveDeferred('b', 2, { tags: ['sports'] });
    await store.commit();

    expect(await client.smembers('test:tag:news')).toEqual(['a']);

    await store.invalidateTags(['news']);

    expect(await store.get('a')).toBeUndefined();
    expect(await store.get('b')).toBe(2);
    expect(await client.smembers('test:tag:news')).toEqual([]);
  });

  it('should drop deleted keys from their tag sets', async () => {
    await store.saveDeferred('a', 1, { tags: ['news', 'home'] });
    await store.saveDeferred('b', 2, { tags: ['news'] });
    await store.commit();

    await store.delete('a');

    expect(await client.smembers('test:tag:news')).toEqual(['b']);
    expect(client.data.has('test:tag:home')).toBe(false);
  });

  it('should move a rewritten key to its new tags', async () => {
    await store.saveDeferred('a', 1, { tags: ['news'] });
    await store.commit();
    await store.saveDeferred('a', 2, { tags: ['sports'] });
    await store.commit();

    expect(await client.smembers('test:tag:news')).toEqual([]);
    expect(await client.smembers('test:tag:sports')).toEqual(['a']);
  });

  it('should expire tag sets with their longest-lived item', async () => {
    await store.saveDeferred('a', 1, { ttlSeconds: 10, tags: ['news'] });
    await store.saveDeferred('b', 2, { ttlSeconds: 60, tags: ['news'] });
    await store.saveDeferred('c', 3, { tags: ['home'] });
    await store.commit();

    expect(await client.pttl('test:tag:news')).toBe(60000);
    expect(await client.pttl('test:tag:home')).toBe(-1);

    vi.advanceTimersByTime(60000);
    expect(client.data.has('test:tag:news')).toBe(true);
    expect(await client.smembers('test:tag:news')).toEqual([]);
    expect(client.data.has('test:tag:news')).toBe(false);
  });

  it('should report deletes', async () => {
    await store.saveDeferred('a', 1);
    await store.commit();
    expect(await store.delete('a')).toBe(true);
    expect(await store.delete('a')).toBe(false);
  });

  it('should clear only its own prefix', async () => {
    await client.set('unrelated', 'x');
    await store.saveDeferred('a', 1, { tags: ['t'] });
    await store.commit();

    await store.clear();

    expect([...client.data.keys()]).toEqual(['unrelated']);
  });

  it('should be tag-aware and clearable but not prunable', () => {
    const capabilities = resolveCapabilities(store);
    expect(capabilities.tags).toBe(store);
    expect(capabilities.clear).toBe(store);
    expect(capabilities.prune).toBeUndefined();
  });

  it('should quit the client on close', async () => {
    await store.close();
    expect(client.closed).toBe(true);
  });
});
