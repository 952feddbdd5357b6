/**
 * Tests for FilesystemItemStore
 */

import { createHash } from 'node:crypto';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import { pino } from 'pino';
import { FilesystemItemStore } from '../src/stores/filesystem.mjs';
import { InvalidArgumentError } from '../src/errors.mjs';

const silent = pino({ level: 'silent' });

function tagFile(directory: string, tag: string): string {
  return path.join(directory, 'http_cache', 'tags', `${createHash('sha256').update(tag).digest('hex')}.json`);
}

async function indexedKeys(directory: string, tag: string): Promise<string[] | undefined> {
  const file = tagFile(directory, tag);
  if (!(await fs.pathExists(file))) {
    return undefined;
  }
  const index: unknown = await fs.readJson(file);
  const keys: unknown = typeof index === 'object' && index !== null ? Reflect.get(index, 'keys') : undefined;
  return Array.isArray(keys) ? keys.filter((key): key is string => typeof key === 'string') : undefined;
}

describe('FilesystemItemStore', () => {
  let directory: string;
  let store: FilesystemItemStore;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'kv-store-'));
    store = new FilesystemItemStore(directory, 'http_cache', silent);
  });

  afterEach(async () => {
    await store.close();
    await fs.remove(directory);
    vi.useRealTimers();
  });

  it('should persist committed values across instances', async () => {
    await store.saveDeferred('key', { status: 200, body: 'hello' });
    await store.commit();

    const other = new FilesystemItemStore(directory, 'http_cache', silent);
    expect(await other.get('key')).toEqual({ status: 200, body: 'hello' });
  });

  it('should not write anything before commit', async () => {
    await store.saveDeferred('key', 'value');
    expect(await store.get('key')).toBe('value');

    const other = new FilesystemItemStore(directory, 'http_cache', silent);
    expect(await other.get('key')).toBeUndefined();
  });

  it('should keep namespaces apart', async () => {
    await store.saveDeferred('key', 'value');
    await store.commit();

    const other = new FilesystemItemStore(directory, 'other', silent);
    expect(await other.get('key')).toBeUndefined();
  });

  it('should expire entries after their TTL', async () => {
    await store.saveDeferred('key', 'value', { ttlSeconds: 5 });
    await store.commit();

    vi.advanceTimersByTime(4000);
    expect(await store.get('key')).toBe('value');

    vi.advanceTimersByTime(1000);
    expect(await store.get('key')).toBeUndefined();
  });

  it('should report whether a deleted entry existed', async () => {
    await store.saveDeferred('key', 'value');
    await store.commit();

    expect(await store.delete('key')).toBe(true);
    expect(await store.delete('key')).toBe(false);
  });

  it('should invalidate entries by tag', async () => {
    await store.saveDeferred('a', 1, { tags: ['foobar', 'other tag'] });
    await store.saveDeferred('b', 2, { tags: ['other tag'] });
    await store.saveDeferred('c', 3);
    await store.commit();

    expect(await store.invalidateTags(['foobar'])).toBe(true);

    expect(await store.get('a')).toBeUndefined();
    expect(await store.get('b')).toBe(2);
    expect(await store.get('c')).toBe(3);
  });

  it('should drop deleted keys from their tag indexes', async () => {
    await store.saveDeferred('a', 1, { tags: ['news', 'home'] });
    await store.saveDeferred('b', 2, { tags: ['news'] });
    await store.commit();

    await store.delete('a');

    expect(await indexedKeys(directory, 'news')).toEqual(['b']);
    expect(await indexedKeys(directory, 'home')).toBeUndefined();
  });

  it('should move a rewritten key to its new tags', async () => {
    await store.saveDeferred('a', 1, { tags: ['news'] });
    await store.commit();
    await store.saveDeferred('a', 2, { tags: ['sports'] });
    await store.commit();

    expect(await indexedKeys(directory, 'news')).toBeUndefined();
    expect(await indexedKeys(directory, 'sports')).toEqual(['a']);
  });

  it('should drop invalidated keys from their other tag indexes', async () => {
    await store.saveDeferred('a', 1, { tags: ['foobar', 'other tag'] });
    await store.saveDeferred('b', 2, { tags: ['other tag'] });
    await store.commit();

    await store.invalidateTags(['foobar']);

    expect(await indexedKeys(directory, 'foobar')).toBeUndefined();
    expect(await indexedKeys(directory, 'other tag')).toEqual(['b']);
  });

  it('should drop expired keys from tag indexes on prune', async () => {
    await store.saveDeferred('short', 1, { ttlSeconds: 1, tags: ['news'] });
    await store.saveDeferred('long', 2, { ttlSeconds: 100, tags: ['news'] });
    await store.saveDeferred('gone', 3, { ttlSeconds: 1, tags: ['archive'] });
    await store.commit();

    vi.advanceTimersByTime(2000);
    await store.prune();

    expect(await indexedKeys(directory, 'news')).toEqual(['long']);
    expect(await indexedKeys(directory, 'archive')).toBeUndefined();
  });

  it('should reject reserved characters in tags', async () => {
    await expect(store.invalidateTags(['a@b'])).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it('should prune expired entries from disk', async () => {
    await store.saveDeferred('short', 1, { ttlSeconds: 1 });
    await store.saveDeferred('long', 2, { ttlSeconds: 100 });
    await store.commit();

    vi.advanceTimersByTime(2000);
    await store.prune();

    const itemsDir = path.join(directory, 'http_cache', 'items');
    const files: string[] = [];
    for (const shard of await fs.readdir(itemsDir)) {
      files.push(...(await fs.readdir(path.join(itemsDir, shard))));
    }
    expect(files).toHaveLength(1);
    expect(await store.get('long')).toBe(2);
  });

  it('should treat unreadable files as misses', async () => {
    await store.saveDeferred('key', 'value');
    await store.commit();

    const itemsDir = path.join(directory, 'http_cache', 'items');
    const [shard] = await fs.readdir(itemsDir);
    const [file] = await fs.readdir(path.join(itemsDir, shard));
    await fs.writeFile(path.join(itemsDir, shard, file), '{not json');

    expect(await store.get('key')).toBeUndefined();
  });

  it('should clear everything', async () => {
    await store.saveDeferred('a', 1, { tags: ['t'] });
    await store.commit();

    await store.clear();

    expect(await store.get('a')).toBeUndefined();
    expect(await fs.readdir(path.join(directory, 'http_cache'))).toEqual([]);
  });
});
