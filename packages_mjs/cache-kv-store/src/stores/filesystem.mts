/**
 * Filesystem key-value backend
 * One JSON file per key, suitable for a single machine
 */

import { createHash, randomBytes } from 'node:crypto';
import path from 'node:path';
import fs from 'fs-extra';
import type {
  ClearableBackend,
  JsonValue,
  PrunableBackend,
  SaveOptions,
  StoredItem,
  TagAwareBackend,
} from '../types.mjs';
import { expiresAtFromTtl, isExpired, validateKey, validateTags } from '../capabilities.mjs';
import { isRecord, toJsonValue } from '../json.mjs';
import { logger as packageLogger, type Logger } from '../logger.mjs';

/**
 * On-disk shape of an item file
 */
interface ItemFile extends StoredItem {
  key: string;
}

/**
 * On-disk shape of a tag index file
 */
interface TagFile {
  tag: string;
  keys: string[];
}

function hashName(name: string): string {
  return createHash('sha256').update(name).digest('hex');
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function toItemFile(raw: unknown): ItemFile | undefined {
  if (!isRecord(raw) || typeof raw['key'] !== 'string' || !('value' in raw)) {
    return undefined;
  }
  const expiresAt = raw['expiresAt'];
  if (expiresAt !== null && typeof expiresAt !== 'number') {
    return undefined;
  }
  const tags = raw['tags'];
  if (!isStringArray(tags)) {
    return undefined;
  }
  return { key: raw['key'], value: toJsonValue(raw['value']), expiresAt, tags };
}

function toTagFile(raw: unknown): TagFile | undefined {
  if (!isRecord(raw) || typeof raw['tag'] !== 'string' || !isStringArray(raw['keys'])) {
    return undefined;
  }
  return { tag: raw['tag'], keys: raw['keys'] };
}

function isMissingFileError(error: unknown): boolean {
  return isRecord(error) && error['code'] === 'ENOENT';
}

/**
 * Filesystem backend with tags, pruning and clearing
 *
 * Layout below `<directory>/<namespace>`:
 * - `items/<xx>/<sha256(key)>.json`
 * - `tags/<sha256(tag)>.json`
 */
export class FilesystemItemStore implements TagAwareBackend, PrunableBackend, ClearableBackend {
  private readonly root: string;
  private readonly logger: Logger;
  private deferred: Map<string, StoredItem> = new Map();

  /**
   * Create a new FilesystemItemStore
   *
   * @param directory - Base directory
   * @param namespace - Sub-directory for this store. Default: 'http_cache'
   */
  constructor(directory: string, namespace: string = 'http_cache', logger?: Logger) {
    this.root = path.join(directory, namespace);
    this.logger = (logger ?? packageLogger).child({ component: 'filesystem-item-store' });
  }

  private itemPath(key: string): string {
    const hash = hashName(key);
    return path.join(this.root, 'items', hash.slice(0, 2), `${hash}.json`);
  }

  private tagPath(tag: string): string {
    return path.join(this.root, 'tags', `${hashName(tag)}.json`);
  }

  private async readJson(file: string): Promise<unknown> {
    try {
      const raw: unknown = await fs.readJson(file);
      return raw;
    } catch (error) {
      if (isMissingFileError(error)) {
        return undefined;
      }
      if (error instanceof SyntaxError) {
        this.logger.warn({ file }, 'removing unreadable cache file');
        await fs.remove(file);
        return undefined;
      }
      throw error;
    }
  }

  private async writeJsonAtomic(file: string, data: ItemFile | TagFile): Promise<void> {
    const tmp = `${file}.${randomBytes(6).toString('hex')}.tmp`;
    await fs.outputJson(tmp, data);
    await fs.move(tmp, file, { overwrite: true });
  }

  private async readItem(key: string): Promise<ItemFile | undefined> {
    const item = toItemFile(await this.readJson(this.itemPath(key)));
    return item !== undefined && item.key === key ? item : undefined;
  }

  private async addToTagIndex(tag: string, key: string): Promise<void> {
    const file = this.tagPath(tag);
    const existing = toTagFile(await this.readJson(file));
    const keys = existing?.keys ?? [];
    if (keys.includes(key)) {
      return;
    }
    await this.writeJsonAtomic(file, { tag, keys: [...keys, key] });
  }

  private async removeFromTagIndex(tag: string, keys: readonly string[]): Promise<void> {
    const file = this.tagPath(tag);
    const existing = toTagFile(await this.readJson(file));
    if (!existing) {
      return;
    }
    const remaining = existing.keys.filter((key) => !keys.includes(key));
    if (remaining.length === existing.keys.length) {
      return;
    }
    if (remaining.length === 0) {
      await fs.remove(file);
    } else {
      await this.writeJsonAtomic(file, { tag, keys: remaining });
    }
  }

  /**
   * Drop index entries whose item is gone, expired, or no longer carries the tag
   */
  private async pruneTagIndexes(now: number): Promise<number> {
    const tagsDir = path.join(this.root, 'tags');
    if (!(await fs.pathExists(tagsDir))) {
      return 0;
    }

    let dropped = 0;
    for (const name of await fs.readdir(tagsDir)) {
      if (name.endsWith('.tmp')) {
        continue;
      }
      const index = toTagFile(await this.readJson(path.join(tagsDir, name)));
      if (!index) {
        continue;
      }
      const stale: string[] = [];
      for (const key of index.keys) {
        const item = await this.readItem(key);
        if (!item || isExpired(item.expiresAt, now) || !item.tags.includes(index.tag)) {
          stale.push(key);
        }
      }
      if (stale.length > 0) {
        await this.removeFromTagIndex(index.tag, stale);
        dropped += stale.length;
      }
    }
    return dropped;
  }

  async get(key: string): Promise<JsonValue | undefined> {
    validateKey(key);

    const pending = this.deferred.get(key);
    if (pending) {
      return isExpired(pending.expiresAt) ? undefined : structuredClone(pending.value);
    }

    const item = await this.readItem(key);
    if (!item) {
      return undefined;
    }
    if (isExpired(item.expiresAt)) {
      await fs.remove(this.itemPath(key));
      return undefined;
    }
    return item.value;
  }

  async saveDeferred(key: string, value: JsonValue, options: SaveOptions = {}): Promise<boolean> {
    validateKey(key);
    const tags = [...(options.tags ?? [])];
    validateTags(tags);

    this.deferred.set(key, {
      value: structuredClone(value),
      expiresAt: expiresAtFromTtl(options.ttlSeconds),
      tags,
    });
    return true;
  }

  async commit(): Promise<boolean> {
    const pending = [...this.deferred.entries()];
    this.deferred.clear();

    let ok = true;
    for (const [key, item] of pending) {
      try {
        const previous = await this.readItem(key);
        await this.writeJsonAtomic(this.itemPath(key), { key, ...item });
        for (const tag of previous?.tags ?? []) {
          if (!item.tags.includes(tag)) {
            await this.removeFromTagIndex(tag, [key]);
          }
        }
        for (const tag of item.tags) {
          await this.addToTagIndex(tag, key);
        }
      } catch (error) {
        ok = false;
        this.logger.warn({ key, err: error }, 'failed to write cache item');
      }
    }
    return ok;
  }

  async delete(key: string): Promise<boolean> {
    validateKey(key);
    const wasDeferred = this.deferred.delete(key);
    const item = await this.readItem(key);
    if (!item) {
      return wasDeferred;
    }
    await fs.remove(this.itemPath(key));
    for (const tag of item.tags) {
      await this.removeFromTagIndex(tag, [key]);
    }
    return wasDeferred || !isExpired(item.expiresAt);
  }

  async invalidateTags(tags: readonly string[]): Promise<boolean> {
    validateTags(tags);
    await this.commit();

    for (const tag of tags) {
      const file = this.tagPath(tag);
      const index = toTagFile(await this.readJson(file));
      if (!index) {
        continue;
      }
      for (const key of index.keys) {
        const item = await this.readItem(key);
        // The key may have been rewritten since with other tags
        if (item && item.tags.includes(tag)) {
          await fs.remove(this.itemPath(key));
          for (const other of item.tags) {
            if (!tags.includes(other)) {
              await this.removeFromTagIndex(other, [key]);
            }
          }
        }
      }
      await fs.remove(file);
    }

    this.logger.debug({ tags }, 'invalidated tags');
    return true;
  }

  async prune(): Promise<boolean> {
    const itemsDir = path.join(this.root, 'items');
    const now = Date.now();
    let pruned = 0;
    const shards = (await fs.pathExists(itemsDir)) ? await fs.readdir(itemsDir) : [];
    for (const shard of shards) {
      const shardDir = path.join(itemsDir, shard);
      for (const name of await fs.readdir(shardDir)) {
        const file = path.join(shardDir, name);
        if (name.endsWith('.tmp')) {
          continue;
        }
        const item = toItemFile(await this.readJson(file));
        if (!item || isExpired(item.expiresAt, now)) {
          await fs.remove(file);
          pruned++;
        }
      }
    }

    const unindexed = await this.pruneTagIndexes(now);

    this.logger.debug({ pruned, unindexed }, 'pruned expired entries');
    return true;
  }

  async clear(): Promise<boolean> {
    this.deferred.clear();
    await fs.emptyDir(this.root);
    return true;
  }

  async close(): Promise<void> {
    this.deferred.clear();
  }
}

/**
 * Create a filesystem backend
 */
export function createFilesystemItemStore(
  directory: string,
  namespace?: string,
  logger?: Logger
): FilesystemItemStore {
  return new FilesystemItemStore(directory, namespace, logger);
}
