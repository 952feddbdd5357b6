/**
 * Lock files on local disk
 * Coordinates processes sharing one filesystem
 */

import { createHash } from 'node:crypto';
import path from 'node:path';
import fs from 'fs-extra';
import type { LockStore } from '../types.mjs';
import { LockReleasingError } from '../errors.mjs';
import { logger as packageLogger, type Logger } from '../logger.mjs';

export interface LockFile {
  resource: string;
  token: string;
  pid: number;
  expiresAt: number;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toLockFile(raw: unknown): LockFile | undefined {
  if (typeof raw !== 'object' || raw === null) {
    return undefined;
  }
  const resource: unknown = Reflect.get(raw, 'resource');
  const token: unknown = Reflect.get(raw, 'token');
  const pid: unknown = Reflect.get(raw, 'pid');
  const expiresAt: unknown = Reflect.get(raw, 'expiresAt');
  if (
    typeof resource !== 'string' ||
    typeof token !== 'string' ||
    typeof pid !== 'number' ||
    typeof expiresAt !== 'number'
  ) {
    return undefined;
  }
  return { resource, token, pid, expiresAt };
}

/**
 * Lock store backed by exclusive-create files
 *
 * Each lock is `<directory>/<sha256(resource)>.lock`. An expired or unreadable
 * lock file is taken over by the next acquirer.
 */
export class FileLockStore implements LockStore {
  private readonly directory: string;
  private readonly logger: Logger;

  constructor(directory: string, logger?: Logger) {
    this.directory = directory;
    this.logger = (logger ?? packageLogger).child({ component: 'file-lock-store' });
  }

  private lockPath(resource: string): string {
    const hash = createHash('sha256').update(resource).digest('hex');
    return path.join(this.directory, `${hash}.lock`);
  }

  protected async readLockFile(file: string): Promise<LockFile | undefined> {
    try {
      const raw: unknown = await fs.readJson(file);
      return toLockFile(raw);
    } catch (error) {
      if (errorCode(error) === 'ENOENT' || error instanceof SyntaxError) {
        return undefined;
      }
      throw error;
    }
  }

  private async create(resource: string, token: string, ttlMs: number): Promise<boolean> {
    const data: LockFile = { resource, token, pid: process.pid, expiresAt: Date.now() + ttlMs };
    try {
      await fs.writeFile(this.lockPath(resource), JSON.stringify(data), { flag: 'wx' });
      return true;
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        return false;
      }
      throw error;
    }
  }

  async acquire(resource: string, token: string, ttlMs: number): Promise<boolean> {
    await fs.ensureDir(this.directory);

    if (await this.create(resource, token, ttlMs)) {
      return true;
    }

    const current = await this.readLockFile(this.lockPath(resource));
    if (current && current.expiresAt > Date.now()) {
      return current.token === token;
    }

    return this.takeOver(resource, token, ttlMs);
  }

  /**
   * Replace a stale or unreadable lock file
   *
   * The file is renamed aside before it is inspected again, so a lock that
   * another acquirer created in the meantime is put back instead of deleted.
   */
  private async takeOver(resource: string, token: string, ttlMs: number): Promise<boolean> {
    const lockPath = this.lockPath(resource);
    const aside = `${lockPath}.${token}.stale`;

    try {
      await fs.rename(lockPath, aside);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return this.create(resource, token, ttlMs);
      }
      throw error;
    }

    const moved = await this.readLockFile(aside);
    if (moved && moved.expiresAt > Date.now()) {
      this.logger.debug({ lock: resource }, 'lock was taken over by another acquirer');
      try {
        await fs.link(aside, lockPath);
      } catch (error) {
        if (errorCode(error) !== 'EEXIST') {
          throw error;
        }
      }
      await fs.remove(aside);
      return moved.token === token;
    }

    this.logger.debug({ lock: resource }, 'taking over stale lock file');
    await fs.remove(aside);
    return this.create(resource, token, ttlMs);
  }

  async release(resource: string, token: string): Promise<void> {
    const current = await this.readLockFile(this.lockPath(resource));
    if (!current || current.token !== token || current.expiresAt <= Date.now()) {
      throw new LockReleasingError(resource);
    }
    await fs.remove(this.lockPath(resource));
  }

  async exists(resource: string, token: string): Promise<boolean> {
    const current = await this.readLockFile(this.lockPath(resource));
    return current !== undefined && current.token === token && current.expiresAt > Date.now();
  }
}

export function createFileLockStore(directory: string, logger?: Logger): FileLockStore {
  return new FileLockStore(directory, logger);
}
