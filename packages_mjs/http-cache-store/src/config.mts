/**
 * Option validation and defaults for HttpCacheStore
 */

import path from 'node:path';
import { z } from 'zod';
import { FilesystemItemStore, type KeyValueBackend } from '@proxy-cache/cache-kv-store';
import { FileLockStore, type LockStore } from '@proxy-cache/cache-lock';
import type { HttpCacheStoreOptions } from './types.mjs';
import { ConfigurationError } from './errors.mjs';
import { logger as packageLogger, type Logger } from './logger.mjs';

/**
 * Default store configuration
 */
export const DEFAULT_STORE_CONFIG = {
  pruneThreshold: 500,
  cacheTagsHeader: 'Cache-Tags',
  generateContentDigests: true,
  gzipLevel: 0,
  lockTtlMs: 300000, // 5 minutes
} as const;

function hasMethods(value: unknown, methods: readonly string[]): boolean {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return methods.every((method) => typeof Reflect.get(value, method) === 'function');
}

const OptionsSchema = z
  .object({
    cacheDirectory: z.string().min(1).optional(),
    cache: z
      .custom<KeyValueBackend>((value) => hasMethods(value, ['get', 'saveDeferred', 'commit', 'delete', 'close']), {
        message: 'Expected a key-value backend',
      })
      .optional(),
    lockStore: z
      .custom<LockStore>((value) => hasMethods(value, ['acquire', 'release', 'exists']), {
        message: 'Expected a lock store',
      })
      .optional(),
    pruneThreshold: z.number().int().nonnegative().default(DEFAULT_STORE_CONFIG.pruneThreshold),
    cacheTagsHeader: z.string().min(1).default(DEFAULT_STORE_CONFIG.cacheTagsHeader),
    generateContentDigests: z.boolean().default(DEFAULT_STORE_CONFIG.generateContentDigests),
    gzipLevel: z.number().int().min(0).max(9).default(DEFAULT_STORE_CONFIG.gzipLevel),
    lockTtlMs: z.number().int().positive().default(DEFAULT_STORE_CONFIG.lockTtlMs),
    logger: z
      .custom<Logger>((value) => hasMethods(value, ['child', 'debug', 'info', 'warn', 'error']), {
        message: 'Expected a pino logger',
      })
      .optional(),
  })
  .strict();

/**
 * Fully resolved store configuration
 */
export interface ResolvedStoreConfig {
  cache: KeyValueBackend;
  lockStore: LockStore;
  /** The cache backend was built from cacheDirectory and is closed with the store */
  ownsCache: boolean;
  pruneThreshold: number;
  cacheTagsHeader: string;
  generateContentDigests: boolean;
  gzipLevel: number;
  lockTtlMs: number;
  logger: Logger;
}

/**
 * Validate options and build the default backends
 *
 * @throws ConfigurationError on invalid options, or when a backend is
 *   neither given nor buildable from cacheDirectory
 */
export function resolveStoreConfig(options: HttpCacheStoreOptions = {}): ResolvedStoreConfig {
  const parsed = OptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid cache store options',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
    );
  }

  const { cacheDirectory, cache, lockStore, ...settings } = parsed.data;
  const logger = settings.logger ?? packageLogger;

  let backend = cache;
  let locks = lockStore;
  if (!backend || !locks) {
    if (cacheDirectory === undefined) {
      throw new ConfigurationError(
        'The cacheDirectory option is required unless both the cache backend and the lock store are set'
      );
    }
    backend = backend ?? new FilesystemItemStore(cacheDirectory, 'http_cache', logger);
    locks = locks ?? new FileLockStore(path.join(cacheDirectory, 'locks'), logger);
  }

  return {
    cache: backend,
    lockStore: locks,
    ownsCache: !cache,
    pruneThreshold: settings.pruneThreshold,
    cacheTagsHeader: settings.cacheTagsHeader,
    generateContentDigests: settings.generateContentDigests,
    gzipLevel: settings.gzipLevel,
    lockTtlMs: settings.lockTtlMs,
    logger,
  };
}
