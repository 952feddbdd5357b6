/**
 * Capability detection and argument validation shared by all backends
 */

import type {
  BackendCapabilities,
  ClearableBackend,
  KeyValueBackend,
  PrunableBackend,
  TagAwareBackend,
} from './types.mjs';
import { InvalidArgumentError } from './errors.mjs';

/**
 * Characters that may not appear in keys or tags
 */
export const RESERVED_CHARACTERS = '{}()/\\@:';

export function isTagAware(backend: KeyValueBackend): backend is TagAwareBackend {
  return 'invalidateTags' in backend && typeof backend.invalidateTags === 'function';
}

export function isPrunable(backend: KeyValueBackend): backend is PrunableBackend {
  return 'prune' in backend && typeof backend.prune === 'function';
}

export function isClearable(backend: KeyValueBackend): backend is ClearableBackend {
  return 'clear' in backend && typeof backend.clear === 'function';
}

/**
 * Resolve the optional capabilities of a backend
 *
 * @example
 * const { tags } = resolveCapabilities(backend);
 * if (tags) await tags.invalidateTags(['news']);
 */
export function resolveCapabilities(backend: KeyValueBackend): BackendCapabilities {
  return {
    tags: isTagAware(backend) ? backend : undefined,
    prune: isPrunable(backend) ? backend : undefined,
    clear: isClearable(backend) ? backend : undefined,
  };
}

function validateName(kind: 'key' | 'tag', name: string): void {
  if (name.length === 0) {
    throw new InvalidArgumentError(`Cache ${kind} length must be greater than zero`);
  }
  for (const char of name) {
    if (RESERVED_CHARACTERS.includes(char)) {
      throw new InvalidArgumentError(
        `Cache ${kind} "${name}" contains reserved characters "${RESERVED_CHARACTERS}"`
      );
    }
  }
}

export function validateKey(key: string): void {
  validateName('key', key);
}

export function validateTags(tags: readonly string[]): void {
  for (const tag of tags) {
    validateName('tag', tag);
  }
}

/**
 * Convert a TTL in seconds into an absolute expiry
 */
export function expiresAtFromTtl(ttlSeconds: number | null | undefined, now: number = Date.now()): number | null {
  if (ttlSeconds === null || ttlSeconds === undefined) {
    return null;
  }
  return now + Math.max(0, ttlSeconds) * 1000;
}

export function isExpired(expiresAt: number | null, now: number = Date.now()): boolean {
  return expiresAt !== null && expiresAt <= now;
}
