/**
 * Reserved names and headers
 *
 * Derived keys always start with one of the prefixes followed by 64 hex
 * characters, so they never collide with the reserved names.
 */

export const CACHE_KEY_PREFIX = 'md';
export const CONTENT_DIGEST_PREFIX = 'en';
export const FILE_DIGEST_PREFIX = 'bf';

export const NON_VARYING_KEY = 'non-varying';
export const COUNTER_KEY = 'write-operations-counter';
export const PRUNE_LOCK = 'prune-lock';
export const CLEANUP_LOCK = 'cleanup-lock';

export const CONTENT_DIGEST_HEADER = 'X-Content-Digest';
