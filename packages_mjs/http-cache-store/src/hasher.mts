/**
 * Cache key, vary key and content digest derivation
 */

import { createHash } from 'node:crypto';
import fs from 'fs-extra';
import type { HttpRequest, HttpResponse } from './http.mjs';
import {
  CACHE_KEY_PREFIX,
  CONTENT_DIGEST_PREFIX,
  FILE_DIGEST_PREFIX,
  NON_VARYING_KEY,
} from './constants.mjs';

function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Key of a URL, the same for its http and https forms
 */
export function getCacheKey(request: HttpRequest): string {
  const uri = request.getUri().slice(`${request.scheme}://`.length);
  return `${CACHE_KEY_PREFIX}${sha256(uri)}`;
}

/**
 * Key of one variant of a URL
 *
 * Header names are compared case-insensitively and in any order. When the
 * response varies on Cookie, every request cookie takes part in the key.
 */
export function getVaryKey(vary: readonly string[], request: HttpRequest): string {
  if (vary.length === 0) {
    return NON_VARYING_KEY;
  }

  const names = [...new Set(vary.map((name) => name.toLowerCase()))].sort();

  let hashData = '';
  for (const name of names) {
    if (name === 'cookie') {
      continue;
    }
    hashData += `${name}:${request.headers.get(name) ?? ''}`;
  }

  if (names.includes('cookie')) {
    hashData += 'cookie:';
    for (const [name, value] of request.cookies) {
      hashData += `${name}=${value}`;
    }
  }

  return sha256(hashData);
}

export interface ContentDigestOptions {
  /** Digest in-memory bodies. File-backed responses are always digested */
  enabled: boolean;
}

/**
 * Digest of a response body, null when digests are disabled
 */
export async function generateContentDigest(
  response: HttpResponse,
  options: ContentDigestOptions
): Promise<string | null> {
  if (response.file !== null) {
    return `${FILE_DIGEST_PREFIX}${sha256(await fs.readFile(response.file))}`;
  }
  if (!options.enabled) {
    return null;
  }
  return `${CONTENT_DIGEST_PREFIX}${sha256(response.getContent())}`;
}

/**
 * Whether a string has the shape of a content digest key
 */
export function isContentDigest(value: string): boolean {
  return new RegExp(`^(${CONTENT_DIGEST_PREFIX}|${FILE_DIGEST_PREFIX})[0-9a-f]{64}$`).test(value);
}
