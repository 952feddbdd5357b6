/**
 * Content-addressed response bodies shared between cache entries
 */

import { promisify } from 'node:util';
import { gunzip, gzip } from 'node:zlib';
import fs from 'fs-extra';
import type { KeyValueBackend } from '@proxy-cache/cache-kv-store';
import type { ContentEntry, VariantRecord } from './types.mjs';
import { HeaderBag, HttpResponse, type HttpRequest } from './http.mjs';
import { generateContentDigest, isContentDigest } from './hasher.mjs';
import { decodeContent, encodeContent } from './codec.mjs';
import { acceptsEncoding } from './parser.mjs';
import { CONTENT_DIGEST_HEADER } from './constants.mjs';
import { StorageError } from './errors.mjs';
import { logger as packageLogger, type Logger } from './logger.mjs';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export interface ContentStoreOptions {
  /** Digest in-memory bodies. Default: true */
  generateContentDigests?: boolean;
  /** Gzip level for stored bodies, 0 disables. Default: 0 */
  gzipLevel?: number;
  logger?: Logger;
}

/**
 * ContentStore - one entry per distinct body
 *
 * An entry lives as long as the longest max-age of any response that
 * referenced it: a shorter max-age never lowers `expires`.
 */
export class ContentStore {
  private readonly cache: KeyValueBackend;
  private readonly generateContentDigests: boolean;
  private readonly gzipLevel: number;
  private readonly logger: Logger;

  constructor(cache: KeyValueBackend, options: ContentStoreOptions = {}) {
    this.cache = cache;
    this.generateContentDigests = options.generateContentDigests ?? true;
    this.gzipLevel = options.gzipLevel ?? 0;
    this.logger = (options.logger ?? packageLogger).child({ component: 'content-store' });
  }

  /**
   * Queue the body of a response under its digest
   *
   * Sets X-Content-Digest and, unless the response is chunked,
   * Content-Length. A response that already carries a digest is left alone.
   *
   * @returns The digest, or null when the body must be stored inline
   * @throws StorageError if the backend refuses the entry
   */
  async ensureStored(response: HttpResponse): Promise<string | null> {
    const existing = response.getContentDigest();
    if (existing !== undefined) {
      return existing;
    }

    const digest = await generateContentDigest(response, { enabled: this.generateContentDigests });
    if (digest === null) {
      return null;
    }

    const maxAge = response.getMaxAge() ?? 0;
    let entry = decodeContent(await this.cache.get(digest));
    let changed = false;

    if (entry === null) {
      entry = await this.createEntry(response);
      changed = true;
    }
    if (maxAge > entry.expires) {
      entry = { ...entry, expires: maxAge };
      changed = true;
    }

    if (changed) {
      const saved = await this.cache.saveDeferred(digest, encodeContent(entry), { ttlSeconds: entry.expires });
      if (!saved) {
        throw new StorageError(digest);
      }
      this.logger.debug({ digest, expires: entry.expires }, 'content entry queued');
    }

    response.headers.set(CONTENT_DIGEST_HEADER, digest);
    if (!response.headers.has('transfer-encoding')) {
      response.headers.set('Content-Length', await this.storedLength(entry));
    }

    return digest;
  }

  /**
   * Rebuild the response of a stored variant
   *
   * Null when the body is gone: digest miss, deleted file, or gzip data
   * that does not decode.
   */
  async restore(record: VariantRecord, request: HttpRequest): Promise<HttpResponse | null> {
    const headers = new HeaderBag(record.headers);
    const init = { status: record.status, headers };
    const digest = headers.get(CONTENT_DIGEST_HEADER);

    if (digest === undefined) {
      return record.content === undefined ? null : new HttpResponse(Buffer.from(record.content, 'base64'), init);
    }
    if (!isContentDigest(digest)) {
      return null;
    }

    const entry = decodeContent(await this.cache.get(digest));
    if (entry === null) {
      return null;
    }

    if (entry.kind === 'file') {
      if (!(await fs.pathExists(entry.path))) {
        this.logger.debug({ digest, path: entry.path }, 'cached file no longer exists');
        return null;
      }
      return HttpResponse.fromFile(entry.path, init);
    }

    if (entry.encoding === 'identity') {
      return new HttpResponse(entry.body, init);
    }

    if (acceptsEncoding(request.headers.getAll('accept-encoding'), 'gzip')) {
      headers.set('Content-Encoding', 'gzip');
      return new HttpResponse(entry.body, init);
    }

    try {
      const body = await gunzipAsync(entry.body);
      if (!headers.has('transfer-encoding')) {
        headers.set('Content-Length', body.length);
      }
      return new HttpResponse(body, init);
    } catch (error) {
      this.logger.warn({ digest, err: error }, 'stored body could not be decoded');
      return null;
    }
  }

  private async createEntry(response: HttpResponse): Promise<ContentEntry> {
    if (response.file !== null) {
      return { kind: 'file', expires: 0, path: response.file };
    }

    const body = response.getContent();
    if (this.gzipLevel > 0 && !response.headers.has('content-encoding')) {
      return { kind: 'content', expires: 0, encoding: 'gzip', body: await gzipAsync(body, { level: this.gzipLevel }) };
    }
    return { kind: 'content', expires: 0, encoding: 'identity', body };
  }

  private async storedLength(entry: ContentEntry): Promise<number> {
    if (entry.kind === 'file') {
      return (await fs.stat(entry.path)).size;
    }
    return entry.body.length;
  }
}
