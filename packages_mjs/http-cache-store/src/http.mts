/**
 * Minimal HTTP request/response model the store reads and writes
 */

import { CONTENT_DIGEST_HEADER } from './constants.mjs';
import { parseCacheControl, parseCookieHeader, parseDateHeader, parseVary } from './parser.mjs';

export type HeaderValue = string | number | readonly string[];

export type HeadersInit = HeaderBag | Record<string, HeaderValue | undefined>;

function toValues(value: HeaderValue): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (typeof value === 'number') {
    return [String(value)];
  }
  return [...value];
}

/**
 * Case-insensitive, multi-valued header collection
 *
 * Names are stored lower-case; insertion order is kept.
 */
export class HeaderBag implements Iterable<[string, string[]]> {
  private readonly values: Map<string, string[]> = new Map();

  constructor(init?: HeadersInit) {
    if (init instanceof HeaderBag) {
      for (const [name, values] of init) {
        this.values.set(name, values);
      }
    } else if (init) {
      for (const [name, value] of Object.entries(init)) {
        if (value !== undefined) {
          this.set(name, value);
        }
      }
    }
  }

  /**
   * First value of a header
   */
  get(name: string): string | undefined {
    return this.values.get(name.toLowerCase())?.[0];
  }

  getAll(name: string): string[] {
    return [...(this.values.get(name.toLowerCase()) ?? [])];
  }

  has(name: string): boolean {
    return this.values.has(name.toLowerCase());
  }

  /**
   * Replace every value of a header
   */
  set(name: string, value: HeaderValue): void {
    const values = toValues(value);
    if (values.length === 0) {
      this.values.delete(name.toLowerCase());
      return;
    }
    this.values.set(name.toLowerCase(), values);
  }

  append(name: string, value: string): void {
    const key = name.toLowerCase();
    this.values.set(key, [...(this.values.get(key) ?? []), value]);
  }

  delete(name: string): boolean {
    return this.values.delete(name.toLowerCase());
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  toRecord(): Record<string, string[]> {
    const record: Record<string, string[]> = {};
    for (const [name, values] of this.values) {
      record[name] = [...values];
    }
    return record;
  }

  clone(): HeaderBag {
    return new HeaderBag(this);
  }

  *[Symbol.iterator](): Iterator<[string, string[]]> {
    for (const [name, values] of this.values) {
      yield [name, [...values]];
    }
  }
}

export interface HttpRequestInit {
  method?: string;
  headers?: HeadersInit;
  /** Default: parsed from the Cookie header */
  cookies?: Record<string, string> | Map<string, string>;
}

/**
 * Incoming request as seen by the cache
 */
export class HttpRequest {
  readonly method: string;
  readonly url: URL;
  readonly headers: HeaderBag;
  /** Request cookies, in the order the client sent them */
  readonly cookies: Map<string, string>;

  constructor(url: URL, init: HttpRequestInit = {}) {
    this.url = url;
    this.method = (init.method ?? 'GET').toUpperCase();
    this.headers = new HeaderBag(init.headers);

    if (init.cookies instanceof Map) {
      this.cookies = new Map(init.cookies);
    } else if (init.cookies) {
      this.cookies = new Map(Object.entries(init.cookies));
    } else {
      this.cookies = parseCookieHeader(this.headers.getAll('cookie'));
    }
  }

  /**
   * Build a request from an absolute or relative URL
   *
   * Relative URLs are resolved against http://localhost.
   *
   * @example
   * HttpRequest.create('/articles?page=2', { headers: { 'Accept-Language': 'en' } });
   */
  static create(url: string, init: HttpRequestInit = {}): HttpRequest {
    return new HttpRequest(new URL(url, 'http://localhost'), init);
  }

  /**
   * Scheme without the trailing colon
   */
  get scheme(): string {
    return this.url.protocol.replace(/:$/, '');
  }

  /**
   * Normalized URI: scheme, host with non-default port, path and the query
   * string sorted by parameter name
   */
  getUri(): string {
    const params = new URLSearchParams(this.url.search);
    params.sort();
    const query = params.toString();
    return `${this.scheme}://${this.url.host}${this.url.pathname}${query === '' ? '' : `?${query}`}`;
  }
}

export interface HttpResponseInit {
  status?: number;
  headers?: HeadersInit;
}

/**
 * Response with either an in-memory body or a file on disk
 */
export class HttpResponse {
  status: number;
  readonly headers: HeaderBag;
  body: Buffer | null;
  /** Path of the file served by a file-backed response */
  file: string | null;

  constructor(body: Buffer | string | null, init: HttpResponseInit = {}, file: string | null = null) {
    this.status = init.status ?? 200;
    this.headers = new HeaderBag(init.headers);
    this.body = typeof body === 'string' ? Buffer.from(body) : body;
    this.file = file;
  }

  static create(body: Buffer | string | null, init: HttpResponseInit = {}): HttpResponse {
    return new HttpResponse(body, init);
  }

  static fromFile(path: string, init: HttpResponseInit = {}): HttpResponse {
    return new HttpResponse(null, init, path);
  }

  isFileBacked(): boolean {
    return this.file !== null;
  }

  /**
   * In-memory body, empty for file-backed responses
   */
  getContent(): Buffer {
    return this.body ?? Buffer.alloc(0);
  }

  /**
   * Freshness lifetime in seconds
   *
   * s-maxage, then max-age, then Expires minus Date (Date defaults to now).
   * An unparseable Expires counts as already expired. Null when the
   * response carries none of them.
   */
  getMaxAge(now: number = Date.now()): number | null {
    const directives = parseCacheControl(this.headers.getAll('cache-control'));
    if (directives.sMaxAge !== undefined) {
      return directives.sMaxAge;
    }
    if (directives.maxAge !== undefined) {
      return directives.maxAge;
    }

    const expiresHeader = this.headers.get('expires');
    if (expiresHeader === undefined) {
      return null;
    }
    const expires = parseDateHeader(expiresHeader);
    if (expires === undefined) {
      return 0;
    }
    const date = parseDateHeader(this.headers.get('date')) ?? now;
    return Math.max(0, Math.floor((expires - date) / 1000));
  }

  /**
   * Lower-case header names from every Vary header
   */
  getVary(): string[] {
    return parseVary(this.headers.getAll('vary'));
  }

  hasVary(): boolean {
    return this.getVary().length > 0;
  }

  getContentDigest(): string | undefined {
    return this.headers.get(CONTENT_DIGEST_HEADER);
  }
}
