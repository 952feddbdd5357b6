/**
 * Header parsing: Cache-Control, Vary, dates, cookies, tags and encodings
 */

import type { CacheControlDirectives } from './types.mjs';

type HeaderInput = string | readonly string[] | undefined | null;

function joinHeader(header: HeaderInput): string {
  if (header === undefined || header === null) {
    return '';
  }
  return typeof header === 'string' ? header : header.join(',');
}

function parseSeconds(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  return parseInt(value, 10);
}

type SecondsDirective = 'maxAge' | 'sMaxAge' | 'staleWhileRevalidate' | 'staleIfError';

function setSeconds(directives: CacheControlDirectives, key: SecondsDirective, value: string | undefined): void {
  const seconds = parseSeconds(value);
  if (seconds !== undefined) {
    directives[key] = seconds;
  }
}

/**
 * Parse Cache-Control header into directives
 *
 * Several header occurrences are read as one comma-separated list. Numeric
 * directives with a malformed value are ignored.
 */
export function parseCacheControl(header: HeaderInput): CacheControlDirectives {
  const directives: CacheControlDirectives = {};

  for (const part of joinHeader(header).toLowerCase().split(',')) {
    const separator = part.indexOf('=');
    const key = (separator === -1 ? part : part.slice(0, separator)).trim();
    const value = separator === -1 ? undefined : part.slice(separator + 1).trim().replace(/^"(.*)"$/, '$1');

    switch (key) {
      case 'no-store':
        directives.noStore = true;
        break;
      case 'no-cache':
        directives.noCache = true;
        break;
      case 'max-age':
        setSeconds(directives, 'maxAge', value);
        break;
      case 's-maxage':
        setSeconds(directives, 'sMaxAge', value);
        break;
      case 'private':
        directives.private = true;
        break;
      case 'public':
        directives.public = true;
        break;
      case 'must-revalidate':
        directives.mustRevalidate = true;
        break;
      case 'proxy-revalidate':
        directives.proxyRevalidate = true;
        break;
      case 'no-transform':
        directives.noTransform = true;
        break;
      case 'stale-while-revalidate':
        setSeconds(directives, 'staleWhileRevalidate', value);
        break;
      case 'stale-if-error':
        setSeconds(directives, 'staleIfError', value);
        break;
      case 'immutable':
        directives.immutable = true;
        break;
    }
  }

  return directives;
}

/**
 * Parse Vary header(s) into lower-case header names, without duplicates
 */
export function parseVary(header: HeaderInput): string[] {
  const names: string[] = [];
  for (const part of joinHeader(header).split(',')) {
    const name = part.trim().toLowerCase();
    if (name !== '' && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Parse Date header to timestamp
 */
export function parseDateHeader(header: string | undefined): number | undefined {
  if (!header) return undefined;
  const date = new Date(header);
  return isNaN(date.getTime()) ? undefined : date.getTime();
}

/**
 * Parse a Cookie request header into name/value pairs, in header order
 *
 * A later cookie with the same name replaces the earlier value but keeps
 * its position.
 */
export function parseCookieHeader(header: HeaderInput): Map<string, string> {
  const cookies = new Map<string, string>();
  for (const pair of joinHeader(header).split(/[;,]/)) {
    const separator = pair.indexOf('=');
    if (separator === -1) {
      continue;
    }
    const name = pair.slice(0, separator).trim();
    if (name === '') {
      continue;
    }
    let value = pair.slice(separator + 1).trim();
    try {
      value = decodeURIComponent(value);
    } catch {
      // Keep the raw value when it is not valid percent-encoding
    }
    cookies.set(name, value);
  }
  return cookies;
}

/**
 * Split tag header occurrences on commas
 *
 * Parts are trimmed and empty parts dropped.
 */
export function parseTagHeader(header: HeaderInput): string[] {
  const values = typeof header === 'string' ? [header] : header ?? [];
  const tags: string[] = [];
  for (const value of values) {
    for (const part of value.split(',')) {
      const tag = part.trim();
      if (tag !== '') {
        tags.push(tag);
      }
    }
  }
  return tags;
}

function qualityOf(params: string[]): number {
  for (const param of params) {
    const [name, value] = param.split('=');
    if (name !== undefined && name.trim().toLowerCase() === 'q') {
      const quality = Number.parseFloat(value ?? '');
      return Number.isNaN(quality) ? 0 : quality;
    }
  }
  return 1;
}

/**
 * Whether an Accept-Encoding header allows the given content coding
 *
 * An explicit entry for the coding wins over `*`; q=0 refuses.
 */
export function acceptsEncoding(header: HeaderInput, encoding: string): boolean {
  const wanted = encoding.toLowerCase();
  let wildcard = false;

  for (const part of joinHeader(header).split(',')) {
    const [coding = '', ...params] = part.split(';');
    const name = coding.trim().toLowerCase();
    if (name === wanted) {
      return qualityOf(params) > 0;
    }
    if (name === '*') {
      wildcard = qualityOf(params) > 0;
    }
  }

  return wildcard;
}
