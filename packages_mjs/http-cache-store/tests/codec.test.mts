/**
 * Tests for the storage codec
 */

import { describe, it, expect } from 'vitest';
import {
  decodeContent,
  decodeCounter,
  decodeMetadata,
  encodeContent,
  encodeMetadata,
} from '../src/codec.mjs';
import type { MetadataEntry } from '../src/types.mjs';

describe('metadata', () => {
  it('should wrap variants in a versioned envelope', () => {
    const entry: MetadataEntry = new Map([
      ['non-varying', { vary: [], headers: { 'content-type': ['text/plain'] }, status: 200, uri: 'http://localhost/' }],
    ]);

    expect(encodeMetadata(entry)).toEqual({
      v: 2,
      kind: 'metadata',
      variants: {
        'non-varying': { vary: [], headers: { 'content-type': ['text/plain'] }, status: 200, uri: 'http://localhost/' },
      },
    });
  });

  it('should read back what it wrote, keeping variant order', () => {
    const entry: MetadataEntry = new Map([
      ['b-key', { vary: ['accept'], headers: {}, status: 200, uri: '/b' }],
      ['a-key', { vary: ['accept'], headers: {}, status: 404, uri: '/a', content: 'aGk=' }],
    ]);

    const decoded = decodeMetadata(encodeMetadata(entry));
    expect(decoded).toEqual(entry);
    expect([...(decoded?.keys() ?? [])]).toEqual(['b-key', 'a-key']);
  });

  it('should migrate entries written without an envelope', () => {
    const legacy = {
      'non-varying': {
        vary: [],
        headers: { 'Content-Type': 'text/plain', 'x-content-digest': ['en00'] },
        status: 200,
      },
    };

    expect(decodeMetadata(legacy)).toEqual(
      new Map([
        [
          'non-varying',
          {
            vary: [],
            headers: { 'content-type': ['text/plain'], 'x-content-digest': ['en00'] },
            status: 200,
            uri: '',
          },
        ],
      ])
    );
  });

  it('should read unknown shapes as misses', () => {
    expect(decodeMetadata(undefined)).toBeNull();
    expect(decodeMetadata(42)).toBeNull();
    expect(decodeMetadata({ v: 3, kind: 'metadata', variants: {} })).toBeNull();
    expect(decodeMetadata({ key: { vary: 'accept', headers: {}, status: 200 } })).toBeNull();
  });
});

describe('content', () => {
  it('should encode bodies as base64', () => {
    expect(
      encodeContent({ kind: 'content', expires: 120, encoding: 'identity', body: Buffer.from('hello world') })
    ).toEqual({ v: 2, kind: 'content', expires: 120, encoding: 'identity', body: 'aGVsbG8gd29ybGQ=' });
  });

  it('should decode body and file entries', () => {
    expect(decodeContent({ v: 2, kind: 'content', expires: 5, encoding: 'gzip', body: 'aGk=' })).toEqual({
      kind: 'content',
      expires: 5,
      encoding: 'gzip',
      body: Buffer.from('hi'),
    });
    expect(decodeContent({ v: 2, kind: 'file', expires: 10, path: '/srv/file.bin' })).toEqual({
      kind: 'file',
      expires: 10,
      path: '/srv/file.bin',
    });
  });

  it('should migrate bare string bodies', () => {
    expect(decodeContent('hello world')).toEqual({
      kind: 'content',
      expires: 0,
      encoding: 'identity',
      body: Buffer.from('hello world'),
    });
  });

  it('should read invalid entries as misses', () => {
    expect(decodeContent(undefined)).toBeNull();
    expect(decodeContent({ v: 2, kind: 'content', expires: -1, encoding: 'identity', body: '' })).toBeNull();
    expect(decodeContent({ v: 2, kind: 'content', expires: 1, encoding: 'br', body: '' })).toBeNull();
    expect(decodeContent([1, 2])).toBeNull();
  });
});

describe('decodeCounter', () => {
  it('should read non-negative integers and default to 0', () => {
    expect(decodeCounter(7)).toBe(7);
    expect(decodeCounter(undefined)).toBe(0);
    expect(decodeCounter('7')).toBe(0);
    expect(decodeCounter(-1)).toBe(0);
    expect(decodeCounter(1.5)).toBe(0);
  });
});
