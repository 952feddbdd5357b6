/**
 * Storage codec for every value the store persists
 *
 * Current values carry an envelope `{ v: 2, kind }`. Values written before
 * the envelope existed are migrated when read:
 * - a bare string under a digest key is an uncompressed body;
 * - a bare object of `{ vary, headers, status }` records is a metadata entry.
 * Anything else reads as a miss.
 */

import { z } from 'zod';
import type { JsonValue } from '@proxy-cache/cache-kv-store';
import type { ContentEntry, MetadataEntry, VariantRecord } from './types.mjs';

export const STORAGE_VERSION = 2;

const VariantRecordSchema = z.object({
  vary: z.array(z.string()),
  headers: z.record(z.array(z.string())),
  status: z.number().int(),
  uri: z.string(),
  content: z.string().optional(),
});

const MetadataEnvelopeSchema = z.object({
  v: z.literal(STORAGE_VERSION),
  kind: z.literal('metadata'),
  variants: z.record(VariantRecordSchema),
});

const ContentEnvelopeSchema = z.discriminatedUnion('kind', [
  z.object({
    v: z.literal(STORAGE_VERSION),
    kind: z.literal('content'),
    expires: z.number().int().nonnegative(),
    encoding: z.enum(['identity', 'gzip']),
    body: z.string(),
  }),
  z.object({
    v: z.literal(STORAGE_VERSION),
    kind: z.literal('file'),
    expires: z.number().int().nonnegative(),
    path: z.string(),
  }),
]);

const LegacyMetadataSchema = z.record(
  z.object({
    vary: z.array(z.string()),
    // Older records kept single header values as plain strings
    headers: z.record(z.union([z.array(z.string()), z.string()])),
    status: z.number().int(),
  })
);

const CounterSchema = z.number().int().nonnegative();

function encodeVariant(record: VariantRecord): JsonValue {
  const encoded: { [key: string]: JsonValue } = {
    vary: [...record.vary],
    headers: { ...record.headers },
    status: record.status,
    uri: record.uri,
  };
  if (record.content !== undefined) {
    encoded['content'] = record.content;
  }
  return encoded;
}

export function encodeMetadata(entry: MetadataEntry): JsonValue {
  const variants: { [key: string]: JsonValue } = {};
  for (const [varyKey, record] of entry) {
    variants[varyKey] = encodeVariant(record);
  }
  return { v: STORAGE_VERSION, kind: 'metadata', variants };
}

/**
 * Decode a metadata entry, null on miss or unreadable value
 */
export function decodeMetadata(raw: JsonValue | undefined): MetadataEntry | null {
  if (raw === undefined) {
    return null;
  }

  const current = MetadataEnvelopeSchema.safeParse(raw);
  if (current.success) {
    return new Map(Object.entries(current.data.variants));
  }

  const legacy = LegacyMetadataSchema.safeParse(raw);
  if (legacy.success) {
    const entry: MetadataEntry = new Map();
    for (const [varyKey, record] of Object.entries(legacy.data)) {
      const headers: Record<string, string[]> = {};
      for (const [name, value] of Object.entries(record.headers)) {
        headers[name.toLowerCase()] = typeof value === 'string' ? [value] : value;
      }
      entry.set(varyKey, { vary: record.vary, headers, status: record.status, uri: '' });
    }
    return entry;
  }

  return null;
}

export function encodeContent(entry: ContentEntry): JsonValue {
  if (entry.kind === 'file') {
    return { v: STORAGE_VERSION, kind: 'file', expires: entry.expires, path: entry.path };
  }
  return {
    v: STORAGE_VERSION,
    kind: 'content',
    expires: entry.expires,
    encoding: entry.encoding,
    body: entry.body.toString('base64'),
  };
}

/**
 * Decode a content digest entry, null on miss or unreadable value
 */
export function decodeContent(raw: JsonValue | undefined): ContentEntry | null {
  if (raw === undefined) {
    return null;
  }

  if (typeof raw === 'string') {
    return { kind: 'content', expires: 0, encoding: 'identity', body: Buffer.from(raw) };
  }

  const parsed = ContentEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const data = parsed.data;
  if (data.kind === 'file') {
    return { kind: 'file', expires: data.expires, path: data.path };
  }
  return {
    kind: 'content',
    expires: data.expires,
    encoding: data.encoding,
    body: Buffer.from(data.body, 'base64'),
  };
}

/**
 * Decode the write counter, 0 when missing or unreadable
 */
export function decodeCounter(raw: JsonValue | undefined): number {
  const parsed = CounterSchema.safeParse(raw);
  return parsed.success ? parsed.data : 0;
}
