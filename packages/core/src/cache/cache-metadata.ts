import type { Logger } from 'pino';
import { z } from 'zod';
import {
  deriveCacheControlPolicy,
  type CacheControlPolicy,
} from './cache-control-parser.js';

export interface CacheValidators {
  /** ETag response header, for If-None-Match conditional requests */
  etag?: string;
  /** Last-Modified response header, for If-Modified-Since conditional requests */
  lastModified?: string;
}

export interface CacheMetadata {
  /** URL the stored response was served from */
  sourceUrl: string;
  /** When the response was received */
  capturedAt: Date;
  validators: CacheValidators;
  cacheControl: CacheControlPolicy;
  /** Response headers, lower-cased names, values in arrival order */
  rawHeaders: Record<string, Array<string>>;
}

/** On-disk shape of the `metadata` file of a cache entry. */
export const MetadataRecordSchema = z.object({
  source: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  response_headers: z.record(z.string(), z.array(z.string())),
});

export type MetadataRecord = z.infer<typeof MetadataRecordSchema>;

/**
 * Flatten fetch `Headers` into a name → values map. `Headers` already joins
 * repeated fields with ", ", except Set-Cookie which keeps one value per
 * cookie.
 */
export function collectRawHeaders(
  headers: Headers,
): Record<string, Array<string>> {
  const raw: Record<string, Array<string>> = {};
  headers.forEach((value, name) => {
    if (name === 'set-cookie') return;
    raw[name] = [value];
  });

  const cookies = headers.getSetCookie();
  if (cookies.length > 0) {
    raw['set-cookie'] = cookies;
  }
  return raw;
}

function firstHeader(
  rawHeaders: Record<string, Array<string>>,
  name: string,
): string | undefined {
  return rawHeaders[name]?.[0];
}

/**
 * Derive validators and cache-control policy from stored headers. Both are
 * always recomputed from `rawHeaders`, so a record can never hold validators
 * that disagree with the response it describes.
 */
export function buildCacheMetadata(
  sourceUrl: string,
  capturedAt: Date,
  rawHeaders: Record<string, Array<string>>,
  logger?: Logger,
): CacheMetadata {
  const validators: CacheValidators = {};
  const etag = firstHeader(rawHeaders, 'etag');
  const lastModified = firstHeader(rawHeaders, 'last-modified');
  if (etag !== undefined) validators.etag = etag;
  if (lastModified !== undefined) validators.lastModified = lastModified;

  return {
    sourceUrl,
    capturedAt,
    validators,
    cacheControl: deriveCacheControlPolicy(
      rawHeaders['cache-control']?.join(', '),
      capturedAt,
      logger,
    ),
    rawHeaders,
  };
}

/**
 * Create metadata for a freshly received 2xx response.
 */
export function createCacheMetadata(
  sourceUrl: string,
  headers: Headers,
  capturedAt: Date = new Date(),
  logger?: Logger,
): CacheMetadata {
  return buildCacheMetadata(
    sourceUrl,
    capturedAt,
    collectRawHeaders(headers),
    logger,
  );
}

export function toMetadataRecord(metadata: CacheMetadata): MetadataRecord {
  return {
    source: metadata.sourceUrl,
    timestamp: metadata.capturedAt.toISOString(),
    response_headers: metadata.rawHeaders,
  };
}

export function fromMetadataRecord(
  record: MetadataRecord,
  logger?: Logger,
): CacheMetadata {
  return buildCacheMetadata(
    record.source,
    new Date(record.timestamp),
    record.response_headers,
    logger,
  );
}
