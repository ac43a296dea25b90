import { createHash } from 'node:crypto';
import path from 'node:path';

/** Directory under the cache root that holds HTTP entries. */
export const HTTP_CACHE_NAMESPACE = 'http';

export const DATA_FILE_NAME = 'data';
export const METADATA_FILE_NAME = 'metadata';

export interface CacheEntryPaths {
  dir: string;
  dataPath: string;
  metadataPath: string;
}

/**
 * Map a request URL to its cache key.
 *
 * The URL string is hashed exactly as given (no normalization), so
 * `https://a.test/x?b=1&a=2` and `https://a.test/x?a=2&b=1` are different
 * entries. SHA-256 keeps accidental collisions out of reach for any cache
 * size this tool will see.
 */
export function deriveCacheKey(url: string): string {
  return createHash('sha256').update(url, 'utf8').digest('hex');
}

export function cacheEntryPaths(cacheDir: string, key: string): CacheEntryPaths {
  const dir = path.join(cacheDir, HTTP_CACHE_NAMESPACE, key);
  return {
    dir,
    dataPath: path.join(dir, DATA_FILE_NAME),
    metadataPath: path.join(dir, METADATA_FILE_NAME),
  };
}
