import type { CacheMetadata, CacheValidators } from './cache-metadata.js';

/**
 * Decide which stored validators to send on the next request.
 *
 * - no metadata, `no-store`: send nothing, the origin must answer with a
 *   full body.
 * - `expires` that has not lapsed yet: send nothing either. A declared
 *   max-age is not taken as proof that a large static artifact is intact,
 *   so the entry is refetched instead of conditionally confirmed.
 * - `no-cache`, `must-revalidate`, lapsed `expires`: send every validator
 *   present and let the origin choose between 304 and 200.
 */
export function evaluateValidators(
  metadata: CacheMetadata | undefined,
  now: Date = new Date(),
): CacheValidators {
  if (!metadata) return {};

  const policy = metadata.cacheControl;
  switch (policy.type) {
    case 'no-store':
      return {};
    case 'expires':
      if (policy.expiresAt.getTime() > now.getTime()) {
        return {};
      }
      return { ...metadata.validators };
    case 'no-cache':
    case 'must-revalidate':
      return { ...metadata.validators };
  }
}

/**
 * Conditional request headers for the selected validators. Absent
 * validators produce no header at all.
 */
export function conditionalRequestHeaders(
  validators: CacheValidators,
): Record<string, string> {
  const headers: Record<string, string> = {};
  if (validators.etag !== undefined) {
    headers['If-None-Match'] = validators.etag;
  }
  if (validators.lastModified !== undefined) {
    headers['If-Modified-Since'] = validators.lastModified;
  }
  return headers;
}
