import type { Logger } from 'pino';

export interface CacheControlDirectives {
  maxAge?: number;
  noCache: boolean;
  noStore: boolean;
  mustRevalidate: boolean;
  /** Raw tokens outside the recognised set, kept for logging. */
  unrecognized: Array<string>;
}

/**
 * What the most recent response allows the cache to do with its stored copy.
 * Anything not understood lands on `must-revalidate`, never on a state that
 * trusts the cache without asking the origin.
 */
export type CacheControlPolicy =
  | { type: 'no-store' }
  | { type: 'no-cache' }
  | { type: 'expires'; expiresAt: Date }
  | { type: 'must-revalidate' };

/**
 * Parse a numeric directive value. Returns undefined for non-finite
 * or negative values so callers can safely treat undefined as "absent".
 */
function parseSeconds(raw: string | undefined): number | undefined {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return undefined;
  const n = Number.parseInt(raw.trim(), 10);
  return Number.isFinite(n) && n >= 0 ? n : undefined;
}

/**
 * Parse a Cache-Control header value into the directives this cache acts on.
 * Malformed `max-age` values are reported as unrecognized.
 */
export function parseCacheControl(
  header: string | null | undefined,
): CacheControlDirectives {
  const result: CacheControlDirectives = {
    noCache: false,
    noStore: false,
    mustRevalidate: false,
    unrecognized: [],
  };
  if (!header) return result;

  for (const part of header.split(',')) {
    const trimmed = part.trim();
    if (!trimmed) continue;

    const eqIdx = trimmed.indexOf('=');
    const key = (eqIdx === -1 ? trimmed : trimmed.slice(0, eqIdx))
      .trim()
      .toLowerCase();
    const value = eqIdx === -1 ? undefined : trimmed.slice(eqIdx + 1).trim();

    switch (key) {
      case 'max-age': {
        const seconds = parseSeconds(value);
        if (seconds === undefined) {
          result.unrecognized.push(trimmed);
        } else {
          result.maxAge = seconds;
        }
        break;
      }
      case 'no-cache':
        result.noCache = true;
        break;
      case 'no-store':
        result.noStore = true;
        break;
      case 'must-revalidate':
        result.mustRevalidate = true;
        break;
      default:
        result.unrecognized.push(trimmed);
    }
  }

  return result;
}

/**
 * Collapse a Cache-Control header into a single policy.
 *
 * Precedence: no-store, no-cache, max-age, then must-revalidate as the
 * fallback for explicit `must-revalidate`, absent headers and anything
 * unparseable. `max-age` becomes an absolute expiry relative to `capturedAt`.
 */
export function deriveCacheControlPolicy(
  header: string | null | undefined,
  capturedAt: Date,
  logger?: Logger,
): CacheControlPolicy {
  const directives = parseCacheControl(header);

  if (directives.unrecognized.length > 0) {
    logger?.debug(
      { cacheControl: header, unrecognized: directives.unrecognized },
      'Ignoring unrecognized Cache-Control directives',
    );
  }

  if (directives.noStore) return { type: 'no-store' };
  if (directives.noCache) return { type: 'no-cache' };
  if (directives.maxAge !== undefined) {
    return {
      type: 'expires',
      expiresAt: new Date(capturedAt.getTime() + directives.maxAge * 1000),
    };
  }
  return { type: 'must-revalidate' };
}
