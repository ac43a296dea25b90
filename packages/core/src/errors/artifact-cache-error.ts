export type ArtifactCacheErrorKind =
  | 'io'
  | 'serialization'
  | 'cache-corruption'
  | 'transport'
  | 'http-status'
  | 'text-decoding';

/**
 * Base class for every error the cache raises. `kind` lets callers branch
 * without `instanceof` chains when errors cross package boundaries.
 */
export abstract class ArtifactCacheError extends Error {
  abstract readonly kind: ArtifactCacheErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Filesystem read/write failure. */
export class CacheIoError extends ArtifactCacheError {
  readonly kind = 'io';

  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Malformed JSON input, e.g. a download manifest or a cached JSON body. */
export class SerializationError extends ArtifactCacheError {
  readonly kind = 'serialization';
}

/** A cache entry that exists but cannot be trusted. Never treated as a miss. */
export class CacheCorruptionError extends ArtifactCacheError {
  readonly kind = 'cache-corruption';

  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The request never produced an HTTP response (DNS, socket, timeout). */
export class TransportError extends ArtifactCacheError {
  readonly kind = 'transport';

  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The origin answered with something other than 2xx or 304. */
export class HttpStatusError extends ArtifactCacheError {
  readonly kind = 'http-status';

  constructor(
    public readonly statusCode: number,
    public readonly url: string,
  ) {
    super(`Request for ${url} failed with status ${statusCode}`);
  }
}

export class TextDecodingError extends ArtifactCacheError {
  readonly kind = 'text-decoding';

  constructor(
    message: string,
    public readonly encoding: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function isNotFoundError(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}
