import { stat } from 'node:fs/promises';
import { Readable } from 'node:stream';
import type { Logger } from 'pino';
import { streamToFileAtomic } from '../cache/atomic-write.js';
import { cacheEntryPaths, deriveCacheKey } from '../cache/cache-key.js';
import {
  createCacheMetadata,
  type CacheMetadata,
} from '../cache/cache-metadata.js';
import {
  conditionalRequestHeaders,
  evaluateValidators,
} from '../cache/cache-policy.js';
import {
  FileMetadataStore,
  type MetadataStore,
} from '../cache/metadata-store.js';
import { resolveCacheConfig } from '../config.js';
import {
  ArtifactCacheError,
  CacheCorruptionError,
  CacheIoError,
  HttpStatusError,
  TransportError,
  isErrnoException,
  isNotFoundError,
} from '../errors/index.js';
import { defaultLogger } from '../logger.js';
import { InProcessEntryLock, type EntryLock } from '../stores/entry-lock.js';
import type {
  CacheType,
  CachedFetchOptions,
  HttpCacheContract,
  HttpTransport,
} from '../types/http-cache.js';
import { CachedArtifact } from './cached-artifact.js';

export interface HttpCacheStores {
  metadata?: MetadataStore;
  lock?: EntryLock;
}

export interface HttpCacheOptions {
  /**
   * Root directory of the cache. Defaults to the platform's per-user cache
   * directory plus `artifact-cache`.
   */
  cacheDir?: string;
  /**
   * Per-request timeout in milliseconds. Without it a request waits as long
   * as the transport does.
   */
  timeoutMs?: number;
  cacheType?: CacheType;
  /**
   * Transport used for every request. Construct one cache per process and
   * share it so the transport's connection pool is reused.
   */
  transport?: HttpTransport;
  logger?: Logger;
  /** Clock used for metadata timestamps and expiry checks. */
  now?: () => Date;
}

const defaultTransport: HttpTransport = (input, init) => fetch(input, init);

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Errors from the filesystem side of a body download carry a syscall and a
 * path; everything else came from reading the response.
 */
function isFilesystemError(error: unknown): boolean {
  return (
    isErrnoException(error) &&
    typeof error.syscall === 'string' &&
    typeof error.path === 'string'
  );
}

/**
 * Caller headers plus the conditional ones. Header names are
 * case-insensitive, so a caller header that names a conditional header in
 * any case is replaced, never joined with it.
 */
function mergeRequestHeaders(
  headers: Record<string, string>,
  conditional: Record<string, string>,
): Record<string, string> {
  const overridden = new Set(
    Object.keys(conditional).map((name) => name.toLowerCase()),
  );
  const merged: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (!overridden.has(name.toLowerCase())) merged[name] = value;
  }
  return { ...merged, ...conditional };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class HttpCache implements HttpCacheContract {
  readonly cacheDir: string;
  readonly cacheType: CacheType;
  private readonly metadataStore: MetadataStore;
  private readonly lock: EntryLock;
  private readonly transport: HttpTransport;
  private readonly timeoutMs: number | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(stores: HttpCacheStores = {}, options: HttpCacheOptions = {}) {
    const config = resolveCacheConfig({
      cacheDir: options.cacheDir,
      timeoutMs: options.timeoutMs,
      cacheType: options.cacheType,
    });

    this.cacheDir = config.cacheDir;
    this.cacheType = config.cacheType;
    this.timeoutMs = config.timeoutMs;
    this.logger = options.logger ?? defaultLogger;
    this.transport = options.transport ?? defaultTransport;
    this.now = options.now ?? (() => new Date());
    this.metadataStore =
      stores.metadata ??
      new FileMetadataStore({ cacheDir: this.cacheDir, logger: this.logger });
    this.lock = stores.lock ?? new InProcessEntryLock();
  }

  async fetch(
    url: string,
    options: CachedFetchOptions = {},
  ): Promise<CachedArtifact> {
    const key = deriveCacheKey(url);
    return this.lock.runExclusive(key, () =>
      this.fetchExclusive(url, key, options),
    );
  }

  /** Fetch through the cache and return the path of the stored body. */
  async cachedGetPath(
    url: string,
    options?: CachedFetchOptions,
  ): Promise<string> {
    return (await this.fetch(url, options)).path;
  }

  /** Fetch through the cache and open a stream over the stored body. */
  async cachedGetReader(
    url: string,
    options?: CachedFetchOptions,
  ): Promise<Readable> {
    return (await this.fetch(url, options)).createReadStream();
  }

  private async fetchExclusive(
    url: string,
    key: string,
    { signal, headers = {} }: CachedFetchOptions,
  ): Promise<CachedArtifact> {
    // Abort while queued behind another fetch of the same URL.
    signal?.throwIfAborted();

    const paths = cacheEntryPaths(this.cacheDir, key);
    const stored = await this.metadataStore.load(key);
    const validators = evaluateValidators(stored, this.now());

    this.logger.debug(
      { url, key, policy: stored?.cacheControl.type, validators },
      'Selected validators for request',
    );

    const response = await this.send(url, {
      headers: mergeRequestHeaders(
        headers,
        conditionalRequestHeaders(validators),
      ),
      signal: this.requestSignal(signal),
    });

    if (response.status === 304) {
      await response.body?.cancel();
      return this.useStoredCopy(url, key, paths.dataPath, stored);
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new HttpStatusError(response.status, url);
    }

    this.logger.info({ url, path: paths.dataPath }, 'Downloading into the cache');
    const bytes = await this.storeBody(url, paths.dataPath, response);

    const metadata = createCacheMetadata(
      response.url || url,
      response.headers,
      this.now(),
      this.logger,
    );
    await this.metadataStore.save(key, metadata);
    this.logger.debug({ url, bytes }, 'Cache entry updated');

    return new CachedArtifact({
      url,
      key,
      path: paths.dataPath,
      status: 'fetched',
      metadata,
      logger: this.logger,
    });
  }

  private requestSignal(signal: AbortSignal | undefined): AbortSignal | undefined {
    if (this.timeoutMs === undefined) return signal;
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }

  private async send(
    url: string,
    init: { headers: Record<string, string>; signal?: AbortSignal },
  ): Promise<Response> {
    try {
      return await this.transport(url, init);
    } catch (error) {
      // Callers detect aborts by name; AbortError is never wrapped.
      if (isAbortError(error)) throw error;

      const reason =
        error instanceof Error && error.name === 'TimeoutError'
          ? `timed out after ${this.timeoutMs}ms`
          : describeError(error);
      throw new TransportError(`Request for ${url} failed: ${reason}`, url, {
        cause: error,
      });
    }
  }

  /**
   * A 304 is only meaningful when this cache asked for it. Data missing
   * under existing metadata means the entry was damaged outside the cache.
   */
  private async useStoredCopy(
    url: string,
    key: string,
    dataPath: string,
    stored: CacheMetadata | undefined,
  ): Promise<CachedArtifact> {
    if (!stored) {
      throw new HttpStatusError(304, url);
    }

    try {
      await stat(dataPath);
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new CacheCorruptionError(
          `Origin confirmed the cached copy of ${url} but ${dataPath} is missing`,
          dataPath,
          { cause: error },
        );
      }
      throw new CacheIoError(`Failed to stat ${dataPath}`, dataPath, {
        cause: error,
      });
    }

    this.logger.info({ url, path: dataPath }, 'Using cached copy');
    return new CachedArtifact({
      url,
      key,
      path: dataPath,
      status: 'revalidated',
      metadata: stored,
      logger: this.logger,
    });
  }

  private async storeBody(
    url: string,
    dataPath: string,
    response: Response,
  ): Promise<number> {
    const body = response.body ? Readable.fromWeb(response.body) : Readable.from([]);
    const declaredLength = response.headers.has('content-encoding')
      ? undefined
      : response.headers.get('content-length');
    const expected =
      declaredLength !== null && declaredLength !== undefined && /^\d+$/.test(declaredLength)
        ? Number(declaredLength)
        : undefined;

    try {
      return await streamToFileAtomic(dataPath, body, (bytes) => {
        if (expected !== undefined && bytes !== expected) {
          throw new TransportError(
            `Response for ${url} ended after ${bytes} of ${expected} bytes`,
            url,
          );
        }
      });
    } catch (error) {
      if (error instanceof ArtifactCacheError || isAbortError(error)) throw error;
      if (isFilesystemError(error)) {
        throw new CacheIoError(
          `Failed to write cached data at ${dataPath}`,
          dataPath,
          { cause: error },
        );
      }
      throw new TransportError(
        `Reading the response for ${url} failed: ${describeError(error)}`,
        url,
        { cause: error },
      );
    }
  }
}
