import type { CachedArtifact } from '../http-cache/cached-artifact.js';

/**
 * Recorded on the cache but not enforced differently yet: both kinds
 * store every 2xx response.
 */
export type CacheType = 'private' | 'public';

/** A fetch-compatible function; the global `fetch` by default. */
export type HttpTransport = (
  input: string,
  init: { headers: Record<string, string>; signal?: AbortSignal },
) => Promise<Response>;

export interface CachedFetchOptions {
  /**
   * AbortSignal that allows the caller to cancel the request, including the
   * wait for another fetch of the same URL to finish. An aborted request
   * rejects with the signal's `AbortError` and leaves the entry untouched.
   */
  signal?: AbortSignal;
  /**
   * Extra request headers. Conditional headers derived from the cache
   * (`If-None-Match`, `If-Modified-Since`) replace caller headers of the
   * same name in any case.
   */
  headers?: Record<string, string>;
}

export interface HttpCacheContract {
  /**
   * Fetch a URL through the cache.
   *
   * Sends the stored validators the cache policy allows, stores the body of
   * a 2xx response, keeps the stored body on 304 and rejects with
   * `HttpStatusError` on anything else.
   *
   * @param url     Full request URL; also the cache key source, verbatim
   * @param options Optional abort signal and extra request headers
   */
  fetch(url: string, options?: CachedFetchOptions): Promise<CachedArtifact>;
}
