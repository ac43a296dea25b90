import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import nock from 'nock';
import { pino } from 'pino';
import { cacheEntryPaths, deriveCacheKey } from '../cache/cache-key.js';
import {
  CacheCorruptionError,
  HttpStatusError,
  TransportError,
} from '../errors/index.js';
import type { HttpTransport } from '../types/http-cache.js';
import { HttpCache } from './http-cache.js';

const baseUrl = 'https://example.test';
const url = `${baseUrl}/a.bin`;
const logger = pino({ level: 'silent' });

describe('HttpCache', () => {
  let cacheDir: string;
  let now: Date;
  let cache: HttpCache;

  const entry = () => cacheEntryPaths(cacheDir, deriveCacheKey(url));

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(async () => {
    cacheDir = await mkdtemp(path.join(tmpdir(), 'http-cache-'));
    now = new Date('2024-05-01T08:00:00.000Z');
    cache = new HttpCache({}, { cacheDir, logger, now: () => now });
  });

  afterEach(async () => {
    nock.cleanAll();
    await rm(cacheDir, { recursive: true, force: true });
  });

  test('stores a fresh response and its validators', async () => {
    nock(baseUrl, { badheaders: ['if-none-match', 'if-modified-since'] })
      .get('/a.bin')
      .reply(200, 'B1', { ETag: '"v1"' });

    const artifact = await cache.fetch(url);

    expect(artifact.status).toBe('fetched');
    expect(artifact.path).toBe(entry().dataPath);
    expect(await readFile(artifact.path, 'utf8')).toBe('B1');
    expect(artifact.metadata.validators).toEqual({ etag: '"v1"' });
    expect(artifact.metadata.capturedAt).toEqual(now);
    expect(nock.isDone()).toBe(true);
  });

  test('revalidates with If-None-Match and keeps the cached bytes on 304', async () => {
    nock(baseUrl).get('/a.bin').reply(200, 'B1', { ETag: '"v1"' });
    await cache.fetch(url);
    const metadataBefore = await readFile(entry().metadataPath, 'utf8');

    now = new Date('2024-05-02T08:00:00.000Z');
    nock(baseUrl)
      .get('/a.bin')
      .matchHeader('if-none-match', '"v1"')
      .reply(304);

    const artifact = await cache.fetch(url);

    expect(artifact.status).toBe('revalidated');
    expect(await artifact.text()).toBe('B1');
    expect(artifact.metadata.validators.etag).toBe('"v1"');
    expect(await readFile(entry().metadataPath, 'utf8')).toBe(metadataBefore);
    expect(nock.isDone()).toBe(true);
  });

  test('forwards Last-Modified as If-Modified-Since', async () => {
    const lastModified = 'Wed, 01 May 2024 07:00:00 GMT';
    nock(baseUrl)
      .get('/a.bin')
      .reply(200, 'B1', { 'Last-Modified': lastModified });
    await cache.fetch(url);

    nock(baseUrl, { badheaders: ['if-none-match'] })
      .get('/a.bin')
      .matchHeader('if-modified-since', lastModified)
      .reply(304);

    await expect(cache.fetch(url)).resolves.toMatchObject({
      status: 'revalidated',
    });
    expect(nock.isDone()).toBe(true);
  });

  test('replaces data and metadata when the origin sends a new version', async () => {
    nock(baseUrl).get('/a.bin').reply(200, 'B1', { ETag: '"v1"' });
    await cache.fetch(url);

    nock(baseUrl)
      .get('/a.bin')
      .matchHeader('if-none-match', '"v1"')
      .reply(200, 'B2-longer', { ETag: '"v2"' });

    const artifact = await cache.fetch(url);

    expect(artifact.status).toBe('fetched');
    expect(await readFile(entry().dataPath, 'utf8')).toBe('B2-longer');
    const stored = JSON.parse(await readFile(entry().metadataPath, 'utf8'));
    expect(stored.response_headers.etag).toEqual(['"v2"']);
  });

  test('never sends validators for a no-store entry', async () => {
    nock(baseUrl)
      .get('/a.bin')
      .reply(200, 'B1', { ETag: '"v1"', 'Cache-Control': 'no-store' });
    await cache.fetch(url);

    nock(baseUrl, { badheaders: ['if-none-match', 'if-modified-since'] })
      .get('/a.bin')
      .reply(200, 'B2', { ETag: '"v1"' });

    const artifact = await cache.fetch(url);
    expect(await artifact.text()).toBe('B2');
    expect(nock.isDone()).toBe(true);
  });

  test('refetches without validators until max-age lapses, then revalidates', async () => {
    nock(baseUrl)
      .get('/a.bin')
      .reply(200, 'B1', { ETag: '"v1"', 'Cache-Control': 'max-age=3600' });
    await cache.fetch(url);

    now = new Date('2024-05-01T08:30:00.000Z');
    nock(baseUrl, { badheaders: ['if-none-match'] })
      .get('/a.bin')
      .reply(200, 'B1', { ETag: '"v1"', 'Cache-Control': 'max-age=3600' });
    await cache.fetch(url);

    // The second response restarted the hour at 08:30.
    now = new Date('2024-05-01T09:31:00.000Z');
    nock(baseUrl)
      .get('/a.bin')
      .matchHeader('if-none-match', '"v1"')
      .reply(304);

    await expect(cache.fetch(url)).resolves.toMatchObject({
      status: 'revalidated',
    });
    expect(nock.isDone()).toBe(true);
  });

  test('sends no validators when the previous response had none', async () => {
    nock(baseUrl).get('/a.bin').reply(200, 'B1');
    const first = await cache.fetch(url);
    expect(first.metadata.validators).toEqual({});

    nock(baseUrl, { badheaders: ['if-none-match', 'if-modified-since'] })
      .get('/a.bin')
      .reply(200, 'B1');

    await expect(cache.fetch(url)).resolves.toMatchObject({
      status: 'fetched',
    });
    expect(nock.isDone()).toBe(true);
  });

  test('fails with the status code and leaves the entry alone on other statuses', async () => {
    nock(baseUrl).get('/a.bin').reply(200, 'B1', { ETag: '"v1"' });
    await cache.fetch(url);
    const metadataBefore = await readFile(entry().metadataPath, 'utf8');

    nock(baseUrl).get('/a.bin').reply(503, 'unavailable');

    const error = await cache.fetch(url).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({ statusCode: 503, url });
    expect(await readFile(entry().dataPath, 'utf8')).toBe('B1');
    expect(await readFile(entry().metadataPath, 'utf8')).toBe(metadataBefore);
  });

  test('does not create an entry when the first request fails', async () => {
    nock(baseUrl).get('/a.bin').reply(404);

    await expect(cache.fetch(url)).rejects.toMatchObject({ statusCode: 404 });
    await expect(readFile(entry().metadataPath)).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });

  test('wraps network failures as transport errors', async () => {
    nock(baseUrl).get('/a.bin').replyWithError('socket hang up');

    await expect(cache.fetch(url)).rejects.toBeInstanceOf(TransportError);
  });

  test('rejects an unsolicited 304', async () => {
    nock(baseUrl).get('/a.bin').reply(304);

    await expect(cache.fetch(url)).rejects.toMatchObject({ statusCode: 304 });
  });

  test('reports a 304 for an entry whose data file vanished as corruption', async () => {
    nock(baseUrl).get('/a.bin').reply(200, 'B1', { ETag: '"v1"' });
    await cache.fetch(url);
    await rm(entry().dataPath);

    nock(baseUrl).get('/a.bin').reply(304);

    await expect(cache.fetch(url)).rejects.toBeInstanceOf(CacheCorruptionError);
  });

  test('refuses to use corrupt metadata and sends no request', async () => {
    await mkdir(entry().dir, { recursive: true });
    await writeFile(entry().metadataPath, 'not json');
    const scope = nock(baseUrl).get('/a.bin').reply(200, 'B1');

    await expect(cache.fetch(url)).rejects.toBeInstanceOf(CacheCorruptionError);
    expect(scope.isDone()).toBe(false);
  });

  test('serialises concurrent fetches of the same url', async () => {
    nock(baseUrl).get('/a.bin').reply(200, 'B1', { ETag: '"v1"' });
    nock(baseUrl)
      .get('/a.bin')
      .matchHeader('if-none-match', '"v1"')
      .reply(304);

    const [first, second] = await Promise.all([
      cache.fetch(url),
      cache.fetch(url),
    ]);

    expect(first.status).toBe('fetched');
    expect(second.status).toBe('revalidated');
    expect(nock.isDone()).toBe(true);
  });

  test('passes extra request headers through', async () => {
    nock(baseUrl)
      .get('/a.bin')
      .matchHeader('accept', 'application/octet-stream')
      .reply(200, 'B1');

    await cache.fetch(url, { headers: { accept: 'application/octet-stream' } });
    expect(nock.isDone()).toBe(true);
  });

  test('exposes path and reader shortcuts', async () => {
    nock(baseUrl).get('/a.bin').reply(200, 'B1', { ETag: '"v1"' });
    await expect(cache.cachedGetPath(url)).resolves.toBe(entry().dataPath);

    nock(baseUrl).get('/a.bin').reply(304);
    const reader = await cache.cachedGetReader(url);
    const chunks: Array<Buffer> = [];
    for await (const chunk of reader) {
      chunks.push(Buffer.from(chunk));
    }
    expect(Buffer.concat(chunks).toString('utf8')).toBe('B1');
  });

  describe('with an injected transport', () => {
    test('uses the transport for every request', async () => {
      const calls: Array<{ url: string; headers: Record<string, string> }> = [];
      const transport: HttpTransport = async (input, init) => {
        calls.push({ url: input, headers: init.headers });
        return calls.length === 1
          ? new Response('B1', { status: 200, headers: { etag: '"v1"' } })
          : new Response(null, { status: 304 });
      };
      const injected = new HttpCache({}, { cacheDir, logger, transport });

      await injected.fetch(url);
      await injected.fetch(url);

      expect(calls).toEqual([
        { url, headers: {} },
        { url, headers: { 'If-None-Match': '"v1"' } },
      ]);
    });

    test('replaces caller validators with the stored ones in any case', async () => {
      const seen: Array<string | null> = [];
      const transport: HttpTransport = async (input, init) => {
        const sent = new Headers(init.headers);
        seen.push(sent.get('if-none-match'));
        return seen.length === 1
          ? new Response('B1', { status: 200, headers: { etag: '"v1"' } })
          : new Response(null, { status: 304 });
      };
      const injected = new HttpCache({}, { cacheDir, logger, transport });

      await injected.fetch(url);
      await injected.fetch(url, {
        headers: { 'if-none-match': '"stale"', accept: '*/*' },
      });

      expect(seen).toEqual([null, '"v1"']);
    });

    test('keeps caller validators when the cache has none to send', async () => {
      let sent: Record<string, string> = {};
      const transport: HttpTransport = async (_input, init) => {
        sent = init.headers;
        return new Response('B1', { status: 200 });
      };
      const injected = new HttpCache({}, { cacheDir, logger, transport });

      await injected.fetch(url, { headers: { 'if-none-match': '"caller"' } });

      expect(sent).toEqual({ 'if-none-match': '"caller"' });
    });

    test('rejects a body shorter than its Content-Length', async () => {
      const transport: HttpTransport = async () =>
        new Response('abc', {
          status: 200,
          headers: { 'content-length': '10', etag: '"v1"' },
        });
      const injected = new HttpCache({}, { cacheDir, logger, transport });

      await expect(injected.fetch(url)).rejects.toThrow(
        `Response for ${url} ended after 3 of 10 bytes`,
      );
      await expect(readFile(entry().dataPath)).rejects.toMatchObject({
        code: 'ENOENT',
      });
      await expect(readFile(entry().metadataPath)).rejects.toMatchObject({
        code: 'ENOENT',
      });
    });

    test('times out a request that takes too long', async () => {
      const transport: HttpTransport = (_input, init) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () =>
            reject(init.signal?.reason),
          );
        });
      const injected = new HttpCache(
        {},
        { cacheDir, logger, transport, timeoutMs: 20 },
      );

      await expect(injected.fetch(url)).rejects.toThrow(
        `Request for ${url} failed: timed out after 20ms`,
      );
    });

    test('lets caller aborts through unwrapped', async () => {
      const transport: HttpTransport = async () => new Response('B1');
      const injected = new HttpCache({}, { cacheDir, logger, transport });
      const controller = new AbortController();
      controller.abort();

      await expect(
        injected.fetch(url, { signal: controller.signal }),
      ).rejects.toMatchObject({ name: 'AbortError' });
    });
  });
});
