import { randomBytes } from 'node:crypto';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { cacheEntryPaths, deriveCacheKey } from './cache-key.js';

describe('deriveCacheKey', () => {
  it('is the sha256 hex digest of the url string', () => {
    // sha256("") is a well-known constant
    expect(deriveCacheKey('')).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    );
  });

  it('returns the same key for repeated calls', () => {
    const url = 'https://example.test/releases/a.bin';
    expect(deriveCacheKey(url)).toBe(deriveCacheKey(url));
    expect(deriveCacheKey(url)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('does not normalise the url', () => {
    expect(deriveCacheKey('https://example.test/a?x=1&y=2')).not.toBe(
      deriveCacheKey('https://example.test/a?y=2&x=1'),
    );
    expect(deriveCacheKey('https://example.test/a')).not.toBe(
      deriveCacheKey('https://example.test/a/'),
    );
  });

  it('produces distinct keys for a large random sample of urls', () => {
    const urls = new Set<string>();
    while (urls.size < 20_000) {
      urls.add(`https://example.test/${randomBytes(12).toString('hex')}`);
    }

    const keys = new Set([...urls].map((url) => deriveCacheKey(url)));
    expect(keys.size).toBe(urls.size);
  });
});

describe('cacheEntryPaths', () => {
  it('lays entries out under <root>/http/<key>', () => {
    const paths = cacheEntryPaths('/var/cache/artifacts', 'abc123');

    expect(paths).toEqual({
      dir: path.join('/var/cache/artifacts', 'http', 'abc123'),
      dataPath: path.join('/var/cache/artifacts', 'http', 'abc123', 'data'),
      metadataPath: path.join(
        '/var/cache/artifacts',
        'http',
        'abc123',
        'metadata',
      ),
    });
  });
});
