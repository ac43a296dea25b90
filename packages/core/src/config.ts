import { homedir } from 'node:os';
import path from 'node:path';
import { z } from 'zod';

export const APP_NAMESPACE = 'artifact-cache';

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * The per-user cache location of the platform: `%LOCALAPPDATA%` on Windows,
 * `~/Library/Caches` on macOS and `$XDG_CACHE_HOME` (or `~/.cache`) elsewhere.
 */
export function platformCacheDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): string {
  if (platform === 'win32') {
    return env['LOCALAPPDATA'] ?? path.join(home, 'AppData', 'Local');
  }
  if (platform === 'darwin') {
    return path.join(home, 'Library', 'Caches');
  }
  const xdg = env['XDG_CACHE_HOME'];
  return xdg && path.isAbsolute(xdg) ? xdg : path.join(home, '.cache');
}

export function defaultCacheDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string {
  return (
    env['ARTIFACT_CACHE_DIR'] ??
    path.join(platformCacheDir(platform, env), APP_NAMESPACE)
  );
}

export const CacheConfigSchema = z.object({
  /** Root directory of the cache. Entries live under `<cacheDir>/http`. */
  cacheDir: z.string().min(1).optional(),
  /** Abort a request that has not completed after this many milliseconds. */
  timeoutMs: z.number().int().positive().optional(),
  /** Read size used when hashing files. */
  chunkSize: z.number().int().positive().default(DEFAULT_CHUNK_SIZE),
  /**
   * Recorded for future use. Public and private caches behave the same
   * today.
   */
  cacheType: z.enum(['private', 'public']).default('private'),
});

export type CacheConfigInput = z.input<typeof CacheConfigSchema>;

export type CacheConfig = Omit<z.output<typeof CacheConfigSchema>, 'cacheDir'> & {
  cacheDir: string;
};

export function resolveCacheConfig(
  input: CacheConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): CacheConfig {
  const parsed = CacheConfigSchema.parse(input);
  return {
    ...parsed,
    cacheDir: path.resolve(parsed.cacheDir ?? defaultCacheDir(env)),
  };
}
