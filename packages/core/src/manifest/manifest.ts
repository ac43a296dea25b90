import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { CacheIoError, SerializationError } from '../errors/index.js';
import type { HttpCacheContract } from '../types/http-cache.js';
import { defaultLogger } from '../logger.js';
import type { DownloadFile } from '../types/download-file.js';

/** Entries use the field names of the component catalogs they are copied from. */
const ManifestFileSchema = z
  .object({
    url: z.string().min(1),
    fileName: z
      .string()
      .min(1)
      .refine((name) => path.basename(name) === name && name !== '..', {
        message: 'must be a plain file name',
      }),
    size: z.number().int().nonnegative(),
    checksum: z.string().min(1),
    checksumType: z.string().min(1),
  })
  .transform(
    (entry): DownloadFile => ({
      remotePath: entry.url,
      localFileName: entry.fileName,
      expectedSize: entry.size,
      checksum: entry.checksum,
      checksumAlgorithm: entry.checksumType,
    }),
  );

export const ManifestSchema = z.object({
  baseUrl: z.string().url(),
  files: z.array(ManifestFileSchema),
});

export type Manifest = z.infer<typeof ManifestSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export async function loadManifest(manifestPath: string): Promise<Manifest> {
  let text: string;
  try {
    text = await readFile(manifestPath, 'utf8');
  } catch (error) {
    throw new CacheIoError(
      `Failed to read manifest ${manifestPath}`,
      manifestPath,
      { cause: error },
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new SerializationError(`Manifest ${manifestPath} is not JSON`, {
      cause: error,
    });
  }

  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SerializationError(
      `Manifest ${manifestPath} is invalid: ${formatIssues(parsed.error)}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}

/**
 * Resolve a file's remote path the way a browser resolves a link: relative
 * to the last `/` of the base URL. Absolute URLs are returned unchanged.
 */
export function resolveFileUrl(baseUrl: string, remotePath: string): string {
  return new URL(remotePath, baseUrl).toString();
}

export interface FetchFilesOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Fetch every manifest file through the cache and copy it into
 * `destinationDir`. Stops at the first error.
 *
 * @returns Local paths, in manifest order
 */
export async function fetchFiles(
  cache: HttpCacheContract,
  manifest: Manifest,
  destinationDir: string,
  { signal, logger = defaultLogger }: FetchFilesOptions = {},
): Promise<Array<string>> {
  const localPaths: Array<string> = [];

  for (const file of manifest.files) {
    const url = resolveFileUrl(manifest.baseUrl, file.remotePath);
    const artifact = await cache.fetch(url, { signal });
    const destination = path.join(destinationDir, file.localFileName);
    const bytes = await artifact.copyTo(destination);

    if (bytes !== file.expectedSize) {
      logger.warn(
        { url, path: destination, bytes, expectedSize: file.expectedSize },
        'Downloaded size differs from the manifest',
      );
    }
    localPaths.push(destination);
  }

  return localPaths;
}
