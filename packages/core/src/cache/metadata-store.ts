import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import {
  CacheCorruptionError,
  CacheIoError,
  isNotFoundError,
} from '../errors/index.js';
import { defaultLogger } from '../logger.js';
import { writeFileAtomic } from './atomic-write.js';
import { cacheEntryPaths } from './cache-key.js';
import {
  MetadataRecordSchema,
  fromMetadataRecord,
  toMetadataRecord,
  type CacheMetadata,
} from './cache-metadata.js';

/**
 * Interface for persisting per-URL cache metadata
 */
export interface MetadataStore {
  /**
   * Read the metadata for a cache key
   * @param key The cache key of the entry
   * @returns The metadata, or undefined when the entry has none
   * @throws CacheCorruptionError when a record exists but cannot be read back
   */
  load(key: string): Promise<CacheMetadata | undefined>;

  /**
   * Replace the metadata for a cache key
   * @param key The cache key of the entry
   * @param metadata The metadata of the most recent 2xx response
   */
  save(key: string, metadata: CacheMetadata): Promise<void>;
}

export interface FileMetadataStoreOptions {
  cacheDir: string;
  logger?: Logger;
}

/**
 * Stores metadata as pretty-printed JSON at `<cacheDir>/http/<key>/metadata`.
 */
export class FileMetadataStore implements MetadataStore {
  private readonly cacheDir: string;
  private readonly logger: Logger;

  constructor({ cacheDir, logger = defaultLogger }: FileMetadataStoreOptions) {
    this.cacheDir = cacheDir;
    this.logger = logger;
  }

  async load(key: string): Promise<CacheMetadata | undefined> {
    const { metadataPath } = cacheEntryPaths(this.cacheDir, key);
    this.logger.debug({ path: metadataPath }, 'Reading http cache metadata');

    let raw: string;
    try {
      raw = await readFile(metadataPath, 'utf8');
    } catch (error: unknown) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw new CacheIoError(
        `Failed to read cache metadata at ${metadataPath}`,
        metadataPath,
        { cause: error },
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CacheCorruptionError(
        `Cache metadata at ${metadataPath} is not valid JSON`,
        metadataPath,
        { cause: error },
      );
    }

    const parsed = MetadataRecordSchema.safeParse(json);
    if (!parsed.success) {
      throw new CacheCorruptionError(
        `Cache metadata at ${metadataPath} is malformed: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
          .join('; ')}`,
        metadataPath,
        { cause: parsed.error },
      );
    }

    return fromMetadataRecord(parsed.data, this.logger);
  }

  async save(key: string, metadata: CacheMetadata): Promise<void> {
    const { metadataPath } = cacheEntryPaths(this.cacheDir, key);
    this.logger.debug(
      { path: metadataPath, source: metadata.sourceUrl },
      'Writing http cache metadata',
    );

    try {
      await writeFileAtomic(
        metadataPath,
        `${JSON.stringify(toMetadataRecord(metadata), null, 2)}\n`,
      );
    } catch (error) {
      throw new CacheIoError(
        `Failed to write cache metadata at ${metadataPath}`,
        metadataPath,
        { cause: error },
      );
    }
  }
}
