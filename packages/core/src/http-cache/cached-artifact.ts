import { createReadStream, createWriteStream, type ReadStream } from 'node:fs';
import { mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { TextDecoder } from 'node:util';
import type { Logger } from 'pino';
import type { z } from 'zod';
import type { CacheMetadata } from '../cache/cache-metadata.js';
import {
  CacheIoError,
  SerializationError,
  TextDecodingError,
} from '../errors/index.js';
import { defaultLogger } from '../logger.js';

/** `fetched`: a 2xx body was just stored. `revalidated`: the origin answered 304. */
export type ArtifactStatus = 'fetched' | 'revalidated';

export interface CachedArtifactInit {
  url: string;
  key: string;
  path: string;
  status: ArtifactStatus;
  metadata: CacheMetadata;
  logger?: Logger;
}

/**
 * Extract the `charset` parameter of a Content-Type value, unquoted and
 * lower-cased.
 */
export function charsetFromContentType(
  contentType: string | undefined,
): string | undefined {
  if (!contentType) return undefined;

  for (const param of contentType.split(';').slice(1)) {
    const eqIdx = param.indexOf('=');
    if (eqIdx === -1) continue;
    if (param.slice(0, eqIdx).trim().toLowerCase() !== 'charset') continue;

    const value = param
      .slice(eqIdx + 1)
      .trim()
      .replace(/^"(.*)"$/, '$1')
      .trim()
      .toLowerCase();
    return value || undefined;
  }
  return undefined;
}

/**
 * Handle on the stored body of a cache entry. Every reader opens the data
 * file afresh, so a handle stays usable after later fetches replace it.
 */
export class CachedArtifact {
  readonly url: string;
  readonly key: string;
  /** Absolute path of the entry's data file */
  readonly path: string;
  readonly status: ArtifactStatus;
  readonly metadata: CacheMetadata;
  private readonly logger: Logger;

  constructor({
    url,
    key,
    path: dataPath,
    status,
    metadata,
    logger = defaultLogger,
  }: CachedArtifactInit) {
    this.url = url;
    this.key = key;
    this.path = dataPath;
    this.status = status;
    this.metadata = metadata;
    this.logger = logger;
  }

  get contentType(): string | undefined {
    return this.metadata.rawHeaders['content-type']?.[0];
  }

  createReadStream(): ReadStream {
    return createReadStream(this.path);
  }

  async bytes(): Promise<Buffer> {
    try {
      return await readFile(this.path);
    } catch (error) {
      throw new CacheIoError(
        `Failed to read cached data at ${this.path}`,
        this.path,
        { cause: error },
      );
    }
  }

  /**
   * Decode the body using the charset declared by the stored Content-Type,
   * or `defaultCharset` when none is declared. An unknown label falls back to
   * UTF-8. Invalid byte sequences raise `TextDecodingError`.
   */
  async text(defaultCharset = 'utf-8'): Promise<string> {
    const label = charsetFromContentType(this.contentType) ?? defaultCharset;

    let decoder: TextDecoder;
    try {
      decoder = new TextDecoder(label, { fatal: true });
    } catch {
      this.logger.debug(
        { charset: label, url: this.url },
        'Unknown charset, decoding as utf-8',
      );
      decoder = new TextDecoder('utf-8', { fatal: true });
    }

    const data = await this.bytes();
    try {
      return decoder.decode(data);
    } catch (error) {
      throw new TextDecodingError(
        `Cached body of ${this.url} is not valid ${decoder.encoding}`,
        decoder.encoding,
        { cause: error },
      );
    }
  }

  /**
   * Parse the body as JSON. With a schema the parsed value is validated
   * and typed by it.
   */
  async json(): Promise<unknown>;
  async json<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T>;
  async json<T>(
    schema?: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<unknown> {
    const text = await this.text();

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw new SerializationError(`Cached body of ${this.url} is not JSON`, {
        cause: error,
      });
    }

    if (!schema) return value;

    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new SerializationError(
        `Cached body of ${this.url} does not match the expected shape`,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  /**
   * Copy the body to `destination`, creating parent directories.
   * @returns The number of bytes copied
   */
  async copyTo(destination: string): Promise<number> {
    let bytes = 0;
    try {
      await mkdir(path.dirname(destination), { recursive: true });
      await pipeline(
        this.createReadStream(),
        async function* (chunks: AsyncIterable<Buffer>) {
          for await (const chunk of chunks) {
            bytes += chunk.length;
            yield chunk;
          }
        },
        createWriteStream(destination),
      );
    } catch (error) {
      throw new CacheIoError(
        `Failed to copy ${this.path} to ${destination}`,
        destination,
        { cause: error },
      );
    }
    return bytes;
  }
}
