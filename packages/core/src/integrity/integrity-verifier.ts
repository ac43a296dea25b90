import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { DEFAULT_CHUNK_SIZE } from '../config.js';
import { CacheIoError, isNotFoundError } from '../errors/index.js';
import {
  SUPPORTED_CHECKSUM_ALGORITHMS,
  resolveChecksumAlgorithm,
} from './checksum-algorithms.js';

export type VerificationOutcome =
  | { status: 'valid' }
  | { status: 'digest-mismatch'; expected: string; actual: string }
  | { status: 'missing' }
  | { status: 'unsupported-algorithm'; algorithm: string };

export interface VerificationProgress {
  processedBytes: number;
  totalBytes: number;
}

export interface VerifyFileOptions {
  /** Bytes read per chunk. Default: 64 KiB */
  chunkSize?: number;
  /**
   * Called after every chunk. Runs synchronously on the read path, so it
   * should only record or print.
   */
  onProgress?: (progress: VerificationProgress) => void;
}

/**
 * Check a file against an expected checksum without loading it into memory.
 *
 * Integrity problems come back as outcomes so a batch can keep going;
 * only I/O failures other than "file not found" throw.
 */
export async function verifyFile(
  filePath: string,
  expectedChecksum: string,
  algorithm: string,
  { chunkSize = DEFAULT_CHUNK_SIZE, onProgress }: VerifyFileOptions = {},
): Promise<VerificationOutcome> {
  const resolved = resolveChecksumAlgorithm(algorithm);
  if (!resolved) {
    return { status: 'unsupported-algorithm', algorithm };
  }

  let totalBytes: number;
  try {
    totalBytes = (await stat(filePath)).size;
  } catch (error) {
    if (isNotFoundError(error)) {
      return { status: 'missing' };
    }
    throw new CacheIoError(`Failed to stat ${filePath}`, filePath, {
      cause: error,
    });
  }

  const hash = createHash(SUPPORTED_CHECKSUM_ALGORITHMS[resolved]);
  let processedBytes = 0;
  try {
    for await (const chunk of createReadStream(filePath, {
      highWaterMark: chunkSize,
    })) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      hash.update(buffer);
      processedBytes += buffer.length;
      onProgress?.({ processedBytes, totalBytes });
    }
  } catch (error) {
    throw new CacheIoError(`Failed to read ${filePath}`, filePath, {
      cause: error,
    });
  }

  const actual = hash.digest('hex');
  if (actual === expectedChecksum.trim().toLowerCase()) {
    return { status: 'valid' };
  }
  return { status: 'digest-mismatch', expected: expectedChecksum, actual };
}
