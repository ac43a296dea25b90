import path from 'node:path';
import type { Logger } from 'pino';
import { defaultLogger } from '../logger.js';
import type { DownloadFile } from '../types/download-file.js';
import {
  verifyFile,
  type VerificationOutcome,
  type VerificationProgress,
} from './integrity-verifier.js';

export interface FileVerificationResult {
  file: DownloadFile;
  path: string;
  outcome: VerificationOutcome;
}

export interface VerificationReport {
  results: Array<FileVerificationResult>;
  /** Number of results whose outcome is not `valid` */
  failed: number;
}

export interface VerifyFilesOptions {
  /** Bytes read per chunk. Default: 64 KiB */
  chunkSize?: number;
  logger?: Logger;
  /** Called after every chunk of every file. */
  onProgress?: (file: DownloadFile, progress: VerificationProgress) => void;
}

/** One human-readable line per outcome, as printed by the CLI. */
export function describeOutcome(
  name: string,
  outcome: VerificationOutcome,
): string {
  switch (outcome.status) {
    case 'valid':
      return `OK ${name}`;
    case 'digest-mismatch':
      return `MISMATCH ${name} expected ${outcome.expected} actual ${outcome.actual}`;
    case 'missing':
      return `MISSING ${name}`;
    case 'unsupported-algorithm':
      return `UNSUPPORTED ${name} ${outcome.algorithm}`;
  }
}

/**
 * Verify every file of a manifest inside `dir`, one at a time.
 *
 * Integrity failures are collected into the report; an I/O error other
 * than a missing file rejects and stops the batch.
 */
export async function verifyFiles(
  dir: string,
  files: ReadonlyArray<DownloadFile>,
  { chunkSize, logger = defaultLogger, onProgress }: VerifyFilesOptions = {},
): Promise<VerificationReport> {
  const results: Array<FileVerificationResult> = [];
  let failed = 0;

  for (const file of files) {
    const filePath = path.join(dir, file.localFileName);
    const outcome = await verifyFile(
      filePath,
      file.checksum,
      file.checksumAlgorithm,
      {
        chunkSize,
        onProgress: onProgress && ((progress) => onProgress(file, progress)),
      },
    );

    if (outcome.status === 'valid') {
      logger.info({ path: filePath }, 'Checksum verified');
    } else {
      failed += 1;
      logger.warn(
        { path: filePath, outcome },
        describeOutcome(file.localFileName, outcome),
      );
    }
    results.push({ file, path: filePath, outcome });
  }

  return { results, failed };
}
