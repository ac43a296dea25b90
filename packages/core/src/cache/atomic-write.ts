import { randomBytes } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

function tempPathFor(target: string): string {
  const suffix = `${process.pid}.${randomBytes(6).toString('hex')}.tmp`;
  return path.join(path.dirname(target), `.${path.basename(target)}.${suffix}`);
}

/**
 * Write to a sibling temp file and rename it over `target`. Readers see
 * either the previous file or the complete new one. The temp file is removed
 * if anything fails before the rename.
 */
async function replaceAtomically(
  target: string,
  write: (tempPath: string) => Promise<void>,
): Promise<void> {
  await mkdir(path.dirname(target), { recursive: true });
  const tempPath = tempPathFor(target);

  try {
    await write(tempPath);
    await rename(tempPath, target);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

export async function writeFileAtomic(
  target: string,
  contents: string,
): Promise<void> {
  await replaceAtomically(target, (tempPath) =>
    writeFile(tempPath, contents, 'utf8'),
  );
}

/**
 * Stream `source` into `target`, returning the number of bytes written.
 * `beforeCommit` sees the byte count before the rename and can veto the
 * write by throwing.
 */
export async function streamToFileAtomic(
  target: string,
  source: Readable,
  beforeCommit?: (bytes: number) => void,
): Promise<number> {
  let bytes = 0;
  await replaceAtomically(target, async (tempPath) => {
    await pipeline(
      source,
      async function* (chunks: AsyncIterable<Buffer>) {
        for await (const chunk of chunks) {
          bytes += chunk.length;
          yield chunk;
        }
      },
      createWriteStream(tempPath),
    );
    beforeCommit?.(bytes);
  });
  return bytes;
}
