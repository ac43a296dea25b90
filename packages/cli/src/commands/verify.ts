import path from 'node:path';
import {
  describeOutcome,
  loadManifest,
  verifyFiles,
  type DownloadFile,
  type VerificationProgress,
} from '@artifact-cache/core';
import { Command, InvalidArgumentError } from 'commander';
import { createRuntime, type CliContext, type GlobalOptions } from '../runtime.js';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

type VerifyOptions = GlobalOptions & {
  dir: string;
};

/**
 * One line per whole percent, so a large file prints at most 101 lines
 * whatever the chunk size.
 */
export function createProgressReporter(
  print: (line: string) => void,
): (file: DownloadFile, progress: VerificationProgress) => void {
  let lastFile: DownloadFile | undefined;
  let lastPercent = -1;

  return (file, { processedBytes, totalBytes }) => {
    const percent =
      totalBytes === 0
        ? 100
        : Math.min(100, Math.floor((processedBytes / totalBytes) * 100));
    if (file === lastFile && percent === lastPercent) return;

    lastFile = file;
    lastPercent = percent;
    print(
      `${file.localFileName} ${percent}% (${processedBytes}/${totalBytes} bytes)`,
    );
  };
}

export function createVerifyCommand(context: CliContext): Command {
  return new Command('verify')
    .description('Check the files of a manifest against their checksums')
    .argument('<manifest>', 'path of the manifest JSON file')
    .option('-d, --dir <dir>', 'directory holding the files', '.')
    .option('--chunk-size <bytes>', 'read size while hashing', parsePositiveInt)
    .action(
      async (manifestPath: string, _options: unknown, command: Command) => {
        const options = command.optsWithGlobals<VerifyOptions>();
        const { config, logger } = createRuntime(context, options);
        const showProgress = options.verbose === true || options.debug === true;

        const manifest = await loadManifest(manifestPath);
        const report = await verifyFiles(
          path.resolve(options.dir),
          manifest.files,
          {
            chunkSize: config.chunkSize,
            logger,
            onProgress: showProgress
              ? createProgressReporter((line) => context.progress(line))
              : undefined,
          },
        );

        for (const { file, outcome } of report.results) {
          context.write(describeOutcome(file.localFileName, outcome));
        }
        if (report.failed > 0) {
          context.setExitCode(1);
        }
      },
    );
}
