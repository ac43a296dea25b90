import path from 'node:path';
import { fetchFiles, loadManifest } from '@artifact-cache/core';
import { Command } from 'commander';
import { createRuntime, type CliContext, type GlobalOptions } from '../runtime.js';

export function createFetchCommand(context: CliContext): Command {
  return new Command('fetch')
    .description('Download every file of a manifest through the cache')
    .argument('<manifest>', 'path of the manifest JSON file')
    .option('-d, --dest <dir>', 'directory to copy the files into', '.')
    .action(
      async (manifestPath: string, _options: unknown, command: Command) => {
        const options = command.optsWithGlobals<GlobalOptions & { dest: string }>();
        const { cache, logger } = createRuntime(context, options);

        const manifest = await loadManifest(manifestPath);
        const localPaths = await fetchFiles(
          cache,
          manifest,
          path.resolve(options.dest),
          { logger },
        );
        for (const localPath of localPaths) {
          context.write(localPath);
        }
      },
    );
}
