import { Command } from 'commander';
import { createRuntime, type CliContext, type GlobalOptions } from '../runtime.js';

export function createPathCommand(context: CliContext): Command {
  return new Command('path')
    .description('Fetch one URL through the cache and print where it is stored')
    .argument('<url>', 'URL to fetch')
    .action(async (url: string, _options: unknown, command: Command) => {
      const { cache } = createRuntime(
        context,
        command.optsWithGlobals<GlobalOptions>(),
      );
      context.write(await cache.cachedGetPath(url));
    });
}
