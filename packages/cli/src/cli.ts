import { Command } from 'commander';
import {
  createFetchCommand,
  createPathCommand,
  createVerifyCommand,
} from './commands/index.js';
import { parsePositiveInt } from './commands/verify.js';
import { processContext, type CliContext } from './runtime.js';

export { processContext, resolveLogLevel } from './runtime.js';
export type { CliContext, GlobalOptions } from './runtime.js';

export function buildProgram(context: CliContext = processContext): Command {
  const program = new Command();

  program
    .name('artifact-cache')
    .description('Fetch artifacts through a revalidating cache and verify their checksums')
    .version('0.1.0')
    .option('-v, --verbose', 'log downloads and verification results')
    .option('-g, --debug', 'log cache decisions')
    .option('-q, --quiet', 'log errors only')
    .option('--cache-dir <dir>', 'cache root (default: per-user cache directory)')
    .option('--timeout <ms>', 'per-request timeout in milliseconds', parsePositiveInt);

  program.addCommand(createFetchCommand(context));
  program.addCommand(createVerifyCommand(context));
  program.addCommand(createPathCommand(context));

  return program;
}
