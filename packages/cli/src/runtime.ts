import {
  HttpCache,
  createLogger,
  resolveCacheConfig,
  type CacheConfig,
  type HttpTransport,
  type LogLevel,
  type Logger,
} from '@artifact-cache/core';

/** Options accepted before the command name. */
export type GlobalOptions = {
  verbose?: boolean;
  debug?: boolean;
  quiet?: boolean;
  cacheDir?: string;
  timeout?: number;
  /** Only accepted by `verify`. */
  chunkSize?: number;
};

export interface CliContext {
  /** Print one line of command output. */
  write(line: string): void;
  /** Print one progress line, kept apart from command output. */
  progress(line: string): void;
  setExitCode(code: number): void;
  /** Replaces the logger the flags would configure. */
  logger?: Logger;
  transport?: HttpTransport;
}

export const processContext: CliContext = {
  write: (line) => {
    process.stdout.write(`${line}\n`);
  },
  progress: (line) => {
    process.stderr.write(`${line}\n`);
  },
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

export function resolveLogLevel({
  verbose,
  debug,
  quiet,
}: GlobalOptions): LogLevel {
  if (debug) return 'debug';
  if (verbose) return 'info';
  if (quiet) return 'error';
  return 'warn';
}

export interface Runtime {
  config: CacheConfig;
  logger: Logger;
  cache: HttpCache;
}

/** Logs go to stderr so stdout only carries command output. */
export function createRuntime(
  context: CliContext,
  options: GlobalOptions,
): Runtime {
  const logger =
    context.logger ??
    createLogger({ level: resolveLogLevel(options), destination: 2 });
  const config = resolveCacheConfig({
    cacheDir: options.cacheDir,
    timeoutMs: options.timeout,
    chunkSize: options.chunkSize,
  });
  const cache = new HttpCache(
    {},
    {
      cacheDir: config.cacheDir,
      timeoutMs: config.timeoutMs,
      cacheType: config.cacheType,
      transport: context.transport,
      logger,
    },
  );
  return { config, logger, cache };
}
