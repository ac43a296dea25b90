import { destination as pinoDestination, pino, type Level, type Logger } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = Level | 'silent';

const LOG_LEVELS: ReadonlyArray<LogLevel> = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface CreateLoggerOptions {
  level?: LogLevel;
  /** Write to this file descriptor instead of stdout. The CLI uses 2. */
  destination?: number;
}

export function createLogger({
  level,
  destination,
}: CreateLoggerOptions = {}): Logger {
  const envLevel = process.env['ARTIFACT_CACHE_LOG_LEVEL'];
  const options = {
    name: 'artifact-cache',
    level: level ?? (isLogLevel(envLevel) ? envLevel : 'silent'),
  };

  return destination === undefined
    ? pino(options)
    : pino(options, pinoDestination({ dest: destination, sync: true }));
}

/** Library-wide fallback used when a component is given no logger. */
export const defaultLogger: Logger = createLogger();
