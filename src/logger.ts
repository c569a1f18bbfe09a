import pino, { type DestinationStream, type LoggerOptions } from 'pino';

export interface LoggerLike {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  trace(...args: unknown[]): void;
  fatal(...args: unknown[]): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export interface LoggerConfiguration {
  level?: LoggerOptions['level'];
  base?: LoggerOptions['base'];
  destination?: DestinationStream;
}

const DEFAULT_LEVEL: LoggerOptions['level'] = 'silent';
const DEFAULT_BASE = { service: 'seedcrawl' } as const;

let activeLogger: LoggerLike = createPinoInstance();

export function configureLogger(config: LoggerConfiguration = {}): void {
  const { level = DEFAULT_LEVEL, base = DEFAULT_BASE, destination } = config;
  activeLogger = createPinoInstance({ level, base }, destination);
}

/** Swap in any logger, e.g. a recording fake in tests. */
export function setLoggerInstance(logger: LoggerLike): void {
  activeLogger = logger;
}

export function resetLogger(): void {
  activeLogger = createPinoInstance();
}

export function getLogger(): LoggerLike {
  return activeLogger;
}

/**
 * File destination for the crawl log. Written synchronously so nothing is
 * lost when the CLI exits right after the summary.
 */
export function createFileDestination(path: string): DestinationStream {
  return pino.destination({ dest: path, sync: true, mkdir: true });
}

function createPinoInstance(
  options: Partial<LoggerOptions> = {},
  destination?: DestinationStream,
): LoggerLike {
  const merged: LoggerOptions = {
    level: options.level ?? DEFAULT_LEVEL,
    base: options.base ?? DEFAULT_BASE,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (destination) {
    return pino(merged, destination);
  }

  return pino(merged);
}
