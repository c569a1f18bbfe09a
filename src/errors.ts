export type ErrorKind =
  | 'fetch'
  | 'parse'
  | 'seed'
  | 'config'
  | 'output'
  | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

export interface CrawlerErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

interface ErrorFactoryOptions {
  severity?: ErrorSeverity;
  cause?: unknown;
}

export class CrawlerError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity = 'recoverable', details, cause }: CrawlerErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = `${capitalize(kind)}Error`;
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }
}

export function isCrawlerError(value: unknown): value is CrawlerError {
  return value instanceof CrawlerError;
}

export function ensureCrawlerError(
  error: unknown,
  fallback: Partial<CrawlerErrorProps> & Pick<CrawlerErrorProps, 'kind'> = { kind: 'internal' },
): CrawlerError {
  if (isCrawlerError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CrawlerError({
    message,
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

export function createFetchError(
  message: string,
  details: Record<string, unknown> = {},
  options: ErrorFactoryOptions = {},
): CrawlerError {
  return createError('fetch', message, details, options, 'recoverable');
}

export function createParseError(
  message: string,
  details: Record<string, unknown> = {},
  options: ErrorFactoryOptions = {},
): CrawlerError {
  return createError('parse', message, details, options, 'recoverable');
}

/** A seed line that cannot be turned into a crawlable URL. */
export function createSeedError(
  message: string,
  details: Record<string, unknown> = {},
  options: ErrorFactoryOptions = {},
): CrawlerError {
  return createError('seed', message, details, options, 'recoverable');
}

export function createConfigurationError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): CrawlerError {
  return createError('config', message, details, { cause: options.cause, severity: 'fatal' }, 'fatal');
}

export function createOutputError(
  message: string,
  details: Record<string, unknown> = {},
  options: ErrorFactoryOptions = {},
): CrawlerError {
  return createError('output', message, details, options, 'fatal');
}

function createError(
  kind: ErrorKind,
  message: string,
  details: Record<string, unknown>,
  options: ErrorFactoryOptions,
  defaultSeverity: ErrorSeverity,
): CrawlerError {
  return new CrawlerError({
    message,
    kind,
    severity: options.severity ?? defaultSeverity,
    details,
    cause: options.cause,
  });
}

function capitalize(value: string): string {
  if (!value) {
    return value;
  }
  return value.charAt(0).toUpperCase() + value.slice(1);
}
