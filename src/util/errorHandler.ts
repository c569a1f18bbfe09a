import {
  CrawlerError,
  ensureCrawlerError,
  type ErrorKind,
  type ErrorSeverity,
} from '../errors.js';
import { getLogger } from '../logger.js';

export interface ErrorContext extends Record<string, unknown> {
  stage?: string;
  seed?: string;
  url?: string;
  depth?: number;
  attempt?: number;
}

export interface ErrorHandlingOptions {
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  throwOnFatal?: boolean;
}

/**
 * Normalizes any thrown value into a CrawlerError and logs it: recoverable
 * errors at warn, fatal ones at error. Fatal errors are rethrown unless
 * `throwOnFatal` is false.
 */
export function reportCrawlerError(
  error: unknown,
  context: ErrorContext = {},
  options: ErrorHandlingOptions = {},
): CrawlerError {
  const crawlerError = ensureCrawlerError(error, {
    kind: options.defaultKind ?? 'internal',
    severity: options.defaultSeverity,
    details: context,
  });

  const details: Record<string, unknown> = {
    ...(crawlerError.details ?? {}),
    ...dropUndefined(context),
  };

  const logger = getLogger();
  const payload = { kind: crawlerError.kind, severity: crawlerError.severity, ...details };
  const message = buildLogMessage(crawlerError);

  if (crawlerError.severity === 'fatal') {
    logger.error(payload, message);
    if (options.throwOnFatal ?? true) {
      throw crawlerError;
    }
  } else {
    logger.warn(payload, message);
  }

  return crawlerError;
}

export function buildLogMessage(error: CrawlerError): string {
  return `[${error.kind}/${error.severity}] ${error.message}`;
}

function dropUndefined(context: ErrorContext): Record<string, unknown> {
  return Object.fromEntries(Object.entries(context).filter(([, value]) => value !== undefined));
}
