import { ensureCrawlerError, type CrawlerError } from '../../errors.js';
import type { FetchFailureReason } from '../../types.js';
import { fetchFailureReason, fetchPage } from './fetchPage.js';
import { RequestPacer } from './pacer.js';

export type FetchOutcome =
  | {
      ok: true;
      url: string;
      status: number;
      contentType?: string;
      /** Present only for HTML (or untyped) responses. */
      html?: string;
      attempts: number;
    }
  | {
      ok: false;
      url: string;
      status?: number;
      reason: FetchFailureReason;
      message: string;
      attempts: number;
      error?: CrawlerError;
    };

export interface RetryContext {
  url: string;
  attempt: number;
  reason: FetchFailureReason;
  message: string;
}

export interface FetchWithRetryOptions {
  timeoutMs: number;
  retryCount: number;
  userAgent: string;
  pacer: RequestPacer;
  fetchImpl?: typeof fetch;
  onRetry?: (context: RetryContext) => void;
}

const RETRYABLE_STATUSES = new Set([408, 425, 429]);

export async function fetchPageWithRetry(
  url: string,
  options: FetchWithRetryOptions,
): Promise<FetchOutcome> {
  const maxAttempts = Math.max(0, Math.trunc(options.retryCount)) + 1;
  let lastFailure: Extract<FetchOutcome, { ok: false }> | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const outcome = await options.pacer.run(() => attemptFetch(url, attempt, options));
    if (outcome.ok) {
      return outcome;
    }

    const { retryable, ...failure } = outcome;
    lastFailure = failure;
    if (!retryable || attempt === maxAttempts) {
      break;
    }

    options.onRetry?.({ url, attempt, reason: failure.reason, message: failure.message });
  }

  return (
    lastFailure ?? {
      ok: false,
      url,
      reason: 'network-error',
      message: 'Request failed',
      attempts: 0,
    }
  );
}

type AttemptOutcome =
  | Extract<FetchOutcome, { ok: true }>
  | (Extract<FetchOutcome, { ok: false }> & { retryable: boolean });

async function attemptFetch(
  url: string,
  attempt: number,
  options: FetchWithRetryOptions,
): Promise<AttemptOutcome> {
  try {
    const page = await fetchPage(url, {
      timeoutMs: options.timeoutMs,
      userAgent: options.userAgent,
      fetchImpl: options.fetchImpl,
    });

    if (!page.ok) {
      return {
        ok: false,
        url: page.url,
        status: page.status,
        reason: 'http-error',
        message: `HTTP ${page.status}`,
        attempts: attempt,
        retryable: isRetryableStatus(page.status),
      };
    }

    return {
      ok: true,
      url: page.url,
      status: page.status,
      contentType: page.contentType,
      html: page.html,
      attempts: attempt,
    };
  } catch (error) {
    const crawlerError = ensureCrawlerError(error, {
      kind: 'fetch',
      severity: 'recoverable',
      details: { url, reason: 'network-error' },
    });

    return {
      ok: false,
      url,
      reason: fetchFailureReason(crawlerError),
      message: crawlerError.message,
      attempts: attempt,
      error: crawlerError,
      retryable: true,
    };
  }
}

export function isRetryableStatus(status: number): boolean {
  return status >= 500 || RETRYABLE_STATUSES.has(status);
}
