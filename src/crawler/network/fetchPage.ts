import { createFetchError, isCrawlerError, type CrawlerError } from '../../errors.js';
import { getLogger } from '../../logger.js';
import type { FetchFailureReason } from '../../types.js';

export interface FetchPageOptions {
  timeoutMs: number;
  userAgent: string;
  fetchImpl?: typeof fetch;
}

export interface FetchedPage {
  /** URL the response came from once redirects were followed. */
  url: string;
  status: number;
  ok: boolean;
  contentType?: string;
  /** Present only for successful HTML (or untyped) responses. */
  html?: string;
}

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

/**
 * One GET attempt, body included. The timeout covers the whole exchange:
 * a server that sends headers and then stalls the body is aborted too.
 * Bodies that will not be used are cancelled so the connection is freed.
 *
 * Rejects with a fetch CrawlerError whose `details.reason` says whether
 * the request timed out or failed on the network.
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<FetchedPage> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
  const doFetch = options.fetchImpl ?? fetch;

  try {
    const response = await doFetch(url, {
      redirect: 'follow',
      signal: controller.signal,
      headers: {
        'user-agent': options.userAgent,
        accept: 'text/html,application/xhtml+xml,*/*;q=0.9',
      },
    });
    const contentType = response.headers.get('content-type') ?? undefined;
    const page: FetchedPage = {
      url: response.url || url,
      status: response.status,
      ok: response.ok,
      contentType,
    };

    if (response.ok && isHtml(contentType)) {
      page.html = await readBody(response, controller.signal);
    } else {
      await discardBody(response, url);
    }

    return page;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    const timedOut = controller.signal.aborted;
    const code = extractErrorCode(err);
    const reason: FetchFailureReason = timedOut ? 'timeout' : 'network-error';
    const message = timedOut
      ? `Request timed out after ${options.timeoutMs}ms`
      : err.message || 'Request failed';

    throw createFetchError(
      message,
      {
        url,
        reason,
        timeoutMs: options.timeoutMs,
        ...(typeof code === 'string' ? { code } : {}),
      },
      { cause: err },
    );
  } finally {
    clearTimeout(timeoutId);
  }
}

export function fetchFailureReason(error: CrawlerError): FetchFailureReason {
  return error.details?.reason === 'timeout' ? 'timeout' : 'network-error';
}

export function isHtml(contentType: string | undefined): boolean {
  if (!contentType) {
    return true;
  }
  const lowered = contentType.toLowerCase();
  return HTML_CONTENT_TYPES.some((type) => lowered.includes(type));
}

/** `response.text()`, rejected as soon as the signal aborts. */
async function readBody(response: Response, signal: AbortSignal): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const onAbort = (): void => reject(new Error('Response body read aborted'));
    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener('abort', onAbort, { once: true });
    void response
      .text()
      .then(resolve, reject)
      .finally(() => signal.removeEventListener('abort', onAbort));
  });
}

async function discardBody(response: Response, url: string): Promise<void> {
  if (!response.body) {
    return;
  }

  try {
    await response.body.cancel();
  } catch (error) {
    getLogger().debug({ url, error: String(error) }, 'failed to cancel response body');
  }
}

function extractErrorCode(error: Error | CrawlerError): string | undefined {
  if (isCrawlerError(error)) {
    const detailsCode = error.details?.code;
    if (typeof detailsCode === 'string') {
      return detailsCode;
    }
  }

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  if (error.cause instanceof Error) {
    return extractErrorCode(error.cause);
  }

  return undefined;
}
