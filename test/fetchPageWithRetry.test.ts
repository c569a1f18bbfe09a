import { describe, expect, it } from 'vitest';

import { fetchPageWithRetry, isRetryableStatus } from '../src/crawler/network/fetchPageWithRetry.js';
import { RequestPacer } from '../src/crawler/network/pacer.js';

const URL_UNDER_TEST = 'https://example.com/page';

function htmlResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'content-type': 'text/html; charset=utf-8' } });
}

function sequenceFetch(steps: Array<() => Promise<Response>>) {
  const calls: string[] = [];
  const fetchImpl: typeof fetch = async (input) => {
    calls.push(String(input));
    const step = steps[Math.min(calls.length, steps.length) - 1];
    if (!step) {
      throw new Error('no response configured');
    }
    return step();
  };
  return { calls, fetchImpl };
}

function baseOptions(fetchImpl: typeof fetch, retryCount: number) {
  return {
    timeoutMs: 1_000,
    retryCount,
    userAgent: 'test-agent',
    pacer: new RequestPacer(0),
    fetchImpl,
  };
}

describe('fetchPageWithRetry', () => {
  it('returns the HTML body of a successful response', async () => {
    const { calls, fetchImpl } = sequenceFetch([async () => htmlResponse('<p>Hi</p>')]);

    const outcome = await fetchPageWithRetry(URL_UNDER_TEST, baseOptions(fetchImpl, 3));

    expect(outcome).toEqual({
      ok: true,
      url: URL_UNDER_TEST,
      status: 200,
      contentType: 'text/html; charset=utf-8',
      html: '<p>Hi</p>',
      attempts: 1,
    });
    expect(calls).toEqual([URL_UNDER_TEST]);
  });

  it('sends the user agent', async () => {
    let userAgent: string | null = null;
    const fetchImpl: typeof fetch = async (_input, init) => {
      userAgent = new Headers(init?.headers).get('user-agent');
      return htmlResponse('<p>Hi</p>');
    };

    await fetchPageWithRetry(URL_UNDER_TEST, baseOptions(fetchImpl, 0));

    expect(userAgent).toBe('test-agent');
  });

  it('makes retryCount + 1 attempts on network errors', async () => {
    const { calls, fetchImpl } = sequenceFetch([
      async () => {
        throw new Error('connection reset');
      },
    ]);
    const retries: number[] = [];

    const outcome = await fetchPageWithRetry(URL_UNDER_TEST, {
      ...baseOptions(fetchImpl, 2),
      onRetry: ({ attempt }) => retries.push(attempt),
    });

    expect(calls).toHaveLength(3);
    expect(retries).toEqual([1, 2]);
    expect(outcome).toMatchObject({
      ok: false,
      reason: 'network-error',
      message: 'connection reset',
      attempts: 3,
    });
    expect(outcome).not.toHaveProperty('retryable');
  });

  it('reports a timeout when the request outlives timeoutMs', async () => {
    const fetchImpl: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });

    const outcome = await fetchPageWithRetry(URL_UNDER_TEST, {
      ...baseOptions(fetchImpl, 1),
      timeoutMs: 5,
    });

    expect(outcome).toMatchObject({
      ok: false,
      reason: 'timeout',
      message: 'Request timed out after 5ms',
      attempts: 2,
    });
  });

  it('does not retry a 404', async () => {
    const { calls, fetchImpl } = sequenceFetch([async () => htmlResponse('missing', 404)]);

    const outcome = await fetchPageWithRetry(URL_UNDER_TEST, baseOptions(fetchImpl, 3));

    expect(calls).toHaveLength(1);
    expect(outcome).toEqual({
      ok: false,
      url: URL_UNDER_TEST,
      status: 404,
      reason: 'http-error',
      message: 'HTTP 404',
      attempts: 1,
    });
  });

  it('retries a 503 and succeeds on the next attempt', async () => {
    const { calls, fetchImpl } = sequenceFetch([
      async () => htmlResponse('busy', 503),
      async () => htmlResponse('<p>Back</p>'),
    ]);

    const outcome = await fetchPageWithRetry(URL_UNDER_TEST, baseOptions(fetchImpl, 3));

    expect(calls).toHaveLength(2);
    expect(outcome).toMatchObject({ ok: true, status: 200, attempts: 2, html: '<p>Back</p>' });
  });

  it('skips the body of non-HTML responses', async () => {
    const { fetchImpl } = sequenceFetch([
      async () => new Response('%PDF', { status: 200, headers: { 'content-type': 'application/pdf' } }),
    ]);

    const outcome = await fetchPageWithRetry(URL_UNDER_TEST, baseOptions(fetchImpl, 0));

    expect(outcome).toMatchObject({ ok: true, contentType: 'application/pdf' });
    expect(outcome.ok && outcome.html).toBeUndefined();
  });
});

describe('response bodies', () => {
  function stalledBody(onCancel?: () => void): ReadableStream<Uint8Array> {
    return new ReadableStream<Uint8Array>({
      start() {
        // never enqueues, never closes
      },
      cancel() {
        onCancel?.();
      },
    });
  }

  it('times out a body that stalls after the headers arrive', async () => {
    const fetchImpl: typeof fetch = async () =>
      new Response(stalledBody(), { status: 200, headers: { 'content-type': 'text/html' } });

    const outcome = await fetchPageWithRetry(URL_UNDER_TEST, {
      ...baseOptions(fetchImpl, 1),
      timeoutMs: 20,
    });

    expect(outcome).toMatchObject({
      ok: false,
      reason: 'timeout',
      message: 'Request timed out after 20ms',
      attempts: 2,
    });
  });

  it('cancels bodies it does not read', async () => {
    const cancelled: string[] = [];
    const { fetchImpl } = sequenceFetch([
      async () =>
        new Response(stalledBody(() => cancelled.push('503')), {
          status: 503,
          headers: { 'content-type': 'text/html' },
        }),
      async () =>
        new Response(stalledBody(() => cancelled.push('pdf')), {
          status: 200,
          headers: { 'content-type': 'application/pdf' },
        }),
    ]);

    const outcome = await fetchPageWithRetry(URL_UNDER_TEST, baseOptions(fetchImpl, 1));

    expect(outcome).toMatchObject({ ok: true, contentType: 'application/pdf', attempts: 2 });
    expect(cancelled).toEqual(['503', 'pdf']);
  });
});

describe('isRetryableStatus', () => {
  it('treats 5xx, 408, 425 and 429 as transient', () => {
    expect([500, 502, 503, 408, 425, 429].every(isRetryableStatus)).toBe(true);
    expect([400, 401, 403, 404, 410].some(isRetryableStatus)).toBe(false);
  });
});
