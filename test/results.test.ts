import { describe, expect, it } from 'vitest';

import { buildCrawlSummary } from '../src/crawler/reporting/summary.js';
import { createCrawlState } from '../src/crawler/state/crawlState.js';
import { ResultLog } from '../src/crawler/state/results.js';
import { initializeStats, recordBlocked, recordFailureStats, recordSuccess } from '../src/crawler/state/stats.js';
import type { PageRecord } from '../src/types.js';

const page: PageRecord = {
  url: 'https://example.com/',
  finalUrl: 'https://example.com/',
  title: 'Home',
  markdown: 'Hello',
  linkCount: 3,
  fetchedAt: '2024-01-01T00:00:00.000Z',
  status: 200,
  depth: 1,
  seed: 'https://example.com/',
};

describe('ResultLog', () => {
  it('stores each page URL once and freezes it', () => {
    const log = new ResultLog();
    const stored = log.addPage(page);
    const duplicate = log.addPage({ ...page, title: 'Other' });

    expect(Object.isFrozen(stored)).toBe(true);
    expect(duplicate.title).toBe('Home');
    expect(log.pages()).toHaveLength(1);
    expect(log.findPage('https://example.com/')).toBe(stored);
    expect(log.findPage('https://example.com/missing')).toBeUndefined();
  });

  it('keeps failures in arrival order', () => {
    const log = new ResultLog();
    log.addFailure({
      url: 'https://example.com/a',
      reason: 'timeout',
      message: 'Request timed out after 5ms',
      timestamp: '2024-01-01T00:00:00.000Z',
      depth: 0,
      seed: 'https://example.com/',
      attempts: 2,
    });

    expect(log.failures().map((failure) => failure.url)).toEqual(['https://example.com/a']);
  });
});

describe('stats and summary', () => {
  it('tallies outcomes into the summary', () => {
    const state = createCrawlState();
    state.seeds.push({ seed: 'example.com', state: 'done', succeeded: 1, failed: 1, blocked: 1 });
    recordSuccess(state.stats, page);
    recordFailureStats(state.stats, 'http-error', 404);
    recordBlocked(state.stats, 'pattern');

    const summary = buildCrawlSummary({ state, startTime: 1_000, now: 1_250 });

    expect(summary).toMatchObject({
      seedsTotal: 1,
      pagesSucceeded: 1,
      pagesFailed: 1,
      pagesBlocked: 1,
      maxDepthReached: 1,
      totalLinksExtracted: 3,
      statusCounts: { '200': 1, '404': 1 },
      failureReasons: { 'http-error': 1 },
      blockReasons: { pattern: 1 },
      durationMs: 250,
    });
  });

  it('does not count a status for failures without one', () => {
    const stats = initializeStats();
    recordFailureStats(stats, 'timeout', undefined);
    expect(stats.statusCounts.size).toBe(0);
    expect(stats.pagesFailed).toBe(1);
  });
});
