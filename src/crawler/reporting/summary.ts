import type { CrawlReport, CrawlSummary } from '../../types.js';
import type { CrawlState } from '../state/crawlState.js';

export function buildCrawlSummary(options: {
  state: CrawlState;
  startTime: number;
  now?: number;
}): CrawlSummary {
  const { state, startTime, now = Date.now() } = options;
  const { stats } = state;

  return {
    seedsTotal: state.seeds.length,
    seedsCompleted: stats.seedsCompleted,
    seedsInvalid: stats.seedsInvalid,
    pagesSucceeded: stats.pagesSucceeded,
    pagesFailed: stats.pagesFailed,
    pagesBlocked: stats.pagesBlocked,
    urlsVisited: stats.urlsVisited,
    maxDepthReached: stats.maxDepthReached,
    totalLinksExtracted: stats.totalLinksExtracted,
    duplicatesFiltered: stats.duplicatesFiltered,
    peakQueueSize: stats.peakQueueSize,
    actualMaxConcurrency: stats.actualMaxConcurrency,
    retryAttempts: stats.retryAttempts,
    statusCounts: Object.fromEntries(
      [...stats.statusCounts.entries()].map(([status, count]) => [String(status), count]),
    ),
    failureReasons: Object.fromEntries(stats.failureReasons.entries()),
    blockReasons: Object.fromEntries(stats.blockReasons.entries()),
    durationMs: now - startTime,
  };
}

export function buildCrawlReport(options: {
  state: CrawlState;
  startTime: number;
  now?: number;
}): CrawlReport {
  return {
    summary: buildCrawlSummary(options),
    pages: options.state.results.pages(),
    failures: options.state.results.failures(),
    seeds: options.state.seeds.map((seed) => ({ ...seed })),
  };
}
