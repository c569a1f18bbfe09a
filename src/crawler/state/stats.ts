import type { BlockReason, FailureReason, PageRecord } from '../../types.js';

export interface CrawlStats {
  pagesSucceeded: number;
  pagesFailed: number;
  pagesBlocked: number;
  urlsVisited: number;
  seedsCompleted: number;
  seedsInvalid: number;
  maxDepthReached: number;
  totalLinksExtracted: number;
  duplicatesFiltered: number;
  peakQueueSize: number;
  actualMaxConcurrency: number;
  retryAttempts: number;
  statusCounts: Map<number, number>;
  failureReasons: Map<FailureReason, number>;
  blockReasons: Map<BlockReason, number>;
}

export function initializeStats(): CrawlStats {
  return {
    pagesSucceeded: 0,
    pagesFailed: 0,
    pagesBlocked: 0,
    urlsVisited: 0,
    seedsCompleted: 0,
    seedsInvalid: 0,
    maxDepthReached: 0,
    totalLinksExtracted: 0,
    duplicatesFiltered: 0,
    peakQueueSize: 0,
    actualMaxConcurrency: 0,
    retryAttempts: 0,
    statusCounts: new Map<number, number>(),
    failureReasons: new Map<FailureReason, number>(),
    blockReasons: new Map<BlockReason, number>(),
  };
}

export function recordSuccess(stats: CrawlStats, page: PageRecord): void {
  stats.pagesSucceeded += 1;
  stats.maxDepthReached = Math.max(stats.maxDepthReached, page.depth);
  stats.totalLinksExtracted += page.linkCount;
  increment(stats.statusCounts, page.status);
}

export function recordFailureStats(
  stats: CrawlStats,
  reason: FailureReason,
  status: number | undefined,
): void {
  stats.pagesFailed += 1;
  increment(stats.failureReasons, reason);

  if (typeof status === 'number') {
    increment(stats.statusCounts, status);
  }
}

export function recordBlocked(stats: CrawlStats, reason: BlockReason): void {
  stats.pagesBlocked += 1;
  increment(stats.blockReasons, reason);
}

function increment<K>(map: Map<K, number>, key: K): void {
  map.set(key, (map.get(key) ?? 0) + 1);
}
