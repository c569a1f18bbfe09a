import type { CrawlStats } from '../state/stats.js';
import type { Frontier } from '../state/frontier.js';
import { normalizeUrl } from '../url/normalizeUrl.js';

/** Distinct normalized links, in the order first seen; unusable hrefs dropped. */
export function resolveLinks(rawLinks: readonly string[], baseUrl: string): string[] {
  const normalizedLinks = new Set<string>();

  for (const rawLink of rawLinks) {
    const normalized = normalizeUrl(rawLink, baseUrl);
    if (normalized) {
      normalizedLinks.add(normalized);
    }
  }

  return [...normalizedLinks];
}

/**
 * Queues resolved links one level deeper than their page. Admission is not
 * checked here; it happens when an entry is dequeued.
 */
export function enqueueLinks(options: {
  links: readonly string[];
  depth: number;
  frontier: Frontier;
  stats: CrawlStats;
}): number {
  const { links, depth, frontier, stats } = options;
  let enqueued = 0;

  for (const link of links) {
    if (frontier.enqueueIfNew(link, depth + 1)) {
      enqueued += 1;
      stats.peakQueueSize = Math.max(stats.peakQueueSize, frontier.pending);
    } else {
      stats.duplicatesFiltered += 1;
    }
  }

  return enqueued;
}
