import type { SeedReport } from '../../types.js';
import { ResultLog } from './results.js';
import { type CrawlStats, initializeStats } from './stats.js';
import { VisitedSet } from './visited.js';

/** Everything one run mutates, owned by the orchestrator for that run. */
export interface CrawlState {
  visited: VisitedSet;
  stats: CrawlStats;
  results: ResultLog;
  seeds: SeedReport[];
}

export function createCrawlState(): CrawlState {
  return {
    visited: new VisitedSet(),
    stats: initializeStats(),
    results: new ResultLog(),
    seeds: [],
  };
}
