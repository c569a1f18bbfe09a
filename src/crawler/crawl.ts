import pLimit from 'p-limit';

import type { CrawlerError } from '../errors.js';
import { getLogger, type LoggerLike } from '../logger.js';
import type {
  AdmissionDecision,
  CrawlHandlers,
  CrawlOptions,
  CrawlReport,
  FailureReason,
  FailureRecord,
  FrontierEntry,
  SeedReport,
} from '../types.js';
import { reportCrawlerError } from '../util/errorHandler.js';
import { AdmissionFilter } from './admission/admissionFilter.js';
import { fetchPageWithRetry } from './network/fetchPageWithRetry.js';
import { RequestPacer } from './network/pacer.js';
import { DEFAULT_CLASSIFIER, type StructuralTagClassifier } from './parsing/classifier.js';
import { enqueueLinks, resolveLinks } from './parsing/enqueueLinks.js';
import { extractContent } from './parsing/extractContent.js';
import { buildCrawlReport } from './reporting/summary.js';
import { type CrawlState, createCrawlState } from './state/crawlState.js';
import { Frontier } from './state/frontier.js';
import { recordFailureStats, recordSuccess } from './state/stats.js';
import { VisitedSet } from './state/visited.js';
import { normalizeSeed, normalizeUrl } from './url/normalizeUrl.js';

export interface CrawlRuntimeOptions {
  seeds: readonly string[];
  options: CrawlOptions;
  handlers?: CrawlHandlers;
  fetchImpl?: typeof fetch;
  classifier?: StructuralTagClassifier;
}

interface RunContext {
  options: CrawlOptions;
  state: CrawlState;
  admission: AdmissionFilter;
  pacer: RequestPacer;
  handlers: CrawlHandlers;
  classifier: StructuralTagClassifier;
  fetchImpl?: typeof fetch;
  logger: LoggerLike;
}

interface FailureInput {
  url: string;
  depth: number;
  reason: FailureReason;
  message: string;
  status?: number;
  attempts: number;
}

/**
 * Breadth-first traversal of one seed: dequeue, claim, admit, fetch,
 * extract, record, enqueue children. Work items run through p-limit; with a
 * concurrency of one the crawl is strictly sequential.
 */
class SeedCrawler {
  private readonly frontier: Frontier;
  private readonly limiter: ReturnType<typeof pLimit>;
  private readonly activePromises = new Set<Promise<void>>();
  private runningCount = 0;
  private fatalError: CrawlerError | undefined;

  constructor(
    private readonly seedUrl: string,
    private readonly visited: VisitedSet,
    private readonly context: RunContext,
  ) {
    this.frontier = new Frontier(visited, context.options.maxDepth);
    this.limiter = pLimit(context.options.concurrency);
  }

  async run(): Promise<void> {
    const { stats } = this.context.state;
    this.frontier.enqueueIfNew(this.seedUrl, 0);
    stats.peakQueueSize = Math.max(stats.peakQueueSize, this.frontier.pending);

    this.pump();
    while (this.activePromises.size > 0) {
      await Promise.allSettled([...this.activePromises]);
    }

    if (this.fatalError) {
      throw this.fatalError;
    }
  }

  private pump(): void {
    const { options, state } = this.context;

    while (!this.fatalError && this.frontier.pending > 0) {
      const entry = this.frontier.dequeue();
      if (!entry) {
        break;
      }

      if (entry.depth > options.maxDepth || !this.visited.claim(entry.url)) {
        continue;
      }

      state.stats.urlsVisited += 1;
      this.schedule(entry);
    }
  }

  private schedule(entry: FrontierEntry): void {
    const { stats } = this.context.state;

    const task = this.limiter(async () => {
      this.runningCount += 1;
      stats.actualMaxConcurrency = Math.max(stats.actualMaxConcurrency, this.runningCount);
      try {
        await this.process(entry);
      } finally {
        this.runningCount -= 1;
      }
    })
      .catch((error: unknown) => {
        const crawlerError = reportCrawlerError(
          error,
          { stage: 'crawl', seed: this.seedUrl, url: entry.url, depth: entry.depth },
          { throwOnFatal: false },
        );

        if (crawlerError.severity === 'fatal') {
          this.fatalError ??= crawlerError;
        }
      })
      .finally(() => {
        this.activePromises.delete(task);
        if (!this.fatalError) {
          this.pump();
        }
      });

    this.activePromises.add(task);
  }

  private async process(entry: FrontierEntry): Promise<void> {
    const { url, depth } = entry;
    const { options, state, handlers, logger } = this.context;

    logger.debug({ url, depth, seed: this.seedUrl }, 'processing');

    const decision = this.context.admission.admit(url);
    if (!decision.allowed) {
      logger.debug({ url, reason: decision.reason, detail: decision.detail }, 'blocked');
      await this.emitBlocked(url, depth, decision);
      return;
    }

    const outcome = await fetchPageWithRetry(url, {
      timeoutMs: options.timeoutMs,
      retryCount: options.retryCount,
      userAgent: options.userAgent,
      pacer: this.context.pacer,
      fetchImpl: this.context.fetchImpl,
      onRetry: ({ attempt, reason, message }) => {
        state.stats.retryAttempts += 1;
        logger.warn({ url, attempt, reason }, `retrying after: ${message}`);
      },
    });

    if (!outcome.ok) {
      if (outcome.error) {
        reportCrawlerError(
          outcome.error,
          { stage: 'fetch', seed: this.seedUrl, url, depth, attempt: outcome.attempts },
          { throwOnFatal: false },
        );
      }
      await this.recordFailure({
        url,
        depth,
        reason: outcome.reason,
        message: outcome.message,
        status: outcome.status,
        attempts: outcome.attempts,
      });
      return;
    }

    const finalUrl = normalizeUrl(outcome.url) ?? url;
    if (finalUrl !== url) {
      const redirectDecision = this.context.admission.admit(finalUrl);
      if (!redirectDecision.allowed) {
        logger.debug(
          { url, finalUrl, reason: redirectDecision.reason, detail: redirectDecision.detail },
          'redirect blocked',
        );
        await this.emitBlocked(finalUrl, depth, redirectDecision);
        return;
      }

      if (!this.visited.claim(finalUrl)) {
        state.stats.duplicatesFiltered += 1;
        logger.debug({ url, finalUrl }, 'redirect target already visited');
        return;
      }
    }

    if (outcome.html === undefined) {
      await this.recordFailure({
        url,
        depth,
        reason: 'no-content',
        message: `Unsupported content type: ${outcome.contentType ?? 'unknown'}`,
        status: outcome.status,
        attempts: outcome.attempts,
      });
      return;
    }

    const extraction = extractContent(outcome.html, finalUrl, this.context.classifier);
    if (!extraction.ok) {
      await this.recordFailure({
        url,
        depth,
        reason: extraction.reason,
        message: extraction.message,
        status: outcome.status,
        attempts: outcome.attempts,
      });
      return;
    }

    const links = resolveLinks(extraction.page.links, finalUrl);
    const record = state.results.addPage({
      url,
      finalUrl,
      title: extraction.page.title,
      markdown: extraction.page.markdown,
      linkCount: links.length,
      fetchedAt: new Date().toISOString(),
      status: outcome.status,
      depth,
      seed: this.seedUrl,
    });
    recordSuccess(state.stats, record);

    if (depth < options.maxDepth) {
      const enqueued = enqueueLinks({ links, depth, frontier: this.frontier, stats: state.stats });
      logger.debug({ url, links: links.length, enqueued }, 'links queued');
    }

    await handlers.onPage?.(record);
  }

  private async emitBlocked(
    url: string,
    depth: number,
    decision: Extract<AdmissionDecision, { allowed: false }>,
  ): Promise<void> {
    await this.context.handlers.onBlocked?.({
      url,
      reason: decision.reason,
      detail: decision.detail,
      depth,
      seed: this.seedUrl,
      timestamp: new Date().toISOString(),
    });
  }

  private async recordFailure(input: FailureInput): Promise<void> {
    const { state, handlers, logger } = this.context;
    const record: FailureRecord = {
      ...input,
      seed: this.seedUrl,
      timestamp: new Date().toISOString(),
    };

    state.results.addFailure(record);
    recordFailureStats(state.stats, record.reason, record.status);
    logger.info({ url: record.url, reason: record.reason, status: record.status }, record.message);

    await handlers.onFailure?.(record);
  }
}

export async function crawl({
  seeds,
  options,
  handlers = {},
  fetchImpl,
  classifier = DEFAULT_CLASSIFIER,
}: CrawlRuntimeOptions): Promise<CrawlReport> {
  const state = createCrawlState();
  const startTime = Date.now();
  const logger = getLogger();
  const context: RunContext = {
    options,
    state,
    admission: new AdmissionFilter(options, state.stats),
    pacer: new RequestPacer(options.politeDelayMs),
    handlers,
    classifier,
    fetchImpl,
    logger,
  };

  state.seeds = seeds.map(
    (seed): SeedReport => ({ seed, state: 'pending', succeeded: 0, failed: 0, blocked: 0 }),
  );

  for (const [index, seedReport] of state.seeds.entries()) {
    await handlers.onSeedStart?.(seedReport.seed, index + 1, state.seeds.length);
    await crawlSeed(seedReport, context);
    await handlers.onSeedComplete?.({ ...seedReport });
  }

  const report = buildCrawlReport({ state, startTime });
  logger.info({ summary: report.summary }, 'crawl finished');
  await handlers.onComplete?.(report);
  return report;
}

async function crawlSeed(seedReport: SeedReport, context: RunContext): Promise<void> {
  const { state, options, logger, handlers } = context;
  const { stats } = state;

  let seedUrl: string;
  try {
    seedUrl = normalizeSeed(seedReport.seed);
  } catch (error) {
    const seedError = reportCrawlerError(
      error,
      { stage: 'seed', seed: seedReport.seed },
      { throwOnFatal: false, defaultKind: 'seed' },
    );
    const record: FailureRecord = {
      url: seedReport.seed,
      reason: 'invalid-seed',
      message: seedError.message,
      timestamp: new Date().toISOString(),
      depth: 0,
      seed: seedReport.seed,
      attempts: 0,
    };

    seedReport.state = 'invalid';
    seedReport.failed = 1;
    stats.seedsInvalid += 1;
    state.results.addFailure(record);
    recordFailureStats(stats, record.reason, undefined);
    await handlers.onFailure?.(record);
    return;
  }

  seedReport.url = seedUrl;
  seedReport.state = 'running';
  logger.info({ seed: seedUrl }, 'seed started');

  const before = { succeeded: stats.pagesSucceeded, failed: stats.pagesFailed, blocked: stats.pagesBlocked };
  const visited = options.visitedScope === 'seed' ? new VisitedSet() : state.visited;

  try {
    await new SeedCrawler(seedUrl, visited, context).run();
  } finally {
    seedReport.succeeded = stats.pagesSucceeded - before.succeeded;
    seedReport.failed = stats.pagesFailed - before.failed;
    seedReport.blocked = stats.pagesBlocked - before.blocked;
  }

  seedReport.state = 'done';
  stats.seedsCompleted += 1;
  logger.info(
    { seed: seedUrl, succeeded: seedReport.succeeded, failed: seedReport.failed, blocked: seedReport.blocked },
    'seed finished',
  );
}
