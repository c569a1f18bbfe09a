import type { StructuralTagClassifier } from './crawler/parsing/classifier.js';

export type OutputFormat = 'text' | 'json';

/** Whether the visited set spans the whole run or is rebuilt for every seed. */
export type VisitedScope = 'global' | 'seed';

export type BlockReason = 'scheme' | 'not-allowed-domain' | 'denied-domain' | 'pattern';

export type FetchFailureReason = 'timeout' | 'http-error' | 'network-error';

export type ExtractionFailureReason = 'no-content' | 'parse-error';

export type FailureReason = FetchFailureReason | ExtractionFailureReason | 'invalid-seed';

export type SeedState = 'pending' | 'running' | 'done' | 'invalid';

export type AdmissionDecision =
  | { allowed: true }
  | { allowed: false; reason: BlockReason; detail?: string };

export interface FrontierEntry {
  url: string;
  depth: number;
}

export interface PageRecord {
  readonly url: string;
  /** URL the response was served from once redirects were followed. */
  readonly finalUrl: string;
  readonly title: string;
  readonly markdown: string;
  readonly linkCount: number;
  readonly fetchedAt: string;
  readonly status: number;
  readonly depth: number;
  readonly seed: string;
}

export interface FailureRecord {
  url: string;
  reason: FailureReason;
  message: string;
  timestamp: string;
  depth: number;
  seed: string;
  status?: number;
  attempts: number;
}

export interface BlockedEvent {
  url: string;
  reason: BlockReason;
  detail?: string;
  depth: number;
  seed: string;
  timestamp: string;
}

export interface SeedReport {
  seed: string;
  url?: string;
  state: SeedState;
  succeeded: number;
  failed: number;
  blocked: number;
}

/** Settings as a caller or a config file supplies them. */
export interface CrawlSettings {
  maxDepth: number;
  timeoutMs: number;
  retryCount: number;
  politeDelayMs: number;
  userAgent: string;
  allowedDomains: string[];
  blockedDomains: string[];
  blockedUrlPatterns: Array<string | RegExp>;
  concurrency: number;
  visitedScope: VisitedScope;
  format: OutputFormat;
  quiet: boolean;
  logLevel: string;
}

/** Settings after validation, with block patterns compiled. */
export interface CrawlOptions extends Omit<CrawlSettings, 'blockedUrlPatterns'> {
  blockedUrlPatterns: RegExp[];
}

export interface CrawlSummary {
  seedsTotal: number;
  seedsCompleted: number;
  seedsInvalid: number;
  pagesSucceeded: number;
  pagesFailed: number;
  pagesBlocked: number;
  urlsVisited: number;
  maxDepthReached: number;
  totalLinksExtracted: number;
  duplicatesFiltered: number;
  peakQueueSize: number;
  actualMaxConcurrency: number;
  retryAttempts: number;
  statusCounts: Record<string, number>;
  failureReasons: Record<string, number>;
  blockReasons: Record<string, number>;
  durationMs: number;
}

export interface CrawlReport {
  summary: CrawlSummary;
  pages: PageRecord[];
  failures: FailureRecord[];
  seeds: SeedReport[];
}

type HandlerResult = void | Promise<void>;

export interface CrawlHandlers {
  onPage?(record: PageRecord): HandlerResult;
  onFailure?(record: FailureRecord): HandlerResult;
  onBlocked?(event: BlockedEvent): HandlerResult;
  onSeedStart?(seed: string, index: number, total: number): HandlerResult;
  onSeedComplete?(report: SeedReport): HandlerResult;
  onComplete?(report: CrawlReport): HandlerResult;
}

export interface CrawlOrchestratorConfig extends Partial<CrawlSettings> {
  handlers?: CrawlHandlers;
  /** Replaces the global fetch, e.g. with an in-memory site in tests. */
  fetchImpl?: typeof fetch;
  /** Rules for stripping noise and mapping tags to Markdown blocks. */
  classifier?: StructuralTagClassifier;
}
