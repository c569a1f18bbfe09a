import { resolveOptions } from './config.js';
import { crawl } from './crawler/crawl.js';
import type {
  CrawlOptions,
  CrawlOrchestratorConfig,
  CrawlReport,
  CrawlSettings,
  CrawlSummary,
  FailureRecord,
  OutputFormat,
  PageRecord,
  SeedReport,
} from './types.js';

/**
 * Crawls every seed in order and resolves with the pages, failures and
 * counters of the run. Per-URL problems are recorded, not thrown; only bad
 * settings, a failing handler or an internal error reject.
 */
export async function crawlOrchestrator(
  seeds: readonly string[],
  config: CrawlOrchestratorConfig = {},
): Promise<CrawlReport> {
  const options = resolveOptions(config, seeds);

  return crawl({
    seeds,
    options,
    handlers: config.handlers,
    fetchImpl: config.fetchImpl,
    classifier: config.classifier,
  });
}

export { DEFAULT_SETTINGS, readConfigFile, resolveOptions } from './config.js';
export { evaluateAdmission } from './crawler/admission/admissionFilter.js';
export { DEFAULT_CLASSIFIER, type StructuralTagClassifier } from './crawler/parsing/classifier.js';
export { extractContent } from './crawler/parsing/extractContent.js';
export { normalizeUrl } from './crawler/url/normalizeUrl.js';
export { CrawlerError } from './errors.js';

export type {
  CrawlOptions,
  CrawlOrchestratorConfig,
  CrawlReport,
  CrawlSettings,
  CrawlSummary,
  FailureRecord,
  OutputFormat,
  PageRecord,
  SeedReport,
};
