#!/usr/bin/env node
import { createRequire } from 'node:module';
import { join } from 'node:path';
import { Command } from 'commander';

import { crawlOrchestrator } from './index.js';
import { isOutputFormat, isVisitedScope, readConfigFile } from './config.js';
import { combineHandlers, createConsoleHandlers } from './crawler/handlers/defaultHandlers.js';
import { createConfigurationError } from './errors.js';
import { configureLogger, createFileDestination } from './logger.js';
import { FileResultSink, OUTPUT_FILES } from './output/fileSink.js';
import { loadSeeds } from './seeds.js';
import type { CrawlSettings } from './types.js';
import { reportCrawlerError } from './util/errorHandler.js';
import { logError, setOutputConfig } from './util/output.js';

const require = createRequire(import.meta.url);
// eslint-disable-next-line @typescript-eslint/no-var-requires -- package.json access for CLI metadata
const pkg: unknown = require('../package.json');
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const DEFAULT_OUTPUT_DIR = 'output';
const DEFAULT_CLI_LOG_LEVEL = 'info';
const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

const program = new Command();

program
  .name('seedcrawl')
  .description('Crawl seed websites within allowed domains and save their readable content as Markdown.')
  .version(version);

program
  .command('crawl')
  .description('Crawl every seed listed in the given file.')
  .argument('<seedsFile>', 'Text file with one seed URL per line.')
  .option('--output-dir <path>', `Directory for Markdown files, index and logs. (default: ${DEFAULT_OUTPUT_DIR})`)
  .option('--config <path>', 'JSON file with crawl settings; flags override it.')
  .option('--max-depth <number>', 'Link depth to follow from each seed; 0 fetches only the seed. (default: 1)')
  .option('--timeout-ms <number>', 'Timeout per request in milliseconds. (default: 10000)')
  .option('--retries <number>', 'Retries after a failed request. (default: 3)')
  .option('--polite-delay-ms <number>', 'Minimum pause between requests in milliseconds. (default: 500)')
  .option('--user-agent <value>', 'User-Agent header sent with every request.')
  .option('--allow <domains...>', 'Domains that may be crawled, subdomains included. (default: the seeds\' hosts)')
  .option('--block <domains...>', 'Domains that are never crawled, replacing the built-in list.')
  .option('--block-pattern <patterns...>', 'Regular expressions for URLs to skip, replacing the built-in list.')
  .option('--concurrency <number>', 'Pages fetched in parallel. (default: 1)')
  .option('--visited-scope <scope>', 'Share visited URLs across seeds (global) or not (seed). (default: global)')
  .option('--format <format>', 'Summary format: text or json. (default: text)')
  .option('--quiet', 'Suppress per-page lines.')
  .option('--log-level <level>', `Crawl log verbosity (${LOG_LEVELS.join('|')}). (default: ${DEFAULT_CLI_LOG_LEVEL})`)
  .action(async (seedsFile: string, options: Record<string, unknown>) => {
    try {
      await runCrawl(seedsFile, options);
    } catch (error) {
      reportCliError(error);
    }
  });

await program.parseAsync(process.argv);

async function runCrawl(seedsFile: string, rawOptions: Record<string, unknown>): Promise<void> {
  const settings = await buildSettings(rawOptions);
  const outputDir =
    rawOptions.outputDir === undefined ? DEFAULT_OUTPUT_DIR : String(rawOptions.outputDir);
  const seeds = await loadSeeds(seedsFile);

  const sink = new FileResultSink(outputDir);
  await sink.prepare();

  configureLogger({
    level: settings.logLevel,
    destination: createFileDestination(join(outputDir, OUTPUT_FILES.log)),
  });
  setOutputConfig({ quiet: settings.quiet ?? false, format: settings.format ?? 'text' });

  await crawlOrchestrator(seeds, {
    ...settings,
    handlers: combineHandlers(sink.handlers(), createConsoleHandlers(outputDir)),
  });
}

async function buildSettings(rawOptions: Record<string, unknown>): Promise<Partial<CrawlSettings>> {
  const settings: Partial<CrawlSettings> =
    rawOptions.config === undefined ? {} : await readConfigFile(String(rawOptions.config));

  if (rawOptions.maxDepth !== undefined) {
    settings.maxDepth = asNumber(rawOptions.maxDepth, 'max-depth');
  }

  if (rawOptions.timeoutMs !== undefined) {
    settings.timeoutMs = asNumber(rawOptions.timeoutMs, 'timeout-ms');
  }

  if (rawOptions.retries !== undefined) {
    settings.retryCount = asNumber(rawOptions.retries, 'retries');
  }

  if (rawOptions.politeDelayMs !== undefined) {
    settings.politeDelayMs = asNumber(rawOptions.politeDelayMs, 'polite-delay-ms');
  }

  if (rawOptions.concurrency !== undefined) {
    settings.concurrency = asNumber(rawOptions.concurrency, 'concurrency');
  }

  if (rawOptions.userAgent !== undefined) {
    settings.userAgent = String(rawOptions.userAgent);
  }

  if (rawOptions.allow !== undefined) {
    settings.allowedDomains = asStringList(rawOptions.allow);
  }

  if (rawOptions.block !== undefined) {
    settings.blockedDomains = asStringList(rawOptions.block);
  }

  if (rawOptions.blockPattern !== undefined) {
    settings.blockedUrlPatterns = asStringList(rawOptions.blockPattern);
  }

  if (rawOptions.visitedScope !== undefined) {
    const scope = String(rawOptions.visitedScope).toLowerCase();
    if (!isVisitedScope(scope)) {
      throw createConfigurationError(`Unsupported visited scope: ${scope}`, { value: scope });
    }
    settings.visitedScope = scope;
  }

  if (rawOptions.format !== undefined) {
    const format = String(rawOptions.format).toLowerCase();
    if (!isOutputFormat(format)) {
      throw createConfigurationError(`Unsupported format: ${format}`, { value: format });
    }
    settings.format = format;
  }

  if (rawOptions.quiet === true) {
    settings.quiet = true;
  }

  if (rawOptions.logLevel !== undefined) {
    settings.logLevel = String(rawOptions.logLevel).toLowerCase();
  }
  settings.logLevel ??= DEFAULT_CLI_LOG_LEVEL;

  if (!LOG_LEVELS.includes(settings.logLevel)) {
    throw createConfigurationError(`Unsupported log level: ${settings.logLevel}`, {
      value: settings.logLevel,
    });
  }

  return settings;
}

function asNumber(value: unknown, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}

function asStringList(value: unknown): string[] {
  const items = Array.isArray(value) ? value : [value];
  return items.flatMap((item) => String(item).split(',')).map((item) => item.trim()).filter(Boolean);
}

function reportCliError(error: unknown): void {
  const crawlerError = reportCrawlerError(error, { stage: 'cli' }, {
    defaultKind: 'config',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  logError(`Error: ${crawlerError.message}`);
  process.exitCode = 1;
}
