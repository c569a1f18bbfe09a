import type { CrawlReport, CrawlSummary, FailureRecord, OutputFormat, PageRecord } from '../types.js';

let quietMode = false;
let outputFormat: OutputFormat = 'text';

export function setOutputConfig(config: { quiet: boolean; format: OutputFormat }): void {
  quietMode = config.quiet;
  outputFormat = config.format;
}

export function resetOutputConfig(): void {
  setOutputConfig({ quiet: false, format: 'text' });
}

/** Per-event lines only make sense for humans reading text output. */
function chatty(): boolean {
  return !quietMode && outputFormat === 'text';
}

export function writeSeedStart(seed: string, index: number, total: number): void {
  if (!chatty()) {
    return;
  }
  process.stdout.write(`\nSEED ${index}/${total}: ${seed}\n`);
}

export function writePage(page: PageRecord): void {
  if (!chatty()) {
    return;
  }
  process.stdout.write(`SAVED [depth ${page.depth}] ${page.url} (${page.title})\n`);
}

export function writeFailure(failure: FailureRecord): void {
  const status = failure.status === undefined ? '' : ` [HTTP ${failure.status}]`;
  logError(`[failure] ${failure.url}: ${failure.reason}${status} ${failure.message}`);
}

export function logError(message: string): void {
  const payload = message.endsWith('\n') ? message : `${message}\n`;
  process.stderr.write(payload);
}

export function writeReport(report: CrawlReport, outputDir?: string): void {
  if (outputFormat === 'json') {
    process.stdout.write(`${JSON.stringify({ ...report.summary, seeds: report.seeds }, null, 2)}\n`);
    return;
  }

  process.stdout.write(renderTextSummary(report.summary, outputDir));
}

export function renderTextSummary(summary: CrawlSummary, outputDir?: string): string {
  const lines: string[] = [
    '',
    '--- Crawl Summary ---',
    `Seeds crawled: ${summary.seedsCompleted}/${summary.seedsTotal}`,
    `Invalid seeds: ${summary.seedsInvalid}`,
    `Pages saved: ${summary.pagesSucceeded}`,
    `Failed: ${summary.pagesFailed}`,
    `Blocked: ${summary.pagesBlocked}`,
    `URLs visited: ${summary.urlsVisited}`,
    `Links extracted: ${summary.totalLinksExtracted}`,
    `Duplicates filtered: ${summary.duplicatesFiltered}`,
    `Max depth reached: ${summary.maxDepthReached}`,
    `Retries: ${summary.retryAttempts}`,
    `Duration: ${formatDuration(summary.durationMs)}`,
  ];

  appendTally(lines, 'Status codes:', summary.statusCounts, ([a], [b]) => Number(a) - Number(b));
  appendTally(lines, 'Failure reasons:', summary.failureReasons, ([, a], [, b]) => b - a);
  appendTally(lines, 'Block reasons:', summary.blockReasons, ([, a], [, b]) => b - a);

  if (outputDir) {
    lines.push(`Output: ${outputDir}`);
  }

  return `${lines.join('\n')}\n`;
}

function appendTally(
  lines: string[],
  heading: string,
  tally: Record<string, number>,
  compare: (a: [string, number], b: [string, number]) => number,
): void {
  const entries = Object.entries(tally).sort(compare);
  if (entries.length === 0) {
    return;
  }

  lines.push(heading);
  for (const [key, count] of entries) {
    lines.push(`  ${key}: ${count}`);
  }
}

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return '0ms';
  }

  if (durationMs < 1_000) {
    return `${Math.round(durationMs)}ms`;
  }

  const seconds = durationMs / 1_000;
  if (seconds < 60) {
    const precision = seconds >= 10 ? 1 : 2;
    return `${seconds.toFixed(precision)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  const secondsPart =
    remainingSeconds >= 10 ? remainingSeconds.toFixed(0) : remainingSeconds.toFixed(1);
  return `${minutes}m ${secondsPart}s`;
}
