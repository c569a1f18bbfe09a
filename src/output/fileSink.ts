import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { join, relative } from 'node:path';

import { createOutputError } from '../errors.js';
import type {
  BlockedEvent,
  CrawlHandlers,
  CrawlReport,
  FailureRecord,
  PageRecord,
} from '../types.js';
import { FilenameAllocator } from './filenames.js';

export interface PageIndexEntry {
  url: string;
  finalUrl: string;
  title: string;
  depth: number;
  status: number;
  fetchedAt: string;
  linkCount: number;
  contentLength: number;
  excerpt: string;
  file: string | null;
}

export const OUTPUT_FILES = {
  pagesDir: 'pages',
  index: 'index.json',
  success: 'success_urls.txt',
  failed: 'failed_urls.txt',
  blocked: 'blocked_urls.txt',
  log: 'crawl.log',
} as const;

const EXCERPT_LENGTH = 200;

/**
 * Writes a run to disk: one Markdown file per page, append-only event logs,
 * and `index.json` once the run completes.
 */
export class FileResultSink {
  private readonly filenames = new FilenameAllocator();
  private readonly files = new Map<string, string>();

  constructor(private readonly outputDir: string) {}

  get pagesDir(): string {
    return join(this.outputDir, OUTPUT_FILES.pagesDir);
  }

  /** Creates the directories and truncates the event logs of a previous run. */
  async prepare(): Promise<void> {
    await this.guard('prepare output directory', async () => {
      await mkdir(this.pagesDir, { recursive: true });
      await Promise.all(
        [OUTPUT_FILES.success, OUTPUT_FILES.failed, OUTPUT_FILES.blocked].map((name) =>
          writeFile(join(this.outputDir, name), '', 'utf8'),
        ),
      );
    });
  }

  handlers(): CrawlHandlers {
    return {
      onPage: (record) => this.writePage(record),
      onFailure: (record) => this.appendFailure(record),
      onBlocked: (event) => this.appendBlocked(event),
      onComplete: (report) => this.writeIndex(report),
    };
  }

  async writePage(record: PageRecord): Promise<void> {
    const filename = this.filenames.allocate(record.url);
    const path = join(this.pagesDir, filename);

    await this.guard(`write ${path}`, async () => {
      await writeFile(path, renderPageFile(record), 'utf8');
      await this.appendLine(OUTPUT_FILES.success, [record.url, record.status, record.fetchedAt]);
    });

    this.files.set(record.url, relative(this.outputDir, path));
  }

  async appendFailure(record: FailureRecord): Promise<void> {
    await this.guard('append failure log', () =>
      this.appendLine(OUTPUT_FILES.failed, [record.url, record.reason, record.timestamp]),
    );
  }

  async appendBlocked(event: BlockedEvent): Promise<void> {
    await this.guard('append blocked log', () =>
      this.appendLine(OUTPUT_FILES.blocked, [event.url, event.reason, event.timestamp]),
    );
  }

  async writeIndex(report: CrawlReport): Promise<void> {
    const entries = report.pages.map((page) => toIndexEntry(page, this.files.get(page.url) ?? null));
    const path = join(this.outputDir, OUTPUT_FILES.index);

    await this.guard(`write ${path}`, () =>
      writeFile(path, `${JSON.stringify(entries, null, 2)}\n`, 'utf8'),
    );
  }

  private async appendLine(name: string, fields: Array<string | number>): Promise<void> {
    await appendFile(join(this.outputDir, name), `${fields.join('|')}\n`, 'utf8');
  }

  private async guard(action: string, operation: () => Promise<void>): Promise<void> {
    try {
      await operation();
    } catch (error) {
      throw createOutputError(`Failed to ${action}`, { outputDir: this.outputDir }, { cause: error });
    }
  }
}

export function renderPageFile(record: PageRecord): string {
  return `# ${record.title}\n\n${record.markdown}\n`;
}

export function toIndexEntry(page: PageRecord, file: string | null): PageIndexEntry {
  return {
    url: page.url,
    finalUrl: page.finalUrl,
    title: page.title,
    depth: page.depth,
    status: page.status,
    fetchedAt: page.fetchedAt,
    linkCount: page.linkCount,
    contentLength: page.markdown.length,
    excerpt: buildExcerpt(page.markdown),
    file,
  };
}

function buildExcerpt(markdown: string): string {
  const flat = markdown.replace(/\s+/g, ' ').trim();
  return flat.length > EXCERPT_LENGTH ? `${flat.slice(0, EXCERPT_LENGTH)}…` : flat;
}
