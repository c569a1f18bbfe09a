import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DEFAULT_SETTINGS, parseSettings, readConfigFile, resolveOptions } from '../src/config.js';
import { isCrawlerError } from '../src/errors.js';
import { loadSeeds, parseSeedList } from '../src/seeds.js';

function catchError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('resolveOptions', () => {
  it('fills defaults and derives the allow-list from the seeds', () => {
    const options = resolveOptions({}, ['https://www.example.com/start', 'docs.example.org', '::bad::']);

    expect(options.maxDepth).toBe(DEFAULT_SETTINGS.maxDepth);
    expect(options.retryCount).toBe(3);
    expect(options.politeDelayMs).toBe(500);
    expect(options.concurrency).toBe(1);
    expect(options.visitedScope).toBe('global');
    expect(options.allowedDomains).toEqual(['example.com', 'docs.example.org']);
    expect(options.blockedDomains).toContain('facebook.com');
    expect(options.blockedUrlPatterns).toHaveLength(3);
    expect(options.blockedUrlPatterns.every((pattern) => pattern instanceof RegExp)).toBe(true);
  });

  it('canonicalizes explicit domains', () => {
    const options = resolveOptions({ allowedDomains: ['WWW.Docs.Example.com', 'docs.example.com'] }, []);
    expect(options.allowedDomains).toEqual(['docs.example.com']);
  });

  it('accepts zero depth and zero delay, truncating fractions', () => {
    const options = resolveOptions({ maxDepth: 2.7, politeDelayMs: 0 }, []);
    expect(options.maxDepth).toBe(2);
    expect(options.politeDelayMs).toBe(0);
    expect(resolveOptions({ maxDepth: 0 }, []).maxDepth).toBe(0);
  });

  it('rejects out-of-range numbers with configuration errors', () => {
    const concurrency = catchError(() => resolveOptions({ concurrency: 0 }, []));
    const depth = catchError(() => resolveOptions({ maxDepth: -1 }, []));

    expect(isCrawlerError(concurrency) && concurrency.message).toBe('concurrency must be a positive integer.');
    expect(isCrawlerError(depth) && depth.kind).toBe('config');
  });

  it('rejects an empty user agent', () => {
    const error = catchError(() => resolveOptions({ userAgent: '   ' }, []));
    expect(isCrawlerError(error) && error.message).toBe('user-agent must not be empty.');
  });
});

describe('parseSettings', () => {
  it('keeps the settings that are present', () => {
    expect(parseSettings({ maxDepth: 2, format: 'json', blockedDomains: ['x.com'] })).toEqual({
      maxDepth: 2,
      format: 'json',
      blockedDomains: ['x.com'],
    });
  });

  it('rejects unknown keys', () => {
    const error = catchError(() => parseSettings({ depth: 2 }));
    expect(isCrawlerError(error) && error.message).toBe('Unknown settings in config: depth');
  });

  it('rejects values of the wrong type', () => {
    expect(isCrawlerError(catchError(() => parseSettings({ quiet: 'yes' })))).toBe(true);
    expect(isCrawlerError(catchError(() => parseSettings({ visitedScope: 'site' })))).toBe(true);
    expect(isCrawlerError(catchError(() => parseSettings([])))).toBe(true);
  });
});

describe('files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'seedcrawl-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a JSON config file', async () => {
    const path = join(dir, 'crawl.json');
    await writeFile(path, JSON.stringify({ retryCount: 1, visitedScope: 'seed' }), 'utf8');

    await expect(readConfigFile(path)).resolves.toEqual({ retryCount: 1, visitedScope: 'seed' });
  });

  it('rejects a config file that is not JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ nope', 'utf8');

    await expect(readConfigFile(path)).rejects.toThrow(`Config file is not valid JSON: ${path}`);
  });

  it('loads seeds, skipping blanks and comments', async () => {
    const path = join(dir, 'seeds.txt');
    await writeFile(path, '# sites\nhttps://example.com\n\n  docs.example.org  \r\n', 'utf8');

    await expect(loadSeeds(path)).resolves.toEqual(['https://example.com', 'docs.example.org']);
  });

  it('fails on a missing or empty seed file', async () => {
    const empty = join(dir, 'empty.txt');
    await writeFile(empty, '# nothing here\n', 'utf8');

    await expect(loadSeeds(join(dir, 'missing.txt'))).rejects.toThrow('Seed file not found or unreadable');
    await expect(loadSeeds(empty)).rejects.toThrow(`No seeds found in ${empty}`);
  });
});

describe('parseSeedList', () => {
  it('trims lines and keeps their order', () => {
    expect(parseSeedList(' b.example.com\na.example.com ')).toEqual(['b.example.com', 'a.example.com']);
  });
});
