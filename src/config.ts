import { readFile } from 'node:fs/promises';

import { compileBlockPatterns } from './crawler/admission/blockPatterns.js';
import { canonicalHost } from './crawler/url/hostMatch.js';
import { normalizeUrl } from './crawler/url/normalizeUrl.js';
import { createConfigurationError } from './errors.js';
import type {
  CrawlOptions,
  CrawlSettings,
  OutputFormat,
  VisitedScope,
} from './types.js';

export const DEFAULT_SETTINGS: CrawlSettings = {
  maxDepth: 1,
  timeoutMs: 10_000,
  retryCount: 3,
  politeDelayMs: 500,
  userAgent: 'seedcrawl/0.1 (+https://www.npmjs.com/package/seedcrawl)',
  // Empty means "the hosts of the seeds".
  allowedDomains: [],
  blockedDomains: [
    'facebook.com',
    'tiktok.com',
    'youtube.com',
    'twitter.com',
    'instagram.com',
    'linkedin.com',
    'pinterest.com',
    'reddit.com',
    'quora.com',
    'whatsapp.com',
    'snapchat.com',
    'x.com',
    'netflix.com',
    'spotify.com',
  ],
  blockedUrlPatterns: [
    '\\.(jpe?g|png|gif|svg|webp|ico|pdf|zip|rar|gz|mp4|avi|mov|mp3|wav)$',
    '/wp-json/',
    '[?&]utm_',
  ],
  concurrency: 1,
  visitedScope: 'global',
  format: 'text',
  quiet: false,
  logLevel: 'silent',
};

const VALID_FORMATS: OutputFormat[] = ['text', 'json'];
const VALID_SCOPES: VisitedScope[] = ['global', 'seed'];
const SETTING_KEYS = Object.keys(DEFAULT_SETTINGS);

/**
 * Merges caller settings over the defaults, validates them and compiles the
 * block patterns. An empty allow-list is filled with the seeds' hosts.
 */
export function resolveOptions(
  config: Partial<CrawlSettings>,
  seeds: readonly string[] = [],
): CrawlOptions {
  const format = config.format ?? DEFAULT_SETTINGS.format;
  if (!VALID_FORMATS.includes(format)) {
    throw createConfigurationError(`Unsupported format: ${format}`, { format });
  }

  const visitedScope = config.visitedScope ?? DEFAULT_SETTINGS.visitedScope;
  if (!VALID_SCOPES.includes(visitedScope)) {
    throw createConfigurationError(`Unsupported visited scope: ${visitedScope}`, { visitedScope });
  }

  const userAgent = (config.userAgent ?? DEFAULT_SETTINGS.userAgent).trim();
  if (!userAgent) {
    throw createConfigurationError('user-agent must not be empty.', { userAgent: config.userAgent });
  }

  const allowedDomains = cleanDomains(config.allowedDomains ?? DEFAULT_SETTINGS.allowedDomains);

  return {
    maxDepth: coerceNonNegativeInteger(config.maxDepth ?? DEFAULT_SETTINGS.maxDepth, 'max-depth'),
    timeoutMs: coercePositiveInteger(config.timeoutMs ?? DEFAULT_SETTINGS.timeoutMs, 'timeout-ms'),
    retryCount: coerceNonNegativeInteger(config.retryCount ?? DEFAULT_SETTINGS.retryCount, 'retries'),
    politeDelayMs: coerceNonNegativeInteger(
      config.politeDelayMs ?? DEFAULT_SETTINGS.politeDelayMs,
      'polite-delay-ms',
    ),
    userAgent,
    allowedDomains: allowedDomains.length > 0 ? allowedDomains : hostsOf(seeds),
    blockedDomains: cleanDomains(config.blockedDomains ?? DEFAULT_SETTINGS.blockedDomains),
    blockedUrlPatterns: compileBlockPatterns(
      config.blockedUrlPatterns ?? DEFAULT_SETTINGS.blockedUrlPatterns,
    ),
    concurrency: coercePositiveInteger(
      config.concurrency ?? DEFAULT_SETTINGS.concurrency,
      'concurrency',
    ),
    visitedScope,
    format,
    quiet: config.quiet ?? DEFAULT_SETTINGS.quiet,
    logLevel: config.logLevel ?? DEFAULT_SETTINGS.logLevel,
  };
}

/** Reads a JSON settings file. Unknown keys are rejected. */
export async function readConfigFile(path: string): Promise<Partial<CrawlSettings>> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw createConfigurationError(`Unable to read config file: ${path}`, { path }, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw createConfigurationError(`Config file is not valid JSON: ${path}`, { path }, { cause: error });
  }

  return parseSettings(parsed, path);
}

export function parseSettings(value: unknown, source = 'config'): Partial<CrawlSettings> {
  if (!isRecord(value)) {
    throw createConfigurationError(`${source} must contain a JSON object.`, { source });
  }

  const unknownKeys = Object.keys(value).filter((key) => !SETTING_KEYS.includes(key));
  if (unknownKeys.length > 0) {
    throw createConfigurationError(`Unknown settings in ${source}: ${unknownKeys.join(', ')}`, {
      source,
      keys: unknownKeys,
    });
  }

  const settings: Partial<CrawlSettings> = {};

  if (value.maxDepth !== undefined) {
    settings.maxDepth = readNumber(value.maxDepth, 'maxDepth');
  }
  if (value.timeoutMs !== undefined) {
    settings.timeoutMs = readNumber(value.timeoutMs, 'timeoutMs');
  }
  if (value.retryCount !== undefined) {
    settings.retryCount = readNumber(value.retryCount, 'retryCount');
  }
  if (value.politeDelayMs !== undefined) {
    settings.politeDelayMs = readNumber(value.politeDelayMs, 'politeDelayMs');
  }
  if (value.concurrency !== undefined) {
    settings.concurrency = readNumber(value.concurrency, 'concurrency');
  }
  if (value.userAgent !== undefined) {
    settings.userAgent = readString(value.userAgent, 'userAgent');
  }
  if (value.logLevel !== undefined) {
    settings.logLevel = readString(value.logLevel, 'logLevel');
  }
  if (value.quiet !== undefined) {
    settings.quiet = readBoolean(value.quiet, 'quiet');
  }
  if (value.allowedDomains !== undefined) {
    settings.allowedDomains = readStringArray(value.allowedDomains, 'allowedDomains');
  }
  if (value.blockedDomains !== undefined) {
    settings.blockedDomains = readStringArray(value.blockedDomains, 'blockedDomains');
  }
  if (value.blockedUrlPatterns !== undefined) {
    settings.blockedUrlPatterns = readStringArray(value.blockedUrlPatterns, 'blockedUrlPatterns');
  }
  if (value.format !== undefined) {
    const format = readString(value.format, 'format');
    if (!isOutputFormat(format)) {
      throw createConfigurationError(`Unsupported format: ${format}`, { format });
    }
    settings.format = format;
  }
  if (value.visitedScope !== undefined) {
    const scope = readString(value.visitedScope, 'visitedScope');
    if (!isVisitedScope(scope)) {
      throw createConfigurationError(`Unsupported visited scope: ${scope}`, { visitedScope: scope });
    }
    settings.visitedScope = scope;
  }

  return settings;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return VALID_FORMATS.some((format) => format === value);
}

export function isVisitedScope(value: string): value is VisitedScope {
  return VALID_SCOPES.some((scope) => scope === value);
}

function hostsOf(seeds: readonly string[]): string[] {
  const hosts = new Set<string>();
  for (const seed of seeds) {
    const normalized = normalizeUrl(seed);
    if (normalized) {
      hosts.add(canonicalHost(new URL(normalized).hostname));
    }
  }
  return [...hosts];
}

function cleanDomains(domains: readonly string[]): string[] {
  return [...new Set(domains.map(canonicalHost).filter((domain) => domain.length > 0))];
}

function coercePositiveInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

function coerceNonNegativeInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw createConfigurationError(`${field} must be zero or a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

function readNumber(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw createConfigurationError(`${field} must be a finite number.`, { value, field });
  }
  return value;
}

function readString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw createConfigurationError(`${field} must be a string.`, { value, field });
  }
  return value;
}

function readBoolean(value: unknown, field: string): boolean {
  if (typeof value !== 'boolean') {
    throw createConfigurationError(`${field} must be true or false.`, { value, field });
  }
  return value;
}

function readStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw createConfigurationError(`${field} must be an array of strings.`, { value, field });
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
