import { createSeedError } from '../../errors.js';

const DEFAULT_PORT_MAP: Record<string, string> = {
  'http:': '80',
  'https:': '443',
};

const HAS_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const PSEUDO_SCHEME = /^(?:mailto|javascript|tel|data|about|blob|sms):/i;

/**
 * Canonical absolute form of `raw`, resolved against `base` when given.
 * Returns null for anything that has no host to fetch from.
 */
export function normalizeUrl(raw: string, base?: string | URL): string | null {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return null;
  }

  try {
    const url = base === undefined ? new URL(withDefaultScheme(trimmed)) : new URL(trimmed, base);

    if (!url.hostname) {
      return null;
    }

    url.protocol = url.protocol.toLowerCase();
    url.hostname = url.hostname.toLowerCase();
    url.hash = '';

    removeDefaultPort(url);
    normalizePath(url);

    return url.toString();
  } catch {
    return null;
  }
}

export function normalizeSeed(raw: string): string {
  const normalized = normalizeUrl(raw);
  if (!normalized) {
    throw createSeedError(`Invalid seed URL: ${JSON.stringify(raw)}`, { seed: raw });
  }
  return normalized;
}

function withDefaultScheme(raw: string): string {
  if (HAS_SCHEME.test(raw) || PSEUDO_SCHEME.test(raw)) {
    return raw;
  }

  if (raw.startsWith('//')) {
    return `https:${raw}`;
  }

  return `https://${raw}`;
}

function removeDefaultPort(url: URL): void {
  const defaultPort = DEFAULT_PORT_MAP[url.protocol];
  if (defaultPort && url.port === defaultPort) {
    url.port = '';
  }
}

function normalizePath(url: URL): void {
  if (url.pathname === '/') {
    return;
  }

  const trimmed = url.pathname.replace(/\/+$/, '');
  url.pathname = trimmed.length > 0 ? trimmed : '/';
}
