const MAX_STEM_LENGTH = 150;

/**
 * File stem for a page: host and path (and query, when present) joined by
 * underscores, `www.` dropped, anything outside [A-Za-z0-9_-] replaced.
 */
export function slugFromUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return sanitize(url) || 'page';
  }

  const host = parsed.host.replace(/^www\./, '').replace(/\./g, '_');
  const path = parsed.pathname.replace(/^\/+|\/+$/g, '').replace(/\//g, '_') || 'index';
  const query = parsed.search.replace(/^\?/, '');

  return sanitize([host, path, query].filter(Boolean).join('_'));
}

/** Hands out stems, suffixing `-2`, `-3`… when one is already taken. */
export class FilenameAllocator {
  private readonly used = new Set<string>();

  allocate(url: string, extension = '.md'): string {
    const stem = slugFromUrl(url);
    let candidate = stem;
    let counter = 2;

    while (this.used.has(candidate)) {
      candidate = `${stem}-${counter}`;
      counter += 1;
    }

    this.used.add(candidate);
    return `${candidate}${extension}`;
  }
}

function sanitize(value: string): string {
  return value.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, MAX_STEM_LENGTH);
}
