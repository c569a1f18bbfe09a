import type { CheerioAPI } from 'cheerio';

import { collapseWhitespace } from './text.js';

/**
 * `<title>`, else the first heading, else the URL path, else the host.
 * Must run before noise removal, since headings often live in `<header>`.
 */
export function extractTitle($: CheerioAPI, pageUrl: string): string {
  const title = collapseWhitespace($('title').first().text());
  if (title) {
    return title;
  }

  const heading = collapseWhitespace($('h1, h2, h3, h4, h5, h6').first().text());
  if (heading) {
    return heading;
  }

  return titleFromUrl(pageUrl);
}

export function titleFromUrl(pageUrl: string): string {
  try {
    const url = new URL(pageUrl);
    const path = safeDecode(url.pathname).replace(/^\/+|\/+$/g, '');
    return path || url.hostname;
  } catch {
    return pageUrl;
  }
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
