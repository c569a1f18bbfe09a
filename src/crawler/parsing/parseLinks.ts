import { load, type CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

import { createParseError } from '../../errors.js';

/** Every distinct, non-empty anchor href in the document, in document order. */
export function parseLinks(source: string | CheerioAPI): string[] {
  try {
    const $ = typeof source === 'string' ? load(source) : source;
    const hrefs = new Set<string>();

    $('a[href]').each((_idx: number, element: Element) => {
      const href = $(element).attr('href');
      if (!href) {
        return;
      }

      const trimmed = href.trim();
      if (trimmed.length === 0) {
        return;
      }

      hrefs.add(trimmed);
    });

    return [...hrefs];
  } catch (error) {
    const details = typeof source === 'string' ? { htmlLength: source.length } : {};
    throw createParseError('Failed to parse links from HTML', details, { cause: error });
  }
}
