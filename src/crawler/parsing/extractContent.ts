import { load, type CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

import type { ExtractionFailureReason } from '../../types.js';
import { DEFAULT_CLASSIFIER, isNoiseElement, type StructuralTagClassifier } from './classifier.js';
import { extractTitle } from './extractTitle.js';
import { parseLinks } from './parseLinks.js';
import { domToMarkdown } from './toMarkdown.js';

export interface ExtractedPage {
  title: string;
  markdown: string;
  /** Raw hrefs from the whole document, to be resolved against the page URL. */
  links: string[];
}

export type ExtractionResult =
  | { ok: true; page: ExtractedPage }
  | { ok: false; reason: ExtractionFailureReason; message: string };

export function extractContent(
  html: string,
  pageUrl: string,
  classifier: StructuralTagClassifier = DEFAULT_CLASSIFIER,
): ExtractionResult {
  if (html.includes('\u0000')) {
    return { ok: false, reason: 'no-content', message: 'Response body looks binary' };
  }

  let $: CheerioAPI;
  let links: string[];
  try {
    $ = load(html);
    links = parseLinks($);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, reason: 'parse-error', message: `Failed to parse HTML: ${message}` };
  }

  const title = extractTitle($, pageUrl);

  removeNoise($, classifier);

  const body = $('body').get(0);
  const markdown = body ? domToMarkdown(body, classifier) : '';

  if (!markdown) {
    return { ok: false, reason: 'no-content', message: 'No extractable text content' };
  }

  return { ok: true, page: { title, markdown, links } };
}

function removeNoise($: CheerioAPI, classifier: StructuralTagClassifier): void {
  if (classifier.noiseTags.length > 0) {
    $(classifier.noiseTags.join(', ')).remove();
  }

  $('[class], [id]').each((_idx: number, element: Element) => {
    if (isNoiseElement(element, classifier)) {
      $(element).remove();
    }
  });
}
