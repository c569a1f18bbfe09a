import type { Element } from 'domhandler';

export type BlockRule =
  | { kind: 'heading'; level: number }
  | { kind: 'paragraph' }
  | { kind: 'list-item' }
  | { kind: 'quote' }
  | { kind: 'code' };

/**
 * The rules the extractor applies to a DOM, kept as data so a caller can
 * swap them without touching the conversion code.
 */
export interface StructuralTagClassifier {
  /** Tags removed outright, with their subtrees. */
  noiseTags: readonly string[];
  /** Matched against each class token and the id of an element. */
  noiseTokenPatterns: readonly RegExp[];
  /** Never removed by the token patterns, whatever their class says. */
  protectedTags: ReadonlySet<string>;
  blocks: ReadonlyMap<string, BlockRule>;
  inlineTags: ReadonlySet<string>;
  listTags: ReadonlySet<string>;
}

export const DEFAULT_CLASSIFIER: StructuralTagClassifier = {
  noiseTags: [
    'script',
    'style',
    'noscript',
    'template',
    'nav',
    'footer',
    'header',
    'aside',
    'iframe',
    'form',
    'svg',
    'canvas',
    'video',
    'audio',
  ],
  noiseTokenPatterns: [
    /^ads?$/i,
    /^ad[-_]/i,
    /^advert/i,
    /^banner$/i,
    /^cookie/i,
    /^sidebar$/i,
    /^social/i,
    /^share/i,
    /^menu$/i,
    /^navbar$/i,
    /^breadcrumbs?$/i,
    /^popup/i,
    /^newsletter/i,
  ],
  protectedTags: new Set(['html', 'head', 'body', 'main', 'article']),
  blocks: new Map<string, BlockRule>([
    ['h1', { kind: 'heading', level: 1 }],
    ['h2', { kind: 'heading', level: 2 }],
    ['h3', { kind: 'heading', level: 3 }],
    ['h4', { kind: 'heading', level: 4 }],
    ['h5', { kind: 'heading', level: 5 }],
    ['h6', { kind: 'heading', level: 6 }],
    ['p', { kind: 'paragraph' }],
    ['li', { kind: 'list-item' }],
    ['blockquote', { kind: 'quote' }],
    ['pre', { kind: 'code' }],
  ]),
  inlineTags: new Set([
    'a',
    'abbr',
    'b',
    'bdi',
    'cite',
    'code',
    'data',
    'dfn',
    'em',
    'i',
    'kbd',
    'label',
    'mark',
    'q',
    's',
    'samp',
    'small',
    'span',
    'strong',
    'sub',
    'sup',
    'time',
    'u',
    'var',
  ]),
  listTags: new Set(['ul', 'ol', 'menu']),
};

export function isNoiseElement(element: Element, classifier: StructuralTagClassifier): boolean {
  if (classifier.protectedTags.has(element.name)) {
    return false;
  }

  const tokens = [...(element.attribs.class ?? '').split(/\s+/), element.attribs.id ?? ''].filter(
    (token) => token.length > 0,
  );

  return tokens.some((token) => classifier.noiseTokenPatterns.some((pattern) => pattern.test(token)));
}
