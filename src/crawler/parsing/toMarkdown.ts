import { isTag, isText, type AnyNode, type Element } from 'domhandler';

import type { BlockRule, StructuralTagClassifier } from './classifier.js';
import { collapseWhitespace } from './text.js';

class MarkdownWriter {
  private readonly blocks: string[] = [];
  private inline = '';

  appendInline(text: string): void {
    this.inline += text;
  }

  flushInline(): void {
    const text = collapseWhitespace(this.inline);
    this.inline = '';
    if (text) {
      this.blocks.push(text);
    }
  }

  block(text: string): void {
    this.flushInline();
    if (text) {
      this.blocks.push(text);
    }
  }

  toString(): string {
    return this.blocks.join('\n\n');
  }
}

/**
 * Converts a cleaned DOM subtree to Markdown-like text, keeping the order of
 * blocks as they appear. Text outside any block rule becomes a plain line.
 */
export function domToMarkdown(root: Element, classifier: StructuralTagClassifier): string {
  const writer = new MarkdownWriter();
  walkChildren(root, writer, classifier, 0);
  writer.flushInline();
  return writer.toString();
}

function walkChildren(
  element: Element,
  writer: MarkdownWriter,
  classifier: StructuralTagClassifier,
  listDepth: number,
): void {
  for (const child of element.children) {
    walk(child, writer, classifier, listDepth);
  }
}

function walk(
  node: AnyNode,
  writer: MarkdownWriter,
  classifier: StructuralTagClassifier,
  listDepth: number,
): void {
  if (isText(node)) {
    writer.appendInline(node.data);
    return;
  }

  if (!isTag(node)) {
    return;
  }

  const tag = node.name;
  if (tag === 'br') {
    writer.appendInline(' ');
    return;
  }

  const rule = classifier.blocks.get(tag);
  if (rule) {
    emitBlock(node, rule, writer, classifier, listDepth);
    return;
  }

  if (classifier.inlineTags.has(tag)) {
    walkChildren(node, writer, classifier, listDepth);
    return;
  }

  const depth = classifier.listTags.has(tag) ? listDepth + 1 : listDepth;
  writer.flushInline();
  walkChildren(node, writer, classifier, depth);
  writer.flushInline();
}

function emitBlock(
  element: Element,
  rule: BlockRule,
  writer: MarkdownWriter,
  classifier: StructuralTagClassifier,
  listDepth: number,
): void {
  switch (rule.kind) {
    case 'heading': {
      const text = textContent(element, classifier);
      writer.block(text ? `${'#'.repeat(rule.level)} ${text}` : '');
      return;
    }
    case 'paragraph':
      writer.block(textContent(element, classifier));
      return;
    case 'quote': {
      const text = textContent(element, classifier);
      writer.block(text ? `> ${text}` : '');
      return;
    }
    case 'code': {
      const raw = rawText(element).replace(/^\n+|\s+$/g, '');
      writer.block(raw ? `\`\`\`\n${raw}\n\`\`\`` : '');
      return;
    }
    case 'list-item': {
      const indent = '  '.repeat(Math.max(0, listDepth - 1));
      const text = textContent(element, classifier, classifier.listTags);
      writer.block(text ? `${indent}- ${text}` : '');
      for (const nested of nestedLists(element, classifier)) {
        walk(nested, writer, classifier, listDepth);
      }
      return;
    }
  }
}

/** Collapsed text of a subtree; block boundaries become spaces. */
function textContent(
  element: Element,
  classifier: StructuralTagClassifier,
  skipTags: ReadonlySet<string> = new Set(),
): string {
  const parts: string[] = [];

  const visit = (node: AnyNode): void => {
    if (isText(node)) {
      parts.push(node.data);
      return;
    }
    if (!isTag(node) || skipTags.has(node.name)) {
      return;
    }
    if (node.name === 'br') {
      parts.push(' ');
      return;
    }

    const inline = classifier.inlineTags.has(node.name);
    if (!inline) {
      parts.push(' ');
    }
    node.children.forEach(visit);
    if (!inline) {
      parts.push(' ');
    }
  };

  element.children.forEach(visit);
  return collapseWhitespace(parts.join(''));
}

function rawText(element: Element): string {
  return element.children
    .map((child): string => {
      if (isText(child)) {
        return child.data;
      }
      if (isTag(child)) {
        return child.name === 'br' ? '\n' : rawText(child);
      }
      return '';
    })
    .join('');
}

/** Lists inside a list item, without descending into those lists. */
function nestedLists(element: Element, classifier: StructuralTagClassifier): Element[] {
  const found: Element[] = [];

  for (const child of element.children) {
    if (!isTag(child)) {
      continue;
    }
    if (classifier.listTags.has(child.name)) {
      found.push(child);
    } else {
      found.push(...nestedLists(child, classifier));
    }
  }

  return found;
}
