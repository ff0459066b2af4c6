import { HTMLElement, parse, TextNode } from 'node-html-parser';
import { marked } from 'marked';
import { MarkupNode } from './types.js';
import { SelectorError } from './errors.js';
import { compact } from './wrap.js';

/** Selector of the element holding the document text, tried first */
export const DEFAULT_CONTENT_SELECTOR = '#content';

/**
 * Parse an HTML document. The contents of `<pre>` are parsed as markup so
 * nested `<code>` elements survive.
 */
export function parseHtml(html: string): HTMLElement {
  return parse(html, {
    blockTextElements: { script: true, noscript: true, style: true },
  });
}

/**
 * Convert Markdown (GitHub flavoured) to HTML
 */
export function markdownToHtml(markdown: string): string {
  return marked.parser(marked.lexer(markdown, { gfm: true }));
}

function queryAll(root: HTMLElement, selector: string): HTMLElement[] {
  try {
    return root.querySelectorAll(selector);
  } catch (err) {
    throw new SelectorError(selector, err);
  }
}

/**
 * Find the element holding the document text: the first match of the
 * selector, else `<body>`, else the document itself.
 */
export function selectContentRoot(document: HTMLElement, selector = DEFAULT_CONTENT_SELECTOR): HTMLElement {
  const [match] = queryAll(document, selector);
  if (match) {
    return match;
  }
  return document.querySelector('body') ?? document;
}

/**
 * Remove all elements matching any of the selectors (navigation, anchors
 * injected by a site generator, ...)
 */
export function removeIgnored(document: HTMLElement, selectors: readonly string[]): number {
  let removed = 0;
  for (const selector of selectors) {
    for (const element of queryAll(document, selector)) {
      element.remove();
      removed++;
    }
  }
  return removed;
}

/**
 * Text of the first `<title>` or `<h1>` element, compacted
 */
export function selectTitle(document: HTMLElement): string {
  const element = document.querySelector('title, h1');
  return element ? compact(element.text) : '';
}

/**
 * Expose a parsed element through the read-only markup interface the tree
 * builder works on. Comments and other non-element nodes are left out.
 */
export function toMarkupNode(node: HTMLElement | TextNode): MarkupNode {
  if (node instanceof TextNode) {
    return {
      name: '',
      isText: true,
      text: node.text,
      children: [],
      attribute: () => undefined,
    };
  }
  const children: MarkupNode[] = [];
  for (const child of node.childNodes) {
    if (child instanceof TextNode || child instanceof HTMLElement) {
      children.push(toMarkupNode(child));
    }
  }
  return {
    name: (node.rawTagName ?? '').toLowerCase(),
    isText: false,
    text: '',
    children,
    attribute: (name: string) => node.getAttribute(name),
  };
}
