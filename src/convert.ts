import { Logger, MarkupNode } from './types.js';
import { silentLogger } from './tree.js';
import { buildDocument } from './builder.js';
import { runPasses } from './passes.js';
import { renderDocument } from './renderer.js';
import { deduplicateDelimiters } from './delimiters.js';
import { DEFAULT_EXTERNAL_DOC_PREFIX } from './links.js';
import { TEXT_WIDTH } from './wrap.js';
import {
  DEFAULT_CONTENT_SELECTOR,
  markdownToHtml,
  parseHtml,
  removeIgnored,
  selectContentRoot,
  selectTitle,
  toMarkupNode,
} from './parser.js';

export const DEFAULT_MODELINE = 'vim: ft=help';

/**
 * Options for converting a document to a Vim help file
 */
export interface ConvertOptions {
  /** Help file title; taken from the document when absent */
  title?: string;
  /** Name of the help file, e.g. `plugin.txt` */
  embeddedFilename?: string;
  /** Base URL to resolve relative links against */
  baseURL?: string;
  /** Selector of the element holding the text (default: `#content`) */
  contentSelector?: string;
  /** Elements matching these selectors are removed before conversion */
  selectorsToIgnore?: readonly string[];
  /** Link targets that never become references */
  ignoredLinkTargets?: Iterable<string>;
  /** Links into this documentation become help tag references */
  externalDocPrefix?: string;
  /** Last line of the help file; a blank value omits it */
  modeline?: string;
  textWidth?: number;
  logger?: Logger;
}

/**
 * Convert an already parsed (and selected) document. `title` should be
 * resolved by the caller; nothing is looked up here.
 */
export function convert(markup: MarkupNode, options: ConvertOptions = {}): string {
  const logger = options.logger ?? silentLogger;
  const width = options.textWidth ?? TEXT_WIDTH;
  const externalDocPrefix = options.externalDocPrefix ?? DEFAULT_EXTERNAL_DOC_PREFIX;

  const root = buildDocument(markup, logger);
  const tree = runPasses(root, {
    embeddedFilename: options.embeddedFilename,
    baseURL: options.baseURL,
    ignoredLinkTargets: new Set(options.ignoredLinkTargets ?? []),
    externalDocPrefix,
    width,
    logger,
  });
  const fragments = deduplicateDelimiters(renderDocument(tree, { width, externalDocPrefix }));
  const body = fragments.map(String).join('');
  return assembleOutput(body, options);
}

/**
 * Put the first line (file tag and title), the body and the modeline
 * together
 */
export function assembleOutput(body: string, options: Pick<ConvertOptions, 'title' | 'embeddedFilename' | 'modeline'>): string {
  const output: string[] = [];
  const firstLine: string[] = [];
  if (options.embeddedFilename) {
    firstLine.push(`*${options.embeddedFilename}*`);
  }
  if (options.title) {
    firstLine.push(options.title);
  }
  if (firstLine.length > 0) {
    output.push(firstLine.join('  '), '');
  }
  output.push(body);
  const modeline = options.modeline ?? DEFAULT_MODELINE;
  if (modeline.trim() !== '') {
    output.push('', modeline);
  }
  return output.join('\n');
}

/**
 * Convert an HTML document to a Vim help file
 */
export function convertHtml(html: string, options: ConvertOptions = {}): string {
  const logger = options.logger ?? silentLogger;
  const document = parseHtml(html);
  const title = options.title || selectTitle(document);
  const removed = removeIgnored(document, options.selectorsToIgnore ?? []);
  if (removed > 0) {
    logger.debug(`Removed ${removed} ignored elements`);
  }
  const content = selectContentRoot(document, options.contentSelector ?? DEFAULT_CONTENT_SELECTOR);
  return convert(toMarkupNode(content), { ...options, title });
}

/**
 * Convert a Markdown document to a Vim help file
 */
export function convertMarkdown(markdown: string, options: ConvertOptions = {}): string {
  return convertHtml(markdownToHtml(markdown), options);
}

/**
 * Convert text that is either Markdown (when it starts with a heading
 * marker) or HTML
 */
export function convertText(text: string, options: ConvertOptions = {}): string {
  return text.trimStart().startsWith('#')
    ? convertMarkdown(text, options)
    : convertHtml(text, options);
}
