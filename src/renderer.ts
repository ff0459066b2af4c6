import {
  ContainerNode,
  Delimiter,
  DocNode,
  Fragment,
  Heading,
  HyperLink,
  Image,
  List,
  ListItem,
  Paragraph,
  PreformattedText,
  TableOfContentsEntry,
} from './types.js';
import { DELIMITERS, DocumentTree, hasBlockContent, isBlock, walkTree } from './tree.js';
import { compact, TEXT_WIDTH, SHIFT_WIDTH, wrapText } from './wrap.js';
import { externalDocAnchor, toTagReference } from './links.js';
import { RenderError } from './errors.js';

/**
 * Options for rendering a document tree
 */
export interface RenderOptions {
  /** Width of the generated text (default: 79) */
  width?: number;
  /** Links starting with this prefix become help tag references */
  externalDocPrefix?: string;
}

interface RenderContext {
  tree: DocumentTree;
  width: number;
  externalDocPrefix?: string;
  /** Number of spaces the current block is indented by */
  indent: number;
}

/** Items average more lines than this → separate them by blank lines */
const LIST_DENSITY_THRESHOLD = 1.5;

const SPACIOUS_LIST_DELIMITER = new Delimiter('\n\n');
const COMPACT_LIST_DELIMITER = new Delimiter('\n');

const CODE_QUOTES = ['`', "'", '"'];

/**
 * Render a whole document tree into a flat sequence of text and delimiters
 */
export function renderDocument(tree: DocumentTree, options: RenderOptions = {}): Fragment[] {
  return renderBlock(tree.root, createContext(tree, options));
}

/**
 * Render inline nodes as one unwrapped, compacted line of text. Used for
 * heading text in tags and the table of contents.
 */
export function renderInlineText(tree: DocumentTree, nodes: readonly DocNode[], options: RenderOptions = {}): string {
  const context = createContext(tree, options);
  return compact(nodes.map(node => renderInline(node, context)).join(''));
}

function createContext(tree: DocumentTree, options: RenderOptions): RenderContext {
  return {
    tree,
    width: options.width ?? TEXT_WIDTH,
    externalDocPrefix: options.externalDocPrefix,
    indent: 0,
  };
}

function indented(context: RenderContext, indent: number): RenderContext {
  return { ...context, indent };
}

function renderBlock(node: DocNode, context: RenderContext): Fragment[] {
  switch (node.kind) {
    case 'blockSequence': {
      const { start, end } = DELIMITERS.blockSequence;
      return [start, ...joinBlocks(node.children, context), end];
    }
    case 'heading':
      return renderHeading(node, context);
    case 'paragraph':
      return renderParagraph(node, context);
    case 'preformatted':
      return renderPreformatted(node, context);
    case 'list':
      return renderList(node, context);
    case 'listItem':
      return renderListItem(node, 1, context);
    case 'table':
      // Tabular data is not supported (yet)
      return [];
    case 'reference': {
      const { start, end } = DELIMITERS.reference;
      return [start, `[${node.number}] ${node.target}`, end];
    }
    case 'tocEntry':
      return renderTocEntry(node, context);
    case 'inlineSequence':
    case 'text':
    case 'hyperLink':
    case 'image':
    case 'code':
    case 'emphasis':
    case 'strong':
      return [joinInline([node], context)];
    default: {
      const unreachable: never = node;
      throw new RenderError(`Unknown node kind: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Render a sequence of block nodes. Runs of inline siblings are wrapped
 * together as one paragraph of text.
 */
function joinBlocks(nodes: readonly DocNode[], context: RenderContext): Fragment[] {
  const output: Fragment[] = [];
  let run: DocNode[] = [];
  const flush = (): void => {
    if (run.length > 0) {
      output.push(joinInline(run, context));
      run = [];
    }
  };
  for (const node of nodes) {
    if (isBlock(node)) {
      flush();
      output.push(...renderBlock(node, context));
    } else {
      run.push(node);
    }
  }
  flush();
  return output.filter(fragment => typeof fragment !== 'string' || fragment.trim() !== '');
}

/**
 * Render inline nodes as wrapped text at the current indent
 */
function joinInline(nodes: readonly DocNode[], context: RenderContext): string {
  const text = nodes.map(node => renderInline(node, context)).join('');
  return wrapText(text, context.width - context.indent, ' '.repeat(context.indent));
}

function isWhitespace(node: DocNode): boolean {
  return node.kind === 'text' && node.text.trim() === '';
}

/** Children other than whitespace between elements */
function significant(nodes: readonly DocNode[]): DocNode[] {
  return nodes.filter(node => !isWhitespace(node));
}

function renderChildren(node: ContainerNode, context: RenderContext): Fragment[] {
  if (hasBlockContent(node.children)) {
    return joinBlocks(node.children, context);
  }
  return [joinInline(node.children, context)];
}

function renderHeading(node: Heading, context: RenderContext): Fragment[] {
  const { width, indent } = context;
  const lines = [(node.level === 1 ? '=' : '-').repeat(width)];
  let text = renderInlineText(context.tree, node.children, context);
  let suffix = ' ~';
  if (node.tag) {
    const tag = node.tag;
    if (text.includes(tag)) {
      text = text.replace(tag, () => `*${tag}*`);
      suffix = '';
    } else {
      lines.push(`*${tag}*`.padStart(width));
    }
  }
  const prefix = ' '.repeat(indent);
  // Room for the marker is kept even when the tag took its place.
  const wrapped = wrapText(text, width - indent - 2);
  for (const line of wrapped.split('\n')) {
    if (line !== '') lines.push(prefix + line + suffix);
  }
  const { start, end } = DELIMITERS.heading;
  return [start, lines.join('\n'), end];
}

function renderParagraph(node: Paragraph, context: RenderContext): Fragment[] {
  let paragraphContext = context;
  // A paragraph holding only an image (possibly wrapped in a link) is indented.
  if (significant(node.children).length === 1 && walkTree(node, 'image').length === 1) {
    paragraphContext = indented(context, Math.max(SHIFT_WIDTH, context.indent));
  }
  const { start, end } = DELIMITERS.paragraph;
  return [start, ...renderChildren(node, paragraphContext), end];
}

function renderPreformatted(node: PreformattedText, context: RenderContext): Fragment[] {
  const prefix = ' '.repeat(Math.max(context.indent, SHIFT_WIDTH));
  const text = node.text
    .split('\n')
    .map(line => (line === '' ? '' : prefix + line))
    .join('\n');
  const { start, end } = DELIMITERS.preformatted;
  return [start, text, end];
}

function countLines(fragments: readonly Fragment[]): number {
  return fragments
    .map(String)
    .join('')
    .split('\n')
    .filter(line => line.trim() !== '').length;
}

interface ListGroup {
  item: ListItem;
  /** Children between this item and the next one (a nested list written without its own item, say) */
  extras: DocNode[];
}

function renderList(node: List, context: RenderContext): Fragment[] {
  const leading: DocNode[] = [];
  const groups: ListGroup[] = [];
  for (const child of node.children) {
    if (child.kind === 'listItem') {
      groups.push({ item: child, extras: [] });
    } else if (groups.length > 0) {
      groups[groups.length - 1].extras.push(child);
    } else {
      leading.push(child);
    }
  }
  if (groups.length === 0) {
    throw new RenderError(`Cannot render ${node.ordered ? 'ordered' : 'unordered'} list without list items`);
  }
  // The delimiter is chosen for the whole list, after all items were rendered.
  const rendered = groups.map(({ item, extras }, i) => renderListItem(item, i + 1, context, extras));
  const totalLines = rendered.reduce((sum, fragments) => sum + countLines(fragments), 0);
  const delimiter = totalLines / groups.length > LIST_DENSITY_THRESHOLD
    ? SPACIOUS_LIST_DELIMITER
    : COMPACT_LIST_DELIMITER;
  const { start, end } = DELIMITERS.list;
  const before = joinBlocks(leading, context);
  const output: Fragment[] = [start, ...before];
  rendered.forEach((fragments, i) => {
    if (i > 0 || before.length > 0) output.push(delimiter);
    output.push(...fragments);
  });
  output.push(end);
  return output;
}

function renderListItem(
  node: ListItem,
  number: number,
  context: RenderContext,
  extras: readonly DocNode[] = [],
): Fragment[] {
  const owner = context.tree.parents.parentOf(node);
  const ordered = owner?.kind === 'list' && owner.ordered;
  const prefix = ' '.repeat(context.indent) + (ordered ? `${number}. ` : '- ');
  const itemContext = indented(context, prefix.length);
  const content = [...renderChildren(node, itemContext), ...joinBlocks(extras, itemContext)];
  while (content.length > 0) {
    const first = content[0];
    if (!(first instanceof Delimiter && first.isWhitespace)) break;
    content.shift();
  }
  // The bullet takes the place of the first line's indentation.
  const first = content[0];
  if (typeof first === 'string') {
    const leading = /^\s*/.exec(first)?.[0].length ?? 0;
    content[0] = first.slice(Math.min(leading, prefix.length));
  }
  return [prefix, ...content];
}

function renderTocEntry(node: TableOfContentsEntry, context: RenderContext): Fragment[] {
  let text = ' '.repeat(node.indent) + `${node.number}. ` + node.text;
  if (node.tag) {
    const tag = `|${node.tag}|`;
    const padding = Math.max(1, context.width - text.length - tag.length);
    text += ' '.repeat(padding) + tag;
  }
  const { start, end } = DELIMITERS.tocEntry;
  return [start, text, end];
}

/**
 * Render an inline node (or a block node found in inline context) without
 * wrapping
 */
function renderInline(node: DocNode, context: RenderContext): string {
  switch (node.kind) {
    case 'text':
      return node.text;
    case 'inlineSequence':
      return node.children.map(child => renderInline(child, context)).join('');
    case 'emphasis':
      return markup(node.children.map(child => renderInline(child, context)).join(''), '_');
    case 'strong':
      return markup(node.children.map(child => renderInline(child, context)).join(''), '__');
    case 'code':
      return renderCode(node.text, context.tree.parents.isInside(node, 'heading'));
    case 'image':
      return renderImage(node);
    case 'hyperLink':
      return renderHyperLink(node, context);
    default:
      return renderBlock(node, indented(context, 0))
        .filter((fragment): fragment is string => typeof fragment === 'string')
        .join(' ');
  }
}

/**
 * Surround text with a marker, keeping surrounding whitespace outside
 */
function markup(text: string, marker: string): string {
  const match = /^(\s*)([\s\S]*?)(\s*)$/.exec(text);
  if (!match || match[2] === '') {
    return text;
  }
  return `${match[1]}${marker}${match[2]}${marker}${match[3]}`;
}

function renderCode(text: string, inHeading: boolean): string {
  if (inHeading || /^[\s`]*$/.test(text)) {
    return text;
  }
  const quote = CODE_QUOTES.find(q => !text.includes(q));
  return quote ? `${quote}${text}${quote}` : text;
}

function renderImage(node: Image): string {
  const label = node.alt || '(unlabeled image)';
  if (node.reference) {
    return `Image: ${label} (see reference [${node.reference.number}])`;
  }
  return `Image: ${label}`;
}

function renderHyperLink(node: HyperLink, context: RenderContext): string {
  const images = walkTree(node, 'image');
  const text = significant(node.children).length === 1 && images.length === 1
    ? `Image: ${images[0].alt}`
    : node.children.map(child => renderInline(child, context)).join('');
  if (node.reference) {
    return `${text} [${node.reference.number}]`;
  }
  const anchor = externalDocAnchor(node.target, context.externalDocPrefix);
  if (anchor !== undefined && !context.tree.parents.isInside(node, 'heading')) {
    return toTagReference(compact(text), anchor);
  }
  return text;
}
