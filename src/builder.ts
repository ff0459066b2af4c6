import { BlockSequence, DocNode, Logger, MarkupNode } from './types.js';
import { sequenceOf, silentLogger } from './tree.js';

type ParseRule = (element: MarkupNode, simplify: (nodes: readonly MarkupNode[]) => DocNode[]) => DocNode;

const heading: ParseRule = (element, simplify) => ({
  kind: 'heading',
  level: Number(element.name.slice(1)),
  children: simplify(element.children),
});

const code: ParseRule = element => ({ kind: 'code', text: descendantText(element) });

const emphasis: ParseRule = (element, simplify) => ({ kind: 'emphasis', children: simplify(element.children) });

const strong: ParseRule = (element, simplify) => ({ kind: 'strong', children: simplify(element.children) });

const list: ParseRule = (element, simplify) => ({
  kind: 'list',
  ordered: element.name === 'ol',
  children: simplify(element.children),
});

const ignored: ParseRule = () => ({ kind: 'inlineSequence', children: [] });

/**
 * Element name → parse rule. Elements not listed here are simplified into
 * a generic block or inline sequence.
 */
const PARSE_RULES: ReadonlyMap<string, ParseRule> = new Map<string, ParseRule>([
  ['h1', heading],
  ['h2', heading],
  ['h3', heading],
  ['h4', heading],
  ['h5', heading],
  ['h6', heading],
  ['p', (element, simplify) => ({ kind: 'paragraph', children: simplify(element.children) })],
  ['pre', element => ({ kind: 'preformatted', text: trimBlankLines(dedent(descendantText(element))) })],
  ['ul', list],
  ['ol', list],
  ['li', (element, simplify) => ({ kind: 'listItem', children: simplify(element.children) })],
  ['table', (element, simplify) => ({ kind: 'table', children: simplify(element.children) })],
  ['a', (element, simplify) => ({
    kind: 'hyperLink',
    target: element.attribute('href') ?? '',
    children: simplify(element.children),
  })],
  ['img', element => ({
    kind: 'image',
    src: element.attribute('src') ?? '',
    alt: element.attribute('alt') ?? '',
  })],
  ['code', code],
  ['tt', code],
  ['kbd', code],
  ['samp', code],
  ['em', emphasis],
  ['i', emphasis],
  ['strong', strong],
  ['b', strong],
  ['script', ignored],
  ['style', ignored],
  ['noscript', ignored],
  ['template', ignored],
]);

/**
 * All text below a markup node, concatenated verbatim
 */
export function descendantText(node: MarkupNode): string {
  if (node.isText) {
    return node.text;
  }
  return node.children.map(descendantText).join('');
}

/**
 * Remove the leading whitespace shared by all non-blank lines
 */
export function dedent(text: string): string {
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  let margin: string | null = null;
  for (const line of lines) {
    if (line.trim() === '') continue;
    const indent = /^[ \t]*/.exec(line)?.[0] ?? '';
    if (margin === null) {
      margin = indent;
      continue;
    }
    let common = 0;
    while (common < margin.length && margin[common] === indent[common]) common++;
    margin = margin.slice(0, common);
  }
  const width = margin?.length ?? 0;
  return lines.map(line => (line.trim() === '' ? '' : line.slice(width))).join('\n');
}

function trimBlankLines(text: string): string {
  const lines = text.split('\n');
  while (lines.length > 0 && lines[0].trim() === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1].trim() === '') lines.pop();
  return lines.join('\n');
}

/**
 * Map a parsed markup node onto the document tree model. Never throws:
 * unknown elements degrade to sequences that keep their content.
 */
export function buildTree(markup: MarkupNode, logger: Logger = silentLogger): DocNode {
  const simplify = (nodes: readonly MarkupNode[]): DocNode[] => nodes.map(node => buildTree(node, logger));

  if (markup.isText) {
    return { kind: 'text', text: markup.text };
  }
  const rule = PARSE_RULES.get(markup.name);
  if (rule) {
    return rule(markup, simplify);
  }
  const improvised = sequenceOf(simplify(markup.children));
  if (markup.name) {
    logger.debug(`Unsupported element <${markup.name}>, mapped to ${improvised.kind}`);
  }
  return improvised;
}

/**
 * Build the document root, which is always a block sequence
 */
export function buildDocument(markup: MarkupNode, logger: Logger = silentLogger): BlockSequence {
  const root = buildTree(markup, logger);
  if (root.kind === 'blockSequence') {
    return root;
  }
  return { kind: 'blockSequence', children: [root] };
}
