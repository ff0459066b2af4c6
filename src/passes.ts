import { DocNode, Heading, Logger, Reference, TableOfContentsEntry } from './types.js';
import {
  childrenOf,
  DocumentTree,
  extendRoot,
  isBlock,
  isContainer,
  linkParents,
  mapTree,
  silentLogger,
  text,
  walkTree,
  withChildren,
} from './tree.js';
import { renderInlineText } from './renderer.js';
import { createTag, tagPrefix } from './tags.js';
import {
  externalDocAnchor,
  isAbsoluteUrl,
  isSameDocumentAnchor,
  normalizeTarget,
} from './links.js';

/**
 * Options that influence the tree passes
 */
export interface PassOptions {
  /** Help file name; its basename namespaces generated tags */
  embeddedFilename?: string;
  /** Base URL to resolve relative link targets against */
  baseURL?: string;
  /** Link targets that never become references (e.g. a homepage) */
  ignoredLinkTargets?: ReadonlySet<string>;
  /** Links into this documentation become tag references instead */
  externalDocPrefix?: string;
  /** Text width, used when rendering heading text */
  width?: number;
  logger?: Logger;
}

function syntheticHeading(title: string): Heading {
  return { kind: 'heading', level: 1, children: [text(title)] };
}

/**
 * Shift heading levels so the largest headings have level 1
 */
export function shiftHeadings(tree: DocumentTree): DocumentTree {
  const headings = walkTree(tree.root, 'heading');
  if (headings.length === 0) {
    return tree;
  }
  const minLevel = Math.min(...headings.map(heading => heading.level));
  if (minLevel <= 1) {
    return tree;
  }
  const root = mapTree(tree.root, node => (
    node.kind === 'heading' ? { ...node, level: node.level - (minLevel - 1) } : node
  ));
  return linkParents(root);
}

function isContent(node: DocNode): boolean {
  switch (node.kind) {
    case 'text':
      return node.text.trim() !== '';
    case 'image':
      return node.src !== '' || node.alt !== '';
    case 'code':
    case 'preformatted':
      return node.text !== '';
    case 'reference':
    case 'tocEntry':
      return true;
    default:
      return false;
  }
}

/**
 * Give text that precedes the first heading a heading of its own, so it
 * doesn't end up below the table of contents without a title.
 */
export function insertIntroduction(tree: DocumentTree): DocumentTree {
  const first = walkTree(tree.root).find(node => node.kind === 'heading' || isContent(node));
  if (!first || first.kind === 'heading' || walkTree(tree.root, 'heading').length === 0) {
    return tree;
  }
  return linkParents(extendRoot(tree.root, [syntheticHeading('Introduction')]));
}

/**
 * Number the external targets of hyper links and images. Each distinct
 * target gets one reference; a "References" section listing them is
 * appended to the document.
 */
export function extractReferences(tree: DocumentTree, options: PassOptions = {}): DocumentTree {
  const logger = options.logger ?? silentLogger;
  const ignored = options.ignoredLinkTargets ?? new Set<string>();
  const byTarget = new Map<string, Reference>();
  const assigned = new Map<DocNode, Reference>();

  for (const node of walkTree(tree.root, 'hyperLink', 'image')) {
    const raw = node.kind === 'image' ? node.src : node.target;
    if (!raw || isSameDocumentAnchor(raw) || ignored.has(raw)) {
      continue;
    }
    if (externalDocAnchor(raw, options.externalDocPrefix) !== undefined) {
      continue;
    }
    const target = normalizeTarget(raw, options.baseURL);
    if (ignored.has(target) || !isAbsoluteUrl(target)) {
      logger.info(`Not a reference: ${raw}`);
      continue;
    }
    // A literal URL doesn't need to be repeated in the references.
    if (node.kind === 'hyperLink') {
      const label = renderInlineText(tree, [node], options);
      if (label === raw || label === target) {
        continue;
      }
    }
    let reference = byTarget.get(target);
    if (!reference) {
      reference = { kind: 'reference', number: byTarget.size + 1, target };
      logger.debug(`Extracting reference #${reference.number} to ${target}`);
      byTarget.set(target, reference);
    }
    assigned.set(node, reference);
  }

  if (byTarget.size === 0) {
    return tree;
  }
  const linked = mapTree(tree.root, (node, original) => {
    const reference = assigned.get(original);
    if (reference && (node.kind === 'hyperLink' || node.kind === 'image')) {
      return { ...node, reference };
    }
    return node;
  });
  const root = extendRoot(linked, [], [syntheticHeading('References'), ...byTarget.values()]);
  return linkParents(root);
}

/**
 * Assign a unique help tag to each heading, preferring the text of code
 * fragments in the heading over the heading text itself. When every
 * candidate is taken the heading stays untagged.
 */
export function tagHeadings(tree: DocumentTree, options: PassOptions = {}): DocumentTree {
  const logger = options.logger ?? silentLogger;
  const prefix = tagPrefix(options.embeddedFilename);
  const used = new Set<string>();
  const tags = new Map<DocNode, string>();

  for (const heading of walkTree(tree.root, 'heading')) {
    const headingText = renderInlineText(tree, heading.children, options);
    const candidates = [
      ...walkTree(heading, 'code').map(code => createTag(code.text, prefix, true)),
      createTag(headingText, prefix, false),
    ].filter((tag): tag is string => tag !== undefined && tag !== '');
    const tag = candidates.find(candidate => !used.has(candidate));
    if (tag) {
      used.add(tag);
      tags.set(heading, tag);
    } else if (candidates.length > 0) {
      logger.info(`Tag ${candidates[candidates.length - 1]} already in use, heading "${headingText}" left untagged`);
    }
  }

  const root = mapTree(tree.root, (node, original) => {
    const tag = tags.get(original);
    return tag && node.kind === 'heading' ? { ...node, tag } : node;
  });
  return linkParents(root);
}

/**
 * Prepend a "Contents" section listing all headings with their numbers
 * and tags
 */
export function generateTableOfContents(tree: DocumentTree, options: PassOptions = {}): DocumentTree {
  const entries: TableOfContentsEntry[] = [];
  let counters: number[] = [];
  for (const heading of walkTree(tree.root, 'heading')) {
    // Forget the counters of deeper levels, then make room for this one.
    counters = counters.slice(0, heading.level);
    while (counters.length < heading.level) {
      counters.push(1);
    }
    entries.push({
      kind: 'tocEntry',
      number: counters[heading.level - 1],
      text: renderInlineText(tree, heading.children, options),
      indent: heading.level,
      tag: heading.tag,
    });
    counters[heading.level - 1] += 1;
  }
  if (entries.length === 0) {
    return tree;
  }
  const root = extendRoot(tree.root, [
    syntheticHeading('Contents'),
    { kind: 'blockSequence', children: entries },
  ]);
  return linkParents(root);
}

function hasContent(node: DocNode): boolean {
  return isContent(node) || childrenOf(node).some(hasContent);
}

function prune(node: DocNode): DocNode | undefined {
  if (isBlock(node) && !hasContent(node)) {
    return undefined;
  }
  if (!isContainer(node)) {
    return node;
  }
  const children: DocNode[] = [];
  for (const child of node.children) {
    const kept = prune(child);
    if (kept) children.push(kept);
  }
  const unchanged = children.length === node.children.length
    && children.every((child, i) => child === node.children[i]);
  return unchanged ? node : withChildren(node, children);
}

/**
 * Remove block nodes without any content. Inline nodes stay, so the
 * whitespace between inline elements survives.
 */
export function pruneEmptyNodes(tree: DocumentTree): DocumentTree {
  const root: DocNode = prune(tree.root) ?? { kind: 'blockSequence', children: [] };
  return root === tree.root ? tree : linkParents(root);
}

/**
 * Run all passes in order over a freshly built tree
 */
export function runPasses(root: DocNode, options: PassOptions = {}): DocumentTree {
  let tree = linkParents(root);
  tree = shiftHeadings(tree);
  // The References heading counts when deciding on an introduction.
  tree = extractReferences(tree, options);
  tree = insertIntroduction(tree);
  tree = tagHeadings(tree, options);
  tree = generateTableOfContents(tree, options);
  return pruneEmptyNodes(tree);
}
