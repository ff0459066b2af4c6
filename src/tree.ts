import {
  BlockKind,
  ContainerNode,
  Delimiter,
  DocNode,
  Logger,
  NodeKind,
} from './types.js';

const BLOCK_KINDS: ReadonlySet<NodeKind> = new Set<BlockKind>([
  'blockSequence',
  'heading',
  'paragraph',
  'preformatted',
  'list',
  'listItem',
  'table',
  'reference',
  'tocEntry',
]);

/**
 * Start/end delimiters each block kind renders around itself
 */
export interface DelimiterPair {
  start: Delimiter;
  end: Delimiter;
}

const BLOCK_DELIMITERS: DelimiterPair = {
  start: new Delimiter('\n\n'),
  end: new Delimiter('\n\n'),
};

const LINE_DELIMITERS: DelimiterPair = {
  start: new Delimiter('\n'),
  end: new Delimiter('\n'),
};

/** Vim help markers for preformatted text */
const CODE_BLOCK_DELIMITERS: DelimiterPair = {
  start: new Delimiter('\n>\n'),
  end: new Delimiter('\n<\n'),
};

export const DELIMITERS: Readonly<Record<BlockKind, DelimiterPair>> = {
  blockSequence: BLOCK_DELIMITERS,
  heading: BLOCK_DELIMITERS,
  paragraph: BLOCK_DELIMITERS,
  preformatted: CODE_BLOCK_DELIMITERS,
  list: BLOCK_DELIMITERS,
  listItem: BLOCK_DELIMITERS,
  table: BLOCK_DELIMITERS,
  reference: LINE_DELIMITERS,
  tocEntry: LINE_DELIMITERS,
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};

export function isBlock(node: DocNode): boolean {
  return BLOCK_KINDS.has(node.kind);
}

/**
 * True when any of the nodes is block-level
 */
export function hasBlockContent(nodes: readonly DocNode[]): boolean {
  return nodes.some(isBlock);
}

export function isContainer(node: DocNode): node is ContainerNode {
  return 'children' in node;
}

export function childrenOf(node: DocNode): readonly DocNode[] {
  return isContainer(node) ? node.children : [];
}

/**
 * Copy a container node with new children
 */
export function withChildren<T extends ContainerNode>(node: T, children: readonly DocNode[]): T {
  return { ...node, children };
}

/**
 * Wrap nodes in a block or inline sequence depending on their content
 */
export function sequenceOf(children: readonly DocNode[]): DocNode {
  return hasBlockContent(children)
    ? { kind: 'blockSequence', children }
    : { kind: 'inlineSequence', children };
}

export function text(value: string): DocNode {
  return { kind: 'text', text: value };
}

/**
 * All nodes of the subtree in document order (pre-order), optionally
 * filtered by kind.
 */
export function walkTree(root: DocNode): DocNode[];
export function walkTree<K extends NodeKind>(root: DocNode, ...kinds: K[]): Extract<DocNode, { kind: K }>[];
export function walkTree(root: DocNode, ...kinds: NodeKind[]): DocNode[] {
  const ordered: DocNode[] = [];
  const wanted = new Set(kinds);
  const recurse = (node: DocNode): void => {
    if (wanted.size === 0 || wanted.has(node.kind)) {
      ordered.push(node);
    }
    for (const child of childrenOf(node)) {
      recurse(child);
    }
  };
  recurse(root);
  return ordered;
}

/**
 * Rebuild a tree bottom-up. `visit` receives each node after its children
 * were rebuilt, along with the node it was rebuilt from, and returns the
 * replacement. Unchanged subtrees keep their identity.
 */
export function mapTree(node: DocNode, visit: (node: DocNode, original: DocNode) => DocNode): DocNode {
  if (isContainer(node)) {
    let changed = false;
    const children = node.children.map(child => {
      const mapped = mapTree(child, visit);
      if (mapped !== child) changed = true;
      return mapped;
    });
    return visit(changed ? withChildren(node, children) : node, node);
  }
  return visit(node, node);
}

/**
 * Add children at the start and/or end of the root
 */
export function extendRoot(root: DocNode, before: readonly DocNode[], after: readonly DocNode[] = []): DocNode {
  if (root.kind === 'blockSequence') {
    return withChildren(root, [...before, ...root.children, ...after]);
  }
  return { kind: 'blockSequence', children: [...before, root, ...after] };
}

/**
 * Child → parent links for one tree, kept outside the node records.
 */
export class ParentIndex {
  private readonly parents = new Map<DocNode, DocNode>();

  constructor(root: DocNode) {
    const recurse = (node: DocNode): void => {
      for (const child of childrenOf(node)) {
        this.parents.set(child, node);
        recurse(child);
      }
    };
    recurse(root);
  }

  parentOf(node: DocNode): DocNode | undefined {
    return this.parents.get(node);
  }

  /** Ancestors from the parent up to the root */
  ancestorsOf(node: DocNode): DocNode[] {
    const ancestors: DocNode[] = [];
    let current = this.parents.get(node);
    while (current) {
      ancestors.push(current);
      current = this.parents.get(current);
    }
    return ancestors;
  }

  isInside(node: DocNode, kind: NodeKind): boolean {
    return this.ancestorsOf(node).some(ancestor => ancestor.kind === kind);
  }
}

/**
 * A document tree together with its parent links. Passes take one and
 * return a new one.
 */
export interface DocumentTree {
  readonly root: DocNode;
  readonly parents: ParentIndex;
}

/**
 * Link parents for a (possibly rebuilt) root
 */
export function linkParents(root: DocNode): DocumentTree {
  return { root, parents: new ParentIndex(root) };
}
