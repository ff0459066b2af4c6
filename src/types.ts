/**
 * Block-level node kinds. Block nodes take care of their own indentation
 * and line wrapping.
 */
export type BlockKind =
  | 'blockSequence'
  | 'heading'
  | 'paragraph'
  | 'preformatted'
  | 'list'
  | 'listItem'
  | 'table'
  | 'reference'
  | 'tocEntry';

/**
 * Inline node kinds. Inline nodes are laid out by the nearest enclosing
 * block.
 */
export type InlineKind =
  | 'inlineSequence'
  | 'text'
  | 'hyperLink'
  | 'image'
  | 'code'
  | 'emphasis'
  | 'strong';

export type NodeKind = BlockKind | InlineKind;

export interface BlockSequence {
  readonly kind: 'blockSequence';
  readonly children: readonly DocNode[];
}

export interface Heading {
  readonly kind: 'heading';
  /** 1..6 as parsed, renumbered so the shallowest heading is 1 */
  readonly level: number;
  readonly children: readonly DocNode[];
  /** Help tag, assigned once by the tagging pass */
  readonly tag?: string;
}

export interface Paragraph {
  readonly kind: 'paragraph';
  readonly children: readonly DocNode[];
}

export interface PreformattedText {
  readonly kind: 'preformatted';
  readonly text: string;
}

export interface List {
  readonly kind: 'list';
  readonly ordered: boolean;
  readonly children: readonly DocNode[];
}

export interface ListItem {
  readonly kind: 'listItem';
  readonly children: readonly DocNode[];
}

export interface Table {
  readonly kind: 'table';
  readonly children: readonly DocNode[];
}

/**
 * A numbered external link target, listed in the "References" appendix.
 */
export interface Reference {
  readonly kind: 'reference';
  readonly number: number;
  readonly target: string;
}

/**
 * One line of the generated table of contents.
 */
export interface TableOfContentsEntry {
  readonly kind: 'tocEntry';
  /** Counter of the heading at its own level */
  readonly number: number;
  readonly text: string;
  readonly indent: number;
  readonly tag?: string;
}

export interface InlineSequence {
  readonly kind: 'inlineSequence';
  readonly children: readonly DocNode[];
}

export interface Text {
  readonly kind: 'text';
  readonly text: string;
}

export interface HyperLink {
  readonly kind: 'hyperLink';
  readonly target: string;
  readonly children: readonly DocNode[];
  readonly reference?: Reference;
}

export interface Image {
  readonly kind: 'image';
  readonly src: string;
  readonly alt: string;
  readonly reference?: Reference;
}

export interface CodeFragment {
  readonly kind: 'code';
  readonly text: string;
}

export interface Emphasis {
  readonly kind: 'emphasis';
  readonly children: readonly DocNode[];
}

export interface Strong {
  readonly kind: 'strong';
  readonly children: readonly DocNode[];
}

export type DocNode =
  | BlockSequence
  | Heading
  | Paragraph
  | PreformattedText
  | List
  | ListItem
  | Table
  | Reference
  | TableOfContentsEntry
  | InlineSequence
  | Text
  | HyperLink
  | Image
  | CodeFragment
  | Emphasis
  | Strong;

/** Nodes that own an ordered list of child nodes */
export type ContainerNode = Extract<DocNode, { readonly children: readonly DocNode[] }>;

/**
 * Boundary marker between rendered blocks. Carries the literal text it
 * renders as, but is subject to deduplication and is not content.
 */
export class Delimiter {
  constructor(public readonly text: string) {}

  get isWhitespace(): boolean {
    return this.text.length > 0 && this.text.trim() === '';
  }

  toString(): string {
    return this.text;
  }
}

/** A unit of rendered output */
export type Fragment = string | Delimiter;

/**
 * Minimal logging surface used by the conversion core. `console` satisfies
 * it; the default is silent.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}

/**
 * Read-only view of a parsed markup node, as supplied by the HTML parser.
 * Text nodes have an empty name and carry their decoded string in `text`.
 */
export interface MarkupNode {
  readonly name: string;
  readonly isText: boolean;
  readonly text: string;
  readonly children: readonly MarkupNode[];
  attribute(name: string): string | undefined;
}
