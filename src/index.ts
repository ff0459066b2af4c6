export * from './types.js';
export type { DocumentTree } from './tree.js';
export {
  DELIMITERS,
  ParentIndex,
  linkParents,
  mapTree,
  walkTree,
} from './tree.js';
export { buildDocument, buildTree } from './builder.js';
export type { PassOptions } from './passes.js';
export {
  extractReferences,
  generateTableOfContents,
  insertIntroduction,
  pruneEmptyNodes,
  runPasses,
  shiftHeadings,
  tagHeadings,
} from './passes.js';
export type { RenderOptions } from './renderer.js';
export { renderDocument, renderInlineText } from './renderer.js';
export { deduplicateDelimiters } from './delimiters.js';
export { createTag, tagPrefix } from './tags.js';
export { SHIFT_WIDTH, TEXT_WIDTH, compact, wrapText } from './wrap.js';
export type { ConvertOptions } from './convert.js';
export {
  DEFAULT_MODELINE,
  assembleOutput,
  convert,
  convertHtml,
  convertMarkdown,
  convertText,
} from './convert.js';
export { markdownToHtml, parseHtml, toMarkupNode } from './parser.js';
export { ConfigError, ConversionError, RenderError, SelectorError } from './errors.js';
