/**
 * Help tag generation for headings.
 */

const OPERATOR_WORDS: ReadonlyArray<[string, string]> = [
  ['+', 'add'],
  ['-', 'sub'],
  ['*', 'mul'],
  ['/', 'div'],
];

const FILLER_WORDS: ReadonlySet<string> = new Set(['a', 'the', 'and', 'some']);

/**
 * Derive the namespace prefix for tags from the help file name:
 * `plugin.txt` → `plugin`, `lpeg-0.10.txt` → `lpeg`.
 */
export function tagPrefix(filename: string | undefined): string {
  if (!filename) {
    return '';
  }
  return filename
    .replace(/\.[A-Za-z]+$/, '')
    .replace(/-\d+(\.\d+)*$/, '');
}

function codeAnchor(text: string): string {
  // Keep the case of identifiers, spell out operators.
  let anchor = text;
  for (const [operator, word] of OPERATOR_WORDS) {
    anchor = anchor.split(operator).join(` ${word} `);
  }
  // Function arguments are not part of the tag.
  return anchor.replace(/\s*\(.*?\)/g, '()');
}

function textAnchor(text: string): string {
  const anchor = text
    .toLowerCase()
    .replace(/\(.*?\)/g, '')
    .replace(/(\w)'(\w)/g, '$1$2')
    .replace(/:\s+/g, ' ');
  return anchor
    .split(/\s+/)
    .filter(token => token !== '' && !FILLER_WORDS.has(token))
    .join(' ');
}

/**
 * Convert text into a help tag. Returns undefined when nothing usable is
 * left of the text.
 */
export function createTag(text: string, prefix: string, isCode: boolean): string | undefined {
  let anchor = (isCode ? codeAnchor(text) : textAnchor(text)).trim();
  if (!/[A-Za-z0-9]/.test(anchor)) {
    return undefined;
  }
  if (prefix && !anchor.toLowerCase().includes(prefix.toLowerCase())) {
    anchor = `${prefix}-${anchor}`;
  }
  return anchor
    .replace(/[^A-Za-z0-9_().:]+/g, '-')
    .replace(/^-+|-+$/g, '');
}
