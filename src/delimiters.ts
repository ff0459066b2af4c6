import { Delimiter, Fragment } from './types.js';

/**
 * Which of two adjacent delimiters to drop, or undefined to keep both.
 */
function redundant(first: Delimiter, second: Delimiter): 0 | 1 | undefined {
  if (first.isWhitespace && !second.isWhitespace) return 0;
  if (second.isWhitespace && !first.isWhitespace) return 1;
  if (first.text.length < second.text.length) return 0;
  if (first.text.length > second.text.length) return 1;
  if (first.isWhitespace) return 0;
  return undefined;
}

/**
 * Collapse runs of adjacent block delimiters into the most significant one
 * and strip whitespace delimiters from both ends of the output.
 */
export function deduplicateDelimiters(fragments: readonly Fragment[]): Fragment[] {
  const output = [...fragments];
  let i = 0;
  while (i < output.length - 1) {
    const first = output[i];
    const second = output[i + 1];
    if (first instanceof Delimiter && second instanceof Delimiter) {
      const drop = redundant(first, second);
      if (drop !== undefined) {
        output.splice(i + drop, 1);
        // The survivor may now be redundant next to its left neighbour.
        i = Math.max(0, i - 1);
        continue;
      }
    }
    i++;
  }
  while (output.length > 0 && isWhitespaceDelimiter(output[0])) {
    output.shift();
  }
  while (output.length > 0 && isWhitespaceDelimiter(output[output.length - 1])) {
    output.pop();
  }
  return output;
}

function isWhitespaceDelimiter(fragment: Fragment): boolean {
  return fragment instanceof Delimiter && fragment.isWhitespace;
}
