/** Default width of generated help files */
export const TEXT_WIDTH = 79;

/** Indentation step for nested blocks */
export const SHIFT_WIDTH = 2;

/**
 * Collapse runs of whitespace into single spaces and trim both ends
 */
export function compact(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Re-flow text into lines of at most `width` characters, each prefixed by
 * `prefix`. A long word containing a tag reference may stick out instead
 * of being pushed to the next line, and is never broken; other words
 * longer than the width are broken.
 */
export function wrapText(text: string, width: number, prefix = ''): string {
  const lines: string[] = [];
  let line = '';
  for (const word of compact(text).split(' ').filter(Boolean)) {
    const separator = /[.?!]$/.test(line) && /^[A-Z]/.test(word) ? '  ' : ' ';
    const prospective = line.length + separator.length + word.length;
    const isTagged = word.includes('|');
    const mayOverflow = isTagged
      && word.length >= width / 3
      && line.length < width / 0.8
      && prospective < width * 1.2;
    if (line !== '' && (prospective <= width || mayOverflow)) {
      line += separator + word;
      continue;
    }
    if (line !== '') {
      lines.push(line);
    }
    line = word;
    while (!isTagged && width > 0 && line.length > width) {
      lines.push(line.slice(0, width));
      line = line.slice(width);
    }
  }
  if (line !== '') {
    lines.push(line);
  }
  return lines.map(l => prefix + l).join('\n');
}
