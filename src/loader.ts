import * as fs from 'node:fs';
import * as path from 'node:path';

/** File extensions the loader picks up */
export const SUPPORTED_EXTENSIONS: readonly string[] = ['.html', '.htm', '.md', '.markdown'];

/**
 * Options for loading content files
 */
export interface LoadOptions {
  /** Directory to scan for HTML and Markdown files */
  contentDir: string;
}

/**
 * Result of loading all content files
 */
export interface LoadResult {
  /** Raw content of all files, keyed by document ID (the file name) */
  corpus: Map<string, string>;
  /** Any errors encountered during loading */
  errors: string[];
}

export type SourceFormat = 'html' | 'markdown';

/**
 * Format of a document, judging by its file name
 */
export function sourceFormat(documentId: string): SourceFormat {
  const ext = path.extname(documentId).toLowerCase();
  return ext === '.md' || ext === '.markdown' ? 'markdown' : 'html';
}

/**
 * Name of the help file generated for a document: `guide.md` → `guide.txt`
 */
export function helpFileName(documentId: string): string {
  return `${path.basename(documentId, path.extname(documentId))}.txt`;
}

/**
 * Find all supported files in a directory (non-recursive)
 */
function findContentFiles(dir: string, errors: string[]): string[] {
  const files: string[] = [];

  try {
    const entries = fs.readdirSync(dir, { withFileTypes: true });

    for (const entry of entries) {
      const ext = path.extname(entry.name).toLowerCase();
      if (entry.isFile() && SUPPORTED_EXTENSIONS.includes(ext)) {
        files.push(path.join(dir, entry.name));
      }
    }
  } catch (err) {
    errors.push(`Failed to read directory ${dir}: ${err}`);
  }

  return files.sort();
}

/**
 * Load all HTML and Markdown content files from a directory
 */
export function loadContent(options: LoadOptions): LoadResult {
  const { contentDir } = options;

  const corpus = new Map<string, string>();
  const errors: string[] = [];

  for (const filePath of findContentFiles(contentDir, errors)) {
    const documentId = path.basename(filePath);

    try {
      corpus.set(documentId, fs.readFileSync(filePath, 'utf-8'));
    } catch (err) {
      errors.push(`Failed to read ${documentId}: ${err}`);
    }
  }

  return { corpus, errors };
}
