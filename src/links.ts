/**
 * Link target helpers shared by reference extraction and rendering.
 */

export const DEFAULT_EXTERNAL_DOC_PREFIX = 'http://vimdoc.sourceforge.net/htmldoc/';

const ABSOLUTE_URL_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*:\/\//;

export function isAbsoluteUrl(target: string): boolean {
  return ABSOLUTE_URL_PATTERN.test(target);
}

export function isSameDocumentAnchor(target: string): boolean {
  return target.startsWith('#');
}

/**
 * Percent-decode a target, keeping the raw string when it is malformed
 */
export function percentDecode(target: string): string {
  try {
    return decodeURIComponent(target);
  } catch {
    return target;
  }
}

/**
 * Resolve a relative target against the base URL (when given) and
 * percent-decode the result.
 */
export function normalizeTarget(target: string, baseURL?: string): string {
  let resolved = target;
  if (baseURL && !isAbsoluteUrl(target)) {
    try {
      resolved = new URL(target, baseURL).href;
    } catch {
      resolved = target;
    }
  }
  return percentDecode(resolved);
}

/**
 * The help tag a link into the external documentation points at, e.g.
 * `http://vimdoc.sourceforge.net/htmldoc/eval.html#expand()` → `expand()`.
 * Undefined when the target is not such a link or its anchor can't be
 * decoded.
 */
export function externalDocAnchor(target: string, prefix: string | undefined): string | undefined {
  if (!prefix || !target.startsWith(prefix)) {
    return undefined;
  }
  const hash = target.indexOf('#');
  if (hash < 0) {
    return undefined;
  }
  try {
    const anchor = decodeURIComponent(target.slice(hash + 1));
    return anchor === '' ? undefined : anchor;
  } catch {
    return undefined;
  }
}

/**
 * Mark the anchor as a tag reference inside the link text, or mention it
 * after the text when it doesn't occur there.
 */
export function toTagReference(text: string, anchor: string): string {
  if (text.includes(anchor)) {
    return text.replace(anchor, () => `|${anchor}|`);
  }
  return `${text} (see |${anchor}|)`;
}
