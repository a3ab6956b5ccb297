import { NS_FILE, type PageRow } from '../host/types.js';

export const FILE_NAMESPACE_PREFIX = 'File';

const NAMESPACE_ALIASES = /^\s*(?:file|image)\s*:/i;
const ILLEGAL_TITLE_CHARS = /[#<>[\]{}|\u0000-\u001f\u007f]/;

/**
 * Title of a page in the file namespace.
 */
export interface FileTitle {
  readonly namespace: typeof NS_FILE;
  /** Database form, words joined by underscores. */
  readonly dbKey: string;
  /** Display form, words joined by spaces. */
  readonly text: string;
  /** Display form with the namespace prefix, e.g. `File:Example.png`. */
  readonly prefixedText: string;
}

function fromNormalizedText(text: string): FileTitle {
  return {
    namespace: NS_FILE,
    dbKey: text.replace(/ /g, '_'),
    text,
    prefixedText: `${FILE_NAMESPACE_PREFIX}:${text}`,
  };
}

/**
 * Build a file title from a user supplied name.
 *
 * Accepts names with or without a `File:`/`Image:` prefix, collapses whitespace and
 * underscores, and upper-cases the first character.
 *
 * @returns The title, or `null` when the name is empty or contains characters titles cannot hold.
 */
export function makeFileTitle(name: string): FileTitle | null {
  const text = name.replace(NAMESPACE_ALIASES, '').replace(/[\s_]+/g, ' ').trim();

  if (!text || ILLEGAL_TITLE_CHARS.test(text)) {
    return null;
  }

  return fromNormalizedText(text.charAt(0).toUpperCase() + text.slice(1));
}

/**
 * Build a file title from a page row. Rows outside the file namespace yield `null`.
 */
export function fileTitleFromRow(row: PageRow): FileTitle | null {
  if (row.namespace !== NS_FILE) return null;
  return makeFileTitle(row.title);
}
