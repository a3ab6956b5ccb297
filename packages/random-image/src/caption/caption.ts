import type { RevisionLookup } from '../host/types.js';
import { Logger } from '../shared/logger.js';
import type { FileTitle } from '../title/title.js';

/**
 * Caption used when nothing better is available. An encoded space keeps the
 * caption slot of the thumbnail markup non-empty.
 */
export const CAPTION_PLACEHOLDER = '&#32;';

const CAPTION_TAG = /<randomcaption>(.*?)<\/randomcaption>/i;
const FIRST_LINE = /^([^\n]*?)\r?\n/;

/**
 * Derive a caption from description page text.
 *
 * Order: the first `<randomcaption>` element, then the first line, then the whole text,
 * then {@link CAPTION_PLACEHOLDER} for empty text.
 */
export function extractCaption(text: string): string {
  const tagged = CAPTION_TAG.exec(text);
  if (tagged) return tagged[1];

  const firstLine = FIRST_LINE.exec(text);
  if (firstLine) return firstLine[1];

  return text || CAPTION_PLACEHOLDER;
}

/**
 * Read the caption for `title` from its description page. Read failures fall back to the placeholder.
 */
export async function readCaption(
  title: FileTitle,
  revisions: RevisionLookup,
  logger: Logger = new Logger(false),
): Promise<string> {
  if (!(await revisions.pageExists(title))) {
    return CAPTION_PLACEHOLDER;
  }

  let text = '';
  try {
    text = (await revisions.getRevisionText(title)) ?? '';
  } catch (error) {
    logger.warn('Failed to read description page, using placeholder caption', {
      title: title.prefixedText,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  return extractCaption(text);
}
