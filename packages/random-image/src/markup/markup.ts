import type { ImageFloat } from '../options/options.js';
import type { FileTitle } from '../title/title.js';

export interface ImageMarkupParts {
  width?: number;
  float?: ImageFloat;
  caption: string;
}

/**
 * Build thumbnail link markup, e.g. `[[File:Example.png|thumb|100px|left|Caption]]`.
 * Size and alignment are left out when unset.
 */
export function buildImageMarkup(title: FileTitle, parts: ImageMarkupParts): string {
  const segments = [title.prefixedText, 'thumb'];

  if (parts.width !== undefined) {
    segments.push(`${parts.width}px`);
  }
  if (parts.float) {
    segments.push(parts.float);
  }
  segments.push(parts.caption);

  return `[[${segments.join('|')}]]`;
}
