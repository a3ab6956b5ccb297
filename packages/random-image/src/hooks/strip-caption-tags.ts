const CAPTION_MARKERS = /<\/?randomcaption>/gi;

/**
 * Remove `<randomcaption>` markers from page text so they do not show up
 * when a description page is viewed directly. The enclosed text is kept.
 */
export function stripCaptionTags(text: string): string {
  return text.replace(CAPTION_MARKERS, '');
}
