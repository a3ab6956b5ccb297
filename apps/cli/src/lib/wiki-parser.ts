import {
  IMAGE_FLOATS,
  makeFileTitle,
  parseLeadingInteger,
  type ImageFloat,
  type ParserOutput,
  type TagAttributes,
  type TagHook,
  type WikiParser,
} from '@wiki-random-image/core';

export type BeforeStripHook = (text: string) => string;

/**
 * Parser output that records the cache lifetime requested by tag hooks.
 */
export class PageOutput implements ParserOutput {
  cacheExpiry: number | null = null;

  updateCacheExpiry(seconds: number): void {
    this.cacheExpiry = this.cacheExpiry === null ? seconds : Math.min(this.cacheExpiry, seconds);
  }

  get cacheable(): boolean {
    return this.cacheExpiry !== 0;
  }
}

const ATTRIBUTE = /([\w-]+)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/g;
const FILE_LINK = /\[\[\s*(?:file|image)\s*:([^|\]]+)((?:\|[^\]]*)?)\]\]/gi;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Parse the attribute section of an extension tag. Names are lower-cased.
 */
export function parseTagAttributes(source: string): TagAttributes {
  const attributes: TagAttributes = {};
  for (const match of source.matchAll(ATTRIBUTE)) {
    attributes[match[1].toLowerCase()] = match[2] ?? match[3] ?? match[4] ?? '';
  }
  return attributes;
}

function isImageFloat(value: string): value is ImageFloat | 'none' {
  return value === 'none' || (IMAGE_FLOATS as readonly string[]).includes(value);
}

/**
 * Expand `[[File:…]]` links into thumbnail HTML the way the host renders them,
 * magnify overlay included.
 */
export function renderFileLinks(text: string): string {
  return text.replace(FILE_LINK, (link: string, name: string, parameters: string) => {
    const title = makeFileTitle(name);
    if (!title) return link;

    let thumb = false;
    let width: number | undefined;
    let float: ImageFloat | 'none' | undefined;
    let caption = '';

    for (const part of parameters.split('|').slice(1)) {
      const option = part.trim().toLowerCase();
      if (option === 'thumb' || option === 'thumbnail') {
        thumb = true;
      } else if (/^\d+px$/.test(option)) {
        width = parseLeadingInteger(option);
      } else if (isImageFloat(option)) {
        float = option;
      } else {
        caption = part;
      }
    }

    const href = `/wiki/${encodeURI(title.prefixedText.replace(/ /g, '_'))}`;
    const src = `/images/${encodeURI(title.dbKey)}`;
    const widthAttr = width !== undefined ? ` width="${width}"` : '';
    const image = `<a href="${href}" class="image"><img alt="" src="${src}"${widthAttr} class="thumbimage"></a>`;

    if (!thumb) return image;

    const align = float === 'center' ? 'none' : (float ?? 'right');
    const frame =
      `<div class="thumb t${align}"><div class="thumbinner">${image}` +
      `<div class="thumbcaption"><div class="magnify"><a href="${href}" class="internal" title="Enlarge"></a></div>` +
      `${caption}</div></div></div>`;

    return float === 'center' ? `<div class="center">${frame}</div>` : frame;
  });
}

/**
 * Minimal host parser: runs before-strip hooks, expands registered extension tags and
 * renders file links. Everything else in the page text is passed through.
 */
export class StandInParser implements WikiParser {
  readonly output = new PageOutput();
  private readonly hooks = new Map<string, TagHook>();
  private readonly beforeStripHooks: BeforeStripHook[] = [];

  setHook(tag: string, hook: TagHook): void {
    this.hooks.set(tag.toLowerCase(), hook);
  }

  addBeforeStripHook(hook: BeforeStripHook): void {
    this.beforeStripHooks.push(hook);
  }

  getOutput(): PageOutput {
    return this.output;
  }

  async recursiveTagParse(text: string): Promise<string> {
    return renderFileLinks(text);
  }

  /**
   * Parse a full page.
   */
  async parse(text: string): Promise<string> {
    let result = this.beforeStripHooks.reduce((current, hook) => hook(current), text);

    for (const [tag, hook] of this.hooks) {
      result = await this.expandTag(result, tag, hook);
    }

    return result;
  }

  private async expandTag(text: string, tag: string, hook: TagHook): Promise<string> {
    const name = escapeRegExp(tag);
    const pattern = new RegExp(`<${name}(\\s[^>]*?)?(?:\\s*/>|>([\\s\\S]*?)</${name}\\s*>)`, 'gi');

    let output = '';
    let lastIndex = 0;
    for (const match of text.matchAll(pattern)) {
      const start = match.index ?? 0;
      output += text.slice(lastIndex, start);
      output += await hook(match[2] ?? null, parseTagAttributes(match[1] ?? ''), this);
      lastIndex = start + match[0].length;
    }

    return output + text.slice(lastIndex);
  }
}
