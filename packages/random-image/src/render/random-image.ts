import { readCaption } from '../caption/caption.js';
import type { RandomImageConfig } from '../config/config.js';
import type { TagAttributes, WikiParser, WikiServices } from '../host/types.js';
import { removeMagnifier } from '../html/remove-magnifier.js';
import { buildImageMarkup } from '../markup/markup.js';
import { parseTagOptions, type RandomImageOptions } from '../options/options.js';
import { pickImage, type RandomSource } from '../selection/selection.js';
import { Logger } from '../shared/logger.js';
import type { FileTitle } from '../title/title.js';

export interface RandomImageRenderOptions {
  config: RandomImageConfig;
  random?: RandomSource;
  logger?: Logger;
}

/**
 * Renders a single `<randomimage>` tag occurrence.
 *
 * @example
 * ```typescript
 * const image = new RandomImage(parser, services, { size: '120', float: 'left' }, null, { config });
 * const html = await image.render();
 * ```
 */
export class RandomImage {
  private readonly options: RandomImageOptions;
  private readonly config: RandomImageConfig;
  private readonly random?: RandomSource;
  private readonly logger: Logger;
  private caption: string;

  constructor(
    private readonly parser: WikiParser,
    private readonly services: WikiServices,
    attributes: TagAttributes,
    caption: string | null,
    options: RandomImageRenderOptions,
  ) {
    this.options = parseTagOptions(attributes);
    this.config = options.config;
    this.random = options.random;
    this.logger = options.logger ?? new Logger(this.config.enableLogging);
    this.caption = caption ?? '';
  }

  /**
   * Pick an image and render it as a thumbnail without the magnify overlay.
   *
   * @returns HTML, or an empty string when no image with an existing file was found
   */
  async render(): Promise<string> {
    try {
      return await this.renderImage();
    } catch (error) {
      this.logger.error('Failed to render random image', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private async renderImage(): Promise<string> {
    const title = await pickImage(this.options.choices, this.services.pages, {
      strict: this.config.strict,
      random: this.random,
      logger: this.logger,
    });

    if (!title || !(await this.services.files.fileExists(title))) {
      this.logger.debug('No image to render', { title: title?.prefixedText ?? null });
      return '';
    }

    const markup = await this.buildMarkup(title);
    const html = await this.parser.recursiveTagParse(markup);
    return removeMagnifier(html);
  }

  /**
   * Thumbnail markup for `title` using the tag's options and caption.
   */
  async buildMarkup(title: FileTitle): Promise<string> {
    return buildImageMarkup(title, {
      width: this.options.width,
      float: this.options.float,
      caption: await this.getCaption(title),
    });
  }

  /**
   * The explicit caption, or the one read from the description page. Cached after the first call.
   */
  async getCaption(title: FileTitle): Promise<string> {
    if (!this.caption) {
      this.caption = await readCaption(title, this.services.revisions, this.logger);
    }
    return this.caption;
  }
}
