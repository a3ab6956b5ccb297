import { resolveConfig, type RandomImageConfig, type RandomImageConfigInput } from '../config/config.js';
import type { TagAttributes, TagHook, WikiParser, WikiServices } from '../host/types.js';
import { RandomImage } from '../render/random-image.js';
import type { RandomSource } from '../selection/selection.js';
import { Logger } from '../shared/logger.js';
import { stripCaptionTags } from './strip-caption-tags.js';

export const RANDOM_IMAGE_TAG = 'randomimage';

export interface RandomImageExtensionOptions extends RandomImageConfigInput {
  random?: RandomSource;
}

/**
 * Hook surface the host calls into.
 */
export interface RandomImageExtension {
  readonly config: RandomImageConfig;
  /** Register the `<randomimage>` tag on a freshly created parser. */
  onParserFirstCallInit(parser: WikiParser): void;
  /** Strip caption markers from page text before it is parsed. */
  onParserBeforeStrip(text: string): string;
  renderHook: TagHook;
}

/**
 * Wire the random image tag to host services.
 *
 * @example
 * ```typescript
 * const extension = createRandomImageExtension({ files, revisions, pages }, { miserMode: true });
 * extension.onParserFirstCallInit(parser);
 * ```
 */
export function createRandomImageExtension(
  services: WikiServices,
  options: RandomImageExtensionOptions = {},
): RandomImageExtension {
  const { random, ...configInput } = options;
  const config = resolveConfig(configInput);
  const logger = new Logger(config.enableLogging);

  const renderHook = async (input: string | null, attributes: TagAttributes, parser: WikiParser): Promise<string> => {
    if (config.noCache) {
      parser.getOutput().updateCacheExpiry(0);
    }

    const image = new RandomImage(parser, services, attributes, input, { config, random, logger });
    return image.render();
  };

  return {
    config,
    onParserFirstCallInit(parser) {
      parser.setHook(RANDOM_IMAGE_TAG, renderHook);
    },
    onParserBeforeStrip(text) {
      return stripCaptionTags(text);
    },
    renderHook,
  };
}
