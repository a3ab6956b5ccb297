/**
 * `<randomimage>` tag for wiki hosts: picks a random file and renders it as a captioned thumbnail.
 */

export * from './host/types.js';
export { RandomImageError, type RandomImageErrorCode } from './errors.js';
export { Logger } from './shared/logger.js';
export { resolveConfig, type RandomImageConfig, type RandomImageConfigInput } from './config/config.js';
export {
  parseTagOptions,
  parseLeadingInteger,
  IMAGE_FLOATS,
  type ImageFloat,
  type RandomImageOptions,
} from './options/options.js';
export { makeFileTitle, fileTitleFromRow, FILE_NAMESPACE_PREFIX, type FileTitle } from './title/title.js';
export {
  pickFromChoices,
  pickFromStore,
  pickImage,
  buildRandomPageQuery,
  type PickOptions,
  type RandomSource,
} from './selection/selection.js';
export { MemoryPageStore, majorMimeOf, type StoredPage, type StoredImage } from './selection/memory-page-store.js';
export { extractCaption, readCaption, CAPTION_PLACEHOLDER } from './caption/caption.js';
export { buildImageMarkup, type ImageMarkupParts } from './markup/markup.js';
export { removeMagnifier } from './html/remove-magnifier.js';
export { stripCaptionTags } from './hooks/strip-caption-tags.js';
export { RandomImage, type RandomImageRenderOptions } from './render/random-image.js';
export {
  createRandomImageExtension,
  RANDOM_IMAGE_TAG,
  type RandomImageExtension,
  type RandomImageExtensionOptions,
} from './hooks/extension.js';
