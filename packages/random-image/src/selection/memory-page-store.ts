import { MAJOR_MIME_TYPES, type MajorMimeType, type PageRow, type PageStore, type RandomPageQuery } from '../host/types.js';

/**
 * Major part of a MIME type such as `image/png`, or `null` when it is not a known major type.
 */
export function majorMimeOf(mime: string): MajorMimeType | null {
  const major = mime.split('/')[0].trim().toLowerCase();
  return MAJOR_MIME_TYPES.find((candidate) => candidate === major) ?? null;
}

/**
 * A row of the page table as kept by {@link MemoryPageStore}.
 */
export interface StoredPage {
  namespace: number;
  /** Database key. */
  title: string;
  isRedirect: boolean;
  /** Random sort key in [0, 1). */
  random: number;
}

/**
 * A row of the image table as kept by {@link MemoryPageStore}.
 */
export interface StoredImage {
  /** Database key of the file page. */
  name: string;
  majorMime: MajorMimeType;
}

/**
 * In-process page store answering random page queries over plain arrays.
 * Mirrors the page/image join the host database runs.
 */
export class MemoryPageStore implements PageStore {
  private readonly pages: StoredPage[];
  private readonly images = new Map<string, StoredImage>();

  constructor(pages: readonly StoredPage[] = [], images: readonly StoredImage[] = []) {
    this.pages = [...pages].sort((a, b) => a.random - b.random);
    for (const image of images) {
      this.images.set(image.name, image);
    }
  }

  async selectRandomPage(query: RandomPageQuery): Promise<PageRow | null> {
    const match = this.pages.find((page) => this.matches(page, query));
    return match ? { namespace: match.namespace, title: match.title } : null;
  }

  private matches(page: StoredPage, query: RandomPageQuery): boolean {
    if (page.namespace !== query.namespace) return false;
    if (query.excludeRedirects && page.isRedirect) return false;
    if (!(page.random > query.randomAbove)) return false;

    if (query.requireMajorMime) {
      const image = this.images.get(page.title);
      if (!image || image.majorMime !== query.requireMajorMime) return false;
    }

    return true;
  }
}
