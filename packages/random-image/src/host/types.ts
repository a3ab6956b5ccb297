import type { FileTitle } from '../title/title.js';

/**
 * Namespace id of file description pages.
 */
export const NS_FILE = 6;

/**
 * Raw tag attributes as handed over by the host parser.
 */
export type TagAttributes = Record<string, string>;

/**
 * Callback the host invokes for every occurrence of a registered tag.
 *
 * @param input - Text between the opening and closing tag, `null` for a self-closing tag.
 */
export type TagHook = (input: string | null, attributes: TagAttributes, parser: WikiParser) => Promise<string>;

/**
 * Output metadata of the page currently being parsed.
 */
export interface ParserOutput {
  /**
   * Lower the cache lifetime of the rendered page. `0` marks it non-cacheable.
   */
  updateCacheExpiry(seconds: number): void;
}

/**
 * Host parser the plugin registers with and delegates markup expansion to.
 */
export interface WikiParser {
  setHook(tag: string, hook: TagHook): void;
  /**
   * Expand embedded wiki markup into HTML within the current parse.
   */
  recursiveTagParse(text: string): Promise<string>;
  getOutput(): ParserOutput;
}

/**
 * Host file repository.
 */
export interface FileRepository {
  /**
   * Whether an uploaded file backs the given title.
   */
  fileExists(title: FileTitle): Promise<boolean>;
}

/**
 * Host revision storage.
 */
export interface RevisionLookup {
  pageExists(title: FileTitle): Promise<boolean>;
  /**
   * Main-slot text of the current revision, `null` when the page has none.
   * Implementations throw `RandomImageError` with code `REVISION_ACCESS` when the content cannot be read.
   */
  getRevisionText(title: FileTitle): Promise<string | null>;
}

/**
 * Row shape returned by a random page query. `title` is a database key.
 */
export interface PageRow {
  namespace: number;
  title: string;
}

export const MAJOR_MIME_TYPES = [
  'image',
  'audio',
  'video',
  'text',
  'application',
  'multipart',
  'message',
  'model',
] as const;

export type MajorMimeType = (typeof MAJOR_MIME_TYPES)[number];

/**
 * A "first page above a random threshold" query against the page table.
 */
export interface RandomPageQuery {
  namespace: number;
  excludeRedirects: boolean;
  /** Only rows whose random sort key is strictly greater than this value match. */
  randomAbove: number;
  orderBy: 'page_random';
  /** When set, the page must be backed by a file of this major MIME type. */
  requireMajorMime?: MajorMimeType;
}

/**
 * Host database access for random page selection.
 */
export interface PageStore {
  selectRandomPage(query: RandomPageQuery): Promise<PageRow | null>;
}

/**
 * Host services the plugin reads from.
 */
export interface WikiServices {
  files: FileRepository;
  revisions: RevisionLookup;
  pages: PageStore;
}
