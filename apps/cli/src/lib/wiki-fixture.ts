import { z } from 'zod';
import {
  MemoryPageStore,
  NS_FILE,
  RandomImageError,
  majorMimeOf,
  makeFileTitle,
  type FileRepository,
  type FileTitle,
  type PageStore,
  type RevisionLookup,
  type StoredImage,
  type StoredPage,
  type WikiServices,
} from '@wiki-random-image/core';
import { CliError } from './errors.js';

const pageSchema = z.object({
  title: z.string().min(1),
  namespace: z.number().int().default(NS_FILE),
  text: z.string().optional(),
  redirect: z.boolean().default(false),
  random: z.number().min(0).lt(1).optional(),
  suppressed: z.boolean().default(false),
});

const fileSchema = z.object({
  name: z.string().min(1),
  mime: z.string().refine((mime) => majorMimeOf(mime) !== null, { message: 'Unknown major MIME type' }),
});

export const wikiFixtureSchema = z.object({
  pages: z.array(pageSchema).default([]),
  files: z.array(fileSchema).default([]),
});

export type WikiFixture = z.infer<typeof wikiFixtureSchema>;
type FixturePage = WikiFixture['pages'][number];

function pageKey(namespace: number, title: string): string | null {
  if (namespace !== NS_FILE) return `${namespace}:${title.replace(/ /g, '_')}`;
  const fileTitle = makeFileTitle(title);
  return fileTitle ? `${NS_FILE}:${fileTitle.dbKey}` : null;
}

/**
 * In-process wiki built from a JSON fixture. Serves every host service the tag reads from.
 */
export class FixtureWiki implements FileRepository, RevisionLookup {
  readonly pages: PageStore;
  private readonly pagesByKey = new Map<string, FixturePage>();
  private readonly fileKeys = new Set<string>();

  constructor(fixture: WikiFixture, random: () => number) {
    const storedPages: StoredPage[] = [];
    for (const page of fixture.pages) {
      const key = pageKey(page.namespace, page.title);
      if (!key) {
        throw new CliError('FIXTURE_INVALID', `Invalid page title in wiki fixture: ${page.title}`, { title: page.title });
      }
      this.pagesByKey.set(key, page);
      storedPages.push({
        namespace: page.namespace,
        title: key.slice(key.indexOf(':') + 1),
        isRedirect: page.redirect,
        random: page.random ?? random(),
      });
    }

    const storedImages: StoredImage[] = [];
    for (const file of fixture.files) {
      const title = makeFileTitle(file.name);
      const majorMime = majorMimeOf(file.mime);
      if (!title || !majorMime) {
        throw new CliError('FIXTURE_INVALID', `Invalid file entry in wiki fixture: ${file.name}`, { name: file.name });
      }
      this.fileKeys.add(title.dbKey);
      storedImages.push({ name: title.dbKey, majorMime });
    }

    this.pages = new MemoryPageStore(storedPages, storedImages);
  }

  get services(): WikiServices {
    return { files: this, revisions: this, pages: this.pages };
  }

  async fileExists(title: FileTitle): Promise<boolean> {
    return this.fileKeys.has(title.dbKey);
  }

  async pageExists(title: FileTitle): Promise<boolean> {
    return this.pagesByKey.has(`${NS_FILE}:${title.dbKey}`);
  }

  async getRevisionText(title: FileTitle): Promise<string | null> {
    const page = this.pagesByKey.get(`${NS_FILE}:${title.dbKey}`);
    if (!page) return null;

    if (page.suppressed) {
      throw new RandomImageError('REVISION_ACCESS', `Revision of ${title.prefixedText} is suppressed.`, {
        title: title.prefixedText,
      });
    }

    return page.text ?? null;
  }
}

/**
 * Validate raw fixture JSON.
 *
 * @throws {CliError} FIXTURE_INVALID for malformed JSON or schema violations
 */
export function parseWikiFixture(source: string, path: string): WikiFixture {
  let raw: unknown;
  try {
    raw = JSON.parse(source);
  } catch (error) {
    throw new CliError('FIXTURE_INVALID', `Wiki fixture is not valid JSON: ${path}`, {
      path,
      message: error instanceof Error ? error.message : String(error),
    });
  }

  const result = wikiFixtureSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue.path.join('.');
    throw new CliError('FIXTURE_INVALID', `Wiki fixture ${path} is invalid at ${location || '(root)'}: ${issue.message}`, {
      path,
      issues: result.error.issues.map((entry) => ({ path: entry.path.join('.'), message: entry.message })),
    });
  }

  return result.data;
}
