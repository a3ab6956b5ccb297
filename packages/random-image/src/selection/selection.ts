import { NS_FILE, type PageStore, type RandomPageQuery } from '../host/types.js';
import { Logger } from '../shared/logger.js';
import { fileTitleFromRow, makeFileTitle, type FileTitle } from '../title/title.js';

/**
 * Source of uniformly distributed numbers in [0, 1).
 */
export type RandomSource = () => number;

export interface PickOptions {
  /** Require store picks to be backed by an image file. */
  strict: boolean;
  random?: RandomSource;
  logger?: Logger;
}

/**
 * Pick one name uniformly from the candidate list. A single entry is returned without drawing.
 *
 * @returns The title of the chosen name, or `null` for an empty list or an invalid name.
 */
export function pickFromChoices(choices: readonly string[], random: RandomSource = Math.random): FileTitle | null {
  if (choices.length === 0) return null;

  if (choices.length === 1) return makeFileTitle(choices[0]);

  const index = Math.min(Math.floor(random() * choices.length), choices.length - 1);
  return makeFileTitle(choices[index]);
}

/**
 * Build the query for the first non-redirect file page whose random key exceeds `randomAbove`.
 *
 * Rows are matched by `page_random > randomAbove` ordered by `page_random`, so a page's chance of
 * being picked is proportional to the gap below its key, and a draw above the highest key matches
 * nothing. Callers retry once on an empty result; the bias itself is kept.
 */
export function buildRandomPageQuery(randomAbove: number, strict: boolean): RandomPageQuery {
  const query: RandomPageQuery = {
    namespace: NS_FILE,
    excludeRedirects: true,
    randomAbove,
    orderBy: 'page_random',
  };

  if (strict) {
    query.requireMajorMime = 'image';
  }

  return query;
}

/**
 * Pick a random file page from the store, running the query a second time when the first draw misses.
 */
export async function pickFromStore(store: PageStore, options: PickOptions): Promise<FileTitle | null> {
  const random = options.random ?? Math.random;
  const logger = options.logger ?? new Logger(false);

  for (let attempt = 1; attempt <= 2; attempt++) {
    const query = buildRandomPageQuery(random(), options.strict);
    const row = await store.selectRandomPage(query);
    const title = row ? fileTitleFromRow(row) : null;

    if (title) {
      logger.debug('Picked image from store', { title: title.prefixedText, attempt });
      return title;
    }

    logger.debug('Random page query matched nothing', { randomAbove: query.randomAbove, attempt });
  }

  return null;
}

/**
 * Pick an image title: from the candidate list when one is given, otherwise from the store.
 */
export async function pickImage(
  choices: readonly string[] | undefined,
  store: PageStore,
  options: PickOptions,
): Promise<FileTitle | null> {
  if (choices && choices.length > 0) {
    options.logger?.debug('Picking image from choices', { count: choices.length });
    return pickFromChoices(choices, options.random);
  }

  return pickFromStore(store, options);
}
