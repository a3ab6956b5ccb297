import { createRandomImageExtension, type RandomImageConfig } from '@wiki-random-image/core';
import { parseWikiFixture, FixtureWiki } from '../lib/wiki-fixture.js';
import { StandInParser } from '../lib/wiki-parser.js';
import { readPageFile } from '../lib/files.js';
import type { CliIO, RenderFlags } from '../lib/types.js';
import { CliError } from '../lib/errors.js';

export interface RenderFileResult {
  path: string;
  html: string;
  cacheable: boolean;
}

export interface RenderResult {
  strict: boolean;
  files: RenderFileResult[];
}

export interface RenderOptions extends RenderFlags {
  verbose: boolean;
}

/**
 * Render page files through the random image extension against a wiki fixture.
 */
export async function render(filePaths: string[], options: RenderOptions, io: CliIO): Promise<RenderResult> {
  if (!options.wikiPath) {
    throw new CliError('MISSING_REQUIRED', 'render requires --wiki <fixture.json>.');
  }

  const fixture = parseWikiFixture(await readPageFile(options.wikiPath, io), options.wikiPath);
  const wiki = new FixtureWiki(fixture, () => io.random());
  const extension = createRandomImageExtension(wiki.services, {
    strict: options.strict,
    noCache: options.noCache,
    miserMode: options.miserMode,
    enableLogging: options.verbose,
    random: () => io.random(),
  });

  const files: RenderFileResult[] = [];
  for (const path of filePaths) {
    const text = await readPageFile(path, io);
    const parser = new StandInParser();
    extension.onParserFirstCallInit(parser);
    parser.addBeforeStripHook((pageText) => extension.onParserBeforeStrip(pageText));

    const html = await parser.parse(text);
    files.push({ path, html, cacheable: parser.output.cacheable });
  }

  return { strict: extension.config.strict, files };
}

export function describeConfig(config: Pick<RandomImageConfig, 'strict'>): string {
  return config.strict ? 'strict (image files only)' : 'lenient (any file)';
}
