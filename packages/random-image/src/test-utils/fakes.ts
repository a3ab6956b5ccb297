import { vi } from 'vitest';
import type { FileRepository, PageStore, ParserOutput, RevisionLookup, WikiParser, WikiServices } from '../host/types.js';

export interface FakeParser extends WikiParser {
  output: ParserOutput;
}

/**
 * Parser whose markup expansion wraps the markup in a thumbnail frame with a magnifier.
 */
export function createFakeParser(): FakeParser {
  const output: ParserOutput = { updateCacheExpiry: vi.fn() };
  return {
    output,
    setHook: vi.fn(),
    recursiveTagParse: vi.fn(
      async (markup: string) =>
        `<div class="thumb"><div class="thumbcaption"><div class="magnify"></div>${markup}</div></div>`,
    ),
    getOutput: vi.fn(() => output),
  };
}

export interface FakeServicesOverrides {
  files?: Partial<FileRepository>;
  revisions?: Partial<RevisionLookup>;
  pages?: Partial<PageStore>;
}

/**
 * Services that know a single image, `Example.png`, with a two-line description.
 */
export function createFakeServices(overrides: FakeServicesOverrides = {}): WikiServices {
  return {
    files: { fileExists: vi.fn(async () => true), ...overrides.files },
    revisions: {
      pageExists: vi.fn(async () => true),
      getRevisionText: vi.fn(async () => 'A caption\nmore'),
      ...overrides.revisions,
    },
    pages: { selectRandomPage: vi.fn(async () => ({ namespace: 6, title: 'Example.png' })), ...overrides.pages },
  };
}
