import { stripCaptionTags } from '@wiki-random-image/core';
import { readPageFile } from '../lib/files.js';
import type { CliIO } from '../lib/types.js';

export interface StripFileResult {
  path: string;
  content: string;
}

/**
 * Print page text with `<randomcaption>` markers removed.
 */
export async function strip(filePaths: string[], io: CliIO): Promise<StripFileResult[]> {
  const results: StripFileResult[] = [];
  for (const path of filePaths) {
    results.push({ path, content: stripCaptionTags(await readPageFile(path, io)) });
  }
  return results;
}
