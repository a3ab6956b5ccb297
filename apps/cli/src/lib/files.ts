import fg from 'fast-glob';
import { CliError } from './errors.js';
import type { CliIO } from './types.js';

/**
 * Expand glob patterns to file paths. Plain paths are kept as given.
 */
export async function expandGlobs(patterns: string[]): Promise<string[]> {
  const files: string[] = [];

  for (const pattern of patterns) {
    if (fg.isDynamicPattern(pattern)) {
      const matches = await fg.glob(pattern, { absolute: true, onlyFiles: true });
      files.push(...matches.sort());
    } else {
      files.push(pattern);
    }
  }

  return files;
}

export async function readPageFile(path: string, io: CliIO): Promise<string> {
  try {
    return await io.readFile(path);
  } catch (error) {
    throw new CliError('FILE_READ_ERROR', `Unable to read ${path}`, {
      path,
      message: error instanceof Error ? error.message : String(error),
    });
  }
}
