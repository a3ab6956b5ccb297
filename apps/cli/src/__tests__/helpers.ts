import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { run } from '../index.js';
import type { CliIO } from '../lib/types.js';

export type RunResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export const fixturePath = (relative: string): string =>
  fileURLToPath(new URL(`./fixtures/${relative}`, import.meta.url));

export const WIKI_FIXTURE = fixturePath('wiki.json');

export interface TestIOOptions {
  random?: number;
  files?: Record<string, string>;
}

export function createTestIO(options: TestIOOptions = {}): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];

  return {
    out,
    err,
    stdout(message) {
      out.push(message);
    },
    stderr(message) {
      err.push(message);
    },
    async readFile(path) {
      const virtual = options.files?.[path];
      return virtual ?? readFile(path, 'utf8');
    },
    random() {
      return options.random ?? 0.3;
    },
  };
}

export async function runCli(args: string[], options: TestIOOptions = {}): Promise<RunResult> {
  const io = createTestIO(options);
  const code = await run(args, io);
  return { code, stdout: io.out.join(''), stderr: io.err.join('') };
}
