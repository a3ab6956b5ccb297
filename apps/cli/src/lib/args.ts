import { CliError } from './errors.js';
import type { GlobalOptions, RenderFlags } from './types.js';

export interface ParsedArgs {
  command?: string;
  positionals: string[];
  global: GlobalOptions;
  render: RenderFlags;
}

const BOOLEAN_FLAGS = new Set(['--json', '--help', '-h', '--verbose', '--no-cache', '--miser-mode', '--strict', '--no-strict']);

/**
 * Split argv into the command, its positional arguments and the known flags.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const global: GlobalOptions = { output: 'pretty', help: false, verbose: false };
  const render: RenderFlags = { noCache: false, miserMode: false };

  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index];

    if (arg === '--wiki') {
      const value = argv[index + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new CliError('MISSING_REQUIRED', '--wiki requires a fixture path.');
      }
      render.wikiPath = value;
      index++;
      continue;
    }

    if (arg.startsWith('--wiki=')) {
      render.wikiPath = arg.slice('--wiki='.length);
      continue;
    }

    if (BOOLEAN_FLAGS.has(arg)) {
      switch (arg) {
        case '--json':
          global.output = 'json';
          break;
        case '--help':
        case '-h':
          global.help = true;
          break;
        case '--verbose':
          global.verbose = true;
          break;
        case '--no-cache':
          render.noCache = true;
          break;
        case '--miser-mode':
          render.miserMode = true;
          break;
        case '--strict':
          render.strict = true;
          break;
        case '--no-strict':
          render.strict = false;
          break;
      }
      continue;
    }

    if (arg.startsWith('-')) {
      throw new CliError('INVALID_ARGUMENT', `Unknown option: ${arg}`, { option: arg });
    }

    positionals.push(arg);
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, global, render };
}
