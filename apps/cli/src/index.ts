import { readFile } from 'node:fs/promises';
import { describeConfig, render, type RenderResult } from './commands/render.js';
import { strip, type StripFileResult } from './commands/strip.js';
import { parseArgs } from './lib/args.js';
import { CliError, toCliError } from './lib/errors.js';
import { expandGlobs } from './lib/files.js';
import type { CliIO } from './lib/types.js';

export const HELP = `
random-image — render <randomimage> tags in wiki page files

Commands:
  render <files...> --wiki <fixture.json>   Expand <randomimage> tags to thumbnail HTML
  strip <files...>                          Remove <randomcaption> markers from page text

Options:
  --json          Machine-readable output
  --no-cache      Mark rendered pages as non-cacheable
  --miser-mode    Disable the image MIME restriction by default
  --strict        Only pick files with an image MIME type
  --no-strict     Pick any file
  --verbose       Log selection details
  --help          Show this message

Examples:
  random-image render ./pages/*.wiki --wiki ./wiki.json
  random-image strip ./pages/File_Lake.wiki
`;

/**
 * Format render results for human-readable output
 */
function formatRenderResult(result: RenderResult): string {
  const lines: string[] = [];

  for (const file of result.files) {
    if (result.files.length > 1) {
      lines.push(`==> ${file.path} <==`);
    }
    lines.push(file.html);
  }

  const uncached = result.files.filter((file) => !file.cacheable).length;
  lines.push('');
  lines.push(`Rendered ${result.files.length} files, selection ${describeConfig(result)}`);
  if (uncached > 0) {
    lines.push(`${uncached} marked non-cacheable`);
  }

  return lines.join('\n');
}

function formatStripResult(results: StripFileResult[]): string {
  return results.map((result) => result.content).join('\n');
}

async function resolveFiles(command: string, patterns: string[]): Promise<string[]> {
  if (patterns.length === 0) {
    throw new CliError('MISSING_REQUIRED', `Usage: random-image ${command} <files...>`);
  }

  const files = await expandGlobs(patterns);
  if (files.length === 0) {
    throw new CliError('INVALID_ARGUMENT', 'No page files found matching the pattern', { patterns });
  }

  return files;
}

function writeJson(io: CliIO, value: unknown): void {
  io.stdout(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Run the CLI with the given arguments. Returns the process exit code.
 */
export async function run(argv: string[], io: CliIO): Promise<number> {
  let jsonOutput = argv.includes('--json');

  try {
    const args = parseArgs(argv);
    jsonOutput = args.global.output === 'json';

    if (!args.command || args.global.help) {
      io.stdout(HELP);
      return 0;
    }

    switch (args.command) {
      case 'render': {
        const files = await resolveFiles('render', args.positionals);
        const result = await render(files, { ...args.render, verbose: args.global.verbose }, io);

        if (jsonOutput) {
          writeJson(io, { ok: true, command: 'render', data: result });
        } else {
          io.stdout(`${formatRenderResult(result)}\n`);
        }
        return 0;
      }

      case 'strip': {
        const files = await resolveFiles('strip', args.positionals);
        const results = await strip(files, io);

        if (jsonOutput) {
          writeJson(io, { ok: true, command: 'strip', data: results });
        } else {
          io.stdout(`${formatStripResult(results)}\n`);
        }
        return 0;
      }

      default:
        throw new CliError('UNKNOWN_COMMAND', `Unknown command: ${args.command}`, { command: args.command });
    }
  } catch (error) {
    const cliError = toCliError(error);

    if (jsonOutput) {
      writeJson(io, { ok: false, error: { code: cliError.code, message: cliError.message } });
    } else {
      io.stderr(`Error: ${cliError.message}\n`);
      if (cliError.code === 'UNKNOWN_COMMAND') {
        io.stderr(HELP);
      }
    }

    return cliError.exitCode;
  }
}

export function createProcessIO(): CliIO {
  return {
    stdout(message) {
      process.stdout.write(message);
    },
    stderr(message) {
      process.stderr.write(message);
    },
    readFile(path) {
      return readFile(path, 'utf8');
    },
    random() {
      return Math.random();
    },
  };
}
