import { describe, expect, test } from 'vitest';
import { parseArgs } from '../../lib/args.js';
import { CliError } from '../../lib/errors.js';

describe('parseArgs', () => {
  test('splits command, files and flags', () => {
    expect(parseArgs(['render', 'a.wiki', '--wiki', 'wiki.json', 'b.wiki', '--no-cache', '--json'])).toEqual({
      command: 'render',
      positionals: ['a.wiki', 'b.wiki'],
      global: { output: 'json', help: false, verbose: false },
      render: { wikiPath: 'wiki.json', noCache: true, miserMode: false },
    });
  });

  test('accepts --wiki=<path>', () => {
    expect(parseArgs(['render', '--wiki=fixture.json']).render.wikiPath).toBe('fixture.json');
  });

  test('lets the last strict flag win', () => {
    expect(parseArgs(['render', '--strict', '--no-strict']).render.strict).toBe(false);
    expect(parseArgs(['render', '--miser-mode', '--strict']).render).toEqual({
      noCache: false,
      miserMode: true,
      strict: true,
    });
  });

  test('requires a value for --wiki', () => {
    expect(() => parseArgs(['render', '--wiki'])).toThrow(CliError);
    expect(() => parseArgs(['render', '--wiki', '--json'])).toThrow('--wiki requires a fixture path.');
  });

  test('rejects unknown options', () => {
    expect(() => parseArgs(['render', '-x'])).toThrow('Unknown option: -x');
  });
});
