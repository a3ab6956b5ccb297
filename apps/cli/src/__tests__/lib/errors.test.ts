import { RandomImageError } from '@wiki-random-image/core';
import { describe, expect, test } from 'vitest';
import { CliError, toCliError } from '../../lib/errors.js';

describe('toCliError', () => {
  test('passes CliError through', () => {
    const error = new CliError('FILE_READ_ERROR', 'Unable to read a.wiki');

    expect(toCliError(error)).toBe(error);
  });

  test('wraps plain errors as COMMAND_FAILED', () => {
    const mapped = toCliError(new TypeError('bad input'));

    expect(mapped).toBeInstanceOf(CliError);
    expect(mapped.code).toBe('COMMAND_FAILED');
    expect(mapped.message).toBe('bad input');
    expect(mapped.details).toEqual({ name: 'TypeError' });
    expect(mapped.exitCode).toBe(1);
  });

  test('keeps the plugin error code', () => {
    const mapped = toCliError(new RandomImageError('INVALID_CONFIG', 'noCache must be a boolean, got "yes".'));

    expect(mapped.code).toBe('COMMAND_FAILED');
    expect(mapped.message).toBe('noCache must be a boolean, got "yes".');
    expect(mapped.details).toEqual({ name: 'RandomImageError', pluginCode: 'INVALID_CONFIG' });
  });

  test('carries typed details', () => {
    const error = new CliError('FILE_READ_ERROR', 'Unable to read a.wiki', { path: 'a.wiki', message: 'ENOENT' });

    expect(error.details).toEqual({ path: 'a.wiki', message: 'ENOENT' });
    expect(error).toBeInstanceOf(Error);
  });

  test('wraps non-error values', () => {
    expect(toCliError('boom')).toMatchObject({ code: 'COMMAND_FAILED', message: 'Unknown error', details: { error: 'boom' } });
  });
});
