import { RandomImageError, type RandomImageErrorCode } from '@wiki-random-image/core';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'MISSING_REQUIRED'
  | 'UNKNOWN_COMMAND'
  | 'FILE_READ_ERROR'
  | 'FIXTURE_INVALID'
  | 'COMMAND_FAILED';

export interface FixtureIssue {
  path: string;
  message: string;
}

/**
 * Shape of `details` carried by each error code.
 */
export interface CliErrorDetailsByCode {
  INVALID_ARGUMENT: { option: string } | { patterns: string[] };
  MISSING_REQUIRED: never;
  UNKNOWN_COMMAND: { command: string };
  FILE_READ_ERROR: { path: string; message: string };
  FIXTURE_INVALID:
    | { path: string; message: string }
    | { path: string; issues: FixtureIssue[] }
    | { title: string }
    | { name: string };
  COMMAND_FAILED: { name: string; pluginCode?: RandomImageErrorCode } | { error: unknown };
}

export class CliError<C extends CliErrorCode = CliErrorCode> extends Error {
  readonly code: C;
  readonly details?: CliErrorDetailsByCode[C];
  readonly exitCode: number;

  constructor(code: C, message: string, details?: CliErrorDetailsByCode[C], exitCode = 1) {
    super(message);
    Object.setPrototypeOf(this, CliError.prototype);
    this.name = 'CliError';
    this.code = code;
    this.details = details;
    this.exitCode = exitCode;
  }
}

/**
 * Normalise anything thrown while running a command. Plugin errors keep their code in `details.pluginCode`.
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;

  if (error instanceof RandomImageError) {
    return new CliError('COMMAND_FAILED', error.message, { name: error.name, pluginCode: error.code });
  }

  if (error instanceof Error) {
    return new CliError('COMMAND_FAILED', error.message, { name: error.name });
  }

  return new CliError('COMMAND_FAILED', 'Unknown error', { error });
}
