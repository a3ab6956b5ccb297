import { RandomImageError } from '../errors.js';

/**
 * Process-wide settings of the random image plugin.
 */
export type RandomImageConfig = {
  /** Store picks must be backed by a file with an `image` major MIME type. */
  strict: boolean;
  /** Mark pages using the tag as non-cacheable. */
  noCache: boolean;
  /** Host miser mode: skips costly per-request work. */
  miserMode: boolean;
  enableLogging: boolean;
};

export type RandomImageConfigInput = Partial<RandomImageConfig>;

const CONFIG_KEYS: ReadonlySet<string> = new Set(['strict', 'noCache', 'miserMode', 'enableLogging']);

/**
 * Resolve plugin settings from partial input. `strict` defaults to the inverse of `miserMode`.
 *
 * @throws {RandomImageError} INVALID_CONFIG for unknown keys or non-boolean values
 */
export function resolveConfig(input: RandomImageConfigInput = {}): RandomImageConfig {
  for (const [key, value] of Object.entries(input)) {
    if (!CONFIG_KEYS.has(key)) {
      throw new RandomImageError('INVALID_CONFIG', `Unknown config key "${key}".`, { field: key });
    }
    if (value !== undefined && typeof value !== 'boolean') {
      throw new RandomImageError('INVALID_CONFIG', `${key} must be a boolean, got ${JSON.stringify(value)}.`, {
        field: key,
        value,
      });
    }
  }

  const miserMode = input.miserMode ?? false;

  return {
    strict: input.strict ?? !miserMode,
    noCache: input.noCache ?? false,
    miserMode,
    enableLogging: input.enableLogging ?? false,
  };
}
