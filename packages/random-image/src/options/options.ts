import type { TagAttributes } from '../host/types.js';

export type ImageFloat = 'left' | 'right' | 'center';

export const IMAGE_FLOATS: readonly ImageFloat[] = ['left', 'right', 'center'];

/**
 * Settings recognised on a `<randomimage>` tag. Absent fields fall back to host defaults.
 */
export interface RandomImageOptions {
  width?: number;
  float?: ImageFloat;
  choices?: string[];
}

function isImageFloat(value: string): value is ImageFloat {
  return (IMAGE_FLOATS as readonly string[]).includes(value);
}

function lowerCaseKeys(attributes: TagAttributes): Map<string, string> {
  const normalized = new Map<string, string>();
  for (const [key, value] of Object.entries(attributes)) {
    normalized.set(key.toLowerCase(), value);
  }
  return normalized;
}

/**
 * Parse a leading integer the way tag attributes are read: `"100px"` is 100, `"abc"` is NaN.
 */
export function parseLeadingInteger(value: string): number {
  return Number.parseInt(value.trim(), 10);
}

/**
 * Extract the recognised options from raw tag attributes.
 * Invalid values are dropped silently and leave the setting unset. Sizes must be positive safe integers.
 */
export function parseTagOptions(attributes: TagAttributes): RandomImageOptions {
  const attrs = lowerCaseKeys(attributes);
  const options: RandomImageOptions = {};

  const size = attrs.get('size');
  if (size !== undefined) {
    const width = parseLeadingInteger(size);
    if (Number.isSafeInteger(width) && width > 0) {
      options.width = width;
    }
  }

  const float = attrs.get('float');
  if (float !== undefined) {
    const normalized = float.trim().toLowerCase();
    if (isImageFloat(normalized)) {
      options.float = normalized;
    }
  }

  const choices = attrs.get('choices');
  if (choices !== undefined) {
    const names = choices
      .split('|')
      .map((name) => name.trim())
      .filter((name) => name.length > 0);
    if (names.length > 0) {
      options.choices = names;
    }
  }

  return options;
}
