import { describe, it, expect } from 'vitest';
import { requireTitle } from '../test-utils/titles.js';
import { buildImageMarkup } from './markup.js';

const example = requireTitle('File:Example.png');

describe('buildImageMarkup', () => {
  it('includes size, alignment and caption', () => {
    expect(buildImageMarkup(example, { width: 100, float: 'left', caption: 'Hi' })).toBe(
      '[[File:Example.png|thumb|100px|left|Hi]]',
    );
  });

  it('omits unset size and alignment', () => {
    expect(buildImageMarkup(example, { caption: 'Hi' })).toBe('[[File:Example.png|thumb|Hi]]');
  });

  it('keeps alignment without a size', () => {
    expect(buildImageMarkup(example, { float: 'center', caption: '&#32;' })).toBe(
      '[[File:Example.png|thumb|center|&#32;]]',
    );
  });

  it('uses the display form of the title', () => {
    const title = requireTitle('Big_red_barn.jpg');

    expect(buildImageMarkup(title, { width: 250, caption: 'Barn' })).toBe('[[File:Big red barn.jpg|thumb|250px|Barn]]');
  });
});
