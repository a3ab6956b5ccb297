import { describe, it, expect } from 'vitest';
import { fileTitleFromRow, makeFileTitle } from './title.js';

describe('makeFileTitle', () => {
  it('builds the prefixed and database forms', () => {
    expect(makeFileTitle('Sunset over hills.jpg')).toEqual({
      namespace: 6,
      dbKey: 'Sunset_over_hills.jpg',
      text: 'Sunset over hills.jpg',
      prefixedText: 'File:Sunset over hills.jpg',
    });
  });

  it('strips File: and Image: prefixes', () => {
    expect(makeFileTitle('File:Example.png')?.prefixedText).toBe('File:Example.png');
    expect(makeFileTitle('image:Example.png')?.prefixedText).toBe('File:Example.png');
  });

  it('normalizes underscores, whitespace and first-letter case', () => {
    expect(makeFileTitle('  red__apple  big.png ')?.text).toBe('Red apple big.png');
  });

  it('rejects empty names', () => {
    expect(makeFileTitle('')).toBeNull();
    expect(makeFileTitle('   ')).toBeNull();
    expect(makeFileTitle('File:')).toBeNull();
  });

  it('rejects names with illegal characters', () => {
    expect(makeFileTitle('A[1].png')).toBeNull();
    expect(makeFileTitle('A#b.png')).toBeNull();
    expect(makeFileTitle('A<b>.png')).toBeNull();
  });
});

describe('fileTitleFromRow', () => {
  it('reads database keys', () => {
    expect(fileTitleFromRow({ namespace: 6, title: 'Blue_sky.png' })?.prefixedText).toBe('File:Blue sky.png');
  });

  it('ignores rows from other namespaces', () => {
    expect(fileTitleFromRow({ namespace: 0, title: 'Main_Page' })).toBeNull();
  });
});
