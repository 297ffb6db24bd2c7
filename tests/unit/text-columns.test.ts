import { describe, expect, it } from 'vitest';

import { isChordSymbol, readChordLine } from '../../src/parser/chord-symbols.js';
import {
  expandTabs,
  measureIndent,
  offsetForColumn,
  visualWidth,
  wordColumns
} from '../../src/parser/text-columns.js';

describe('text columns', () => {
  it('expands tabs to the next tab stop', () => {
    expect(visualWidth('ab\tc', 4)).toBe(5);
    expect(visualWidth('\t', 8, 3)).toBe(5);
    expect(expandTabs('ab\tc', 4)).toBe('ab  c');
    expect(expandTabs('plain', 4)).toBe('plain');
  });

  it('maps visual columns back to character offsets', () => {
    expect(offsetForColumn('Amazing grace', 8, 8)).toBe(8);
    expect(offsetForColumn('Amazing grace', -2, 8)).toBe(0);
    expect(offsetForColumn('Amazing grace', 40, 8)).toBe(13);
    // Column 2 lies inside the tab that spans columns 1 to 3.
    expect(offsetForColumn('a\tb', 2, 4)).toBe(1);
    expect(offsetForColumn('a\tb', 4, 4)).toBe(2);
    expect(offsetForColumn('a\tbc', 2, 4)).toBe(1);
    expect(offsetForColumn('a\tbc', 2, 4, 2)).toBe(2);
  });

  it('measures indentation and word columns', () => {
    expect(measureIndent('\t  G   D', 4)).toEqual({ indent: 6, content: 'G   D' });
    expect(wordColumns('C       G', 8)).toEqual([
      { word: 'C', column: 0 },
      { word: 'G', column: 8 }
    ]);
    expect(wordColumns('C\tG', 8, 2)).toEqual([
      { word: 'C', column: 2 },
      { word: 'G', column: 8 }
    ]);
  });
});

describe('chord symbols', () => {
  it('recognizes common chord spellings', () => {
    for (const chord of ['C', 'Am', 'F#m7', 'Bb', 'Gsus4', 'Cmaj7', 'D/F#', 'E7(b9)', 'Cadd9', 'N.C.']) {
      expect(isChordSymbol(chord)).toBe(true);
    }
    for (const word of ['', 'Amazing', 'H', 'grace', 'Chorus', 'C/H']) {
      expect(isChordSymbol(word)).toBe(false);
    }
  });

  it('reads chord lines and keeps stray words as annotations', () => {
    expect(readChordLine('G | D | Em', 0, 8)).toEqual([
      { symbol: 'G', column: 0, annotation: false },
      { symbol: 'D', column: 4, annotation: false },
      { symbol: 'Em', column: 8, annotation: false }
    ]);
    expect(readChordLine('C G Am F x2', 2, 8)).toEqual([
      { symbol: 'C', column: 2, annotation: false },
      { symbol: 'G', column: 4, annotation: false },
      { symbol: 'Am', column: 6, annotation: false },
      { symbol: 'F', column: 9, annotation: false },
      { symbol: 'x2', column: 11, annotation: true }
    ]);
  });

  it('rejects lines that are mostly words', () => {
    expect(readChordLine('A mighty fortress', 0, 8)).toBeUndefined();
    expect(readChordLine('C D softly now', 0, 8)).toBeUndefined();
    expect(readChordLine('| |', 0, 8)).toBeUndefined();
  });
});
