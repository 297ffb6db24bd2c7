import { describe, expect, it } from 'vitest';

import { detectDialect, isBareKindWord, kindForLabel } from '../../src/parser/dialects.js';
import { normalizeSongText, tokenize } from '../../src/parser/tokenize.js';

describe('tokenizer', () => {
  it('emits marker, chord and lyric tokens with 1-based positions', () => {
    const tokens = tokenize('[Verse 1]\nC       G\n  Amazing grace\n', { dialect: 'plain' });

    expect(tokens).toEqual([
      { type: 'marker', line: 1, column: 1, kind: 'verse', name: 'Verse 1' },
      {
        type: 'chords',
        line: 2,
        column: 1,
        raw: 'C       G',
        indent: 0,
        entries: [
          { symbol: 'C', column: 0, annotation: false },
          { symbol: 'G', column: 8, annotation: false }
        ]
      },
      { type: 'lyric', line: 3, column: 3, text: 'Amazing grace', indent: 2 }
    ]);
  });

  it('keeps blank lines between content but drops the trailing newline', () => {
    const tokens = tokenize('one\n\ntwo\n', { dialect: 'classic' });
    expect(tokens.map((token) => token.type)).toEqual(['lyric', 'blank', 'lyric']);
  });

  it('reads plain metadata and repeat hints as directives', () => {
    const tokens = tokenize('#title: Grace\nChorus x2\n(Repeat Chorus)\ngo to Bridge', { dialect: 'plain' });

    expect(tokens.map((token) => (token.type === 'directive' ? [token.key, token.value] : token.type))).toEqual([
      ['title', 'Grace'],
      ['repeat', 'Chorus x2'],
      ['repeat', 'Chorus'],
      ['repeat', 'Bridge']
    ]);
  });

  it('flags broken plain markup as anomalies instead of throwing', () => {
    const tokens = tokenize('[Chorus\n# just a hash', { dialect: 'plain' });

    expect(tokens).toEqual([
      {
        type: 'directive',
        line: 1,
        column: 1,
        raw: '[Chorus',
        key: 'unknown',
        anomaly: "section header is missing its closing ']'"
      },
      {
        type: 'directive',
        line: 2,
        column: 1,
        raw: '# just a hash',
        key: 'unknown',
        anomaly: "metadata line has no 'key: value' form"
      }
    ]);
  });

  it('reads ChordPro directives, section markers and comments', () => {
    const source = ['{title: Hello}', '# ignored', '{soc}', '[G]Sing [D]now', '{eoc}', '{c: softly}', '{chorus}', '{foo}'].join(
      '\n'
    );
    const tokens = tokenize(source, { dialect: 'chordpro' });

    expect(tokens.map((token) => token.line)).toEqual([1, 3, 4, 5, 6, 7, 8]);
    expect(tokens[1]).toEqual({ type: 'marker', line: 3, column: 1, kind: 'chorus' });
    expect(tokens[2]).toEqual({ type: 'lyric', line: 4, column: 1, text: '[G]Sing [D]now', indent: 0 });
    expect(
      tokens.flatMap((token) => (token.type === 'directive' ? [[token.key, token.value ?? null]] : []))
    ).toEqual([
      ['title', 'Hello'],
      ['end', null],
      ['comment', 'softly'],
      ['repeat', 'Chorus'],
      ['unknown', null]
    ]);
  });

  it('never reads chord lines in the classic dialect', () => {
    const tokens = tokenize('C   G\nwords here', { dialect: 'classic' });
    expect(tokens.map((token) => token.type)).toEqual(['lyric', 'lyric']);
  });

  it('normalizes line endings and invisible characters', () => {
    expect(normalizeSongText('\ufeffa\u00a0b\r\nc\rd')).toBe('a b\nc\nd');
  });
});

describe('dialect detection', () => {
  it('sniffs the dialect from its markup', () => {
    expect(detectDialect('{title: X}\n[G]Hi')).toBe('chordpro');
    expect(detectDialect('[Chorus]\nHi there')).toBe('plain');
    expect(detectDialect('C   G\nwords here')).toBe('plain');
    expect(detectDialect('#title: X\nline one\n\nline two')).toBe('classic');
  });

  it('maps section words to part kinds', () => {
    expect(kindForLabel('Refrain 2')).toBe('chorus');
    expect(kindForLabel('Pre-Chorus')).toBe('other');
    expect(kindForLabel('Finale')).toBeUndefined();
    expect(isBareKindWord(' verse ')).toBe(true);
    expect(isBareKindWord('Verse 2')).toBe(false);
  });
});
