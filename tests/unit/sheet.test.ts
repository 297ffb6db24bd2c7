import { describe, expect, it } from 'vitest';

import type { LyricLine } from '../../src/core/song.js';
import { parseSong } from '../../src/public/api.js';
import { blockHeight, chordRow, formatCrossReferences, planSheet, type SheetBlock } from '../../src/planner/sheet.js';
import { blockLines, formatSheetText } from '../../src/planner/sheet-text.js';

const SOURCE = [
  '#title: Grace',
  '#author: Test Writer',
  '#key: G',
  '[Verse 1]',
  'C       G',
  'Amazing grace',
  '[Chorus]',
  'Sing it',
  '',
  'repeat Chorus x2: softly'
].join('\n');

describe('sheet planner', () => {
  it('prints each part once with aligned chords and cross-references', () => {
    const { song, diagnostics } = parseSong(SOURCE);
    expect(diagnostics).toEqual([]);

    const plan = planSheet(song).plan;
    expect(plan?.header).toEqual(['Test Writer', 'Key: G']);
    expect(plan?.blocks).toEqual([
      {
        partName: 'Verse 1',
        kind: 'verse',
        label: 'Verse 1',
        rows: [{ chords: 'C       G', lyrics: 'Amazing grace' }],
        firstPosition: 1,
        crossReferences: []
      },
      {
        partName: 'Chorus',
        kind: 'chorus',
        label: 'Chorus',
        rows: [{ lyrics: 'Sing it' }],
        firstPosition: 2,
        crossReferences: [{ position: 3, repeat: 2, override: 'softly' }]
      }
    ]);
    expect(plan?.pages).toEqual([{ number: 1, blockIndexes: [0, 1], rowCount: 11 }]);
  });

  it('formats the plan as monospace text', () => {
    const plan = planSheet(parseSong(SOURCE).song).plan;
    expect(plan).toBeDefined();
    if (!plan) {
      return;
    }

    const text = formatSheetText(plan);
    expect(text).toBe(
      [
        'Grace',
        'Test Writer',
        'Key: G',
        '',
        'Verse 1',
        'C       G',
        'Amazing grace',
        '',
        'Chorus',
        'Sing it',
        'Repeated at: 3 x2 (softly)',
        ''
      ].join('\n')
    );
    expect(text.split('\n')).toHaveLength(12);
  });

  it('opens a new page when a block does not fit', () => {
    const plan = planSheet(parseSong(SOURCE).song, { rowsPerPage: 8 }).plan;
    expect(plan?.pages).toEqual([
      { number: 1, blockIndexes: [0], rowCount: 7 },
      { number: 2, blockIndexes: [1], rowCount: 3 }
    ]);
    if (!plan) {
      return;
    }

    expect(formatSheetText(plan)).toBe(
      'Grace\nTest Writer\nKey: G\n\nVerse 1\nC       G\nAmazing grace\n\f\nChorus\nSing it\nRepeated at: 3 x2 (softly)\n'
    );
  });

  it('hides chords and cross-references on request', () => {
    const plan = planSheet(parseSong(SOURCE).song, { showChords: false, showCrossReferences: false }).plan;

    expect(plan?.blocks.map((block) => block.rows)).toEqual([[{ lyrics: 'Amazing grace' }], [{ lyrics: 'Sing it' }]]);
    expect(plan?.blocks.map((block) => block.crossReferences)).toEqual([[], []]);
  });

  it('reports invalid sheet options', () => {
    const result = planSheet(parseSong(SOURCE).song, { rowsPerPage: 0 });

    expect(result.plan).toBeUndefined();
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['PLANNER_CONFIG_INVALID']);
    expect(result.error?.option).toBe('rowsPerPage');
  });
});

describe('chord rows', () => {
  it('keeps the recorded column of anchors past the end of the text', () => {
    const line: LyricLine = {
      segments: [
        { kind: 'text', text: 'Hi' },
        { kind: 'chord', chord: 'G', offset: 2, column: 20 }
      ]
    };
    expect(chordRow(line, 8)).toBe(`${' '.repeat(20)}G`);
  });

  it('pushes touching chords apart', () => {
    const line: LyricLine = {
      segments: [
        { kind: 'chord', chord: 'Am', offset: 0, column: 0 },
        { kind: 'text', text: 'a' },
        { kind: 'chord', chord: 'G', offset: 1, column: 1 },
        { kind: 'text', text: 'b' }
      ]
    };
    expect(chordRow(line, 8)).toBe('Am G');
  });

  it('expands tabs before placing chords', () => {
    const line: LyricLine = {
      segments: [
        { kind: 'text', text: '\t' },
        { kind: 'chord', chord: 'D', offset: 1, column: 8 },
        { kind: 'text', text: 'word' }
      ]
    };
    expect(chordRow(line, 8)).toBe(`${' '.repeat(8)}D`);
    expect(chordRow(line, 4)).toBe(`${' '.repeat(4)}D`);
  });

  it('prints a chords-only row without an empty lyric row', () => {
    const block: SheetBlock = {
      partName: 'Intro',
      kind: 'intro',
      label: 'Intro',
      rows: [{ chords: 'C   G', lyrics: '' }],
      crossReferences: []
    };
    expect(blockLines(block)).toEqual(['Intro', 'C   G']);
    expect(blockHeight(block)).toBe(2);
  });

  it('lists later performances', () => {
    expect(formatCrossReferences([{ position: 3, repeat: 1 }, { position: 5, repeat: 2, override: 'softly' }])).toBe(
      'Repeated at: 3, 5 x2 (softly)'
    );
  });
});
