import { describe, expect, it } from 'vitest';

import type { LyricLine, PartDefinition, PartInstance, Song } from '../../src/core/song.js';
import { createSong } from '../../src/core/song-model.js';
import { PlannerConfigError } from '../../src/planner/planner-config.js';
import { chunkLines, planPresentation, type ContentSlide, type Slide } from '../../src/planner/presentation.js';
import { renderTemplate, templateValues } from '../../src/planner/templating.js';

function text(value: string): LyricLine {
  return { segments: [{ kind: 'text', text: value }] };
}

function buildSong(definitions: PartDefinition[], order: PartInstance[], title = 'Grace'): Song {
  return createSong({ title, metadata: { author: 'Test Writer', tags: { author: 'Test Writer' } }, definitions, order });
}

function contentSlides(slides: readonly Slide[]): ContentSlide[] {
  return slides.flatMap((slide) => (slide.type === 'content' ? [slide] : []));
}

const VERSE: PartDefinition = { name: 'Verse 1', kind: 'verse', lines: [text('line one'), text('line two')] };
const CHORUS: PartDefinition = { name: 'Chorus', kind: 'chorus', lines: [text('refrain')] };

describe('presentation planner', () => {
  it('plans one slide per part occurrence and marks repeats', () => {
    const song = buildSong(
      [VERSE, CHORUS],
      [{ name: 'Verse 1' }, { name: 'Chorus' }, { name: 'Verse 1' }, { name: 'Chorus' }]
    );
    const result = planPresentation(song, { maxLinesPerSlide: 2, expandRepeats: true });

    expect(result.diagnostics).toEqual([]);
    const slides = contentSlides(result.plan?.slides ?? []);
    expect(slides).toHaveLength(4);
    expect(slides.map((slide) => [slide.partName, slide.isRepeat])).toEqual([
      ['Verse 1', false],
      ['Chorus', false],
      ['Verse 1', true],
      ['Chorus', true]
    ]);
    expect(slides[0]).toEqual({
      type: 'content',
      partName: 'Verse 1',
      partKind: 'verse',
      lines: ['line one', 'line two'],
      isRepeat: false,
      chunk: { index: 0, count: 1 }
    });
  });

  it('reports invalid options without touching the song', () => {
    const song = buildSong([VERSE], [{ name: 'Verse 1' }]);
    const result = planPresentation(song, { maxLinesPerSlide: 0 });

    expect(result.plan).toBeUndefined();
    expect(result.error).toBeInstanceOf(PlannerConfigError);
    expect(result.error?.option).toBe('maxLinesPerSlide');
    expect(result.diagnostics).toEqual([
      {
        code: 'PLANNER_CONFIG_INVALID',
        severity: 'error',
        category: 'planner-config',
        message: "Invalid planner option 'maxLinesPerSlide': expected an integer greater than 0, got 0."
      }
    ]);

    const retry = planPresentation(song, { maxLinesPerSlide: 1 });
    expect(retry.plan?.slides).toHaveLength(2);
    expect(song.definitions[0]?.lines).toHaveLength(2);
  });

  it('splits long parts into balanced chunks', () => {
    const lines = ['a', 'b', 'c', 'd', 'e'];
    expect(chunkLines(lines, 2)).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
    expect(chunkLines(['a', 'b', 'c', 'd', 'e', 'f', 'g'], 3)).toEqual([['a', 'b', 'c'], ['d', 'e'], ['f', 'g']]);
    expect(chunkLines([], 4)).toEqual([[]]);

    const long: PartDefinition = { name: 'Verse 1', kind: 'verse', lines: lines.map(text) };
    const song = buildSong([long], [{ name: 'Verse 1' }]);
    const split = contentSlides(planPresentation(song, { maxLinesPerSlide: 2 }).plan?.slides ?? []);
    expect(split.map((slide) => slide.chunk)).toEqual([
      { index: 0, count: 3 },
      { index: 1, count: 3 },
      { index: 2, count: 3 }
    ]);

    const together = contentSlides(planPresentation(song, { maxLinesPerSlide: 2, keepPartTogether: true }).plan?.slides ?? []);
    expect(together.map((slide) => slide.lines)).toEqual([lines]);
  });

  it('keeps a part without lyrics as one empty slide', () => {
    const chordsOnly: PartDefinition = {
      name: 'Intro',
      kind: 'intro',
      lines: [{ segments: [{ kind: 'chord', chord: 'G', offset: 0, column: 0 }] }]
    };
    const song = buildSong([chordsOnly], [{ name: 'Intro' }]);

    expect(contentSlides(planPresentation(song).plan?.slides ?? [])).toEqual([
      { type: 'content', partName: 'Intro', partKind: 'intro', lines: [], isRepeat: false, chunk: { index: 0, count: 1 } }
    ]);
  });

  it('gives a part with no lines exactly one empty slide at the smallest limit', () => {
    const empty: PartDefinition = { name: 'Bridge', kind: 'bridge', lines: [] };
    const song = buildSong([empty], [{ name: 'Bridge' }]);

    expect(planPresentation(song, { maxLinesPerSlide: 1 }).plan?.slides).toEqual([
      { type: 'content', partName: 'Bridge', partKind: 'bridge', lines: [], isRepeat: false, chunk: { index: 0, count: 1 } }
    ]);
  });

  it('collapses or expands counted repeats', () => {
    const song = buildSong([CHORUS], [{ name: 'Chorus', repeat: 2, override: 'softly' }]);

    const collapsed = contentSlides(planPresentation(song, { expandRepeats: false }).plan?.slides ?? []);
    expect(collapsed).toHaveLength(1);
    expect(collapsed[0]).toMatchObject({ repeatCount: 2, note: 'softly', isRepeat: false });

    const expanded = contentSlides(planPresentation(song, { expandRepeats: true }).plan?.slides ?? []);
    expect(expanded.map((slide) => [slide.isRepeat, slide.repeatCount, slide.note])).toEqual([
      [false, undefined, 'softly'],
      [true, undefined, 'softly']
    ]);
  });

  it('adds title, spoiler, meta and closing slides', () => {
    const song = buildSong([VERSE, CHORUS], [{ name: 'Verse 1' }, { name: 'Chorus' }]);
    const result = planPresentation(song, {
      maxLinesPerSlide: 1,
      titleSlide: true,
      blankLastSlide: true,
      spoiler: true,
      metaTemplate: '{{title}} - {{author}} {{missing}}'
    });

    expect(result.plan?.slides).toEqual([
      { type: 'title', title: 'Grace', meta: 'Grace - Test Writer' },
      {
        type: 'content',
        partName: 'Verse 1',
        partKind: 'verse',
        lines: ['line one'],
        isRepeat: false,
        chunk: { index: 0, count: 2 },
        spoiler: 'line two',
        meta: 'Grace - Test Writer'
      },
      {
        type: 'content',
        partName: 'Verse 1',
        partKind: 'verse',
        lines: ['line two'],
        isRepeat: false,
        chunk: { index: 1, count: 2 },
        spoiler: 'refrain'
      },
      {
        type: 'content',
        partName: 'Chorus',
        partKind: 'chorus',
        lines: ['refrain'],
        isRepeat: false,
        chunk: { index: 0, count: 1 },
        meta: 'Grace - Test Writer'
      },
      { type: 'blank' }
    ]);

    const firstOnly = contentSlides(
      planPresentation(song, { metaTemplate: '{{author}}', metaOnLastSlide: false }).plan?.slides ?? []
    );
    expect(firstOnly.map((slide) => slide.meta)).toEqual(['Test Writer', undefined]);
  });

  it('rejects options of the wrong type', () => {
    const song = buildSong([VERSE], [{ name: 'Verse 1' }]);
    const result = planPresentation(song, { maxLinesPerSlide: 2.5 });
    expect(result.error?.message).toBe(
      "Invalid planner option 'maxLinesPerSlide': expected an integer greater than 0, got 2.5."
    );
  });
});

describe('meta templates', () => {
  it('fills placeholders from title, fields and raw tags', () => {
    const song = createSong({
      title: 'Grace',
      metadata: { key: 'G', tags: { key: 'G', ccli: '12345' } },
      definitions: [],
      order: []
    });
    const values = templateValues(song);

    expect(values).toEqual({ key: 'G', ccli: '12345', title: 'Grace' });
    expect(renderTemplate('{{ title }} in {{key}} (CCLI {{ccli}}){{nothing}}', values)).toBe('Grace in G (CCLI 12345)');
    expect(renderTemplate('[{{constructor}}{{toString}}{{__proto__}}]', values)).toBe('[]');
  });
});
