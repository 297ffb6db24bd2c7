import type { LyricLine, PartDefinition, PartInstance, PartKind, Song } from '../core/song.js';
import { getPartDefinition, lineText, normalizePartName } from '../core/song.js';
import {
  resolvePresentationOptions,
  runPlanner,
  type PlanResult,
  type PresentationOptions,
  type ResolvedPresentationOptions
} from './planner-config.js';
import { renderTemplate, templateValues } from './templating.js';

/** One slide showing (a chunk of) a part. */
export interface ContentSlide {
  type: 'content';
  partName: string;
  partKind: PartKind;
  lines: string[];
  /** The part was already shown earlier in the plan. */
  isRepeat: boolean;
  chunk: { index: number; count: number };
  /** Times the part is sung, set only when repeats are not expanded. */
  repeatCount?: number;
  /** Variant note of the instance, e.g. "softly". */
  note?: string;
  /** First line of the next content slide. */
  spoiler?: string;
  meta?: string;
}

/** Opening slide with the song title. */
export interface TitleSlide {
  type: 'title';
  title: string;
  meta?: string;
}

/** Empty closing slide. */
export interface BlankSlide {
  type: 'blank';
}

export type Slide = ContentSlide | TitleSlide | BlankSlide;

/** Ordered slides for projecting one song. */
export interface SlidePlan {
  title: string;
  slides: Slide[];
}

/**
 * Plan display slides for a song.
 * Invalid options yield a `PlannerConfigError` in `error` and no plan; the song is never touched.
 */
export function planPresentation(song: Song, options: PresentationOptions = {}): PlanResult<SlidePlan> {
  return runPlanner(
    () => resolvePresentationOptions(options),
    (resolved) => buildSlidePlan(song, resolved)
  );
}

function buildSlidePlan(song: Song, options: ResolvedPresentationOptions): SlidePlan {
  const content: ContentSlide[] = [];
  const shown = new Set<string>();

  for (const instance of song.order) {
    const definition = getPartDefinition(song, instance.name);
    if (!definition) {
      continue;
    }

    const groups = options.expandRepeats ? instance.repeat ?? 1 : 1;
    for (let group = 0; group < groups; group += 1) {
      const key = normalizePartName(definition.name);
      content.push(...slidesForInstance(definition, instance, shown.has(key), options));
      shown.add(key);
    }
  }

  if (options.spoiler) {
    addSpoilers(content);
  }
  const meta = renderTemplate(options.metaTemplate, templateValues(song)).trim();
  if (meta.length > 0) {
    addMeta(content, meta, options);
  }

  const slides: Slide[] = [];
  if (options.titleSlide) {
    slides.push(meta.length > 0 ? { type: 'title', title: song.title, meta } : { type: 'title', title: song.title });
  }
  slides.push(...content);
  if (options.blankLastSlide) {
    slides.push({ type: 'blank' });
  }
  return { title: song.title, slides };
}

/** Split one part occurrence into chunks of near-equal size. */
function slidesForInstance(
  definition: PartDefinition,
  instance: PartInstance,
  isRepeat: boolean,
  options: ResolvedPresentationOptions
): ContentSlide[] {
  const chunks = chunkLines(displayLines(definition.lines), options.keepPartTogether ? Infinity : options.maxLinesPerSlide);

  return chunks.map((lines, index) => {
    const slide: ContentSlide = {
      type: 'content',
      partName: definition.name,
      partKind: definition.kind,
      lines,
      isRepeat,
      chunk: { index, count: chunks.length }
    };
    if (!options.expandRepeats && instance.repeat !== undefined && instance.repeat > 1) {
      slide.repeatCount = instance.repeat;
    }
    if (instance.override !== undefined) {
      slide.note = instance.override;
    }
    return slide;
  });
}

/** Lines worth projecting: trimmed text, chords-only and annotation-only lines dropped. */
export function displayLines(lines: readonly LyricLine[]): string[] {
  return lines.map((line) => lineText(line).trim()).filter((text) => text.length > 0);
}

/**
 * Split lines into `ceil(n / max)` chunks, earlier chunks taking the extra line.
 * No lines still yields one empty chunk so silent parts stay visible.
 */
export function chunkLines(lines: readonly string[], max: number): string[][] {
  if (lines.length <= max) {
    return [[...lines]];
  }

  const count = Math.ceil(lines.length / max);
  const base = Math.floor(lines.length / count);
  const extra = lines.length % count;
  const chunks: string[][] = [];
  let start = 0;
  for (let index = 0; index < count; index += 1) {
    const size = base + (index < extra ? 1 : 0);
    chunks.push(lines.slice(start, start + size));
    start += size;
  }
  return chunks;
}

function addSpoilers(slides: ContentSlide[]): void {
  slides.forEach((slide, index) => {
    const next = slides[index + 1]?.lines[0];
    if (next !== undefined) {
      slide.spoiler = next;
    }
  });
}

function addMeta(slides: ContentSlide[], meta: string, options: ResolvedPresentationOptions): void {
  const first = slides[0];
  const last = slides[slides.length - 1];
  if (options.metaOnFirstSlide && first) {
    first.meta = meta;
  }
  if (options.metaOnLastSlide && last) {
    last.meta = meta;
  }
}
