import type { LyricLine, PartDefinition, PartKind, Song } from '../core/song.js';
import { anchorLabel, lineAnchors, lineText, normalizePartName } from '../core/song.js';
import { expandTabs, visualWidth } from '../parser/text-columns.js';
import {
  resolveSheetOptions,
  runPlanner,
  type PlanResult,
  type ResolvedSheetOptions,
  type SheetOptions
} from './planner-config.js';

/** One printed line: an optional chord row above the lyric row. */
export interface SheetRow {
  chords?: string;
  lyrics: string;
}

/** A later performance of a part, listed instead of printing the part again. */
export interface CrossReference {
  /** 1-based position in the performance order. */
  position: number;
  repeat: number;
  override?: string;
}

/** Printed block of one part definition. */
export interface SheetBlock {
  partName: string;
  kind: PartKind;
  label: string;
  rows: SheetRow[];
  firstPosition?: number;
  crossReferences: CrossReference[];
}

export interface SheetPage {
  number: number;
  /** Indexes into `SheetPlan.blocks`. */
  blockIndexes: number[];
  rowCount: number;
}

/** Print layout of a song: each part once, in definition order, paged. */
export interface SheetPlan {
  title: string;
  header: string[];
  blocks: SheetBlock[];
  pages: SheetPage[];
}

/**
 * Plan a printable sheet for a song.
 * Invalid options yield a `PlannerConfigError` in `error` and no plan.
 */
export function planSheet(song: Song, options: SheetOptions = {}): PlanResult<SheetPlan> {
  return runPlanner(
    () => resolveSheetOptions(options),
    (resolved) => buildSheetPlan(song, resolved)
  );
}

function buildSheetPlan(song: Song, options: ResolvedSheetOptions): SheetPlan {
  const header = sheetHeader(song);
  const blocks = song.definitions.map((definition) => buildBlock(song, definition, options));
  return { title: song.title, header, blocks, pages: paginate(blocks, header, options.rowsPerPage) };
}

/** Subtitle, author, then key and tempo on one line; absent fields are skipped. */
function sheetHeader(song: Song): string[] {
  const { subtitle, author, key, tempo } = song.metadata;
  const header: string[] = [];
  if (subtitle !== undefined) {
    header.push(subtitle);
  }
  if (author !== undefined) {
    header.push(author);
  }
  const details = [key !== undefined ? `Key: ${key}` : undefined, tempo !== undefined ? `Tempo: ${tempo}` : undefined]
    .filter((detail): detail is string => detail !== undefined)
    .join('  ');
  if (details.length > 0) {
    header.push(details);
  }
  return header;
}

function buildBlock(song: Song, definition: PartDefinition, options: ResolvedSheetOptions): SheetBlock {
  const wanted = normalizePartName(definition.name);
  const positions = song.order.flatMap((instance, index) =>
    normalizePartName(instance.name) === wanted ? [{ instance, position: index + 1 }] : []
  );
  const [first, ...later] = positions;

  const block: SheetBlock = {
    partName: definition.name,
    kind: definition.kind,
    label: definition.name,
    rows: definition.lines.map((line) => buildRow(line, options)),
    crossReferences: options.showCrossReferences
      ? later.map(({ instance, position }) => ({
          position,
          repeat: instance.repeat ?? 1,
          ...(instance.override !== undefined ? { override: instance.override } : {})
        }))
      : []
  };
  if (first) {
    block.firstPosition = first.position;
  }
  return block;
}

function buildRow(line: LyricLine, options: ResolvedSheetOptions): SheetRow {
  const lyrics = expandTabs(lineText(line), options.tabWidth);
  const anchors = lineAnchors(line);
  if (!options.showChords || anchors.length === 0) {
    return { lyrics };
  }
  return { chords: chordRow(line, options.tabWidth), lyrics };
}

/**
 * Place each anchor over the column of its offset in the expanded text.
 * Anchors at or past the end keep their recorded column; an anchor that would touch the
 * previous one is pushed right by one space.
 */
export function chordRow(line: LyricLine, tabWidth: number): string {
  const text = lineText(line);
  let row = '';

  for (const anchor of lineAnchors(line)) {
    let column = visualWidth(text.slice(0, anchor.offset), tabWidth);
    if (anchor.offset >= text.length) {
      column = Math.max(column, anchor.column);
    }
    if (row.length > 0 && column <= row.length) {
      column = row.length + 1;
    }
    row = row.padEnd(column) + anchorLabel(anchor);
  }
  return row;
}

/** Rows a sheet row prints as; a chord row over empty lyrics prints alone. */
export function rowHeight(row: SheetRow): number {
  return row.chords !== undefined && row.lyrics.length > 0 ? 2 : 1;
}

/** Label row, row heights, and one cross-reference row when there are any. */
export function blockHeight(block: SheetBlock): number {
  const rows = block.rows.reduce((sum, row) => sum + rowHeight(row), 0);
  return 1 + rows + (block.crossReferences.length > 0 ? 1 : 0);
}

/** Title row, header rows and one blank row. */
export function headerHeight(header: readonly string[]): number {
  return header.length + 2;
}

/**
 * Fill pages in block order, separating blocks by a blank row.
 * A block that does not fit opens a new page; a block taller than a page gets one of its own.
 */
export function paginate(blocks: readonly SheetBlock[], header: readonly string[], rowsPerPage: number): SheetPage[] {
  let page: SheetPage = { number: 1, blockIndexes: [], rowCount: headerHeight(header) };
  const pages: SheetPage[] = [page];

  blocks.forEach((block, index) => {
    const height = blockHeight(block);
    const separator = page.blockIndexes.length > 0 ? 1 : 0;
    if (page.rowCount > 0 && page.rowCount + separator + height > rowsPerPage) {
      page = { number: page.number + 1, blockIndexes: [], rowCount: 0 };
      pages.push(page);
    }

    page.rowCount += (page.blockIndexes.length > 0 ? 1 : 0) + height;
    page.blockIndexes.push(index);
  });

  return pages;
}

/** Text of a block's cross-reference row, e.g. `Repeated at: 3, 5 x2 (softly)`. */
export function formatCrossReferences(references: readonly CrossReference[]): string {
  const entries = references.map((reference) => {
    const repeat = reference.repeat > 1 ? ` x${reference.repeat}` : '';
    const override = reference.override !== undefined ? ` (${reference.override})` : '';
    return `${reference.position}${repeat}${override}`;
  });
  return `Repeated at: ${entries.join(', ')}`;
}
