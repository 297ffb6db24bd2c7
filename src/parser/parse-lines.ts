import type { AnchorSegment, LyricLine, Segment } from '../core/song.js';
import { isChordSymbol } from './chord-symbols.js';
import type { DialectRules } from './dialects.js';
import { addDiagnostic, type ParseContext } from './parse-context.js';
import { offsetForColumn, visualWidth } from './text-columns.js';
import type { BlankLineToken, ChordLineToken, DirectiveToken, LyricLineToken } from './tokens.js';

/** Tokens a part body can hold; blanks are kept because they break chord/lyric adjacency. */
export type PartBodyToken = ChordLineToken | LyricLineToken | BlankLineToken | DirectiveToken;

/** Text and anchors of one line before segments are assembled. */
interface LineContent {
  text: string;
  anchors: AnchorSegment[];
}

const INLINE_GROUP_RE = /\[([^[\]]*)\]/g;

/**
 * Turn the body tokens of one part into lyric lines.
 * A chord line directly above a lyric line is merged into it; any other chord line stands alone
 * as a chords-only line.
 */
export function buildPartLines(tokens: readonly PartBodyToken[], ctx: ParseContext): LyricLine[] {
  const lines: LyricLine[] = [];

  for (let index = 0; index < tokens.length; index += 1) {
    const token = tokens[index];
    if (!token || token.type === 'blank') {
      continue;
    }

    if (token.type === 'directive') {
      if (token.value !== undefined) {
        lines.push({
          segments: [{ kind: 'annotation', text: token.value, offset: 0, column: 0 }],
          sourceLine: token.line
        });
      }
      continue;
    }

    if (token.type === 'lyric') {
      const content = extractInlineChords(token.text, ctx.dialect, ctx.tabWidth);
      lines.push({ segments: assembleSegments(content), sourceLine: token.line });
      continue;
    }

    const next = tokens[index + 1];
    if (next?.type !== 'lyric') {
      lines.push({ segments: assembleSegments(chordsOnly(token)), sourceLine: token.line });
      continue;
    }

    const lyric = extractInlineChords(next.text, ctx.dialect, ctx.tabWidth);
    if (lyric.anchors.length > 0) {
      addDiagnostic(
        ctx,
        'AMBIGUOUS_CHORD_ALIGNMENT',
        'warning',
        'structural-warning',
        `Chord line ${token.line} sits above a line that already has inline chords; kept as a chords-only line.`,
        { line: token.line, column: token.column }
      );
      lines.push({ segments: assembleSegments(chordsOnly(token)), sourceLine: token.line });
      continue;
    }

    lines.push({ segments: assembleSegments(mergeChordsOverLyric(token, next, ctx)), sourceLine: next.line });
    index += 1;
  }

  return lines;
}

/** Anchor each chord at the lyric offset under its column; warn once when a chord falls outside. */
function mergeChordsOverLyric(chords: ChordLineToken, lyric: LyricLineToken, ctx: ParseContext): LineContent {
  const textWidth = visualWidth(lyric.text, ctx.tabWidth, lyric.indent);
  const tolerance = ctx.chordAlignmentTolerance;
  let outside = false;

  const anchors = chords.entries.map((entry): AnchorSegment => {
    const relative = entry.column - lyric.indent;
    if (relative < -tolerance || relative > textWidth + tolerance) {
      outside = true;
    }

    const offset = offsetForColumn(lyric.text, relative, ctx.tabWidth, lyric.indent);
    const column = Math.max(0, relative);
    return entry.annotation
      ? { kind: 'annotation', text: entry.symbol, offset, column }
      : { kind: 'chord', chord: entry.symbol, offset, column };
  });

  if (outside) {
    addDiagnostic(
      ctx,
      'AMBIGUOUS_CHORD_ALIGNMENT',
      'warning',
      'structural-warning',
      `Chords on line ${chords.line} reach more than ${tolerance} columns outside lyric line ${lyric.line}.`,
      { line: chords.line, column: chords.column }
    );
  }

  return { text: lyric.text, anchors };
}

/** A chord line without lyric: empty text, every anchor at offset 0 keeping its column. */
function chordsOnly(token: ChordLineToken): LineContent {
  return {
    text: '',
    anchors: token.entries.map((entry): AnchorSegment => {
      const column = entry.column - token.indent;
      return entry.annotation
        ? { kind: 'annotation', text: entry.symbol, offset: 0, column }
        : { kind: 'chord', chord: entry.symbol, offset: 0, column };
    })
  };
}

/**
 * Strip `[X]` groups out of a lyric line according to the dialect.
 * `[*text]` is an annotation; other groups are chords when the dialect reads all groups, or when
 * it reads chord-like groups and the content is a chord symbol. Anything else stays literal.
 */
export function extractInlineChords(text: string, dialect: DialectRules, tabWidth: number): LineContent {
  if (dialect.inlineChords === 'none' || !text.includes('[')) {
    return { text, anchors: [] };
  }

  let stripped = '';
  let cursor = 0;
  const anchors: AnchorSegment[] = [];

  for (const match of text.matchAll(INLINE_GROUP_RE)) {
    const start = match.index ?? 0;
    const content = (match[1] ?? '').trim();
    stripped += text.slice(cursor, start);
    cursor = start + match[0].length;

    const offset = stripped.length;
    const column = visualWidth(stripped, tabWidth);
    if (content.startsWith('*') && content.length > 1) {
      anchors.push({ kind: 'annotation', text: content.slice(1).trim(), offset, column });
    } else if (content.length > 0 && (dialect.inlineChords === 'all' || isChordSymbol(content))) {
      anchors.push({ kind: 'chord', chord: content, offset, column });
    } else if (dialect.inlineChords === 'chord-like') {
      stripped += match[0];
    }
  }

  stripped += text.slice(cursor);
  return { text: stripped, anchors };
}

/** Interleave text slices and anchors so each anchor follows exactly the text before its offset. */
function assembleSegments(content: LineContent): Segment[] {
  const segments: Segment[] = [];
  let cursor = 0;

  for (const anchor of content.anchors) {
    if (anchor.offset > cursor) {
      segments.push({ kind: 'text', text: content.text.slice(cursor, anchor.offset) });
      cursor = anchor.offset;
    }
    segments.push(anchor);
  }

  if (cursor < content.text.length) {
    segments.push({ kind: 'text', text: content.text.slice(cursor) });
  }
  return segments;
}
