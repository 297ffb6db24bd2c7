import type { Diagnostic } from '../core/diagnostics.js';
import type { DialectId, Song } from '../core/song.js';
import { createSong } from '../core/song-model.js';
import { getDialect } from './dialects.js';
import { DEFAULT_CHORD_ALIGNMENT_TOLERANCE, DEFAULT_TAB_WIDTH } from './parse-constants.js';
import { createParseContext, type ParserMode } from './parse-context.js';
import { buildMetadata, resolveTitle } from './parse-metadata.js';
import { assignPartNames, classifyRepeatedParts, collectDefinitions, groupTokens } from './parse-parts.js';
import { resolvePerformanceOrder, validatePerformanceOrder } from './parse-references.js';
import { resolveDialectId, tokenizeWithDialect } from './tokenize.js';
import type { Token } from './tokens.js';

/** Parser entry options for dialect, source naming, strictness and chord alignment. */
export interface ParserOptions {
  /** Markup dialect; `auto` (default) sniffs it from the text. */
  dialect?: DialectId | 'auto';
  sourceName?: string;
  mode?: ParserMode;
  tabWidth?: number;
  /** Columns a chord may sit outside its lyric line before a warning is raised. */
  chordAlignmentTolerance?: number;
}

/** Parser return envelope: the best-effort song plus every diagnostic raised on the way. */
export interface ParserResult {
  song: Song;
  diagnostics: Diagnostic[];
}

/** Tokenize and parse song text in one step. */
export function parseSong(text: string, options: ParserOptions = {}): ParserResult {
  const dialect = resolveDialectId(text, options.dialect);
  const tokens = tokenizeWithDialect(text, getDialect(dialect), positiveInteger(options.tabWidth, DEFAULT_TAB_WIDTH));
  return parseTokens(tokens, { ...options, dialect });
}

/**
 * Build a song from tokens.
 * Never throws on song content: structural problems become diagnostics and the song keeps
 * whatever could be recovered. Tokens carry no dialect, so `auto` reads them as plain.
 */
export function parseTokens(tokens: readonly Token[], options: ParserOptions = {}): ParserResult {
  const dialect = options.dialect === undefined || options.dialect === 'auto' ? 'plain' : options.dialect;
  const ctx = createParseContext(getDialect(dialect), {
    mode: options.mode ?? 'lenient',
    sourceName: options.sourceName,
    tabWidth: positiveInteger(options.tabWidth, DEFAULT_TAB_WIDTH),
    chordAlignmentTolerance: nonNegativeInteger(options.chordAlignmentTolerance, DEFAULT_CHORD_ALIGNMENT_TOLERANCE)
  });

  const grouped = groupTokens(tokens, ctx);
  classifyRepeatedParts(grouped, ctx);
  assignPartNames(grouped);
  const definitions = collectDefinitions(grouped, ctx);
  const order = validatePerformanceOrder(definitions, resolvePerformanceOrder(grouped, definitions, ctx), ctx);

  const song = createSong({
    title: resolveTitle(grouped.tags, options.sourceName),
    metadata: buildMetadata(grouped.tags),
    definitions,
    order,
    source: options.sourceName === undefined ? { dialect } : { name: options.sourceName, dialect }
  });

  return { song, diagnostics: ctx.diagnostics };
}

function positiveInteger(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isInteger(value) && value > 0 ? value : fallback;
}

function nonNegativeInteger(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isInteger(value) && value >= 0 ? value : fallback;
}
