import type { Diagnostic } from '../core/diagnostics.js';
import type { DialectId, Song } from '../core/song.js';
import { detectDialect as detectSongDialect } from '../parser/dialects.js';
import { parseSong as parseSongText, parseTokens as parseSongTokens } from '../parser/parse.js';
import { tokenize as tokenizeSong, type TokenizeOptions } from '../parser/tokenize.js';
import type { Token } from '../parser/tokens.js';
import type { PlanResult, PresentationOptions, SheetOptions } from '../planner/planner-config.js';
import { planPresentation as planSlides, type SlidePlan } from '../planner/presentation.js';
import { planSheet as planPrintSheet, type SheetPlan } from '../planner/sheet.js';
import { formatSheetText as formatSheet } from '../planner/sheet-text.js';

/** Parser configuration shared by text, byte and token entry points. */
export interface ParseOptions {
  dialect?: DialectId | 'auto';
  sourceName?: string;
  mode?: 'strict' | 'lenient';
  tabWidth?: number;
  chordAlignmentTolerance?: number;
}

/** Standard parser return envelope with diagnostics-first reporting. */
export interface ParseResult {
  song: Song;
  diagnostics: Diagnostic[];
}

/** Split raw song text into line tokens. */
export function tokenize(text: string, options: TokenizeOptions = {}): Token[] {
  return tokenizeSong(text, options);
}

/** Guess the markup dialect of raw song text. */
export function detectDialect(text: string): DialectId {
  return detectSongDialect(text);
}

/** Parse song text into the immutable song model. */
export function parseSong(text: string, options: ParseOptions = {}): ParseResult {
  return parseSongText(text, options);
}

/** Parse UTF-8 bytes; a byte order mark is dropped and invalid sequences are replaced. */
export function parseSongBytes(data: Uint8Array, options: ParseOptions = {}): ParseResult {
  return parseSong(new TextDecoder().decode(data), options);
}

/** Parse tokens produced by `tokenize`; pass the dialect they were read with. */
export function parseTokens(tokens: readonly Token[], options: ParseOptions = {}): ParseResult {
  return parseSongTokens(tokens, options);
}

/** Plan projection slides; invalid options come back as `error` with no plan. */
export function planPresentation(song: Song, options: PresentationOptions = {}): PlanResult<SlidePlan> {
  return planSlides(song, options);
}

/** Plan a paged print sheet; invalid options come back as `error` with no plan. */
export function planSheet(song: Song, options: SheetOptions = {}): PlanResult<SheetPlan> {
  return planPrintSheet(song, options);
}

/** Render a sheet plan as monospace text. */
export function formatSheetText(plan: SheetPlan): string {
  return formatSheet(plan);
}
