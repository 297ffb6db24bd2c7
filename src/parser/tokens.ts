import type { PartKind } from '../core/song.js';
import type { ChordLineEntry } from './chord-symbols.js';

/** Position shared by every token; `column` is 1-based and counts tab-expanded columns. */
interface TokenBase {
  line: number;
  column: number;
}

/** Start of a part, e.g. `[Verse 1]` or `{start_of_chorus}`. */
export interface MarkerToken extends TokenBase {
  type: 'marker';
  kind: PartKind;
  /** Label as written; absent when the marker carries none (`{soc}`). */
  name?: string;
}

/** A line of chords positioned over the following lyric line. */
export interface ChordLineToken extends TokenBase {
  type: 'chords';
  raw: string;
  indent: number;
  entries: ChordLineEntry[];
}

/** Any other text line, trimmed. */
export interface LyricLineToken extends TokenBase {
  type: 'lyric';
  text: string;
  indent: number;
}

/**
 * Key/value instruction (metadata, repeat, order, end-of-part, comment).
 * `anomaly` is set when the line looked like markup but could not be read.
 */
export interface DirectiveToken extends TokenBase {
  type: 'directive';
  key: string;
  value?: string;
  raw: string;
  anomaly?: string;
}

/** Empty separator line. */
export interface BlankLineToken extends TokenBase {
  type: 'blank';
}

export type Token = MarkerToken | ChordLineToken | LyricLineToken | DirectiveToken | BlankLineToken;
