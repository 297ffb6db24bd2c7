/** Tab stop width used to expand tabs into visual columns. */
export const DEFAULT_TAB_WIDTH = 8;

/**
 * How many columns a chord may sit before the lyric start or past the lyric end and still be
 * taken as belonging to that lyric line without an alignment warning.
 */
export const DEFAULT_CHORD_ALIGNMENT_TOLERANCE = 4;

/** Minimum share of chord-looking words for a line to count as a chord line. */
export const CHORD_LINE_RATIO = 0.7;

/** Name of the implicit part that absorbs content preceding the first marker. */
export const IMPLICIT_LEADING_PART_NAME = 'Intro';

/** Fallback name when the song defines its own `Intro` part. */
export const IMPLICIT_LEADING_PART_FALLBACK_NAME = 'Untitled';
