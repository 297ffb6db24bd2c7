import { CHORD_LINE_RATIO } from './parse-constants.js';
import { wordColumns } from './text-columns.js';

/** Root, accidental, quality, extension, optional parenthesized alteration and slash bass. */
const CHORD_SYMBOL_RE =
  /^[A-G](?:#|b|♯|♭)?(?:maj|min|dim|aug|sus|add|m|M|°|ø|\+)?(?:\d{1,2})?(?:(?:sus|add|maj|b|#)\d{1,2})*(?:\([^)]{1,8}\))?(?:\/[A-G](?:#|b|♯|♭)?)?$/;

/** Bar and rhythm symbols that may appear between chords and carry no meaning for alignment. */
const BAR_SYMBOLS = new Set(['|', '||', '|:', ':|', '/', '//', '-', '%']);

/** No-chord marks. */
const NO_CHORD_SYMBOLS = new Set(['N.C.', 'NC', 'N.C']);

/** One word of a chord line at its visual column. */
export interface ChordLineEntry {
  symbol: string;
  column: number;
  annotation: boolean;
}

/** True when `word` reads as a chord symbol. */
export function isChordSymbol(word: string): boolean {
  if (word.length === 0 || word.length > 16) {
    return false;
  }
  return NO_CHORD_SYMBOLS.has(word) || CHORD_SYMBOL_RE.test(word);
}

/**
 * Classify a trimmed line as a chord line and return its entries, or `undefined` for a lyric line.
 * Bar symbols are skipped; other non-chord words are kept as annotations.
 */
export function readChordLine(
  content: string,
  indent: number,
  tabWidth: number
): ChordLineEntry[] | undefined {
  const words = wordColumns(content, tabWidth, indent).filter((entry) => !BAR_SYMBOLS.has(entry.word));
  if (words.length === 0) {
    return undefined;
  }

  const chordCount = words.filter((entry) => isChordSymbol(entry.word)).length;
  if (chordCount === 0 || chordCount / words.length < CHORD_LINE_RATIO) {
    return undefined;
  }

  return words.map((entry) => ({
    symbol: entry.word,
    column: entry.column,
    annotation: !isChordSymbol(entry.word)
  }));
}
