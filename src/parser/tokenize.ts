import type { DialectId } from '../core/song.js';
import { readChordLine } from './chord-symbols.js';
import { detectDialect, getDialect, type DialectRules } from './dialects.js';
import { DEFAULT_TAB_WIDTH } from './parse-constants.js';
import { measureIndent } from './text-columns.js';
import type { Token } from './tokens.js';

/** Tokenizer configuration; `auto` sniffs the dialect from the text. */
export interface TokenizeOptions {
  dialect?: DialectId | 'auto';
  tabWidth?: number;
}

/** Unicode spaces folded to a plain space. */
const UNICODE_SPACE_RE = /[\u00a0\u1680\u2000-\u200a\u202f\u205f\u3000]/g;
/** Zero-width characters, BOM and control characters other than tab. */
const INVISIBLE_RE = /[\u200b-\u200d\u2060\ufeff\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g;

/** Normalize line endings and strip encoding noise; never changes visible text otherwise. */
export function normalizeSongText(rawText: string): string {
  return rawText.replace(/\r\n?/g, '\n').replace(UNICODE_SPACE_RE, ' ').replace(INVISIBLE_RE, '');
}

/**
 * Split raw song text into typed line tokens.
 * Never throws: lines that fit no rule become lyric tokens, and markup that is recognizably
 * broken becomes a directive token carrying an `anomaly` for the parser to report.
 */
export function tokenize(rawText: string, options: TokenizeOptions = {}): Token[] {
  const dialectId = resolveDialectId(rawText, options.dialect);
  return tokenizeWithDialect(rawText, getDialect(dialectId), options.tabWidth ?? DEFAULT_TAB_WIDTH);
}

/** Resolve `auto` (or a missing dialect) by sniffing the text. */
export function resolveDialectId(rawText: string, dialect: DialectId | 'auto' | undefined): DialectId {
  return dialect === undefined || dialect === 'auto' ? detectDialect(rawText) : dialect;
}

/** Tokenize with explicit dialect rules. */
export function tokenizeWithDialect(rawText: string, dialect: DialectRules, tabWidth: number): Token[] {
  const tokens: Token[] = [];
  const lines = normalizeSongText(rawText).split('\n');

  lines.forEach((rawLine, index) => {
    const line = index + 1;
    const { indent, content } = measureIndent(rawLine, tabWidth);
    const column = indent + 1;

    if (content.length === 0) {
      tokens.push({ type: 'blank', line, column: 1 });
      return;
    }
    if (dialect.isComment(content)) {
      return;
    }

    const directive = dialect.matchDirective(content);
    if (directive) {
      tokens.push({ type: 'directive', line, column, raw: content, ...directive });
      return;
    }

    const marker = dialect.matchMarker(content);
    if (marker) {
      tokens.push({ type: 'marker', line, column, ...marker });
      return;
    }

    const entries = dialect.chordLines ? readChordLine(content, indent, tabWidth) : undefined;
    if (entries) {
      tokens.push({ type: 'chords', line, column, raw: content, indent, entries });
      return;
    }

    tokens.push({ type: 'lyric', line, column, text: content, indent });
  });

  // A trailing newline produces one empty line that carries no information.
  const last = tokens[tokens.length - 1];
  if (last?.type === 'blank' && last.line === lines.length && lines.length > 1) {
    tokens.pop();
  }

  return tokens;
}
