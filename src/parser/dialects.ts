import type { DialectId, PartKind } from '../core/song.js';
import { isChordSymbol, readChordLine } from './chord-symbols.js';
import { DEFAULT_TAB_WIDTH } from './parse-constants.js';

/** Structural marker recognized on one trimmed line. */
export interface MarkerMatch {
  kind: PartKind;
  name?: string;
}

/** Directive recognized on one trimmed line. */
export interface DirectiveMatch {
  key: string;
  value?: string;
  anomaly?: string;
}

/**
 * Marker-recognition rules and structural capabilities of one song markup dialect.
 * All dialects feed the same tokenizer and parser; only these rules differ.
 */
export interface DialectRules {
  id: DialectId;
  matchDirective(content: string): DirectiveMatch | undefined;
  matchMarker(content: string): MarkerMatch | undefined;
  isComment(content: string): boolean;
  /** Whether stacked chord-over-lyric lines are recognized. */
  chordLines: boolean;
  /** Which `[...]` groups inside lyric lines are read as anchored chords. */
  inlineChords: 'none' | 'chord-like' | 'all';
  /** How unmarked content is grouped into parts. */
  unmarkedBlocks: 'leading-part' | 'verses';
  /** Whether an unmarked block repeating an earlier block is a chorus repeat. */
  repeatedBlocksAsChorus: boolean;
}

/** Section keywords and the part kind they denote. */
const KIND_WORDS = new Map<string, PartKind>([
  ['verse', 'verse'],
  ['stanza', 'verse'],
  ['strophe', 'verse'],
  ['chorus', 'chorus'],
  ['refrain', 'chorus'],
  ['hook', 'chorus'],
  ['bridge', 'bridge'],
  ['intro', 'intro'],
  ['outro', 'outro'],
  ['ending', 'outro'],
  ['coda', 'outro'],
  ['pre-chorus', 'other'],
  ['prechorus', 'other'],
  ['post-chorus', 'other'],
  ['postchorus', 'other'],
  ['interlude', 'other'],
  ['instrumental', 'other'],
  ['solo', 'other'],
  ['tag', 'other']
]);

const KIND_WORD_PATTERN =
  'verse|stanza|strophe|chorus|refrain|hook|bridge|intro|outro|ending|coda|pre-?chorus|post-?chorus|interlude|instrumental|solo|tag';

/** Part kind named by the first word of `label`, if it is a section keyword. */
export function kindForLabel(label: string): PartKind | undefined {
  const firstWord = label.trim().split(/\s+/)[0] ?? '';
  return KIND_WORDS.get(firstWord.toLowerCase());
}

/** True when `label` is only a section keyword without number or qualifier. */
export function isBareKindWord(label: string): boolean {
  return KIND_WORDS.has(label.trim().toLowerCase());
}

const METADATA_LINE_RE = /^#\s*([A-Za-z][\w-]*)\s*:\s*(.*)$/;
const WRAPPED_RE = /^[([]\s*(.*?)\s*[)\]]$/;
const LOOSE_REPEAT_RE = /^(?:repeat|go\s*to|back\s+to)\s+(.+)$/i;
const KEYWORD_REPEAT_RE = new RegExp(`^(?:repeat|go\\s*to|back\\s+to)\\s+((?:${KIND_WORD_PATTERN})\\b.*)$`, 'i');
const TIMES_RE = new RegExp(
  `^((?:${KIND_WORD_PATTERN})(?:\\s+\\d+)?\\s*(?:[x×]\\s*\\d+|\\d+\\s*[x×]))$`,
  'i'
);
const BRACKET_HEADER_RE = /^\[([^[\]]+)\]$/;
const BARE_HEADER_RE = new RegExp(`^((?:${KIND_WORD_PATTERN})(?:\\s+(?:\\d+[a-z]?|[ivx]+))?)\\s*:?$`, 'i');
const UNCLOSED_HEADER_RE = new RegExp(`^\\[\\s*(?:${KIND_WORD_PATTERN})\\b[^\\]]*$`, 'i');

/** `#key: value` metadata, shared by the plain and classic dialects. */
function matchHashMetadata(content: string): DirectiveMatch | undefined {
  const meta = METADATA_LINE_RE.exec(content);
  if (meta) {
    const value = (meta[2] ?? '').trim();
    return { key: (meta[1] ?? '').toLowerCase(), value: value.length > 0 ? value : undefined };
  }
  if (content.startsWith('#')) {
    return { key: 'unknown', anomaly: "metadata line has no 'key: value' form" };
  }
  return undefined;
}

function matchPlainDirective(content: string): DirectiveMatch | undefined {
  const metadata = matchHashMetadata(content);
  if (metadata) {
    return metadata;
  }

  const wrapped = WRAPPED_RE.exec(content);
  const inner = wrapped?.[1] ?? content;
  const target = KEYWORD_REPEAT_RE.exec(inner)?.[1] ?? (wrapped ? LOOSE_REPEAT_RE.exec(inner)?.[1] : undefined);
  if (target) {
    return { key: 'repeat', value: target.trim() };
  }

  const times = TIMES_RE.exec(inner)?.[1];
  if (times) {
    return { key: 'repeat', value: times.trim() };
  }

  if (UNCLOSED_HEADER_RE.test(content)) {
    return { key: 'unknown', anomaly: "section header is missing its closing ']'" };
  }
  return undefined;
}

function matchPlainMarker(content: string): MarkerMatch | undefined {
  const bracket = BRACKET_HEADER_RE.exec(content)?.[1]?.trim();
  if (bracket !== undefined) {
    if (bracket.length === 0 || bracket.startsWith('*') || isChordSymbol(bracket)) {
      return undefined;
    }
    return { kind: kindForLabel(bracket) ?? 'other', name: bracket };
  }

  const bare = BARE_HEADER_RE.exec(content)?.[1]?.trim();
  if (bare) {
    return { kind: kindForLabel(bare) ?? 'other', name: bare };
  }
  return undefined;
}

/** Plain text with section headers, chord-over-lyric lines and free-form repeat hints. */
export const PLAIN_DIALECT: DialectRules = {
  id: 'plain',
  matchDirective: matchPlainDirective,
  matchMarker: matchPlainMarker,
  isComment: () => false,
  chordLines: true,
  inlineChords: 'chord-like',
  unmarkedBlocks: 'leading-part',
  repeatedBlocksAsChorus: false
};

/** Blank-line separated lyric blocks under a `#key: value` header; lyrics only. */
export const CLASSIC_DIALECT: DialectRules = {
  id: 'classic',
  matchDirective: matchHashMetadata,
  matchMarker: () => undefined,
  isComment: () => false,
  chordLines: false,
  inlineChords: 'none',
  unmarkedBlocks: 'verses',
  repeatedBlocksAsChorus: true
};

const CHORDPRO_DIRECTIVE_RE = /^\{\s*([A-Za-z_][\w-]*)\s*(?::\s*(.*?))?\s*\}$/;
const CHORDPRO_UNCLOSED_RE = /^\{[^}]*$/;
const CHORDPRO_END_RE = /^(?:end_of_\w+|eo[cvbtg])$/;

/** Section-start directives; a fixed label is used when the directive carries none. */
const CHORDPRO_SECTION_START = new Map<string, { kind: PartKind; label?: string }>([
  ['start_of_verse', { kind: 'verse' }],
  ['sov', { kind: 'verse' }],
  ['start_of_chorus', { kind: 'chorus' }],
  ['soc', { kind: 'chorus' }],
  ['start_of_bridge', { kind: 'bridge' }],
  ['sob', { kind: 'bridge' }],
  ['start_of_intro', { kind: 'intro' }],
  ['start_of_outro', { kind: 'outro' }],
  ['start_of_pre_chorus', { kind: 'other', label: 'Pre-Chorus' }],
  ['start_of_interlude', { kind: 'other', label: 'Interlude' }],
  ['start_of_instrumental', { kind: 'other', label: 'Instrumental' }],
  ['start_of_solo', { kind: 'other', label: 'Solo' }],
  ['start_of_tab', { kind: 'other', label: 'Tab' }],
  ['sot', { kind: 'other', label: 'Tab' }],
  ['start_of_grid', { kind: 'other', label: 'Grid' }],
  ['sog', { kind: 'other', label: 'Grid' }]
]);

/** Short directive names mapped to their long form. */
const CHORDPRO_ALIASES = new Map<string, string>([
  ['t', 'title'],
  ['st', 'subtitle'],
  ['a', 'artist'],
  ['lang', 'language'],
  ['c', 'comment'],
  ['ci', 'comment'],
  ['cb', 'comment'],
  ['comment_italic', 'comment'],
  ['comment_box', 'comment'],
  ['highlight', 'comment']
]);

const CHORDPRO_METADATA_KEYS = new Set([
  'title',
  'subtitle',
  'artist',
  'author',
  'composer',
  'lyricist',
  'album',
  'year',
  'key',
  'tempo',
  'time',
  'capo',
  'duration',
  'copyright',
  'language',
  'ccli',
  'order'
]);

/** Layout directives with no structural meaning. */
const CHORDPRO_FORMAT_KEYS = new Set([
  'new_page',
  'np',
  'new_physical_page',
  'npp',
  'column_break',
  'colb',
  'columns',
  'col',
  'textfont',
  'textsize',
  'textcolour',
  'chordfont',
  'chordsize',
  'chordcolour',
  'titles',
  'grid',
  'g',
  'no_grid',
  'ng',
  'define',
  'chord',
  'image',
  'pagetype'
]);

function matchChordProDirective(content: string): DirectiveMatch | undefined {
  const match = CHORDPRO_DIRECTIVE_RE.exec(content);
  if (!match) {
    return CHORDPRO_UNCLOSED_RE.test(content) ? { key: 'unknown', anomaly: "directive is missing its closing '}'" } : undefined;
  }

  const rawName = (match[1] ?? '').toLowerCase();
  const name = CHORDPRO_ALIASES.get(rawName) ?? rawName;
  const rawValue = match[2]?.trim();
  const value = rawValue !== undefined && rawValue.length > 0 ? rawValue : undefined;

  if (CHORDPRO_SECTION_START.has(name)) {
    return undefined;
  }
  if (CHORDPRO_END_RE.test(name)) {
    return { key: 'end', value };
  }
  if (name === 'chorus') {
    return { key: 'repeat', value: value ? `Chorus: ${value}` : 'Chorus' };
  }
  if (name === 'comment') {
    return { key: 'comment', value };
  }
  if (name === 'meta') {
    const [metaKey, ...rest] = (value ?? '').split(/\s+/);
    if (!metaKey) {
      return { key: 'unknown', anomaly: "'meta' directive has no name" };
    }
    return { key: metaKey.toLowerCase(), value: rest.join(' ') || undefined };
  }
  if (CHORDPRO_METADATA_KEYS.has(name)) {
    return { key: name, value };
  }
  if (CHORDPRO_FORMAT_KEYS.has(name)) {
    return { key: 'format', value };
  }
  return { key: 'unknown', anomaly: `unknown directive '${rawName}'` };
}

function matchChordProMarker(content: string): MarkerMatch | undefined {
  const match = CHORDPRO_DIRECTIVE_RE.exec(content);
  const section = match ? CHORDPRO_SECTION_START.get((match[1] ?? '').toLowerCase()) : undefined;
  if (!match || !section) {
    return undefined;
  }

  const label = match[2]?.trim();
  const name = label !== undefined && label.length > 0 ? label : section.label;
  return name === undefined ? { kind: section.kind } : { kind: section.kind, name };
}

/** ChordPro: `{directives}`, inline `[chords]`, `#` comment lines. */
export const CHORDPRO_DIALECT: DialectRules = {
  id: 'chordpro',
  matchDirective: matchChordProDirective,
  matchMarker: matchChordProMarker,
  isComment: (content) => content.startsWith('#'),
  chordLines: true,
  inlineChords: 'all',
  unmarkedBlocks: 'verses',
  repeatedBlocksAsChorus: false
};

const DIALECTS: Record<DialectId, DialectRules> = {
  plain: PLAIN_DIALECT,
  chordpro: CHORDPRO_DIALECT,
  classic: CLASSIC_DIALECT
};

/** Rules for a dialect id. */
export function getDialect(id: DialectId): DialectRules {
  return DIALECTS[id];
}

const CHORDPRO_SIGNATURE_RE =
  /^\{\s*(?:title|t|subtitle|st|artist|key|tempo|start_of_\w+|end_of_\w+|so[cvb]|eo[cvb]|chorus|comment|c|ci)\s*(?::[^}]*)?\}$/i;

/**
 * Guess the dialect of raw song text.
 * ChordPro wins on any ChordPro directive; plain wins on any header, repeat hint or chord line;
 * text with none of those is read as classic blocks.
 */
export function detectDialect(rawText: string): DialectId {
  const lines = rawText
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.some((line) => CHORDPRO_SIGNATURE_RE.test(line))) {
    return 'chordpro';
  }

  const looksPlain = lines.some((line) => {
    const directive = matchPlainDirective(line);
    if (directive && (directive.key === 'repeat' || directive.key === 'order')) {
      return true;
    }
    return (
      matchPlainMarker(line) !== undefined || readChordLine(line, 0, DEFAULT_TAB_WIDTH) !== undefined
    );
  });
  return looksPlain ? 'plain' : 'classic';
}
