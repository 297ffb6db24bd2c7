/** Markup dialects understood by the tokenizer and parser. */
export type DialectId = 'plain' | 'chordpro' | 'classic';

/** Structural role of a part. */
export type PartKind = 'verse' | 'chorus' | 'bridge' | 'intro' | 'outro' | 'other';

/** Every part kind, in the order used for display labels. */
export const PART_KINDS: readonly PartKind[] = ['verse', 'chorus', 'bridge', 'intro', 'outro', 'other'];

/** Canonical song root produced by the parser and consumed by both planners. */
export interface Song {
  readonly title: string;
  readonly metadata: SongMetadata;
  /** Part content in definition order; names are unique. */
  readonly definitions: readonly PartDefinition[];
  /** Performance order after repeat resolution. */
  readonly order: readonly PartInstance[];
  readonly source?: SongSource;
}

/** Where the song text came from and how it was read. */
export interface SongSource {
  readonly name?: string;
  readonly dialect: DialectId;
}

/** Well-known metadata fields plus every raw tag seen in the source. */
export interface SongMetadata {
  readonly subtitle?: string;
  readonly author?: string;
  readonly language?: string;
  readonly key?: string;
  readonly tempo?: string;
  /** Lower-cased tag name to value, including the well-known fields. */
  readonly tags: Readonly<Record<string, string>>;
}

/** Unique content of one named part. */
export interface PartDefinition {
  readonly name: string;
  readonly kind: PartKind;
  readonly lines: readonly LyricLine[];
  readonly sourceLine?: number;
}

/** One occurrence of a part in performance order. */
export interface PartInstance {
  readonly name: string;
  readonly repeat?: number;
  readonly override?: string;
}

/** One display line of a part. */
export interface LyricLine {
  readonly segments: readonly Segment[];
  readonly sourceLine?: number;
}

/** Plain lyric text. */
export interface TextSegment {
  readonly kind: 'text';
  readonly text: string;
}

/** Chord symbol anchored at a character offset of the line text. */
export interface ChordSegment {
  readonly kind: 'chord';
  readonly chord: string;
  readonly offset: number;
  /** Visual column relative to the start of the line text, tabs expanded. */
  readonly column: number;
}

/** Non-chord marker (performance hint, repeat sign) anchored like a chord. */
export interface AnnotationSegment {
  readonly kind: 'annotation';
  readonly text: string;
  readonly offset: number;
  readonly column: number;
}

export type AnchorSegment = ChordSegment | AnnotationSegment;
export type Segment = TextSegment | AnchorSegment;

/** Narrow a segment to the anchored variants. */
export function isAnchor(segment: Segment): segment is AnchorSegment {
  return segment.kind !== 'text';
}

/** Rendered text of a line: its text segments joined, anchors ignored. */
export function lineText(line: LyricLine): string {
  let text = '';
  for (const segment of line.segments) {
    if (segment.kind === 'text') {
      text += segment.text;
    }
  }
  return text;
}

/** Anchored segments of a line in order. */
export function lineAnchors(line: LyricLine): AnchorSegment[] {
  return line.segments.filter(isAnchor);
}

/** Display value of an anchor (chord symbol or annotation text). */
export function anchorLabel(anchor: AnchorSegment): string {
  return anchor.kind === 'chord' ? anchor.chord : anchor.text;
}

/** Normalize a part name for lookups: case-insensitive, single spaces. */
export function normalizePartName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

/** Find a definition by name using the same normalization as the parser. */
export function getPartDefinition(song: Song, name: string): PartDefinition | undefined {
  const wanted = normalizePartName(name);
  return song.definitions.find((definition) => normalizePartName(definition.name) === wanted);
}

/** Human label for a part kind, e.g. `chorus` → `Chorus`. */
export function partKindLabel(kind: PartKind): string {
  return kind.charAt(0).toUpperCase() + kind.slice(1);
}
