import type { LyricLine, PartDefinition, PartKind } from '../core/song.js';
import { anchorLabel, normalizePartName, partKindLabel } from '../core/song.js';
import { isBareKindWord } from './dialects.js';
import { IMPLICIT_LEADING_PART_FALLBACK_NAME, IMPLICIT_LEADING_PART_NAME } from './parse-constants.js';
import { addDiagnostic, type ParseContext } from './parse-context.js';
import { buildPartLines, type PartBodyToken } from './parse-lines.js';
import type { Token } from './tokens.js';

/** Part as collected from the token stream, before names are final. */
export interface RawPart {
  index: number;
  kind: PartKind;
  /** Label written on the marker, if any. */
  label?: string;
  /** `marker`: opened by a marker; `leading`: content before the first marker; `block`: unmarked block. */
  origin: 'marker' | 'leading' | 'block';
  sourceLine: number;
  body: PartBodyToken[];
  lines: LyricLine[];
  name: string;
  /** Index of the part this one plays again instead of defining new content. */
  aliasOf?: number;
}

/** Directive value with the position it was read from. */
export interface DirectiveValue {
  value: string;
  line: number;
  column: number;
}

/** One entry of the performance order before references are resolved. */
export type Slot = { type: 'part'; part: number } | ({ type: 'reference' } & DirectiveValue);

/** Output of the grouping pass. */
export interface GroupedSong {
  parts: RawPart[];
  slots: Slot[];
  /** Metadata tags in first-seen order, first value wins. */
  tags: Map<string, string>;
  order?: DirectiveValue;
}

/** Keys with structural meaning; every other directive key is a metadata tag. */
const STRUCTURAL_KEYS = new Set(['end', 'repeat', 'order', 'comment', 'format', 'unknown']);

/** Group tokens into raw parts, performance slots, metadata tags and the order directive. */
export function groupTokens(tokens: readonly Token[], ctx: ParseContext): GroupedSong {
  const grouped: GroupedSong = { parts: [], slots: [], tags: new Map() };
  let current: RawPart | undefined;

  const open = (kind: PartKind, origin: RawPart['origin'], line: number, label?: string): RawPart => {
    const part: RawPart = { index: grouped.parts.length, kind, origin, sourceLine: line, body: [], lines: [], name: '' };
    if (label !== undefined) {
      part.label = label;
    }
    grouped.parts.push(part);
    grouped.slots.push({ type: 'part', part: part.index });
    return part;
  };

  const openImplicit = (line: number): RawPart =>
    ctx.dialect.unmarkedBlocks === 'leading-part' && grouped.parts.length === 0
      ? open('other', 'leading', line)
      : open('verse', 'block', line);

  for (const token of tokens) {
    switch (token.type) {
      case 'blank':
        if (current?.origin === 'block') {
          current = undefined;
        } else {
          current?.body.push(token);
        }
        break;
      case 'marker':
        current = open(token.kind, 'marker', token.line, token.name);
        break;
      case 'chords':
      case 'lyric':
        current ??= openImplicit(token.line);
        current.body.push(token);
        break;
      case 'directive':
        if (token.anomaly !== undefined) {
          addDiagnostic(
            ctx,
            'UNRECOGNIZED_MARKER',
            'warning',
            'tokenize-anomaly',
            `Unrecognized markup '${token.raw}': ${token.anomaly}.`,
            token
          );
        } else if (token.key === 'end') {
          if (current?.origin !== 'marker') {
            addDiagnostic(
              ctx,
              'UNMATCHED_END_MARKER',
              'warning',
              'structural-warning',
              `End marker '${token.raw}' has no open section.`,
              token
            );
          }
          current = undefined;
        } else if (token.key === 'repeat') {
          if (token.value !== undefined) {
            grouped.slots.push({ type: 'reference', value: token.value, line: token.line, column: token.column });
          }
        } else if (token.key === 'comment') {
          if (token.value !== undefined) {
            current ??= openImplicit(token.line);
            current.body.push(token);
          }
        } else if (token.key === 'order') {
          readOrderDirective(grouped, token.value, token, ctx);
        } else if (!STRUCTURAL_KEYS.has(token.key) && token.value !== undefined) {
          readMetadataDirective(grouped, token.key, token.value, token, ctx);
        }
        break;
    }
  }

  for (const part of grouped.parts) {
    part.lines = buildPartLines(part.body, ctx);
  }
  return grouped;
}

function readOrderDirective(
  grouped: GroupedSong,
  value: string | undefined,
  position: { line: number; column: number },
  ctx: ParseContext
): void {
  if (value === undefined) {
    return;
  }
  if (grouped.order) {
    addDiagnostic(
      ctx,
      'DUPLICATE_ORDER',
      'warning',
      'structural-warning',
      `Order directive ignored; the order from line ${grouped.order.line} is kept.`,
      position
    );
    return;
  }
  grouped.order = { value, line: position.line, column: position.column };
}

function readMetadataDirective(
  grouped: GroupedSong,
  key: string,
  value: string,
  position: { line: number; column: number },
  ctx: ParseContext
): void {
  const existing = grouped.tags.get(key);
  if (existing !== undefined) {
    addDiagnostic(
      ctx,
      'DUPLICATE_METADATA',
      'warning',
      'structural-warning',
      `Metadata '${key}' is already set to '${existing}'; later value '${value}' ignored.`,
      position
    );
    return;
  }
  grouped.tags.set(key, value);
}

/** Case-insensitive content key of a part, chords included. */
function contentKey(lines: readonly LyricLine[]): string {
  return lines
    .map((line) =>
      line.segments.map((segment) => (segment.kind === 'text' ? segment.text : `[${anchorLabel(segment)}]`)).join('')
    )
    .join('\n')
    .toLowerCase();
}

/**
 * Mark parts that repeat earlier content as aliases.
 * Repeated unmarked blocks become chorus repeats where the dialect reads them so; unlabelled
 * sections repeating an unlabelled section of the same kind are repeats in every dialect.
 */
export function classifyRepeatedParts(grouped: GroupedSong, ctx: ParseContext): void {
  const seen = new Map<string, RawPart>();

  for (const part of grouped.parts) {
    if (part.lines.length === 0 || part.label !== undefined || part.origin === 'leading') {
      continue;
    }

    const key = `${part.origin === 'block' ? 'block' : part.kind}\u0000${contentKey(part.lines)}`;
    const first = seen.get(key);
    if (!first) {
      seen.set(key, part);
      continue;
    }

    if (part.origin === 'block' && !ctx.dialect.repeatedBlocksAsChorus) {
      continue;
    }
    if (part.origin === 'block') {
      first.kind = 'chorus';
    }
    part.aliasOf = first.index;
  }
}

/**
 * Give every non-alias part its name.
 * Explicit labels are kept; bare verse labels and unlabelled parts are numbered per kind,
 * skipping names an explicit label already takes.
 */
export function assignPartNames(grouped: GroupedSong): void {
  const owners = grouped.parts.filter((part) => part.aliasOf === undefined);
  const isAutoNamed = (part: RawPart): boolean =>
    part.origin !== 'leading' &&
    (part.label === undefined || (part.kind === 'verse' && isBareKindWord(part.label)));

  const taken = new Set(
    owners.filter((part) => !isAutoNamed(part) && part.label !== undefined).map((part) => normalizePartName(part.label ?? ''))
  );

  const autoCounts = new Map<PartKind, number>();
  for (const part of owners) {
    if (isAutoNamed(part)) {
      autoCounts.set(part.kind, (autoCounts.get(part.kind) ?? 0) + 1);
    }
  }

  const nextNumber = new Map<PartKind, number>();
  for (const part of owners) {
    if (part.origin === 'leading') {
      part.name = taken.has(normalizePartName(IMPLICIT_LEADING_PART_NAME))
        ? IMPLICIT_LEADING_PART_FALLBACK_NAME
        : IMPLICIT_LEADING_PART_NAME;
    } else if (!isAutoNamed(part)) {
      part.name = part.label ?? '';
    } else if (
      part.kind !== 'verse' &&
      (autoCounts.get(part.kind) ?? 0) === 1 &&
      !taken.has(normalizePartName(partKindLabel(part.kind)))
    ) {
      part.name = partKindLabel(part.kind);
    } else {
      const base = partKindLabel(part.kind);
      let number = nextNumber.get(part.kind) ?? 1;
      while (taken.has(normalizePartName(`${base} ${number}`))) {
        number += 1;
      }
      part.name = `${base} ${number}`;
      nextNumber.set(part.kind, number + 1);
    }
  }

  for (const part of grouped.parts) {
    if (part.aliasOf !== undefined) {
      part.name = grouped.parts[part.aliasOf]?.name ?? part.name;
    }
  }
}

/**
 * Collect unique definitions in first-seen order.
 * A part repeating a defined name plays that definition again when it is an empty marker or
 * has the same content; otherwise it is a DUPLICATE_PART error and its content is discarded,
 * leaving the slot to play the first one.
 */
export function collectDefinitions(grouped: GroupedSong, ctx: ParseContext): PartDefinition[] {
  const definitions = new Map<string, { definition: PartDefinition; content: string }>();

  for (const part of grouped.parts) {
    if (part.aliasOf !== undefined) {
      continue;
    }

    const key = normalizePartName(part.name);
    const content = contentKey(part.lines);
    const existing = definitions.get(key);
    if (!existing) {
      definitions.set(key, {
        definition: { name: part.name, kind: part.kind, lines: part.lines, sourceLine: part.sourceLine },
        content
      });
      continue;
    }

    const replay = (part.origin === 'marker' && part.lines.length === 0) || content === existing.content;
    if (!replay) {
      addDiagnostic(
        ctx,
        'DUPLICATE_PART',
        'error',
        'structural-error',
        `Part '${part.name}' is already defined on line ${existing.definition.sourceLine ?? '?'}; this content is discarded.`,
        { line: part.sourceLine }
      );
    }
    part.name = existing.definition.name;
  }

  return [...definitions.values()].map((entry) => entry.definition);
}
