import {
  normalizePartName,
  PART_KINDS,
  type LyricLine,
  type PartDefinition,
  type PartInstance,
  type Song
} from './song.js';

/** Thrown when `createSong` receives a value that breaks a model invariant. */
export class SongModelError extends Error {
  readonly issues: readonly string[];

  constructor(issues: string[]) {
    super(`Invalid song model: ${issues.join('; ')}`);
    this.name = 'SongModelError';
    this.issues = issues;
  }
}

/**
 * Build the immutable song value.
 * The input is copied, checked against every structural invariant and deep-frozen.
 */
export function createSong(input: Song): Song {
  const issues = collectSongIssues(input);
  if (issues.length > 0) {
    throw new SongModelError(issues);
  }

  return deepFreeze(structuredClone(input));
}

/** Return every invariant violation of `song`; an empty list means the song is valid. */
export function collectSongIssues(song: Song): string[] {
  const issues: string[] = [];
  const names = new Set<string>();

  for (const definition of song.definitions) {
    const key = normalizePartName(definition.name);
    if (key.length === 0) {
      issues.push('part definition has an empty name');
    } else if (names.has(key)) {
      issues.push(`duplicate part definition '${definition.name}'`);
    }
    names.add(key);

    if (!PART_KINDS.includes(definition.kind)) {
      issues.push(`part '${definition.name}' has unknown kind '${String(definition.kind)}'`);
    }

    definition.lines.forEach((line, index) => {
      issues.push(...collectLineIssues(definition, line, index));
    });
  }

  song.order.forEach((instance, position) => {
    issues.push(...collectInstanceIssues(instance, position, names));
  });

  if (song.definitions.length > 0 && song.order.length === 0) {
    issues.push('song has part definitions but an empty performance order');
  }

  return issues;
}

/** Check one performance entry against the known definition names. */
function collectInstanceIssues(instance: PartInstance, position: number, names: Set<string>): string[] {
  const issues: string[] = [];
  if (!names.has(normalizePartName(instance.name))) {
    issues.push(`order entry ${position + 1} references unknown part '${instance.name}'`);
  }
  if (instance.repeat !== undefined && (!Number.isInteger(instance.repeat) || instance.repeat <= 0)) {
    issues.push(`order entry ${position + 1} has invalid repeat count ${instance.repeat}`);
  }
  return issues;
}

/** Anchors must sit exactly after the text that precedes them, in non-decreasing order. */
function collectLineIssues(definition: PartDefinition, line: LyricLine, index: number): string[] {
  const issues: string[] = [];
  const where = `part '${definition.name}' line ${index + 1}`;
  let textLength = 0;
  let lastOffset = 0;

  for (const segment of line.segments) {
    if (segment.kind === 'text') {
      textLength += segment.text.length;
      continue;
    }

    if (segment.offset < lastOffset) {
      issues.push(`${where}: anchor offsets decrease`);
    }
    if (segment.offset !== textLength) {
      issues.push(`${where}: anchor at offset ${segment.offset} does not match preceding text length ${textLength}`);
    }
    if (!Number.isInteger(segment.column) || segment.column < 0) {
      issues.push(`${where}: anchor column ${segment.column} is not a non-negative integer`);
    }
    lastOffset = segment.offset;
  }

  return issues;
}

/** Recursively freeze plain objects and arrays. */
function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
