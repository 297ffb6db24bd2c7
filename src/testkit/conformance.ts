import { access, readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

import type { DialectId } from '../core/song.js';

/** Fixture activation status in the conformance suite. */
export type FixtureStatus = 'active' | 'skip';
/** Parse strictness applied during conformance fixture execution. */
export type FixtureParseMode = 'strict' | 'lenient';

/**
 * Observations a fixture must reproduce.
 * `diagnostics` lists diagnostic codes in emission order; `slides` is the slide count under the
 * fixture's presentation options.
 */
export interface ConformanceFixtureExpect {
  diagnostics: string[];
  definitions: string[];
  order: string[];
  /** Dialect `auto` detection must pick. */
  dialect?: DialectId;
  slides?: number;
}

/** Presentation options a fixture plans with. */
export interface ConformanceFixturePresentation {
  max_lines_per_slide?: number;
  keep_part_together?: boolean;
  expand_repeats?: boolean;
}

/** Metadata contract for one conformance fixture sidecar file. */
export interface ConformanceFixtureMeta {
  id: string;
  category: string;
  status: FixtureStatus;
  dialect?: DialectId;
  parse_mode?: FixtureParseMode;
  notes?: string;
  expect: ConformanceFixtureExpect;
  presentation?: ConformanceFixturePresentation;
}

/** Resolved fixture record including metadata and song file paths. */
export interface ConformanceFixtureRecord {
  metaPath: string;
  songPath: string;
  meta: ConformanceFixtureMeta;
}

/** Validation error for malformed conformance metadata. */
export class ConformanceMetadataError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Metadata error in ${filePath}: ${message}`);
    this.name = 'ConformanceMetadataError';
    this.filePath = filePath;
  }
}

/** Accepted metadata filename suffixes. */
const META_SUFFIXES = ['.meta.yaml', '.meta.yml'];
/** Song extensions probed when resolving a fixture payload from metadata. */
const SONG_EXTENSIONS = ['.txt', '.cho', '.song'];
const DIALECTS: readonly DialectId[] = ['plain', 'chordpro', 'classic'];

type YamlObject = Record<string, unknown>;

/** Load and validate all conformance fixture records under `rootDir`. */
export async function loadConformanceFixtures(rootDir: string): Promise<ConformanceFixtureRecord[]> {
  const metaFiles = await findMetadataFiles(rootDir);
  const records: ConformanceFixtureRecord[] = [];

  for (const metaPath of metaFiles) {
    const raw = await readFile(metaPath, 'utf8');
    const meta = parseConformanceMeta(metaPath, parseYaml(raw));
    const songPath = await resolveSongPath(metaPath);
    records.push({ metaPath, songPath, meta });
  }

  records.sort((left, right) => left.meta.id.localeCompare(right.meta.id));
  return records;
}

/** Recursively discover metadata files from the conformance root. */
async function findMetadataFiles(rootDir: string): Promise<string[]> {
  const matches: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
        continue;
      }

      if (META_SUFFIXES.some((suffix) => entry.name.endsWith(suffix))) {
        matches.push(fullPath);
      }
    }
  }

  await walk(rootDir);
  return matches;
}

function isYamlObject(value: unknown): value is YamlObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validate parsed YAML into a `ConformanceFixtureMeta` object. */
export function parseConformanceMeta(filePath: string, input: unknown): ConformanceFixtureMeta {
  if (!isYamlObject(input)) {
    throw new ConformanceMetadataError(filePath, 'metadata must be a YAML object');
  }

  const id = readRequiredString(filePath, input, 'id');
  const category = readRequiredString(filePath, input, 'category');

  const status = readRequiredString(filePath, input, 'status');
  if (status !== 'active' && status !== 'skip') {
    throw new ConformanceMetadataError(filePath, "'status' must be 'active' or 'skip'");
  }

  const meta: ConformanceFixtureMeta = {
    id,
    category,
    status,
    expect: readExpect(filePath, input.expect)
  };

  const dialect = readOptionalDialect(filePath, input, 'dialect');
  if (dialect !== undefined) {
    meta.dialect = dialect;
  }

  const parseMode = readOptionalParseMode(filePath, input, 'parse_mode');
  if (parseMode !== undefined) {
    meta.parse_mode = parseMode;
  }
  const notes = readOptionalString(filePath, input, 'notes');
  if (notes !== undefined) {
    meta.notes = notes;
  }
  const presentation = readOptionalPresentation(filePath, input.presentation);
  if (presentation !== undefined) {
    meta.presentation = presentation;
  }

  return meta;
}

/** Read the required `expect` block. */
function readExpect(filePath: string, value: unknown): ConformanceFixtureExpect {
  if (!isYamlObject(value)) {
    throw new ConformanceMetadataError(filePath, "'expect' must be an object");
  }

  const expect: ConformanceFixtureExpect = {
    diagnostics: readOptionalStringArray(filePath, value, 'diagnostics') ?? [],
    definitions: readRequiredStringArray(filePath, value, 'definitions'),
    order: readRequiredStringArray(filePath, value, 'order')
  };

  const dialect = readOptionalDialect(filePath, value, 'dialect');
  if (dialect !== undefined) {
    expect.dialect = dialect;
  }
  const slides = readOptionalNonNegativeInteger(filePath, value, 'slides');
  if (slides !== undefined) {
    expect.slides = slides;
  }
  return expect;
}

/** Read the optional `presentation` block. */
function readOptionalPresentation(filePath: string, value: unknown): ConformanceFixturePresentation | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isYamlObject(value)) {
    throw new ConformanceMetadataError(filePath, "'presentation' must be an object");
  }

  const presentation: ConformanceFixturePresentation = {};
  const maxLines = readOptionalNonNegativeInteger(filePath, value, 'max_lines_per_slide');
  if (maxLines !== undefined) {
    presentation.max_lines_per_slide = maxLines;
  }
  const keepTogether = readOptionalBoolean(filePath, value, 'keep_part_together');
  if (keepTogether !== undefined) {
    presentation.keep_part_together = keepTogether;
  }
  const expandRepeats = readOptionalBoolean(filePath, value, 'expand_repeats');
  if (expandRepeats !== undefined) {
    presentation.expand_repeats = expandRepeats;
  }
  return presentation;
}

/** Read a required non-empty string metadata field. */
function readRequiredString(filePath: string, obj: YamlObject, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConformanceMetadataError(filePath, `missing or invalid '${key}'`);
  }
  return value;
}

/** Read an optional string metadata field. */
function readOptionalString(filePath: string, obj: YamlObject, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw new ConformanceMetadataError(filePath, `'${key}' must be a string`);
  }

  return value;
}

/** Read an optional dialect id. */
function readOptionalDialect(filePath: string, obj: YamlObject, key: string): DialectId | undefined {
  const value = readOptionalString(filePath, obj, key);
  if (value === undefined) {
    return undefined;
  }

  const dialect = DIALECTS.find((candidate) => candidate === value);
  if (!dialect) {
    throw new ConformanceMetadataError(filePath, `'${key}' must be one of ${DIALECTS.join(', ')}`);
  }
  return dialect;
}

/** Read optional fixture parse-mode and validate enum membership. */
function readOptionalParseMode(filePath: string, obj: YamlObject, key: string): FixtureParseMode | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (value !== 'strict' && value !== 'lenient') {
    throw new ConformanceMetadataError(filePath, `'${key}' must be 'strict' or 'lenient'`);
  }

  return value;
}

/** Read an optional boolean metadata field. */
function readOptionalBoolean(filePath: string, obj: YamlObject, key: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'boolean') {
    throw new ConformanceMetadataError(filePath, `'${key}' must be a boolean`);
  }

  return value;
}

/** Read an optional string-array metadata field. */
function readOptionalStringArray(filePath: string, obj: YamlObject, key: string): string[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!Array.isArray(value)) {
    throw new ConformanceMetadataError(filePath, `'${key}' must be an array of strings`);
  }

  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new ConformanceMetadataError(filePath, `'${key}' must be an array of strings`);
    }
    items.push(item);
  }
  return items;
}

/** Read a required string-array metadata field; an empty list is allowed. */
function readRequiredStringArray(filePath: string, obj: YamlObject, key: string): string[] {
  const value = readOptionalStringArray(filePath, obj, key);
  if (value === undefined) {
    throw new ConformanceMetadataError(filePath, `missing '${key}'`);
  }
  return value;
}

/** Read an optional non-negative integer metadata field. */
function readOptionalNonNegativeInteger(filePath: string, obj: YamlObject, key: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConformanceMetadataError(filePath, `'${key}' must be a non-negative integer`);
  }

  return value;
}

/** Resolve the song file that belongs to one metadata file. */
async function resolveSongPath(metaPath: string): Promise<string> {
  const base = stripMetaSuffix(metaPath);

  for (const extension of SONG_EXTENSIONS) {
    const candidate = `${base}${extension}`;
    if (await exists(candidate)) {
      return candidate;
    }
  }

  throw new ConformanceMetadataError(metaPath, 'no matching song file found for metadata');
}

/** Remove `.meta.yaml`/`.meta.yml` from a metadata file path. */
function stripMetaSuffix(filePath: string): string {
  for (const suffix of META_SUFFIXES) {
    if (filePath.endsWith(suffix)) {
      return filePath.slice(0, -suffix.length);
    }
  }

  return filePath;
}

/** Promise-based existence check used by fixture resolution. */
async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}
