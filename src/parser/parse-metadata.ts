import path from 'node:path';

import type { SongMetadata } from '../core/song.js';

type MetadataField = Exclude<keyof SongMetadata, 'tags'>;

/** Tag names read into each well-known metadata field, by priority. */
const FIELD_SOURCES: ReadonlyArray<[MetadataField, readonly string[]]> = [
  ['subtitle', ['subtitle']],
  ['author', ['author', 'artist', 'composer', 'lyricist']],
  ['language', ['language']],
  ['key', ['key']],
  ['tempo', ['tempo', 'bpm']]
];

/** Build song metadata from collected tags. */
export function buildMetadata(tags: ReadonlyMap<string, string>): SongMetadata {
  const fields: Partial<Record<MetadataField, string>> = {};
  for (const [field, names] of FIELD_SOURCES) {
    const value = names.map((name) => tags.get(name)).find((candidate) => candidate !== undefined);
    if (value !== undefined) {
      fields[field] = value;
    }
  }
  return { ...fields, tags: Object.fromEntries(tags) };
}

/** Title from the `title` tag, else the source file stem, else empty. */
export function resolveTitle(tags: ReadonlyMap<string, string>, sourceName: string | undefined): string {
  const title = tags.get('title');
  if (title !== undefined) {
    return title;
  }
  if (sourceName === undefined || sourceName.length === 0) {
    return '';
  }
  const base = path.basename(sourceName);
  return path.basename(base, path.extname(base));
}
