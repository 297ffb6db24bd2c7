import type { Song } from '../core/song.js';

const PLACEHOLDER_RE = /\{\{\s*([\w-]+)\s*\}\}/g;

/** Values a meta template can name: every tag, the well-known fields, and `title`. */
export function templateValues(song: Song): Record<string, string> {
  const { tags, ...fields } = song.metadata;
  const values: Record<string, string> = { ...tags };
  for (const [key, value] of Object.entries(fields)) {
    if (typeof value === 'string') {
      values[key] = value;
    }
  }
  values.title = song.title;
  return values;
}

/** Replace `{{key}}` placeholders; unknown keys render as empty text. */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER_RE, (_match, key: string) =>
    Object.hasOwn(values, key) ? (values[key] ?? '') : ''
  );
}
