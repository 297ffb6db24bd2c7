/** Visual width of `text` when tabs advance to the next multiple of `tabWidth`. */
export function visualWidth(text: string, tabWidth: number, startColumn = 0): number {
  let column = startColumn;
  for (let index = 0; index < text.length; index += 1) {
    column = text.charAt(index) === '\t' ? nextTabStop(column, tabWidth) : column + 1;
  }
  return column - startColumn;
}

/** Replace tabs with spaces up to the next tab stop. */
export function expandTabs(text: string, tabWidth: number, startColumn = 0): string {
  if (!text.includes('\t')) {
    return text;
  }

  let out = '';
  let column = startColumn;
  for (let index = 0; index < text.length; index += 1) {
    const char = text.charAt(index);
    if (char === '\t') {
      const next = nextTabStop(column, tabWidth);
      out += ' '.repeat(next - column);
      column = next;
    } else {
      out += char;
      column += 1;
    }
  }
  return out;
}

/**
 * Map a visual column back to a character offset of `text`.
 * `column` counts from the start of `text`, which itself begins at `startColumn` for tab stops.
 * Columns inside an expanded tab resolve to the tab itself; columns past the end resolve to
 * `text.length`.
 */
export function offsetForColumn(text: string, column: number, tabWidth: number, startColumn = 0): number {
  if (column <= 0) {
    return 0;
  }

  const target = startColumn + column;
  let current = startColumn;
  for (let index = 0; index < text.length; index += 1) {
    const next = text.charAt(index) === '\t' ? nextTabStop(current, tabWidth) : current + 1;
    if (target < next) {
      return index;
    }
    current = next;
  }
  return text.length;
}

/** Split `line` into its leading-whitespace width and trimmed content. */
export function measureIndent(line: string, tabWidth: number): { indent: number; content: string } {
  const content = line.trim();
  const leading = line.slice(0, line.length - line.trimStart().length);
  return { indent: visualWidth(leading, tabWidth), content };
}

/** Start columns of whitespace-separated words, tabs expanded. */
export function wordColumns(text: string, tabWidth: number, startColumn = 0): Array<{ word: string; column: number }> {
  const words: Array<{ word: string; column: number }> = [];
  let column = startColumn;
  let current = '';
  let currentStart = 0;

  for (let index = 0; index < text.length; index += 1) {
    const char = text.charAt(index);
    if (char === ' ' || char === '\t') {
      if (current.length > 0) {
        words.push({ word: current, column: currentStart });
        current = '';
      }
      column = char === '\t' ? nextTabStop(column, tabWidth) : column + 1;
      continue;
    }

    if (current.length === 0) {
      currentStart = column;
    }
    current += char;
    column += 1;
  }

  if (current.length > 0) {
    words.push({ word: current, column: currentStart });
  }
  return words;
}

function nextTabStop(column: number, tabWidth: number): number {
  return (Math.floor(column / tabWidth) + 1) * tabWidth;
}
