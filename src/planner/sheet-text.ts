import { formatCrossReferences, type SheetBlock, type SheetPlan } from './sheet.js';

/** Line separating pages in the text rendering. */
export const PAGE_SEPARATOR = '\f';

/** Render a sheet plan as monospace text, one row per line, pages split by a form feed line. */
export function formatSheetText(plan: SheetPlan): string {
  const pages = plan.pages.map((page) => {
    const lines: string[] = page.number === 1 ? [plan.title, ...plan.header, ''] : [];
    page.blockIndexes.forEach((blockIndex, position) => {
      const block = plan.blocks[blockIndex];
      if (!block) {
        return;
      }
      if (position > 0) {
        lines.push('');
      }
      lines.push(...blockLines(block));
    });
    return lines.join('\n');
  });

  return `${pages.join(`\n${PAGE_SEPARATOR}\n`)}\n`;
}

/** Rows of one block in print order; the count always equals `blockHeight(block)`. */
export function blockLines(block: SheetBlock): string[] {
  const lines = [block.label];
  for (const row of block.rows) {
    if (row.chords !== undefined) {
      lines.push(row.chords);
      if (row.lyrics.length > 0) {
        lines.push(row.lyrics);
      }
    } else {
      lines.push(row.lyrics);
    }
  }
  if (block.crossReferences.length > 0) {
    lines.push(formatCrossReferences(block.crossReferences));
  }
  return lines;
}
