/**
 * Plain-text table for CLI output: header, dashed separator, one line per row.
 * Cells wider than the cap are cut and end in an ellipsis.
 */

export const MAX_CELL_WIDTH = 60;

export function formatTable(columns: string[], rows: string[][], maxWidth = MAX_CELL_WIDTH): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return `${columns.join(' | ')}\n(0 rows)`;

  const widths = columns.map((col) => Math.min(col.length, maxWidth));
  for (const row of rows) {
    for (let i = 0; i < columns.length; i++) {
      widths[i] = Math.min(Math.max(widths[i], cell(row, i).length), maxWidth);
    }
  }

  const lines: string[] = [];
  lines.push(columns.map((col, i) => fit(col, widths[i])).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));
  for (const row of rows) {
    lines.push(columns.map((_, i) => fit(cell(row, i), widths[i])).join(' | '));
  }

  return lines.map((line) => line.trimEnd()).join('\n');
}

function cell(row: string[], index: number): string {
  return (row[index] ?? '').replace(/[\r\n\t]/g, ' ');
}

function fit(value: string, width: number): string {
  return value.length > width ? value.slice(0, width - 1) + '…' : value.padEnd(width);
}
