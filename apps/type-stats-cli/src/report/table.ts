import type { GlobalResult, TypeStats } from '@app/type-stats';

export type SortOrder = 'count' | 'bytes' | 'type';

export type ReportRow = Readonly<{
  type: string;
  count: number;
  totalBytes: number;
}>;

const HEADERS = ['Type', 'Count', 'Size Bytes'] as const;

/** Column width of a cell, counted in code points. */
function cellWidth(cell: string): number {
  return [...cell].length;
}

function padCell(cell: string, width: number): string {
  return ' '.repeat(Math.max(0, width - cellWidth(cell))) + cell;
}

function compareType(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortRows(
  types: ReadonlyMap<string, Readonly<TypeStats>>,
  order: SortOrder
): ReportRow[] {
  const rows: ReportRow[] = [];
  for (const [type, stats] of types) {
    rows.push({ type, count: stats.count, totalBytes: stats.totalBytes });
  }

  switch (order) {
    case 'count':
      return rows.sort((a, b) => b.count - a.count || compareType(a.type, b.type));
    case 'bytes':
      return rows.sort((a, b) => b.totalBytes - a.totalBytes || compareType(a.type, b.type));
    case 'type':
      return rows.sort((a, b) => compareType(a.type, b.type));
  }
}

/**
 * Renders the ASCII report: one right-aligned row per type between bordered
 * header and footer, then `skipped lines: N` when any line was skipped.
 */
export function formatTable(result: GlobalResult, order: SortOrder = 'count'): string {
  const cells: string[][] = sortRows(result.types, order).map((row) => [
    row.type,
    String(row.count),
    String(row.totalBytes),
  ]);

  const widths = HEADERS.map((header, col) =>
    cells.reduce((max, row) => Math.max(max, cellWidth(row[col] ?? '')), header.length)
  );

  const border = `+${widths.map((w) => '-'.repeat(w + 2)).join('+')}+`;
  const renderRow = (row: readonly string[]): string =>
    `|${row.map((cell, col) => ` ${padCell(cell, widths[col] ?? 0)} `).join('|')}|`;

  const lines = [border, renderRow(HEADERS), border, ...cells.map(renderRow), border];
  if (result.skippedLines > 0) {
    lines.push(`skipped lines: ${result.skippedLines}`);
  }
  return `${lines.join('\n')}\n`;
}

export function formatJson(result: GlobalResult, order: SortOrder = 'count'): string {
  const payload = {
    types: sortRows(result.types, order),
    skippedLines: result.skippedLines,
    skipped: result.skipped,
    totalLines: result.totalLines,
    totalBytes: result.totalBytes,
  };
  return `${JSON.stringify(payload, null, 2)}\n`;
}
