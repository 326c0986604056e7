import stringWidth from 'string-width';
import type { ColumnSpec, Row } from '../types';

export type ColumnWidths = Readonly<Record<string, number>>;

export interface LayoutResult {
  widths: ColumnWidths;
  /** Minimum widths did not fit; some columns were cut below their minimum */
  degraded: boolean;
}

function contentWidth(column: ColumnSpec, rows: readonly Row[]): number {
  let widest = stringWidth(column.title);
  for (const row of rows) {
    const cell = row.cells[column.id];
    if (cell) widest = Math.max(widest, stringWidth(cell.text));
  }
  return widest;
}

function capOf(column: ColumnSpec, min: number, rows: readonly Row[]): number {
  if (column.maxWidth === undefined) return Infinity;
  const max = column.maxWidth === 'content' ? contentWidth(column, rows) : column.maxWidth;
  return Math.max(min, max);
}

function toRecord(columns: readonly ColumnSpec[], widths: number[]): ColumnWidths {
  const out: Record<string, number> = {};
  columns.forEach((column, i) => {
    out[column.id] = widths[i] ?? 1;
  });
  return out;
}

/**
 * Concrete widths for a table of `columns` in `viewportWidth` cells (gaps
 * already subtracted). Every column keeps at least one cell.
 */
export function computeWidths(
  viewportWidth: number,
  columns: readonly ColumnSpec[],
  rows: readonly Row[],
): LayoutResult {
  const widths = columns.map(c => Math.max(1, c.minWidth));
  const totalMin = widths.reduce((a, b) => a + b, 0);

  if (totalMin > viewportWidth) {
    let excess = totalMin - viewportWidth;
    // lowest weight shrinks first; on equal weight the later column goes first
    const order = columns
      .map((c, i) => ({ weight: c.weight, i }))
      .sort((a, b) => a.weight - b.weight || b.i - a.i);
    for (const { i } of order) {
      if (excess <= 0) break;
      const current = widths[i] ?? 1;
      const cut = Math.min(excess, current - 1);
      widths[i] = current - cut;
      excess -= cut;
    }
    return { widths: toRecord(columns, widths), degraded: true };
  }

  const caps = columns.map((c, i) => capOf(c, widths[i] ?? 1, rows));
  let remaining = viewportWidth - totalMin;

  while (remaining > 0) {
    const open = columns
      .map((_, i) => i)
      .filter(i => (columns[i]?.weight ?? 0) > 0 && (widths[i] ?? 0) < (caps[i] ?? 0));
    if (open.length === 0) break;

    const totalWeight = open.reduce((acc, i) => acc + (columns[i]?.weight ?? 0), 0);
    let granted = 0;
    for (const i of open) {
      const share = Math.floor((remaining * (columns[i]?.weight ?? 0)) / totalWeight);
      const grant = Math.min(share, (caps[i] ?? 0) - (widths[i] ?? 0));
      widths[i] = (widths[i] ?? 0) + grant;
      granted += grant;
    }
    remaining -= granted;

    if (granted === 0) {
      // rounding left every share at zero: hand out single cells, heaviest first
      const heaviest = [...open].sort(
        (a, b) => (columns[b]?.weight ?? 0) - (columns[a]?.weight ?? 0) || a - b,
      );
      for (const i of heaviest) {
        if (remaining === 0) break;
        widths[i] = (widths[i] ?? 0) + 1;
        remaining -= 1;
      }
    }
  }

  return { widths: toRecord(columns, widths), degraded: false };
}
