import { LEVEL_STYLES } from '@core/classifier';
import { COLUMN_GAP, type ViewModel } from '@core/view-model';
import type { Cell, ColumnSpec, Row } from '../types';
import { pad, seg, truncate, type Line, type Segment, type SegmentStyle } from './frame';

const GAP = ' '.repeat(COLUMN_GAP);

export function renderColumnTitles(model: ViewModel): Line {
  const line: Line = [];
  model.columns.forEach((column, i) => {
    if (i > 0) line.push(seg(GAP));
    line.push(seg(pad(column.title, width(model, column), column.align), { color: 'muted', bold: true }));
  });
  return line;
}

function width(model: ViewModel, column: ColumnSpec): number {
  return model.columnWidths[column.id] ?? column.minWidth;
}

function cellStyle(row: Row, cell: Cell | undefined): SegmentStyle {
  if (row.muted) return { color: 'muted', dim: true };
  if (cell?.level) return { color: LEVEL_STYLES[cell.level].color };
  return { color: 'foreground' };
}

export function renderRow(model: ViewModel, row: Row): Line {
  const line: Line = [];
  model.columns.forEach((column, i) => {
    if (i > 0) line.push(seg(GAP));
    const cell = row.cells[column.id];
    line.push(seg(pad(cell?.text ?? '', width(model, column), column.align), cellStyle(row, cell)));
  });
  return line;
}

/**
 * Exactly `height` body lines: the rows in the viewport, a notice when
 * there is nothing to show, blank lines below
 */
export function renderBody(model: ViewModel, height: number, lineWidth: number): Line[] {
  const lines: Line[] = [];
  if (!model.hasData) {
    lines.push([notice('Waiting for data…', lineWidth)]);
  } else if (model.filteredRows.length === 0) {
    const query = model.filterQuery;
    lines.push([notice(query ? `No matching rows for "${query}"` : 'No matching rows', lineWidth)]);
  } else {
    for (const row of model.windowRows) lines.push(renderRow(model, row));
  }
  while (lines.length < height) lines.push([]);
  return lines.slice(0, height);
}

function notice(text: string, lineWidth: number): Segment {
  return seg(truncate(`  ${text}`, lineWidth), { color: 'muted' });
}
