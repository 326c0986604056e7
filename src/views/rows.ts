import type { ActivityLevel, Cell, ColumnSpec, DataRecord, Row } from '../types';
import { LEVEL_STYLES } from '@core/classifier';
import type { RowContext } from './types';

/**
 * Numeric field; the admin interface returns most counters as strings
 */
export function num(record: DataRecord, key: string): number {
  const value = record[key];
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  if (typeof value === 'string') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

export function str(record: DataRecord, key: string, fallback = ''): string {
  const value = record[key];
  if (value === null || value === undefined || value === '') return fallback;
  return String(value);
}

export function text(value: string, raw?: number): Cell {
  return raw === undefined ? { text: value } : { text: value, raw };
}

export function count(value: number): Cell {
  return { text: String(value), raw: value };
}

export function statusCell(level: ActivityLevel): Cell {
  const style = LEVEL_STYLES[level];
  return { text: `${style.glyph} ${style.label}`, level };
}

/**
 * Address cell that shows `ip (host)` once the name is cached.
 * The hostname is returned separately so it lands in the search text.
 */
export function hostCell(address: string, ctx: RowContext): { cell: Cell; extra: string[] } {
  const host = ctx.hostOf(address);
  if (!host) return { cell: { text: address }, extra: [] };
  return { cell: { text: `${address} (${host})` }, extra: [host] };
}

export interface RowInit<C extends string> {
  key: string;
  cells: Record<C, Cell>;
  extra?: readonly string[];
  level?: ActivityLevel;
  muted?: boolean;
  tag?: string;
}

/**
 * Build a row and its lower-cased search text from every displayed cell
 */
export function makeRow<C extends string>(init: RowInit<C>): Row<C> {
  const parts = Object.values<Cell>(init.cells).map(c => c.text);
  if (init.extra) parts.push(...init.extra);
  const row: Row<C> = {
    key: init.key,
    cells: init.cells,
    searchText: parts.join(' ').toLowerCase(),
  };
  if (init.level) row.level = init.level;
  if (init.muted) row.muted = true;
  if (init.tag) row.tag = init.tag;
  return row;
}

export function sumRaw<C extends string>(rows: readonly Row<C>[], column: C): number {
  return rows.reduce((acc, r) => acc + (r.cells[column]?.raw ?? 0), 0);
}

/** Column spec shorthand: `col('user', 'User', 8, { weight: 2 })` */
export function col<C extends string>(
  id: C,
  title: string,
  minWidth: number,
  options: Partial<Pick<ColumnSpec, 'maxWidth' | 'weight' | 'align'>> = {},
): ColumnSpec<C> {
  const spec: ColumnSpec<C> = {
    id,
    title,
    minWidth,
    weight: options.weight ?? 0,
    align: options.align ?? 'left',
  };
  if (options.maxWidth !== undefined) spec.maxWidth = options.maxWidth;
  return spec;
}

/** Status column shared by the connection tables */
export const STATUS_COLUMN = col('status', 'Status', 11, { maxWidth: 'content', weight: 1 });
