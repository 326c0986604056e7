/**
 * Column width allocation: spare width by weight, caps, and the degraded
 * path when minimum widths do not fit.
 */
import { describe, it, expect } from 'vitest';
import { computeWidths } from '../src/core/layout';
import type { ColumnSpec, Row } from '../src/types';

function column(id: string, minWidth: number, weight: number, maxWidth?: ColumnSpec['maxWidth']): ColumnSpec {
  return { id, title: id.toUpperCase(), minWidth, weight, align: 'left', ...(maxWidth !== undefined && { maxWidth }) };
}

function row(key: string, cells: Record<string, string>): Row {
  const mapped: Record<string, { text: string }> = {};
  for (const [id, text] of Object.entries(cells)) mapped[id] = { text };
  return { key, cells: mapped, searchText: Object.values(cells).join(' ') };
}

const total = (widths: Readonly<Record<string, number>>) => Object.values(widths).reduce((a, b) => a + b, 0);

describe('computeWidths', () => {
  it('splits spare width by weight', () => {
    const { widths, degraded } = computeWidths(30, [column('a', 5, 1), column('b', 5, 3)], []);
    expect(widths).toEqual({ a: 10, b: 20 });
    expect(degraded).toBe(false);
  });

  it('never grows a zero-weight column', () => {
    const { widths } = computeWidths(10, [column('a', 4, 0), column('b', 2, 1)], []);
    expect(widths).toEqual({ a: 4, b: 6 });
  });

  it('caps content-sized columns at their widest cell', () => {
    const rows = [row('1', { a: 'alice', b: 'x' }), row('2', { a: 'bob', b: 'y' })];
    const { widths } = computeWidths(20, [column('a', 3, 1, 'content'), column('b', 2, 1)], rows);
    expect(widths).toEqual({ a: 5, b: 15 });
  });

  it('respects a fixed maximum', () => {
    const { widths } = computeWidths(40, [column('a', 2, 5, 8), column('b', 2, 1)], []);
    expect(widths['a']).toBe(8);
    expect(total(widths)).toBe(40);
  });

  it('fills the viewport exactly when rounding leaves cells over', () => {
    const { widths } = computeWidths(11, [column('a', 1, 1), column('b', 1, 1), column('c', 1, 1)], []);
    expect(total(widths)).toBe(11);
  });

  it('shrinks the lightest column first when minimums do not fit', () => {
    const { widths, degraded } = computeWidths(6, [column('a', 5, 1), column('b', 5, 3)], []);
    expect(degraded).toBe(true);
    expect(widths).toEqual({ a: 1, b: 5 });
  });

  it('keeps every column at least one cell wide', () => {
    const { widths, degraded } = computeWidths(0, [column('a', 5, 1), column('b', 5, 1)], []);
    expect(degraded).toBe(true);
    expect(widths).toEqual({ a: 1, b: 1 });
  });

  it('never exceeds the viewport when not degraded', () => {
    const columns = [column('a', 3, 2), column('b', 4, 1, 6), column('c', 2, 0)];
    for (let width = 9; width <= 80; width++) {
      const { widths, degraded } = computeWidths(width, columns, []);
      expect(degraded).toBe(false);
      expect(total(widths)).toBeLessThanOrEqual(width);
    }
  });
});
