/**
 * Display formatting and the ASCII line graph.
 */
import { describe, it, expect } from 'vitest';
import {
  formatBytes,
  formatClock,
  formatLatency,
  formatNumber,
  formatPercent,
  formatTime,
  squash,
} from '../src/utils/format';
import { lineGraph } from '../src/utils/graph';

describe('formatNumber', () => {
  it('compacts thousands, millions and billions', () => {
    expect(formatNumber(999)).toBe('999');
    expect(formatNumber(1500)).toBe('1.5K');
    expect(formatNumber(2_300_000)).toBe('2.3M');
    expect(formatNumber(4_000_000_000)).toBe('4.0B');
  });

  it('drops fractions and keeps the sign', () => {
    expect(formatNumber(12.9)).toBe('12');
    expect(formatNumber(-1500)).toBe('-1.5K');
  });
});

describe('durations and sizes', () => {
  it('formats milliseconds', () => {
    expect(formatTime(250)).toBe('250ms');
    expect(formatTime(1500)).toBe('1.5s');
    expect(formatTime(120000)).toBe('2.0m');
  });

  it('formats backend latency from microseconds', () => {
    expect(formatLatency(12000)).toBe('12ms');
    expect(formatLatency(1_200_000)).toBe('1.2s');
  });

  it('formats bytes as GB, or MB for small values', () => {
    expect(formatBytes(2 * 1073741824)).toBe('2.00GB');
    expect(formatBytes(5 * 1048576)).toBe('5.00MB');
  });

  it('formats percentages', () => {
    expect(formatPercent(12.345, 1)).toBe('12.3%');
    expect(formatPercent(75)).toBe('75%');
  });

  it('formats a wall clock', () => {
    expect(formatClock(Date.now())).toMatch(/^\d{2}:\d{2}:\d{2}$/);
  });

  it('collapses whitespace in SQL', () => {
    expect(squash('SELECT *\n   FROM t\tWHERE id = ? ')).toBe('SELECT * FROM t WHERE id = ?');
  });
});

describe('lineGraph', () => {
  it('needs room to draw', () => {
    expect(lineGraph([1, 2, 3], 5, 5, 'QPS')).toEqual([]);
    expect(lineGraph([1, 2, 3], 20, 2, 'QPS')).toEqual([]);
  });

  it('needs two samples', () => {
    expect(lineGraph([7], 20, 5, 'QPS')).toEqual(['QPS (insufficient data)']);
  });

  it('plots samples with scale labels', () => {
    expect(lineGraph([0, 4], 10, 3, 'QPS')).toEqual(['QPS', ' ●  4.0', ' │  2.0', '●│  0.0', '── (2s)']);
  });

  it('keeps only the newest samples that fit', () => {
    const values = Array.from({ length: 30 }, (_, i) => i);
    const lines = lineGraph(values, 12, 4, 'T');
    expect(lines[lines.length - 1]).toBe(`${'─'.repeat(12)} (12s)`);
    expect(lines).toHaveLength(6);
  });
});
