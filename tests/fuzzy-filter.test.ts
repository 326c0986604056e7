/**
 * Fuzzy filter tests: subsequence matching, order preservation and the
 * empty-query identity.
 */
import { describe, it, expect } from 'vitest';
import { filterRows, fuzzyMatch } from '../src/core/fuzzy-filter';

const row = (searchText: string) => ({ searchText });

describe('fuzzyMatch', () => {
  it('matches characters in order, not necessarily adjacent', () => {
    expect(fuzzyMatch('usr1', 'user1@10.0.0.5')).toBe(true);
    expect(fuzzyMatch('usr1', 'use2@10.0.0.6')).toBe(false);
  });

  it('ignores case on both sides', () => {
    expect(fuzzyMatch('ADM', 'admin@localhost')).toBe(true);
    expect(fuzzyMatch('adm', 'ADMIN')).toBe(true);
  });

  it('rejects characters out of order', () => {
    expect(fuzzyMatch('ba', 'ab')).toBe(false);
  });

  it('needs as many repeats as the query has', () => {
    expect(fuzzyMatch('ll', 'hello')).toBe(true);
    expect(fuzzyMatch('lll', 'hello')).toBe(false);
  });

  it('matches everything with an empty query', () => {
    expect(fuzzyMatch('', '')).toBe(true);
    expect(fuzzyMatch('', 'anything')).toBe(true);
  });
});

describe('filterRows', () => {
  const rows = [row('user1@10.0.0.5'), row('use2@10.0.0.6'), row('app@db1'), row('usr1@host')];

  it('returns every row in order for the empty query', () => {
    const out = filterRows('', rows);
    expect(out).toEqual(rows);
    expect(out).not.toBe(rows);
  });

  it('keeps matching rows in their original order', () => {
    expect(filterRows('usr1', rows).map(r => r.searchText)).toEqual(['user1@10.0.0.5', 'usr1@host']);
  });

  it('returns nothing when no row matches', () => {
    expect(filterRows('zzz', rows)).toEqual([]);
  });

  it('is idempotent', () => {
    const once = filterRows('u1', rows);
    expect(filterRows('u1', once)).toEqual(once);
  });

  it('narrows as the query grows', () => {
    const broad = filterRows('u', rows);
    const narrow = filterRows('us1', rows);
    expect(narrow.every(r => broad.includes(r))).toBe(true);
    expect(narrow.length).toBeLessThanOrEqual(broad.length);
  });
});
