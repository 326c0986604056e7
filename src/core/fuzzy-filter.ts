/**
 * fzf-style subsequence matching: every query character must appear in
 * `text`, in order, not necessarily adjacent. Case-insensitive.
 */
export function fuzzyMatch(query: string, text: string): boolean {
  const q = query.toLowerCase();
  const t = text.toLowerCase();
  let qi = 0;
  for (let ti = 0; ti < t.length && qi < q.length; ti++) {
    if (q[qi] === t[ti]) qi++;
  }
  return qi === q.length;
}

/**
 * Rows whose searchText matches the query, in their original order.
 * The empty query keeps every row.
 */
export function filterRows<T extends { searchText: string }>(query: string, rows: readonly T[]): T[] {
  if (query === '') return [...rows];
  return rows.filter(row => fuzzyMatch(query, row.searchText));
}
