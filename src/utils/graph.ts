/**
 * ASCII line graph: one column per sample (newest on the right), ● marks the
 * value and │ fills below it. Scale labels sit on the top, middle and bottom rows.
 */
export function lineGraph(values: readonly number[], width: number, height: number, title: string): string[] {
  if (width < 10 || height < 3) return [];
  const points = values.slice(-width);
  if (points.length < 2) return [`${title} (insufficient data)`];

  let min = Math.min(...points);
  let max = Math.max(...points);
  if (min > 0) min = 0;
  if (max === min) max = min + 1;

  const scaled = points.map(p => {
    const h = Math.floor(((p - min) / (max - min)) * (height - 1));
    return Math.max(0, Math.min(height - 1, h));
  });

  const lines: string[] = [title];
  const mid = Math.floor(height / 2);
  for (let row = height - 1; row >= 0; row--) {
    let line = '';
    for (const h of scaled) {
      line += h === row ? '●' : h > row ? '│' : ' ';
    }
    let label = '';
    if (row === height - 1) label = max.toFixed(1);
    else if (row === 0) label = min.toFixed(1);
    else if (row === mid) label = ((max + min) / 2).toFixed(1);
    lines.push(`${line}  ${label}`.trimEnd());
  }
  lines.push(`${'─'.repeat(points.length)} (${points.length}s)`);
  return lines;
}
