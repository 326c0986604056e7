import stringWidth from 'string-width';
import type { Theme } from '@themes/types';
import type { Alignment } from '../types';

/**
 * Theme slot a segment is painted with; resolved by the Ink layer
 */
export type ColorRole = Exclude<keyof Theme, 'name'>;

export interface SegmentStyle {
  color?: ColorRole;
  bold?: boolean;
  dim?: boolean;
  inverse?: boolean;
}

export interface Segment {
  text: string;
  style?: SegmentStyle;
}

export type Line = Segment[];

/**
 * A complete screen: one entry per terminal row, each no wider than the terminal
 */
export interface Frame {
  width: number;
  lines: Line[];
}

export function seg(text: string, style?: SegmentStyle): Segment {
  return style ? { text, style } : { text };
}

export function lineText(line: Line): string {
  return line.map(s => s.text).join('');
}

export function lineWidth(line: Line): number {
  return line.reduce((acc, s) => acc + stringWidth(s.text), 0);
}

/**
 * Cut text to at most `width` cells, marking the cut with an ellipsis
 */
export function truncate(text: string, width: number): string {
  if (width <= 0) return '';
  if (stringWidth(text) <= width) return text;
  if (width === 1) return '…';
  let out = '';
  let used = 0;
  for (const ch of text) {
    const w = stringWidth(ch);
    if (used + w > width - 1) break;
    out += ch;
    used += w;
  }
  return out + '…';
}

export function pad(text: string, width: number, align: Alignment = 'left'): string {
  const cut = truncate(text, width);
  const fill = ' '.repeat(Math.max(0, width - stringWidth(cut)));
  return align === 'right' ? fill + cut : cut + fill;
}

/**
 * Clip a line to `width` cells, trimming or dropping trailing segments
 */
export function clipLine(line: Line, width: number): Line {
  const out: Line = [];
  let used = 0;
  for (const segment of line) {
    if (used >= width) break;
    const w = stringWidth(segment.text);
    if (used + w <= width) {
      out.push(segment);
      used += w;
      continue;
    }
    let text = '';
    for (const ch of segment.text) {
      const cw = stringWidth(ch);
      if (used + cw > width) break;
      text += ch;
      used += cw;
    }
    out.push({ ...segment, text });
    break;
  }
  return out;
}

/**
 * Place `right` at the right edge of `left`, dropping it when there is no room
 */
export function spread(left: Line, right: Line, width: number): Line {
  const lw = lineWidth(left);
  const rw = lineWidth(right);
  if (lw + rw + 1 > width) return clipLine(left, width);
  return [...left, seg(' '.repeat(width - lw - rw)), ...right];
}

export function center(line: Line, width: number): Line {
  const w = lineWidth(line);
  if (w >= width) return clipLine(line, width);
  return [seg(' '.repeat(Math.floor((width - w) / 2))), ...line];
}
