import type { TerminalSize, ViewId } from '../types';

export const MIN_COLUMNS = 60;
export const MIN_ROWS = 14;

/** Header, rule, page strip, sub-page strip, heading, column titles and the 3-line footer */
export const CHROME_ROWS = 9;

export const GRAPH_HEIGHT = 10;
/** Graphs go side by side from this width */
export const SIDE_BY_SIDE_COLUMNS = 120;
/** Title, metrics and rule */
export const CARD_ROWS = 3;
/** The counters table keeps at least this many rows under the graphs */
const MIN_TABLE_ROWS = 3;

export type GraphArrangement = 'side-by-side' | 'stacked' | 'none';

export interface PerformancePlan {
  cards: boolean;
  graphs: GraphArrangement;
  /** Plot rows per graph, excluding its title and axis */
  graphHeight: number;
  /** Rows taken above the counters table */
  rows: number;
}

export function isTooSmall(size: TerminalSize): boolean {
  return size.columns < MIN_COLUMNS || size.rows < MIN_ROWS;
}

/**
 * What of the Performance dashboard fits above its table
 */
export function performancePlan(size: TerminalSize): PerformancePlan {
  const available = size.rows - CHROME_ROWS;
  const cards = available - CARD_ROWS >= MIN_TABLE_ROWS;
  let rows = cards ? CARD_ROWS : 0;

  let graphs: GraphArrangement = 'none';
  let graphHeight = 0;
  if (size.columns >= SIDE_BY_SIDE_COLUMNS) {
    const block = GRAPH_HEIGHT + 2;
    if (available - rows - block >= MIN_TABLE_ROWS) {
      graphs = 'side-by-side';
      graphHeight = GRAPH_HEIGHT;
      rows += block;
    }
  } else {
    const block = 2 * (GRAPH_HEIGHT - 2 + 2);
    if (available - rows - block >= MIN_TABLE_ROWS) {
      graphs = 'stacked';
      graphHeight = GRAPH_HEIGHT - 2;
      rows += block;
    }
  }
  return { cards, graphs, graphHeight, rows };
}

/**
 * Table body rows for a view at the given terminal size
 */
export function bodyHeight(view: ViewId, size: TerminalSize): number {
  const extra = view === 'performance.overview' ? performancePlan(size).rows : 0;
  return Math.max(1, size.rows - CHROME_ROWS - extra);
}
