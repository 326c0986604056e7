import type { Ladders } from '@core/classifier';
import type {
  ActionId,
  ColumnSpec,
  DataRecord,
  PageId,
  Row,
  Thresholds,
  ViewId,
} from '../types';

/**
 * Everything a row builder may consult besides the records themselves
 */
export interface RowContext {
  ladders: Ladders;
  thresholds: Thresholds;
  /** Cached short hostname for an address; never blocks */
  hostOf(address: string): string | undefined;
  /** Current hits/sec for a query rule id */
  hitRate(ruleId: string): number;
}

/** `servers` is the connections legend plus Offline */
export type LegendKind = 'connections' | 'servers' | 'hits' | 'logs' | 'none';

/**
 * A table view over a fixed column schema. Row builders must fill a cell for
 * every id in `C`.
 */
export interface ViewDefinition<C extends string = string> {
  id: ViewId;
  /** Sub-page strip label */
  label: string;
  /** Heading above the table */
  heading: string;
  columns: readonly ColumnSpec<C>[];
  buildRows(records: readonly DataRecord[], ctx: RowContext): Row<C>[];
  /** Footer statistics for the rows currently shown */
  stats(rows: readonly Row<C>[], all: readonly Row<C>[]): string;
  legend: LegendKind;
  clearAction?: ActionId;
}

export interface PageDefinition {
  id: PageId;
  title: string;
  views: readonly ViewDefinition[];
}
