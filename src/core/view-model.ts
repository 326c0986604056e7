import type { ColumnSpec, Row, ViewId } from '../types';
import { filterRows } from './fuzzy-filter';
import { computeWidths, type ColumnWidths } from './layout';

/** One space between adjacent columns */
export const COLUMN_GAP = 1;

/**
 * Presentation state of a single page/sub-page.
 *
 * `filteredRows` is derived from `rows`, the scope tags and the filter query.
 * After every mutation the scroll offset is clamped to
 * `[0, max(0, filteredRows.length - viewportHeight)]`.
 */
export class ViewModel {
  private allRows: readonly Row[] = [];
  private visibleRows: readonly Row[] = [];
  private offset = 0;
  private query = '';
  private scopeTags: ReadonlySet<string> | null = null;
  private followTail = false;
  private height = 1;
  private width = 0;
  private widths: ColumnWidths = {};
  private degradedLayout = false;
  private loaded = false;

  constructor(
    public readonly id: ViewId,
    public readonly columns: readonly ColumnSpec[],
  ) {
    this.relayout();
  }

  get rows(): readonly Row[] {
    return this.allRows;
  }

  get filteredRows(): readonly Row[] {
    return this.visibleRows;
  }

  get scrollOffset(): number {
    return this.offset;
  }

  get filterQuery(): string {
    return this.query;
  }

  get scope(): ReadonlySet<string> | null {
    return this.scopeTags;
  }

  get follow(): boolean {
    return this.followTail;
  }

  get viewportHeight(): number {
    return this.height;
  }

  get columnWidths(): ColumnWidths {
    return this.widths;
  }

  get degraded(): boolean {
    return this.degradedLayout;
  }

  /** Whether data has been applied at least once */
  get hasData(): boolean {
    return this.loaded;
  }

  get maxScrollOffset(): number {
    return Math.max(0, this.visibleRows.length - this.height);
  }

  /** Rows currently inside the viewport */
  get windowRows(): readonly Row[] {
    return this.visibleRows.slice(this.offset, this.offset + this.height);
  }

  /**
   * Replace the full row set (wholesale, never patched)
   */
  applyData(rows: readonly Row[]): void {
    this.allRows = rows;
    this.loaded = true;
    this.recompute();
    this.relayout();
  }

  applyFilter(query: string): void {
    this.query = query;
    this.recompute();
  }

  /** Restrict rows to the given tags (null shows all) */
  setScope(tags: readonly string[] | null): void {
    this.scopeTags = tags === null ? null : new Set(tags);
    this.offset = 0;
    this.recompute();
  }

  /** Keep the viewport pinned to the last rows after each refresh */
  setFollow(follow: boolean): void {
    this.followTail = follow;
    this.clamp();
  }

  scroll(delta: number): void {
    this.offset += delta;
    this.clamp();
  }

  pageUp(): void {
    this.scroll(-this.pageSize());
  }

  pageDown(): void {
    this.scroll(this.pageSize());
  }

  jumpTop(): void {
    this.offset = 0;
    this.clamp();
  }

  jumpBottom(): void {
    this.offset = this.maxScrollOffset;
    this.clamp();
  }

  /**
   * Body size available to this view. Recomputes column widths when the
   * width changes.
   */
  setViewport(width: number, height: number): void {
    this.height = Math.max(1, height);
    if (width !== this.width) {
      this.width = width;
      this.relayout();
    }
    this.clamp();
  }

  private pageSize(): number {
    return Math.max(1, this.height);
  }

  private recompute(): void {
    const tags = this.scopeTags;
    const scoped =
      tags === null ? this.allRows : this.allRows.filter(r => r.tag !== undefined && tags.has(r.tag));
    this.visibleRows = filterRows(this.query, scoped);
    this.clamp();
  }

  private relayout(): void {
    const gaps = Math.max(0, this.columns.length - 1) * COLUMN_GAP;
    const result = computeWidths(Math.max(0, this.width - gaps), this.columns, this.allRows);
    this.widths = result.widths;
    this.degradedLayout = result.degraded;
  }

  private clamp(): void {
    const max = this.maxScrollOffset;
    if (this.followTail) {
      this.offset = max;
      return;
    }
    this.offset = Math.min(Math.max(0, this.offset), max);
  }
}
