/**
 * Shared type definitions for proxytop
 */

/**
 * Top-level pages, in strip order
 */
export type PageId = 'frontend' | 'backend' | 'runtime' | 'performance' | 'logs';

/**
 * One table-backed view per page/sub-page
 */
export type ViewId =
  | 'frontend.user-host'
  | 'frontend.by-user'
  | 'frontend.by-host'
  | 'frontend.slow-queries'
  | 'frontend.patterns'
  | 'backend.servers'
  | 'runtime.users'
  | 'runtime.rules'
  | 'runtime.backends'
  | 'runtime.mysql-vars'
  | 'runtime.admin-vars'
  | 'runtime.stats'
  | 'runtime.hostgroups'
  | 'performance.overview'
  | 'logs.tail';

/**
 * Ordered activity levels shared by every metric kind
 */
export type ActivityLevel =
  | 'quiet'
  | 'silent'
  | 'idle'
  | 'light'
  | 'moderate'
  | 'busy'
  | 'saturated'
  | 'hot'
  | 'offline';

/**
 * Destructive admin actions guarded by a confirmation
 */
export type ActionId = 'reset-digest' | 'reset-backend-stats' | 'reload-query-rules';

export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

/**
 * A single value as returned by the admin interface
 */
export type SqlValue = string | number | null;

/**
 * A raw record from the data provider, keyed by result column name
 */
export type DataRecord = Readonly<Record<string, SqlValue>>;

export interface Cell {
  /** Display text */
  text: string;
  /** Numeric value used for classification and footer totals */
  raw?: number;
  /** Activity level shown by a status cell */
  level?: ActivityLevel;
}

/**
 * A table row. `C` is the column-id union of the view that built it; code
 * that handles rows of any view sees the default, plain `string`.
 */
export interface Row<C extends string = string> {
  /** Stable identity within a view */
  key: string;
  /** One cell per column id */
  cells: Readonly<Record<C, Cell>>;
  /** Lower-cased text the fuzzy filter matches against, built once per refresh */
  searchText: string;
  /** Row tint */
  level?: ActivityLevel;
  /** Render the whole row dimmed (inactive rules, users) */
  muted?: boolean;
  /** View-specific scope tag (log level on the Logs view) */
  tag?: string;
}

export type Alignment = 'left' | 'right';

export interface ColumnSpec<C extends string = string> {
  id: C;
  title: string;
  minWidth: number;
  /** Upper bound; 'content' caps at the widest cell, omitted means unbounded */
  maxWidth?: number | 'content';
  /** Relative share of spare width; 0 never grows */
  weight: number;
  align: Alignment;
}

export interface TerminalSize {
  columns: number;
  rows: number;
}

/**
 * Counters sampled on every refresh tick, regardless of the active view
 */
export interface MetricsSnapshot {
  questions: number;
  uptimeSeconds: number;
  clientConnections: number;
  activeConnections: number;
  poolUsed: number;
  poolFree: number;
  backendErrors: number;
  onlineServers: number;
  totalServers: number;
  slowQueries: number;
}

export interface Thresholds {
  connections: { low: number; medium: number; high: number };
  hitsPerSecond: { low: number; medium: number; high: number };
  qps: { low: number; medium: number; high: number };
  slowQueryMs: number;
  errorRate: { warning: number; high: number };
}

/**
 * Normalized keyboard input
 */
export type SpecialKey =
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'pageUp'
  | 'pageDown'
  | 'home'
  | 'end'
  | 'tab'
  | 'escape'
  | 'return'
  | 'backspace';

export type KeyEvent =
  | { kind: 'char'; char: string; ctrl: boolean }
  | { kind: 'special'; key: SpecialKey };
