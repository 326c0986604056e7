/**
 * Static page and view definitions, in strip order
 */
import type { ActionId, ViewId } from '../types';
import { backendPage } from './backend';
import { frontendPage } from './frontend';
import { logsPage } from './logs';
import { performancePage } from './performance';
import { runtimePage } from './runtime';
import type { PageDefinition, ViewDefinition } from './types';

export type { PageDefinition, ViewDefinition, RowContext, LegendKind } from './types';
export { LOG_LEVELS } from './logs';

export const PAGES: readonly PageDefinition[] = [
  frontendPage,
  backendPage,
  runtimePage,
  performancePage,
  logsPage,
];

export const VIEWS: ReadonlyMap<ViewId, ViewDefinition> = new Map(
  PAGES.flatMap(page => page.views.map(view => [view.id, view] as const)),
);

export function getPage(index: number): PageDefinition {
  return PAGES[index] ?? frontendPage;
}

export function getView(id: ViewId): ViewDefinition {
  const view = VIEWS.get(id);
  if (!view) throw new Error(`Unknown view: ${id}`);
  return view;
}

export interface ActionDefinition {
  title: string;
  message: string;
  /** Admin statements run in order */
  statements: readonly string[];
  /** Transient message after success */
  done: string;
}

export const ACTIONS: Readonly<Record<ActionId, ActionDefinition>> = {
  'reset-digest': {
    title: 'CLEAR PATTERN STATS',
    message: 'Clear query digest statistics?',
    statements: ['SELECT * FROM stats_mysql_query_digest_reset LIMIT 1'],
    done: 'Query digest statistics cleared',
  },
  'reset-backend-stats': {
    title: 'CLEAR BACKEND STATS',
    message: 'Clear backend query and error statistics?',
    statements: [
      'SELECT * FROM stats_mysql_connection_pool_reset LIMIT 1',
      'SELECT * FROM stats_mysql_errors_reset LIMIT 1',
    ],
    done: 'Backend statistics cleared',
  },
  'reload-query-rules': {
    title: 'RELOAD QUERY RULES',
    message: 'This reloads ALL query rules to runtime, the only way to clear hit counters. Continue?',
    statements: ['LOAD MYSQL QUERY RULES TO RUNTIME'],
    done: 'Query rules reloaded to runtime',
  },
};
