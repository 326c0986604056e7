import { keyValueView, type KeyValueColumn } from './runtime';
import type { PageDefinition, ViewDefinition } from './types';

/**
 * Graphs and metric cards are drawn from the trend buffers; the table below
 * them lists the global counters they are derived from.
 */
const overview: ViewDefinition<KeyValueColumn> = {
  ...keyValueView(
    'performance.overview',
    'Overview',
    'PERFORMANCE: SYSTEM OVERVIEW',
    'Variable_name',
    'Variable_value',
  ),
  stats: (rows, all) => `Counters: ${rows.length} of ${all.length}`,
};

export const performancePage: PageDefinition = {
  id: 'performance',
  title: 'Performance',
  views: [overview],
};
