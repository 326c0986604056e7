import { classify, LEVEL_STYLES } from '@core/classifier';
import type { AppState } from '@core/app-state';
import { formatPercent } from '@utils/format';
import { lineGraph } from '@utils/graph';
import { loadColor } from './header';
import { clipLine, pad, seg, type ColorRole, type Line } from './frame';
import type { PerformancePlan } from './viewport';

interface Card {
  title: string;
  value: string;
  color: ColorRole;
  detail: string;
}

export function performanceCards(state: AppState): Card[] {
  const m = state.metrics;
  const qps = state.qps;
  const average = state.qpsHistory.average();
  const peak = state.trends.qps.peak();
  const active = m?.activeConnections ?? 0;
  const total = m?.clientConnections ?? 0;
  const efficiency = state.trends.poolEfficiency.latest()?.value ?? 0;
  const online = m?.onlineServers ?? 0;
  const servers = m?.totalServers ?? 0;
  const errors = m?.backendErrors ?? 0;
  const errorRate = state.trends.errorRate.latest()?.value ?? 0;

  return [
    {
      title: 'QUERIES/SEC',
      value: String(Math.trunc(qps)),
      color: LEVEL_STYLES[classify(qps, state.ladders.qps)].color,
      detail: `avg:${Math.trunc(average)} peak:${Math.trunc(peak)}`,
    },
    {
      title: 'CONNECTIONS',
      value: String(active),
      color: loadColor(active, state.thresholds.connections),
      detail: `/${total} (${formatPercent(efficiency)} eff)`,
    },
    {
      title: 'BACKEND SERVERS',
      value: `${online}/${servers}`,
      color: online === servers ? 'success' : online > 0 ? 'warning' : 'error',
      detail: 'online',
    },
    {
      title: 'ERRORS',
      value: String(errors),
      color: LEVEL_STYLES[classify(errorRate, state.ladders.errorRate)].color,
      detail: `(${formatPercent(errorRate, 2)})`,
    },
  ];
}

function renderCards(state: AppState, width: number): Line[] {
  const cards = performanceCards(state);
  const cell = Math.floor(width / cards.length);
  const titles: Line = [];
  const values: Line = [];
  for (const card of cards) {
    titles.push(seg(pad(card.title, cell), { color: 'muted' }));
    const value = `${card.value} `;
    values.push(seg(value, { color: card.color, bold: true }));
    values.push(seg(pad(card.detail, Math.max(0, cell - value.length)), { color: 'muted' }));
  }
  return [clipLine(titles, width), clipLine(values, width), [seg('─'.repeat(width), { color: 'border' })]];
}

function graphLines(values: readonly number[], width: number, height: number, title: string): string[] {
  const lines = lineGraph(values, width, height, title);
  const block = height + 2;
  while (lines.length < block) lines.push('');
  return lines.slice(0, block);
}

/**
 * Metric cards and trend graphs shown above the counters table
 */
export function renderPerformance(state: AppState, plan: PerformancePlan, width: number): Line[] {
  const lines: Line[] = plan.cards ? renderCards(state, width) : [];
  const qps = state.trends.qps.values();
  const connections = state.trends.activeConnections.values();

  if (plan.graphs === 'side-by-side') {
    const half = Math.floor((width - 3) / 2);
    const left = graphLines(qps, half - 10, plan.graphHeight, 'QPS (last 2min)');
    const right = graphLines(connections, half - 10, plan.graphHeight, 'Active Connections (last 2min)');
    left.forEach((text, i) => {
      lines.push(
        clipLine(
          [
            seg(pad(text, half), { color: 'success' }),
            seg('   '),
            seg(right[i] ?? '', { color: 'info' }),
          ],
          width,
        ),
      );
    });
  } else if (plan.graphs === 'stacked') {
    const graphWidth = width - 20;
    for (const text of graphLines(qps, graphWidth, plan.graphHeight, 'QPS (last 2min)')) {
      lines.push(clipLine([seg(text, { color: 'success' })], width));
    }
    for (const text of graphLines(connections, graphWidth, plan.graphHeight, 'Active Connections (last 2min)')) {
      lines.push(clipLine([seg(text, { color: 'info' })], width));
    }
  }
  return lines;
}
