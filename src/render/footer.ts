import { LEVEL_STYLES } from '@core/classifier';
import { activeModel, activeViewDefinition, type AppState } from '@core/app-state';
import type { ActivityLevel, Thresholds } from '../types';
import { LOG_LEVELS, type ViewDefinition } from '@views/index';
import { formatNumber } from '@utils/format';
import { clipLine, seg, type Line } from './frame';

function levelItem(level: ActivityLevel, suffix = ''): Line {
  const style = LEVEL_STYLES[level];
  return [seg(`${style.glyph} ${style.label}${suffix}`, { color: style.color }), seg('  ')];
}

function connectionLegend(connections: Thresholds['connections']): Line {
  return [
    ...levelItem('quiet'),
    ...levelItem('idle'),
    ...levelItem('light', ` 1-${connections.medium - 1}`),
    ...levelItem('moderate', ` ${connections.medium}-${connections.high - 1}`),
    ...levelItem('saturated', ` ${connections.high}+`),
  ];
}

export function renderLegend(state: AppState, view: ViewDefinition): Line {
  const { connections, hitsPerSecond } = state.thresholds;
  switch (view.legend) {
    case 'connections':
      return connectionLegend(connections);
    case 'servers':
      return [...connectionLegend(connections), ...levelItem('offline')];
    case 'hits':
      return [
        ...levelItem('silent'),
        ...levelItem('light', ` <${formatNumber(hitsPerSecond.low)}/s`),
        ...levelItem('moderate', ` ${formatNumber(hitsPerSecond.low)}+`),
        ...levelItem('busy', ` ${formatNumber(hitsPerSecond.medium)}+`),
        ...levelItem('hot', ` ${formatNumber(hitsPerSecond.high)}+`),
      ];
    case 'logs': {
      const model = activeModel(state);
      const scope = model.scope;
      const line: Line = [seg('Levels: ', { color: 'muted' })];
      for (const level of LOG_LEVELS) {
        const shown = scope === null || scope.has(level);
        line.push(seg(level, shown ? { color: 'accent', bold: true } : { color: 'muted', dim: true }));
        line.push(seg(' '));
      }
      line.push(seg(`· Follow: ${model.follow ? 'on' : 'off'}`, { color: 'muted' }));
      return line;
    }
    case 'none':
      return [];
  }
}

export function hints(state: AppState, view: ViewDefinition): string {
  if (state.nav.mode === 'confirming') return 'y/Enter confirm  any other key cancel';
  const parts = ['←/→ page', 'Tab view', '↑↓ scroll', '/ filter'];
  if (view.id === 'logs.tail') parts.push('a follow', 'e/w/i/d level', 'r all');
  else parts.push('r refresh');
  if (view.clearAction) parts.push('c clear');
  parts.push('q quit');
  return parts.join('  ');
}

/**
 * Stats, legend or message, and the key hints or filter prompt
 */
export function renderFooter(state: AppState, width: number): Line[] {
  const view = activeViewDefinition(state);
  const model = activeModel(state);
  const stats: Line = [seg(view.stats(model.filteredRows, model.rows), { color: 'muted' })];

  const message = state.message;
  const second: Line = message
    ? [seg(message.text, { color: message.kind === 'error' ? 'error' : 'success', bold: true })]
    : renderLegend(state, view);

  const third: Line =
    state.nav.mode === 'filtering'
      ? [seg('Filter: ', { color: 'accent', bold: true }), seg(`${model.filterQuery}█`)]
      : [seg(hints(state, view), { color: 'muted' })];

  return [clipLine(stats, width), clipLine(second, width), clipLine(third, width)];
}
