import { classify, LEVEL_STYLES } from '@core/classifier';
import type { AppState } from '@core/app-state';
import { formatClock, formatNumber } from '@utils/format';
import { seg, spread, type ColorRole, type Line } from './frame';

export type Health = 'OK' | 'WARNING' | 'CRITICAL';

const HEALTH_COLORS: Readonly<Record<Health, ColorRole>> = {
  OK: 'success',
  WARNING: 'warning',
  CRITICAL: 'error',
};

/** More running slow queries than this raises a warning */
const SLOW_QUERY_WARNING = 10;

export function health(state: AppState): Health {
  const m = state.metrics;
  if (!m) return 'OK';
  if (m.backendErrors > 0) return 'CRITICAL';
  if (m.slowQueries > SLOW_QUERY_WARNING) return 'WARNING';
  return 'OK';
}

export function trendArrow(current: number, average: number): string {
  if (current > average * 1.1) return '↗';
  if (current < average * 0.9) return '↘';
  return '→';
}

/**
 * Colour for a load figure against low/medium thresholds
 */
export function loadColor(value: number, levels: { low: number; medium: number }): ColorRole {
  if (value < levels.low) return 'success';
  if (value < levels.medium) return 'warning';
  return 'error';
}

/**
 * `ProxySQL 2.5.5` from a version comment like `2.5.5-10-g195bd70`
 */
export function shortVersion(version: string): string {
  return version.split('-')[0] ?? version;
}

export function renderHeader(state: AppState, width: number): Line {
  const status = health(state);
  const m = state.metrics;
  const average = state.qpsHistory.average();
  const active = m?.activeConnections ?? 0;
  const total = m?.clientConnections ?? 0;
  const pct = total > 0 ? Math.round((active / total) * 100) : 0;
  const qpsLevel = classify(state.qps, state.ladders.qps);

  const left: Line = [
    seg(` ${status} `, { color: HEALTH_COLORS[status], bold: true, inverse: true }),
    seg(' '),
    seg(`ProxySQL ${shortVersion(state.identity.version)}`, { color: 'accent', bold: true }),
    seg(` @ ${state.identity.host}`, { color: 'muted' }),
    seg('  QPS: ', { color: 'muted' }),
    seg(formatNumber(state.qps), { color: LEVEL_STYLES[qpsLevel].color, bold: true }),
    seg(` ${trendArrow(state.qps, average)} ${formatNumber(average)}`, { color: 'muted' }),
    seg('  Conn: ', { color: 'muted' }),
    seg(`${active}/${total}`, { color: loadColor(active, state.thresholds.connections), bold: true }),
    seg(` (${pct}%)`, { color: 'muted' }),
  ];
  return spread(left, [seg(formatClock(state.clock), { color: 'muted' })], width);
}
