import type { ActivityLevel, Thresholds } from '../types';
import type { ColorRole } from '@render/frame';

export interface Tier {
  /** Inclusive lower bound */
  from: number;
  level: ActivityLevel;
}

/**
 * Ascending thresholds with the level each one opens.
 * `base` applies below the first threshold.
 */
export interface Ladder {
  base: ActivityLevel;
  tiers: readonly Tier[];
}

export interface LevelStyle {
  glyph: string;
  label: string;
  color: ColorRole;
  /** Position in the severity order, used for comparisons */
  rank: number;
}

export const LEVEL_STYLES: Readonly<Record<ActivityLevel, LevelStyle>> = {
  quiet: { glyph: '○', label: 'Quiet', color: 'muted', rank: 0 },
  silent: { glyph: '○', label: 'Silent', color: 'muted', rank: 0 },
  idle: { glyph: '◐', label: 'Idle', color: 'foreground', rank: 1 },
  light: { glyph: '◑', label: 'Light', color: 'success', rank: 2 },
  moderate: { glyph: '◕', label: 'Moderate', color: 'warning', rank: 3 },
  busy: { glyph: '●', label: 'Busy', color: 'accentSecondary', rank: 4 },
  saturated: { glyph: '●', label: 'Saturated', color: 'error', rank: 5 },
  hot: { glyph: '▲', label: 'Hot', color: 'error', rank: 5 },
  offline: { glyph: '✗', label: 'Offline', color: 'error', rank: 6 },
};

/**
 * Level of the highest tier whose threshold the value reaches
 */
export function classify(value: number, ladder: Ladder): ActivityLevel {
  let level = ladder.base;
  for (const tier of ladder.tiers) {
    if (value < tier.from) break;
    level = tier.level;
  }
  return level;
}

export function levelRank(level: ActivityLevel): number {
  return LEVEL_STYLES[level].rank;
}

/**
 * Per-metric ladders built from configured thresholds
 */
export interface Ladders {
  connections: Ladder;
  hits: Ladder;
  qps: Ladder;
  queryTime: Ladder;
  errorRate: Ladder;
}

export function buildLadders(thresholds: Thresholds): Ladders {
  const { connections, hitsPerSecond, qps, slowQueryMs, errorRate } = thresholds;
  return {
    connections: {
      base: 'light',
      tiers: [
        { from: connections.medium, level: 'moderate' },
        { from: connections.high, level: 'saturated' },
      ],
    },
    hits: {
      base: 'light',
      tiers: [
        { from: hitsPerSecond.low, level: 'moderate' },
        { from: hitsPerSecond.medium, level: 'busy' },
        { from: hitsPerSecond.high, level: 'hot' },
      ],
    },
    qps: {
      base: 'quiet',
      tiers: [
        { from: qps.low, level: 'light' },
        { from: qps.medium, level: 'moderate' },
        { from: qps.high, level: 'hot' },
      ],
    },
    queryTime: {
      base: 'light',
      tiers: [
        { from: slowQueryMs, level: 'moderate' },
        { from: slowQueryMs * 10, level: 'hot' },
      ],
    },
    errorRate: {
      base: 'quiet',
      tiers: [
        { from: errorRate.warning, level: 'moderate' },
        { from: errorRate.high, level: 'hot' },
      ],
    },
  };
}

/**
 * Connection activity: nothing open is Quiet, nothing running is Idle,
 * otherwise the active count goes through the ladder.
 */
export function classifyConnections(total: number, active: number, ladders: Ladders): ActivityLevel {
  if (total <= 0) return 'quiet';
  if (active <= 0) return 'idle';
  return classify(active, ladders.connections);
}

export function classifyHits(hitsPerSecond: number, ladders: Ladders): ActivityLevel {
  if (hitsPerSecond <= 0) return 'silent';
  return classify(hitsPerSecond, ladders.hits);
}
