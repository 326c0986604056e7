import { describe, it, expect } from 'vitest';
import {
  buildLadders,
  classify,
  classifyConnections,
  classifyHits,
  levelRank,
  type Ladder,
} from '../src/core/classifier';
import { defaultSettings } from '../src/utils/config';

const ladders = buildLadders(defaultSettings().thresholds);

describe('classify', () => {
  const ladder: Ladder = {
    base: 'quiet',
    tiers: [
      { from: 10, level: 'light' },
      { from: 20, level: 'moderate' },
      { from: 30, level: 'hot' },
    ],
  };

  it('returns the base below the first threshold', () => {
    expect(classify(0, ladder)).toBe('quiet');
    expect(classify(9.99, ladder)).toBe('quiet');
  });

  it('treats thresholds as inclusive lower bounds', () => {
    expect(classify(10, ladder)).toBe('light');
    expect(classify(20, ladder)).toBe('moderate');
    expect(classify(30, ladder)).toBe('hot');
  });

  it('catches everything above the last threshold in the top tier', () => {
    expect(classify(1e9, ladder)).toBe('hot');
  });

  it('never ranks a larger value lower', () => {
    let previous = levelRank(classify(0, ladders.qps));
    for (let value = 0; value <= 20000; value += 250) {
      const rank = levelRank(classify(value, ladders.qps));
      expect(rank).toBeGreaterThanOrEqual(previous);
      previous = rank;
    }
  });
});

describe('classifyConnections', () => {
  it('is Quiet with no connections and Idle with none active', () => {
    expect(classifyConnections(0, 0, ladders)).toBe('quiet');
    expect(classifyConnections(12, 0, ladders)).toBe('idle');
  });

  it('grades active connections against the default thresholds', () => {
    expect(classifyConnections(5, 3, ladders)).toBe('light');
    expect(classifyConnections(80, 75, ladders)).toBe('moderate');
    expect(classifyConnections(200, 150, ladders)).toBe('saturated');
  });

  it('is monotonic in the active count', () => {
    let previous = 0;
    for (let active = 1; active <= 300; active++) {
      const rank = levelRank(classifyConnections(300, active, ladders));
      expect(rank).toBeGreaterThanOrEqual(previous);
      previous = rank;
    }
  });

  it('follows configured thresholds', () => {
    const custom = buildLadders({
      ...defaultSettings().thresholds,
      connections: { low: 1, medium: 2, high: 3 },
    });
    expect(classifyConnections(10, 2, custom)).toBe('moderate');
    expect(classifyConnections(10, 3, custom)).toBe('saturated');
  });
});

describe('classifyHits', () => {
  it('is Silent without hits', () => {
    expect(classifyHits(0, ladders)).toBe('silent');
  });

  it('climbs through Light, Moderate, Busy and Hot', () => {
    expect(classifyHits(5, ladders)).toBe('light');
    expect(classifyHits(1000, ladders)).toBe('moderate');
    expect(classifyHits(10000, ladders)).toBe('busy');
    expect(classifyHits(100000, ladders)).toBe('hot');
  });
});

describe('errorRate ladder', () => {
  it('uses the configured warning and high percentages', () => {
    expect(classify(0.5, ladders.errorRate)).toBe('quiet');
    expect(classify(1, ladders.errorRate)).toBe('moderate');
    expect(classify(5, ladders.errorRate)).toBe('hot');
    const custom = buildLadders({ ...defaultSettings().thresholds, errorRate: { warning: 10, high: 20 } });
    expect(classify(5, custom.errorRate)).toBe('quiet');
    expect(classify(15, custom.errorRate)).toBe('moderate');
  });
});

describe('queryTime ladder', () => {
  it('marks slow and very slow queries', () => {
    expect(classify(999, ladders.queryTime)).toBe('light');
    expect(classify(1000, ladders.queryTime)).toBe('moderate');
    expect(classify(10000, ladders.queryTime)).toBe('hot');
  });
});
