/**
 * Display formatting for counters, durations and sizes
 */

const GIB = 1073741824;
const MIB = 1048576;

/**
 * Compact count: 999, 1.5K, 2.3M, 4.0B
 */
export function formatNumber(value: number): string {
  const n = Math.trunc(value);
  const abs = Math.abs(n);
  if (abs >= 1e9) return `${(n / 1e9).toFixed(1)}B`;
  if (abs >= 1e6) return `${(n / 1e6).toFixed(1)}M`;
  if (abs >= 1e3) return `${(n / 1e3).toFixed(1)}K`;
  return String(n);
}

/**
 * Duration in milliseconds: 250ms, 1.5s, 2.0m
 */
export function formatTime(ms: number): string {
  if (ms >= 60000) return `${(ms / 60000).toFixed(1)}m`;
  if (ms >= 1000) return `${(ms / 1000).toFixed(1)}s`;
  return `${ms.toFixed(0)}ms`;
}

/**
 * Byte count as GB with two decimals, falling back to MB below 0.01 GB
 */
export function formatBytes(bytes: number): string {
  const gb = bytes / GIB;
  if (gb >= 0.01) return `${gb.toFixed(2)}GB`;
  return `${(bytes / MIB).toFixed(2)}MB`;
}

export function formatPercent(value: number, digits = 0): string {
  return `${value.toFixed(digits)}%`;
}

/**
 * Backend latency from microseconds: 12ms, 1.2s
 */
export function formatLatency(us: number): string {
  const ms = us / 1000;
  return ms < 1000 ? `${ms.toFixed(0)}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Wall clock HH:MM:SS in local time
 */
export function formatClock(epochMs: number): string {
  const d = new Date(epochMs);
  const two = (n: number) => String(n).padStart(2, '0');
  return `${two(d.getHours())}:${two(d.getMinutes())}:${two(d.getSeconds())}`;
}

/**
 * Collapse whitespace runs (multi-line SQL) into single spaces
 */
export function squash(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
