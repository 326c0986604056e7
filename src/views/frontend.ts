import { classify, classifyConnections } from '@core/classifier';
import { formatNumber, formatTime, squash } from '@utils/format';
import type { Row } from '../types';
import {
  STATUS_COLUMN,
  col,
  count,
  hostCell,
  makeRow,
  num,
  statusCell,
  str,
  sumRaw,
  text,
} from './rows';
import type { PageDefinition, ViewDefinition } from './types';

type ConnectionCounts = 'total' | 'active' | 'idle';

function connectionStats(label: string, rows: readonly Row<ConnectionCounts>[]): string {
  return [
    `${label}: ${rows.length}`,
    `Total: ${sumRaw(rows, 'total')}`,
    `Active: ${sumRaw(rows, 'active')}`,
    `Idle: ${sumRaw(rows, 'idle')}`,
  ].join(' | ');
}

const userHost: ViewDefinition<'status' | 'user' | 'host' | ConnectionCounts> = {
  id: 'frontend.user-host',
  label: 'User & Host',
  heading: 'FRONTEND: CONNECTIONS BY USER & HOST',
  columns: [
    STATUS_COLUMN,
    col('user', 'User', 8, { maxWidth: 'content', weight: 2 }),
    col('host', 'Client Host', 15, { weight: 3 }),
    col('total', 'Total', 6, { align: 'right' }),
    col('active', 'Active', 6, { align: 'right' }),
    col('idle', 'Idle', 6, { align: 'right' }),
  ],
  buildRows: (records, ctx) =>
    records.map(r => {
      const user = str(r, 'User', 'NULL');
      const address = str(r, 'Client_Host', 'NULL');
      const total = num(r, 'connections');
      const active = num(r, 'active');
      const level = classifyConnections(total, active, ctx.ladders);
      const { cell, extra } = hostCell(address, ctx);
      return makeRow({
        key: `${user}@${address}`,
        cells: {
          status: statusCell(level),
          user: text(user),
          host: cell,
          total: count(total),
          active: count(active),
          idle: count(num(r, 'idle')),
        },
        extra,
        level,
      });
    }),
  stats: rows => connectionStats('Connections', rows),
  legend: 'connections',
};

const byUser: ViewDefinition<'status' | 'user' | ConnectionCounts> = {
  id: 'frontend.by-user',
  label: 'By User',
  heading: 'FRONTEND: CONNECTIONS BY USER',
  columns: [
    STATUS_COLUMN,
    col('user', 'User', 10, { weight: 3 }),
    col('total', 'Total', 6, { align: 'right' }),
    col('active', 'Active', 6, { align: 'right' }),
    col('idle', 'Idle', 6, { align: 'right' }),
  ],
  buildRows: (records, ctx) =>
    records.map(r => {
      const user = str(r, 'User', 'NULL');
      const total = num(r, 'total_connections');
      const active = num(r, 'active');
      const level = classifyConnections(total, active, ctx.ladders);
      return makeRow({
        key: user,
        cells: {
          status: statusCell(level),
          user: text(user),
          total: count(total),
          active: count(active),
          idle: count(num(r, 'idle')),
        },
        level,
      });
    }),
  stats: rows => connectionStats('Users', rows),
  legend: 'connections',
};

const byHost: ViewDefinition<'status' | 'host' | ConnectionCounts | 'users'> = {
  id: 'frontend.by-host',
  label: 'By Host',
  heading: 'FRONTEND: CONNECTIONS BY HOST',
  columns: [
    STATUS_COLUMN,
    col('host', 'Client Host', 15, { weight: 3 }),
    col('total', 'Total', 6, { align: 'right' }),
    col('active', 'Active', 6, { align: 'right' }),
    col('idle', 'Idle', 6, { align: 'right' }),
    col('users', 'Users', 6, { align: 'right' }),
  ],
  buildRows: (records, ctx) =>
    records.map(r => {
      const address = str(r, 'Client_Host', 'NULL');
      const total = num(r, 'total_connections');
      const active = num(r, 'active');
      const level = classifyConnections(total, active, ctx.ladders);
      const { cell, extra } = hostCell(address, ctx);
      return makeRow({
        key: address,
        cells: {
          status: statusCell(level),
          host: cell,
          total: count(total),
          active: count(active),
          idle: count(num(r, 'idle')),
          users: count(num(r, 'unique_users')),
        },
        extra,
        level,
      });
    }),
  stats: rows => connectionStats('Hosts', rows),
  legend: 'connections',
};

const slowQueries: ViewDefinition<'time' | 'hg' | 'server' | 'user' | 'query'> = {
  id: 'frontend.slow-queries',
  label: 'Slow Queries',
  heading: 'FRONTEND: SLOW QUERIES',
  columns: [
    col('time', 'Time', 7, { align: 'right' }),
    col('hg', 'HG', 3, { align: 'right' }),
    col('server', 'Server', 12, { maxWidth: 'content', weight: 1 }),
    col('user', 'User@DB', 10, { maxWidth: 'content', weight: 1 }),
    col('query', 'Query', 20, { weight: 4 }),
  ],
  buildRows: (records, ctx) =>
    records.map((r, i) => {
      const timeMs = num(r, 'time_ms');
      const level = classify(timeMs, ctx.ladders.queryTime);
      const server = `${str(r, 'srv_host')}:${str(r, 'srv_port')}`;
      return makeRow({
        key: `${i}:${server}:${timeMs}`,
        cells: {
          time: { text: formatTime(timeMs), raw: timeMs, level },
          hg: text(str(r, 'hostgroup', '-')),
          server: text(server),
          user: text(`${str(r, 'user', 'NULL')}@${str(r, 'db', 'NULL')}`),
          query: text(squash(str(r, 'info', 'N/A'))),
        },
        level,
      });
    }),
  stats: rows => {
    const avg = rows.length > 0 ? sumRaw(rows, 'time') / rows.length : 0;
    return `Slow queries: ${rows.length} | Avg execution time: ${avg.toFixed(2)}ms`;
  },
  legend: 'none',
};

const patterns: ViewDefinition<'rank' | 'count' | 'avg' | 'total' | 'user' | 'schema' | 'pattern'> = {
  id: 'frontend.patterns',
  label: 'Patterns',
  heading: 'FRONTEND: QUERY PATTERNS (TOP RESOURCE CONSUMERS)',
  columns: [
    col('rank', '#', 3, { align: 'right' }),
    col('count', 'Exec', 7, { align: 'right' }),
    col('avg', 'Avg', 7, { align: 'right' }),
    col('total', 'Total', 7, { align: 'right' }),
    col('user', 'User', 6, { maxWidth: 'content', weight: 1 }),
    col('schema', 'Database', 8, { maxWidth: 'content', weight: 1 }),
    col('pattern', 'Pattern', 20, { weight: 4 }),
  ],
  buildRows: (records, ctx) =>
    records.map((r, i) => {
      const avgMs = num(r, 'avg_time_ms');
      const totalMs = num(r, 'total_time_ms');
      const executions = num(r, 'count_star');
      const level = classify(avgMs, ctx.ladders.queryTime);
      return makeRow({
        key: `${i}:${str(r, 'digest_text')}`,
        cells: {
          rank: count(i + 1),
          count: { text: formatNumber(executions), raw: executions },
          avg: { text: formatTime(avgMs), raw: avgMs, level },
          total: { text: formatTime(totalMs), raw: totalMs },
          user: text(str(r, 'username', '-')),
          schema: text(str(r, 'schemaname', '-')),
          pattern: text(squash(str(r, 'digest_text'))),
        },
        level,
      });
    }),
  stats: rows =>
    `Patterns: ${rows.length} | Executions: ${formatNumber(sumRaw(rows, 'count'))} | Total time: ${formatTime(sumRaw(rows, 'total'))}`,
  legend: 'none',
  clearAction: 'reset-digest',
};

export const frontendPage: PageDefinition = {
  id: 'frontend',
  title: 'Frontend',
  views: [userHost, byUser, byHost, slowQueries, patterns],
};
