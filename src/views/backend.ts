import { classifyConnections } from '@core/classifier';
import { formatBytes, formatLatency, formatNumber, formatPercent } from '@utils/format';
import type { ActivityLevel, DataRecord } from '../types';
import { STATUS_COLUMN, col, count, hostCell, makeRow, num, statusCell, str, sumRaw, text } from './rows';
import type { PageDefinition, RowContext, ViewDefinition } from './types';

const DOWN_STATES = new Set(['OFFLINE_SOFT', 'OFFLINE_HARD', 'SHUNNED']);

/**
 * Offline or shunned servers are always Offline; online ones are graded by
 * pool usage.
 */
export function serverLevel(record: DataRecord, ctx: RowContext): ActivityLevel {
  if (DOWN_STATES.has(str(record, 'status').toUpperCase())) return 'offline';
  const used = num(record, 'used_connections');
  const free = num(record, 'free_connections');
  return classifyConnections(used + free, used, ctx.ladders);
}

export function serverKey(record: DataRecord): string {
  return `${str(record, 'hostgroup_id', '0')}:${str(record, 'hostname')}:${str(record, 'port', '3306')}`;
}

type ServerColumn =
  | 'status'
  | 'hg'
  | 'server'
  | 'port'
  | 'state'
  | 'weight'
  | 'conn'
  | 'clients'
  | 'load'
  | 'queries'
  | 'errors'
  | 'latency'
  | 'sent'
  | 'recv';

const servers: ViewDefinition<ServerColumn> = {
  id: 'backend.servers',
  label: 'Servers',
  heading: 'BACKEND: SERVER HEALTH & LOAD DISTRIBUTION',
  columns: [
    STATUS_COLUMN,
    col('hg', 'HG', 3, { align: 'right' }),
    col('server', 'Server', 15, { maxWidth: 40, weight: 3 }),
    col('port', 'Port', 5, { align: 'right' }),
    col('state', 'State', 7, { maxWidth: 'content', weight: 1 }),
    col('weight', 'Weight', 6, { align: 'right' }),
    col('conn', 'Conn', 9, { align: 'right' }),
    col('clients', 'Clients', 7, { align: 'right' }),
    col('load', 'Load%', 6, { align: 'right' }),
    col('queries', 'Queries', 7, { align: 'right' }),
    col('errors', 'Err', 5, { align: 'right' }),
    col('latency', 'Latency', 7, { align: 'right' }),
    col('sent', 'Sent', 9, { align: 'right' }),
    col('recv', 'Recv', 9, { align: 'right', weight: 1 }),
  ],
  buildRows: (records, ctx) => {
    const totalQueries = records.reduce((acc, r) => acc + num(r, 'total_queries'), 0);
    return records.map(r => {
      const used = num(r, 'used_connections');
      const free = num(r, 'free_connections');
      const queries = num(r, 'total_queries');
      const load = totalQueries > 0 ? (queries / totalQueries) * 100 : 0;
      const level = serverLevel(r, ctx);
      const { cell, extra } = hostCell(str(r, 'hostname'), ctx);
      return makeRow({
        key: serverKey(r),
        cells: {
          status: statusCell(level),
          hg: text(str(r, 'hostgroup_id', '0')),
          server: cell,
          port: text(str(r, 'port', '3306')),
          state: text(str(r, 'status', 'UNKNOWN')),
          weight: text(str(r, 'weight', '1000')),
          conn: { text: `${used}/${used + free}`, raw: used },
          clients: count(num(r, 'client_count')),
          load: { text: formatPercent(load, 1), raw: load },
          queries: { text: formatNumber(queries), raw: queries },
          errors: count(num(r, 'connection_errors')),
          latency: text(formatLatency(num(r, 'latency_us'))),
          sent: text(formatBytes(num(r, 'bytes_sent'))),
          recv: text(formatBytes(num(r, 'bytes_received'))),
        },
        extra,
        level,
      });
    });
  },
  stats: rows => {
    const online = rows.filter(r => r.cells.state.text === 'ONLINE').length;
    return [
      `Servers: ${rows.length} (${online} online)`,
      `Used connections: ${sumRaw(rows, 'conn')}`,
      `Queries: ${formatNumber(sumRaw(rows, 'queries'))}`,
      `Errors: ${sumRaw(rows, 'errors')}`,
    ].join(' | ');
  },
  legend: 'servers',
  clearAction: 'reset-backend-stats',
};

export const backendPage: PageDefinition = {
  id: 'backend',
  title: 'Backend',
  views: [servers],
};
