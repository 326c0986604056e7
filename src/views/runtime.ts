import { classifyHits } from '@core/classifier';
import { formatNumber } from '@utils/format';
import type { ViewId } from '../types';
import { serverKey, serverLevel } from './backend';
import { STATUS_COLUMN, col, count, hostCell, makeRow, num, statusCell, str, sumRaw, text } from './rows';
import type { PageDefinition, ViewDefinition } from './types';

const yesNo = (value: number) => (value ? 'yes' : 'no');

type UserColumn = 'user' | 'active' | 'ssl' | 'hg' | 'schema' | 'locked' | 'txn' | 'ff' | 'side' | 'max' | 'comment';

const users: ViewDefinition<UserColumn> = {
  id: 'runtime.users',
  label: 'Users',
  heading: 'RUNTIME: MYSQL USERS',
  columns: [
    col('user', 'Username', 10, { maxWidth: 'content', weight: 2 }),
    col('active', 'Active', 6),
    col('ssl', 'SSL', 4),
    col('hg', 'HG', 4, { align: 'right' }),
    col('schema', 'Default Schema', 14, { maxWidth: 'content', weight: 1 }),
    col('locked', 'Locked', 6),
    col('txn', 'TxnPersist', 10),
    col('ff', 'FastFwd', 7),
    col('side', 'BE/FE', 5),
    col('max', 'MaxConn', 7, { align: 'right' }),
    col('comment', 'Comment', 8, { weight: 2 }),
  ],
  buildRows: records =>
    records.map(r => {
      const active = num(r, 'active');
      const user = str(r, 'username');
      const side = `${num(r, 'backend') ? 'B' : '-'}/${num(r, 'frontend') ? 'F' : '-'}`;
      return makeRow({
        key: `${user}:${side}`,
        cells: {
          user: text(user),
          active: text(yesNo(active), active),
          ssl: text(yesNo(num(r, 'use_ssl'))),
          hg: text(str(r, 'default_hostgroup', '0')),
          schema: text(str(r, 'default_schema', '-')),
          locked: text(yesNo(num(r, 'schema_locked'))),
          txn: text(yesNo(num(r, 'transaction_persistent'))),
          ff: text(yesNo(num(r, 'fast_forward'))),
          side: text(side),
          max: count(num(r, 'max_connections')),
          comment: text(str(r, 'comment')),
        },
        muted: active === 0,
      });
    }),
  stats: rows => {
    const active = sumRaw(rows, 'active');
    return `Users: ${rows.length} | Active: ${active} | Inactive: ${rows.length - active}`;
  },
  legend: 'none',
};

type RuleColumn =
  | 'status'
  | 'rule'
  | 'active'
  | 'hg'
  | 'apply'
  | 'mpx'
  | 'hits'
  | 'rate'
  | 'digest'
  | 'user'
  | 'schema'
  | 'comment';

const rules: ViewDefinition<RuleColumn> = {
  id: 'runtime.rules',
  label: 'Rules',
  heading: 'RUNTIME: QUERY RULES',
  columns: [
    STATUS_COLUMN,
    col('rule', 'Rule', 5, { align: 'right' }),
    col('active', 'Act', 3),
    col('hg', 'HG', 4, { align: 'right' }),
    col('apply', 'Apl', 3),
    col('mpx', 'Mpx', 3),
    col('hits', 'Hits', 7, { align: 'right' }),
    col('rate', 'Hits/s', 8, { align: 'right' }),
    col('digest', 'Digest / Pattern', 16, { weight: 4 }),
    col('user', 'Username', 8, { maxWidth: 'content', weight: 1 }),
    col('schema', 'Schema', 6, { maxWidth: 'content', weight: 1 }),
    col('comment', 'Comment', 8, { weight: 1 }),
  ],
  buildRows: (records, ctx) =>
    records.map(r => {
      const id = str(r, 'rule_id');
      const active = num(r, 'active');
      const hits = num(r, 'hits');
      const rate = ctx.hitRate(id);
      const level = classifyHits(rate, ctx.ladders);
      return makeRow({
        key: id,
        cells: {
          status: statusCell(level),
          rule: text(id),
          active: text(yesNo(active), active),
          hg: text(str(r, 'destination_hostgroup', '-')),
          apply: text(yesNo(num(r, 'apply'))),
          mpx: text(str(r, 'multiplex', '-')),
          hits: { text: formatNumber(hits), raw: hits },
          rate: { text: rate.toFixed(1), raw: rate },
          digest: text(str(r, 'match_digest') || str(r, 'match_pattern', '-')),
          user: text(str(r, 'username', '-')),
          schema: text(str(r, 'schemaname', '-')),
          comment: text(str(r, 'comment')),
        },
        level,
        muted: active === 0,
      });
    }),
  stats: rows => {
    const active = sumRaw(rows, 'active');
    return [
      `Rules: ${rows.length} (${active} active)`,
      `Hits: ${formatNumber(sumRaw(rows, 'hits'))}`,
      `Hits/s: ${sumRaw(rows, 'rate').toFixed(1)}`,
    ].join(' | ');
  },
  legend: 'hits',
  clearAction: 'reload-query-rules',
};

type BackendColumn =
  | 'status'
  | 'hg'
  | 'server'
  | 'port'
  | 'gtid'
  | 'state'
  | 'weight'
  | 'compress'
  | 'max'
  | 'lag'
  | 'ssl'
  | 'maxlat';

const backends: ViewDefinition<BackendColumn> = {
  id: 'runtime.backends',
  label: 'Backends',
  heading: 'RUNTIME: MYSQL SERVERS',
  columns: [
    STATUS_COLUMN,
    col('hg', 'HG', 3, { align: 'right' }),
    col('server', 'Server', 15, { maxWidth: 40, weight: 3 }),
    col('port', 'Port', 5, { align: 'right' }),
    col('gtid', 'GTIDPort', 8, { align: 'right' }),
    col('state', 'Status', 7, { maxWidth: 'content', weight: 1 }),
    col('weight', 'Weight', 6, { align: 'right' }),
    col('compress', 'Compress', 8),
    col('max', 'MaxConn', 7, { align: 'right' }),
    col('lag', 'MaxRepLag', 9, { align: 'right' }),
    col('ssl', 'SSL', 4),
    col('maxlat', 'MaxLatMs', 8, { align: 'right', weight: 1 }),
  ],
  buildRows: (records, ctx) =>
    records.map(r => {
      const level = serverLevel(r, ctx);
      const { cell, extra } = hostCell(str(r, 'hostname'), ctx);
      return makeRow({
        key: serverKey(r),
        cells: {
          status: statusCell(level),
          hg: text(str(r, 'hostgroup_id', '0')),
          server: cell,
          port: text(str(r, 'port', '3306')),
          gtid: text(str(r, 'gtid_port', '0')),
          state: text(str(r, 'status', 'UNKNOWN')),
          weight: text(str(r, 'weight', '1000')),
          compress: text(yesNo(num(r, 'compression'))),
          max: count(num(r, 'max_connections')),
          lag: count(num(r, 'max_replication_lag')),
          ssl: text(yesNo(num(r, 'use_ssl'))),
          maxlat: count(num(r, 'max_latency_ms')),
        },
        extra,
        level,
      });
    }),
  stats: rows => {
    const online = rows.filter(r => r.cells.state.text === 'ONLINE').length;
    return `Servers: ${rows.length} | Online: ${online} | Max connections: ${sumRaw(rows, 'max')}`;
  },
  legend: 'servers',
  clearAction: 'reset-backend-stats',
};

export type KeyValueColumn = 'name' | 'value';

/**
 * Two-column name/value listing shared by the variable and counter views
 */
export function keyValueView(
  id: ViewId,
  label: string,
  heading: string,
  nameField: string,
  valueField: string,
): ViewDefinition<KeyValueColumn> {
  return {
    id,
    label,
    heading,
    columns: [
      col('name', 'Variable Name', 20, { maxWidth: 'content', weight: 1 }),
      col('value', 'Value', 10, { weight: 2 }),
    ],
    buildRows: records =>
      records.map(r => {
        const name = str(r, nameField);
        return makeRow({
          key: name,
          cells: { name: text(name), value: text(str(r, valueField)) },
        });
      }),
    stats: (rows, all) => `Variables: ${rows.length} of ${all.length}`,
    legend: 'none',
  };
}

const hostgroups: ViewDefinition<'writer' | 'reader' | 'check' | 'comment'> = {
  id: 'runtime.hostgroups',
  label: 'Hostgroups',
  heading: 'RUNTIME: REPLICATION HOSTGROUPS',
  columns: [
    col('writer', 'Writer HG', 9, { align: 'right' }),
    col('reader', 'Reader HG', 9, { align: 'right' }),
    col('check', 'Check Type', 10, { maxWidth: 'content', weight: 1 }),
    col('comment', 'Comment', 8, { weight: 2 }),
  ],
  buildRows: records =>
    records.map(r => {
      const writer = str(r, 'writer_hostgroup');
      const reader = str(r, 'reader_hostgroup');
      return makeRow({
        key: `${writer}:${reader}`,
        cells: {
          writer: text(writer),
          reader: text(reader),
          check: text(str(r, 'check_type', '-')),
          comment: text(str(r, 'comment')),
        },
      });
    }),
  stats: rows => `Replication hostgroups: ${rows.length}`,
  legend: 'none',
};

export const runtimePage: PageDefinition = {
  id: 'runtime',
  title: 'Runtime',
  views: [
    users,
    rules,
    backends,
    keyValueView('runtime.mysql-vars', 'MySQL Vars', 'RUNTIME: MYSQL VARIABLES', 'variable_name', 'variable_value'),
    keyValueView('runtime.admin-vars', 'Admin Vars', 'RUNTIME: ADMIN VARIABLES', 'variable_name', 'variable_value'),
    keyValueView('runtime.stats', 'Stats', 'RUNTIME: GLOBAL STATISTICS', 'Variable_Name', 'Variable_Value'),
    hostgroups,
  ],
};
