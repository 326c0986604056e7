/**
 * Page definitions and the row builders behind each table view.
 */
import { describe, it, expect, expectTypeOf } from 'vitest';
import { buildLadders } from '../src/core/classifier';
import { ACTIONS, PAGES, VIEWS, getView, type RowContext } from '../src/views/index';
import { col, makeRow, num, str, sumRaw, text } from '../src/views/rows';
import type { ColumnSpec, Row } from '../src/types';
import { serverLevel } from '../src/views/backend';
import { defaultSettings } from '../src/utils/config';

const thresholds = defaultSettings().thresholds;

const ctx: RowContext = {
  ladders: buildLadders(thresholds),
  thresholds,
  hostOf: address => (address === '10.0.0.5' ? 'app1' : undefined),
  hitRate: ruleId => (ruleId === '7' ? 2500 : 0),
};

describe('pages', () => {
  it('lists five pages in strip order', () => {
    expect(PAGES.map(p => p.title)).toEqual(['Frontend', 'Backend', 'Runtime', 'Performance', 'Logs']);
    expect(PAGES.map(p => p.id)).toEqual(['frontend', 'backend', 'runtime', 'performance', 'logs']);
  });

  it('registers every view once', () => {
    expect(VIEWS.size).toBe(15);
    expect(getView('runtime.hostgroups').label).toBe('Hostgroups');
    expect(new Set(PAGES.flatMap(p => p.views.map(v => v.id))).size).toBe(15);
  });

  it('describes each destructive action', () => {
    expect(ACTIONS['reload-query-rules'].statements).toEqual(['LOAD MYSQL QUERY RULES TO RUNTIME']);
    expect(ACTIONS['reset-backend-stats'].statements).toHaveLength(2);
  });
});

describe('row helpers', () => {
  it('reads numbers from strings and numbers', () => {
    expect(num({ a: '12' }, 'a')).toBe(12);
    expect(num({ a: 3 }, 'a')).toBe(3);
    expect(num({ a: 'x' }, 'a')).toBe(0);
    expect(num({ a: null }, 'a')).toBe(0);
  });

  it('falls back for empty strings', () => {
    expect(str({ a: '' }, 'a', '-')).toBe('-');
    expect(str({ a: null }, 'a', 'NULL')).toBe('NULL');
    expect(str({ a: 5 }, 'a')).toBe('5');
  });

  it('builds lower-cased search text from cells and extras', () => {
    const row = makeRow({
      key: 'k',
      cells: { user: { text: 'App' }, host: { text: '10.0.0.5 (app1)' } },
      extra: ['APP1'],
      muted: false,
    });
    expect(row.searchText).toBe('app 10.0.0.5 (app1) app1');
    expect(row.muted).toBeUndefined();
  });

  it('types cells by the column ids of the row', () => {
    const row = makeRow({ key: 'k', cells: { user: text('app'), total: text('3', 3) } });
    expectTypeOf(row).toEqualTypeOf<Row<'user' | 'total'>>();
    expectTypeOf<Row<'usr' | 'total'>>().not.toMatchTypeOf<Row<'user' | 'total'>>();
    expectTypeOf<Row<'user'>>().not.toMatchTypeOf<Row<'user' | 'total'>>();
    expect(row.cells.user.text).toBe('app');
    expect(sumRaw([row, row], 'total')).toBe(6);
  });

  it('keeps the literal id of a column', () => {
    const column = col('host', 'Client Host', 15, { weight: 3 });
    expectTypeOf(column).toEqualTypeOf<ColumnSpec<'host'>>();
    expect(column).toEqual({ id: 'host', title: 'Client Host', minWidth: 15, weight: 3, align: 'left' });
  });
});

describe('frontend views', () => {
  it('grades connections and shows resolved hosts', () => {
    const rows = getView('frontend.user-host').buildRows(
      [
        { User: 'app', Client_Host: '10.0.0.5', connections: '80', active: '75', idle: '5' },
        { User: 'batch', Client_Host: '10.0.0.9', connections: '4', active: '0', idle: '4' },
      ],
      ctx,
    );
    expect(rows.map(r => r.level)).toEqual(['moderate', 'idle']);
    expect(rows[0]?.cells['status']?.text).toBe('◕ Moderate');
    expect(rows[0]?.cells['host']?.text).toBe('10.0.0.5 (app1)');
    expect(rows[1]?.cells['host']?.text).toBe('10.0.0.9');
    expect(rows[0]?.key).toBe('app@10.0.0.5');
  });

  it('totals connections in the footer', () => {
    const view = getView('frontend.user-host');
    const rows = view.buildRows(
      [
        { User: 'app', Client_Host: '10.0.0.5', connections: '80', active: '75', idle: '5' },
        { User: 'batch', Client_Host: '10.0.0.9', connections: '4', active: '0', idle: '4' },
      ],
      ctx,
    );
    expect(view.stats(rows, rows)).toBe('Connections: 2 | Total: 84 | Active: 75 | Idle: 9');
  });

  it('marks slow queries by execution time', () => {
    const rows = getView('frontend.slow-queries').buildRows(
      [
        {
          hostgroup: 10,
          srv_host: 'db1',
          srv_port: 3306,
          user: 'app',
          db: 'shop',
          time_ms: 12000,
          info: 'SELECT *\n  FROM orders',
        },
      ],
      ctx,
    );
    expect(rows[0]?.cells['time']).toEqual({ text: '12.0s', raw: 12000, level: 'hot' });
    expect(rows[0]?.cells['server']?.text).toBe('db1:3306');
    expect(rows[0]?.cells['user']?.text).toBe('app@shop');
    expect(rows[0]?.cells['query']?.text).toBe('SELECT * FROM orders');
  });

  it('ranks query patterns', () => {
    const view = getView('frontend.patterns');
    const rows = view.buildRows(
      [
        { digest_text: 'SELECT ?', count_star: '2000', avg_time_ms: '1.5', total_time_ms: '3000' },
        { digest_text: 'UPDATE t SET a = ?', count_star: '10', avg_time_ms: '1500', total_time_ms: '15000' },
      ],
      ctx,
    );
    expect(rows.map(r => r.cells['rank']?.text)).toEqual(['1', '2']);
    expect(rows[0]?.cells['count']?.text).toBe('2.0K');
    expect(rows[1]?.level).toBe('moderate');
    expect(view.stats(rows, rows)).toBe('Patterns: 2 | Executions: 2.0K | Total time: 18.0s');
    expect(view.clearAction).toBe('reset-digest');
  });
});

describe('backend view', () => {
  it('shows offline states regardless of load', () => {
    expect(serverLevel({ status: 'SHUNNED', used_connections: '0', free_connections: '0' }, ctx)).toBe('offline');
    expect(serverLevel({ status: 'offline_soft' }, ctx)).toBe('offline');
    expect(serverLevel({ status: 'ONLINE', used_connections: '60', free_connections: '40' }, ctx)).toBe('moderate');
    expect(serverLevel({ status: 'ONLINE', used_connections: '0', free_connections: '0' }, ctx)).toBe('quiet');
  });

  it('spreads load across servers', () => {
    const view = getView('backend.servers');
    const rows = view.buildRows(
      [
        { hostgroup_id: 10, hostname: 'db1', port: 3306, status: 'ONLINE', used_connections: 3, free_connections: 1, total_queries: 300 },
        { hostgroup_id: 20, hostname: 'db2', port: 3306, status: 'ONLINE', used_connections: 1, free_connections: 1, total_queries: 100 },
      ],
      ctx,
    );
    expect(rows.map(r => r.cells['load']?.text)).toEqual(['75.0%', '25.0%']);
    expect(rows[0]?.cells['conn']?.text).toBe('3/4');
    expect(rows[0]?.key).toBe('10:db1:3306');
    expect(view.stats(rows, rows)).toBe('Servers: 2 (2 online) | Used connections: 4 | Queries: 400 | Errors: 0');
  });
});

describe('runtime views', () => {
  it('dims inactive users', () => {
    const rows = getView('runtime.users').buildRows(
      [
        { username: 'app', active: 1, backend: 1, frontend: 1, max_connections: 100 },
        { username: 'old', active: 0, backend: 1, frontend: 0, max_connections: 10 },
      ],
      ctx,
    );
    expect(rows.map(r => r.muted)).toEqual([undefined, true]);
    expect(rows.map(r => r.cells['side']?.text)).toEqual(['B/F', 'B/-']);
    expect(rows[0]?.cells).not.toHaveProperty('password');
  });

  it('grades rules by hit rate', () => {
    const rows = getView('runtime.rules').buildRows(
      [
        { rule_id: 7, active: 1, match_digest: '^SELECT', hits: '90000' },
        { rule_id: 8, active: 0, match_pattern: 'UPDATE', hits: '0' },
      ],
      ctx,
    );
    expect(rows.map(r => r.level)).toEqual(['moderate', 'silent']);
    expect(rows[0]?.cells['rate']?.text).toBe('2500.0');
    expect(rows[0]?.cells['hits']?.text).toBe('90.0K');
    expect(rows[1]?.cells['digest']?.text).toBe('UPDATE');
    expect(rows[1]?.muted).toBe(true);
  });

  it('lists variables as name and value', () => {
    const view = getView('runtime.mysql-vars');
    const rows = view.buildRows([{ variable_name: 'mysql-threads', variable_value: '4' }], ctx);
    expect(rows[0]?.cells['value']?.text).toBe('4');
    expect(view.stats(rows, rows)).toBe('Variables: 1 of 1');
  });
});

describe('logs view', () => {
  it('tags rows with their level', () => {
    const view = getView('logs.tail');
    const rows = view.buildRows(
      [
        { timestamp: '2026-03-01 12:00:00', level: 'ERROR', message: 'boom' },
        { timestamp: '2026-03-01 12:00:01', level: 'bogus', message: 'odd' },
      ],
      ctx,
    );
    expect(rows.map(r => r.tag)).toEqual(['ERROR', 'INFO']);
    expect(view.stats(rows.slice(0, 1), rows)).toBe('Lines: 1 of 2 | ERROR: 1 | WARN: 0 | INFO: 0 | DEBUG: 0');
  });
});
