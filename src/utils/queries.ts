/**
 * Admin-interface SQL for each table view.
 *
 * Values are bound as `?` placeholders and expanded client-side by mysql2
 * (arrays become comma-separated lists).
 */
import type { ViewId } from '../types';

export interface Statement {
  sql: string;
  values: unknown[];
}

export interface QueryOptions {
  excludedUsers: readonly string[];
  slowQueries: { minExecutionMs: number; maxRows: number };
}

const ACTIVE = "SUM(CASE WHEN command != 'Sleep' THEN 1 ELSE 0 END)";
const IDLE = "SUM(CASE WHEN command = 'Sleep' THEN 1 ELSE 0 END)";

/** Global counters listed on the Performance page */
export const PERFORMANCE_COUNTERS = [
  'Questions',
  'Slow_queries',
  'Com_select',
  'Com_insert',
  'Com_update',
  'Com_delete',
  'Client_Connections_aborted',
  'Client_Connections_connected',
  'Client_Connections_created',
  'Server_Connections_aborted',
  'Server_Connections_connected',
  'Server_Connections_created',
  'ConnPool_get_conn_success',
  'ConnPool_get_conn_failure',
  'ConnPool_get_conn_immediate',
  'Questions_backends_bytes_recv',
  'Questions_backends_bytes_sent',
  'mysql_backend_buffers_bytes',
  'mysql_frontend_buffers_bytes',
  'ProxySQL_Uptime',
  'Query_Processor_time_nsec',
  'backend_query_time_nsec',
  'mysql_killed_backend_connections',
  'mysql_killed_backend_queries',
  'ConnPool_memory_bytes',
  'Query_Cache_Memory_bytes',
];

/**
 * `conditions` joined with AND, plus the excluded-users filter when any are configured
 */
function where(options: QueryOptions, conditions: string[] = []): Statement {
  const clauses = [...conditions];
  const values: unknown[] = [];
  if (options.excludedUsers.length > 0) {
    clauses.unshift('user NOT IN (?)');
    values.push([...options.excludedUsers]);
  }
  return { sql: clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '', values };
}

function statement(sql: string, values: unknown[] = []): Statement {
  return { sql: sql.replace(/\s+/g, ' ').trim(), values };
}

/**
 * SQL behind a table view; null for views not backed by the admin interface
 */
export function viewStatement(view: ViewId, options: QueryOptions): Statement | null {
  switch (view) {
    case 'frontend.user-host': {
      const filter = where(options);
      return statement(
        `SELECT user AS User, cli_host AS Client_Host, COUNT(*) AS connections,
           ${ACTIVE} AS active, ${IDLE} AS idle
         FROM stats_mysql_processlist ${filter.sql}
         GROUP BY user, cli_host
         ORDER BY ${ACTIVE} DESC, COUNT(*) DESC, user`,
        filter.values,
      );
    }
    case 'frontend.by-user': {
      const filter = where(options);
      const users = options.excludedUsers.length > 0 ? 'AND u.username NOT IN (?)' : '';
      const values =
        options.excludedUsers.length > 0 ? [...filter.values, [...options.excludedUsers]] : filter.values;
      return statement(
        `SELECT DISTINCT u.username AS User,
           COALESCE(p.total_connections, 0) AS total_connections,
           COALESCE(p.active, 0) AS active,
           COALESCE(p.idle, 0) AS idle
         FROM runtime_mysql_users u
         LEFT JOIN (
           SELECT user, COUNT(*) AS total_connections, ${ACTIVE} AS active, ${IDLE} AS idle
           FROM stats_mysql_processlist ${filter.sql}
           GROUP BY user
         ) p ON u.username = p.user
         WHERE u.active = 1 ${users}
         ORDER BY COALESCE(p.active, 0) DESC, COALESCE(p.total_connections, 0) DESC, u.username`,
        values,
      );
    }
    case 'frontend.by-host': {
      const filter = where(options, ['cli_host IS NOT NULL']);
      return statement(
        `SELECT cli_host AS Client_Host, COUNT(*) AS total_connections,
           ${ACTIVE} AS active, ${IDLE} AS idle, COUNT(DISTINCT user) AS unique_users
         FROM stats_mysql_processlist ${filter.sql}
         GROUP BY cli_host
         ORDER BY ${ACTIVE} DESC, COUNT(*) DESC, cli_host`,
        filter.values,
      );
    }
    case 'frontend.slow-queries':
      return statement(
        `SELECT hostgroup, srv_host, srv_port, user, db, command, time_ms, info
         FROM stats_mysql_processlist
         WHERE command != 'Sleep' AND time_ms > ? AND info IS NOT NULL AND info != ''
         ORDER BY time_ms DESC
         LIMIT ?`,
        [options.slowQueries.minExecutionMs, options.slowQueries.maxRows],
      );
    case 'frontend.patterns':
      return statement(
        `SELECT digest_text, schemaname, username, count_star,
           sum_time/1000 AS total_time_ms,
           min_time/1000 AS min_time_ms,
           max_time/1000 AS max_time_ms,
           sum_time/count_star/1000 AS avg_time_ms,
           sum_rows_affected, sum_rows_sent, first_seen, last_seen
         FROM stats_mysql_query_digest
         WHERE count_star > 5
         ORDER BY sum_time DESC
         LIMIT 30`,
      );
    case 'backend.servers':
      return statement(
        `SELECT rs.hostgroup_id, rs.hostname, rs.port, rs.status, rs.weight, rs.max_connections,
           COALESCE(cp.ConnUsed, 0) AS used_connections,
           COALESCE(cp.ConnFree, 0) AS free_connections,
           COALESCE(cp.ConnOK, 0) AS total_ok_connections,
           COALESCE(cp.ConnERR, 0) AS connection_errors,
           COALESCE(pl.client_count, 0) AS client_count,
           COALESCE(cp.Queries, 0) AS total_queries,
           COALESCE(cp.Bytes_data_sent, 0) AS bytes_sent,
           COALESCE(cp.Bytes_data_recv, 0) AS bytes_received,
           COALESCE(cp.Latency_us, 0) AS latency_us
         FROM runtime_mysql_servers rs
         LEFT JOIN stats_mysql_connection_pool cp
           ON rs.hostgroup_id = cp.hostgroup AND rs.hostname = cp.srv_host AND rs.port = cp.srv_port
         LEFT JOIN (
           SELECT hostgroup, srv_host, srv_port, COUNT(DISTINCT cli_host) AS client_count
           FROM stats_mysql_processlist
           WHERE cli_host IS NOT NULL AND cli_host != ''
           GROUP BY hostgroup, srv_host, srv_port
         ) pl ON rs.hostgroup_id = pl.hostgroup AND rs.hostname = pl.srv_host AND rs.port = pl.srv_port
         ORDER BY rs.hostgroup_id, rs.hostname, rs.port`,
      );
    case 'runtime.users':
      return statement(
        `SELECT username, active, use_ssl, default_hostgroup, default_schema,
           schema_locked, transaction_persistent, fast_forward, backend,
           frontend, max_connections, comment
         FROM runtime_mysql_users ORDER BY username`,
      );
    case 'runtime.rules':
      return statement(
        `SELECT r.rule_id, r.active, r.match_pattern, r.match_digest, r.username,
           r.schemaname, r.destination_hostgroup, r.apply, r.multiplex, r.comment,
           COALESCE(s.hits, 0) AS hits
         FROM runtime_mysql_query_rules r
         LEFT JOIN stats_mysql_query_rules s ON r.rule_id = s.rule_id
         ORDER BY r.rule_id`,
      );
    case 'runtime.backends':
      return statement(
        `SELECT hostgroup_id, hostname, port, gtid_port, status, weight, compression,
           max_connections, max_replication_lag, use_ssl, max_latency_ms, comment
         FROM runtime_mysql_servers
         ORDER BY hostgroup_id, hostname, port`,
      );
    case 'runtime.mysql-vars':
      return statement(
        `SELECT variable_name, variable_value FROM runtime_global_variables
         WHERE variable_name LIKE 'mysql-%' ORDER BY variable_name`,
      );
    case 'runtime.admin-vars':
      return statement(
        `SELECT variable_name, variable_value FROM runtime_global_variables
         WHERE variable_name LIKE 'admin-%' ORDER BY variable_name`,
      );
    case 'runtime.stats':
      return statement('SELECT Variable_Name, Variable_Value FROM stats_mysql_global ORDER BY Variable_Name');
    case 'runtime.hostgroups':
      return statement(
        `SELECT writer_hostgroup, reader_hostgroup, check_type, comment
         FROM runtime_mysql_replication_hostgroups`,
      );
    case 'performance.overview':
      return statement(
        'SELECT Variable_name, Variable_value FROM stats_mysql_global WHERE Variable_name IN (?)',
        [PERFORMANCE_COUNTERS],
      );
    case 'logs.tail':
      return null;
  }
}

/** Counters behind the header and the Performance cards */
export const METRIC_STATEMENTS = {
  globals: statement(
    `SELECT Variable_Name, Variable_Value FROM stats_mysql_global
     WHERE Variable_Name IN ('Questions', 'ProxySQL_Uptime')`,
  ),
  pool: statement('SELECT status, ConnUsed, ConnFree, ConnERR FROM stats_mysql_connection_pool'),
};

export function clientStatement(options: QueryOptions): Statement {
  const filter = where(options);
  return statement(
    `SELECT COUNT(*) AS total, ${ACTIVE} AS active,
       SUM(CASE WHEN command != 'Sleep' AND time_ms > ? THEN 1 ELSE 0 END) AS slow
     FROM stats_mysql_processlist ${filter.sql}`,
    [options.slowQueries.minExecutionMs, ...filter.values],
  );
}

export const PROBE = 'SELECT 1 FROM stats.stats_mysql_global LIMIT 1';
export const VERSION = 'SELECT @@version_comment AS version';
