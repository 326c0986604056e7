import mysql, { type Pool, type RowDataPacket } from 'mysql2/promise';
import type { ActionExecutor, DataProvider } from '@core/refresh-loop';
import { ErrorKind, StartupError, toDashboardError } from '@core/errors';
import type { ActionId, DataRecord, MetricsSnapshot, SqlValue, ViewId } from '../types';
import { ACTIONS } from '@views/index';
import type { Settings } from './config';
import { readLogTail } from './log-reader';
import { getLogger } from './logger';
import {
  METRIC_STATEMENTS,
  PROBE,
  VERSION,
  clientStatement,
  viewStatement,
  type QueryOptions,
  type Statement,
} from './queries';

/** Small pool so one hung query does not hold up the next refresh */
const CONNECTION_LIMIT = 4;

const ONLINE = 'ONLINE';

function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (typeof value === 'bigint') return Number(value);
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

export function toRecord(row: Readonly<Record<string, unknown>>): DataRecord {
  const record: Record<string, SqlValue> = {};
  for (const [key, value] of Object.entries(row)) {
    record[key] = toSqlValue(value);
  }
  return record;
}

function numeric(value: SqlValue | undefined): number {
  const n = typeof value === 'number' ? value : Number(value ?? 0);
  return Number.isFinite(n) ? n : 0;
}

/**
 * Fold the metric queries into one snapshot
 */
export function buildMetrics(
  globals: readonly DataRecord[],
  clients: DataRecord | undefined,
  pool: readonly DataRecord[],
): MetricsSnapshot {
  const counter = (name: string) =>
    numeric(globals.find(r => r['Variable_Name'] === name || r['Variable_name'] === name)?.['Variable_Value']);
  return {
    questions: counter('Questions'),
    uptimeSeconds: counter('ProxySQL_Uptime'),
    clientConnections: numeric(clients?.['total']),
    activeConnections: numeric(clients?.['active']),
    poolUsed: pool.reduce((acc, r) => acc + numeric(r['ConnUsed']), 0),
    poolFree: pool.reduce((acc, r) => acc + numeric(r['ConnFree']), 0),
    backendErrors: pool.reduce((acc, r) => acc + numeric(r['ConnERR']), 0),
    onlineServers: pool.filter(r => r['status'] === ONLINE).length,
    totalServers: pool.length,
    slowQueries: numeric(clients?.['slow']),
  };
}

/**
 * Client for the ProxySQL admin interface (MySQL protocol, port 6032)
 */
export class ProxyAdmin implements DataProvider, ActionExecutor {
  private readonly pool: Pool;
  private readonly options: QueryOptions;

  constructor(private readonly settings: Settings) {
    const { host, port, user, password, socket, timeoutSeconds } = settings.connection;
    this.pool = mysql.createPool({
      ...(socket ? { socketPath: socket } : { host, port }),
      user,
      password,
      connectTimeout: timeoutSeconds * 1000,
      connectionLimit: CONNECTION_LIMIT,
      waitForConnections: true,
    });
    this.options = {
      excludedUsers: settings.excludedUsers,
      slowQueries: settings.slowQueries,
    };
  }

  /** Label shown in the header */
  get hostLabel(): string {
    const { host, port, socket } = this.settings.connection;
    return socket ?? `${host}:${port}`;
  }

  async fetchView(view: ViewId, signal: AbortSignal): Promise<DataRecord[]> {
    if (view === 'logs.tail') {
      return readLogTail(this.settings.logFile, this.settings.logTailLines, signal);
    }
    const stmt = viewStatement(view, this.options);
    return stmt ? this.query(stmt, signal) : [];
  }

  async fetchMetrics(signal: AbortSignal): Promise<MetricsSnapshot> {
    const [globals, clients, pool] = await Promise.all([
      this.query(METRIC_STATEMENTS.globals, signal),
      this.query(clientStatement(this.options), signal),
      this.query(METRIC_STATEMENTS.pool, signal),
    ]);
    return buildMetrics(globals, clients[0], pool);
  }

  async execute(action: ActionId): Promise<void> {
    for (const sql of ACTIONS[action].statements) {
      getLogger().info(`Action ${action}: ${sql}`);
      await this.query({ sql, values: [] });
    }
  }

  /**
   * Check the admin interface answers and read its version
   * @throws StartupError when it does not
   */
  async probe(): Promise<string> {
    try {
      await this.query({ sql: PROBE, values: [] });
    } catch (error) {
      const failure = toDashboardError(error, ErrorKind.Startup);
      throw new StartupError(`Cannot reach ProxySQL admin at ${this.hostLabel}: ${failure.message}`, failure.detail);
    }
    try {
      const [row] = await this.query({ sql: VERSION, values: [] });
      return String(row?.['version'] ?? 'unknown');
    } catch (error) {
      getLogger().warn(`Version lookup failed: ${toDashboardError(error, ErrorKind.Startup).message}`);
      return 'unknown';
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  /**
   * Run one statement. An aborted signal stops it before it is sent; mysql2
   * cannot cancel a query already on the wire, so the timeout bounds those.
   */
  private async query(stmt: Statement, signal?: AbortSignal): Promise<DataRecord[]> {
    signal?.throwIfAborted();
    const [rows] = await this.pool.query<RowDataPacket[]>({
      sql: stmt.sql,
      values: stmt.values,
      timeout: this.settings.connection.timeoutSeconds * 1000,
    });
    return rows.map(row => toRecord(row));
  }
}
