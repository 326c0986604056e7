import type { LogLevel } from '../types';
import { col, makeRow, str, text } from './rows';
import type { PageDefinition, ViewDefinition } from './types';

export const LOG_LEVELS: readonly LogLevel[] = ['ERROR', 'WARN', 'INFO', 'DEBUG'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(l => l === value);
}

const tail: ViewDefinition<'timestamp' | 'level' | 'message'> = {
  id: 'logs.tail',
  label: 'Tail',
  heading: 'LOGS: PROXYSQL LOG (tail)',
  columns: [
    col('timestamp', 'Timestamp', 19),
    col('level', 'Level', 5),
    col('message', 'Message', 20, { weight: 1 }),
  ],
  buildRows: records =>
    records.map((r, i) => {
      const raw = str(r, 'level', 'INFO').toUpperCase();
      const level: LogLevel = isLogLevel(raw) ? raw : 'INFO';
      return makeRow({
        key: String(i),
        cells: {
          timestamp: text(str(r, 'timestamp')),
          level: text(level),
          message: text(str(r, 'message')),
        },
        tag: level,
      });
    }),
  stats: (rows, all) => {
    const counts = LOG_LEVELS.map(level => `${level}: ${rows.filter(r => r.tag === level).length}`);
    return [`Lines: ${rows.length} of ${all.length}`, ...counts].join(' | ');
  },
  legend: 'logs',
};

export const logsPage: PageDefinition = {
  id: 'logs',
  title: 'Logs',
  views: [tail],
};
