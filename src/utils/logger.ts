import { appendFileSync } from 'fs';

export type LoggerLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * File logger. The terminal belongs to Ink, so nothing is written to stdout;
 * without a file path every call is a no-op.
 */
export class FileLogger implements Logger {
  constructor(private readonly logFile?: string) {}

  private log(level: LoggerLevel, message: string): void {
    if (!this.logFile) return;
    const timestamp = new Date().toISOString().replace('T', ' ').substring(0, 19);
    const logLine = `[${timestamp}] [${level}] ${message}\n`;
    try {
      appendFileSync(this.logFile, logLine);
    } catch {
      // Silent fail - logging should never break the dashboard
    }
  }

  debug(message: string): void {
    this.log('DEBUG', message);
  }

  info(message: string): void {
    this.log('INFO', message);
  }

  warn(message: string): void {
    this.log('WARN', message);
  }

  error(message: string): void {
    this.log('ERROR', message);
  }
}

let current: Logger = new FileLogger();

/**
 * Install the process-wide logger (called once at startup)
 */
export function setLogger(logger: Logger): void {
  current = logger;
}

export function getLogger(): Logger {
  return current;
}
