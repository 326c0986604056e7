import fs from 'fs';
import path from 'path';
import os from 'os';
import chalk from 'chalk';
import { z } from 'zod';

/**
 * Configuration directory path (~/.config/proxytop/)
 */
const CONFIG_DIR = path.join(os.homedir(), '.config', 'proxytop');

/**
 * Settings file path
 */
const SETTINGS_FILE = path.join(CONFIG_DIR, 'settings.json');

const levels = (low: number, medium: number, high: number) =>
  z
    .object({
      low: z.number().nonnegative().default(low),
      medium: z.number().nonnegative().default(medium),
      high: z.number().nonnegative().default(high),
    })
    .default({})
    .refine(t => t.low <= t.medium && t.medium <= t.high, {
      message: 'thresholds must be ascending (low <= medium <= high)',
    });

export const settingsSchema = z.object({
  connection: z
    .object({
      host: z.string().min(1).default('localhost'),
      port: z.number().int().min(1).max(65535).default(6032),
      user: z.string().default('admin'),
      password: z.string().default('admin'),
      /** Unix socket; takes precedence over host/port */
      socket: z.string().min(1).optional(),
      timeoutSeconds: z.number().positive().default(5),
    })
    .default({}),
  thresholds: z
    .object({
      connections: levels(10, 50, 100),
      hitsPerSecond: levels(1000, 10000, 100000),
      qps: levels(1000, 5000, 10000),
      slowQueryMs: z.number().positive().default(1000),
      errorRate: z
        .object({
          warning: z.number().nonnegative().default(1),
          high: z.number().nonnegative().default(5),
        })
        .default({}),
    })
    .default({}),
  excludedUsers: z.array(z.string()).default(['proxysql-admin', 'proxysql-stats', 'proxysql-stat']),
  refreshIntervalMs: z.number().int().min(100).default(1000),
  trendCapacity: z.number().int().min(2).default(120),
  theme: z.enum(['nano-dark', 'nano-light']).default('nano-dark'),
  slowQueries: z
    .object({
      minExecutionMs: z.number().nonnegative().default(10),
      maxRows: z.number().int().positive().default(15),
    })
    .default({}),
  logFile: z.string().default('/var/lib/proxysql/proxysql.log'),
  logTailLines: z.number().int().positive().default(100),
  logs: z
    .object({
      follow: z.boolean().default(true),
      showDebug: z.boolean().default(false),
    })
    .default({}),
  /** Debug log file; logging is off when unset */
  debugLog: z.string().min(1).optional(),
});

export type Settings = z.infer<typeof settingsSchema>;

export function defaultSettings(): Settings {
  return settingsSchema.parse({});
}

/**
 * Validate raw settings, falling back to defaults for an invalid document
 */
export function parseSettings(raw: unknown): { settings: Settings; problems: string[] } {
  const result = settingsSchema.safeParse(raw);
  if (result.success) {
    return { settings: result.data, problems: [] };
  }
  const problems = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
  return { settings: defaultSettings(), problems };
}

/**
 * Load settings from file
 * @returns Settings with defaults applied; defaults alone if the file is missing or invalid
 */
export function loadSettings(file: string = SETTINGS_FILE): Settings {
  try {
    if (fs.existsSync(file)) {
      const content = fs.readFileSync(file, 'utf-8');
      const { settings, problems } = parseSettings(JSON.parse(content));
      if (problems.length > 0) {
        console.error(chalk.yellow(`Ignoring invalid settings in ${file}:`));
        problems.forEach(p => console.error(chalk.gray(`  ${p}`)));
      }
      return settings;
    }
  } catch (error) {
    console.error(chalk.yellow('Failed to load settings:'), error);
  }
  return defaultSettings();
}

export interface CliOptions {
  help: boolean;
  overrides: {
    host?: string;
    port?: number;
    user?: string;
    password?: string;
    socket?: string;
    refreshIntervalMs?: number;
    logFile?: string;
    theme?: Settings['theme'];
    debugLog?: string;
  };
}

const portArg = z.coerce.number().int().min(1).max(65535);
const intervalArg = z.coerce.number().int().min(100);
const themeArg = settingsSchema.shape.theme.removeDefault();

/**
 * Parse CLI arguments
 * @throws Error naming the offending flag
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { help: false, overrides: {} };
  const o = options.overrides;

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (flag === '--help' || flag === '-h') {
      options.help = true;
      continue;
    }
    const value = argv[i + 1];
    if (value === undefined) {
      throw new Error(`Unknown or incomplete option: ${flag}`);
    }
    switch (flag) {
      case '--host':
      case '-H':
        o.host = value;
        break;
      case '--port':
      case '-P':
        o.port = parseWith(portArg, flag, value);
        break;
      case '--user':
      case '-u':
        o.user = value;
        break;
      case '--password':
      case '-p':
        o.password = value;
        break;
      case '--socket':
      case '-S':
        o.socket = value;
        break;
      case '--interval':
      case '-i':
        o.refreshIntervalMs = parseWith(intervalArg, flag, value);
        break;
      case '--log-file':
        o.logFile = value;
        break;
      case '--theme':
        o.theme = parseWith(themeArg, flag, value);
        break;
      case '--debug-log':
        o.debugLog = value;
        break;
      default:
        throw new Error(`Unknown or incomplete option: ${flag}`);
    }
    i++;
  }
  return options;
}

function parseWith<T>(schema: z.ZodType<T>, flag: string, value: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new Error(`Invalid value for ${flag}: ${value}`);
  }
  return result.data;
}

/**
 * CLI flags win over the settings file
 */
export function applyOverrides(settings: Settings, overrides: CliOptions['overrides']): Settings {
  const { host, port, user, password, socket, refreshIntervalMs, logFile, theme, debugLog } = overrides;
  return {
    ...settings,
    connection: {
      ...settings.connection,
      ...(host !== undefined && { host }),
      ...(port !== undefined && { port }),
      ...(user !== undefined && { user }),
      ...(password !== undefined && { password }),
      ...(socket !== undefined && { socket }),
    },
    ...(refreshIntervalMs !== undefined && { refreshIntervalMs }),
    ...(logFile !== undefined && { logFile }),
    ...(theme !== undefined && { theme }),
    ...(debugLog !== undefined && { debugLog }),
  };
}

export const USAGE = `Usage: proxytop [options]

Options:
  -H, --host <host>         ProxySQL admin host (default localhost)
  -P, --port <port>         ProxySQL admin port (default 6032)
  -u, --user <user>         Admin user (default admin)
  -p, --password <pass>     Admin password
  -S, --socket <path>       Admin unix socket (overrides host/port)
  -i, --interval <ms>       Refresh interval in milliseconds (default 1000)
      --log-file <path>     ProxySQL log file for the Logs page
      --theme <name>        nano-dark | nano-light
      --debug-log <path>    Write a debug log to this file
  -h, --help                Show this help

Settings are read from ${SETTINGS_FILE}`;
