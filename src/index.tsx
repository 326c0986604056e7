#!/usr/bin/env tsx
import React from 'react';
import { render } from 'ink';
import chalk from 'chalk';
import * as tty from 'tty';
import * as fs from 'fs';
import { App } from '@components/App';
import { ThemeProvider } from '@hooks/useTheme';
import { createAppState } from '@core/app-state';
import { ControlLoop } from '@core/control-loop';
import { errorMessage } from '@core/errors';
import { RefreshLoop } from '@core/refresh-loop';
import { USAGE, applyOverrides, loadSettings, parseArgs, type CliOptions } from '@utils/config';
import { SystemDnsResolver } from '@utils/dns';
import { FileLogger, getLogger, setLogger } from '@utils/logger';
import { ProxyAdmin } from '@utils/proxy-admin';

chalk.level = 3;

let cli: CliOptions;
try {
  cli = parseArgs(process.argv.slice(2));
} catch (error) {
  console.error(chalk.red(errorMessage(error)));
  console.error(USAGE);
  process.exit(1);
}

if (cli.help) {
  console.log(USAGE);
  process.exit(0);
}

const settings = applyOverrides(loadSettings(), cli.overrides);
setLogger(new FileLogger(settings.debugLog));
getLogger().info(
  `Starting with ${JSON.stringify({ ...settings, connection: { ...settings.connection, password: '***' } })}`,
);

const admin = new ProxyAdmin(settings);

let version: string;
try {
  version = await admin.probe();
} catch (error) {
  getLogger().error(errorMessage(error));
  console.error(chalk.red('✗ ') + chalk.bold(errorMessage(error)));
  console.error(chalk.gray('  Check --host/--port/--user/--password or ~/.config/proxytop/settings.json'));
  await admin.close().catch((closeError: unknown) => {
    getLogger().debug(`Pool close failed: ${errorMessage(closeError)}`);
  });
  process.exit(1);
}

// stdin can fail with EPERM when piped on Linux. Open /dev/tty as TTY instead.
let stdinStream: tty.ReadStream = process.stdin;
if (process.platform === 'linux') {
  try {
    const fd = fs.openSync('/dev/tty', 'r');
    stdinStream = new tty.ReadStream(fd);
  } catch (error) {
    getLogger().debug(`Using process stdin: ${errorMessage(error)}`);
  }
}

const state = createAppState({
  settings,
  resolver: new SystemDnsResolver(),
  identity: { version, host: admin.hostLabel },
  size: { columns: process.stdout.columns || 80, rows: process.stdout.rows || 24 },
  now: Date.now(),
});
const refresh = new RefreshLoop(admin, admin, {
  intervalMs: settings.refreshIntervalMs,
  timeoutMs: settings.connection.timeoutSeconds * 1000,
});
const loop = new ControlLoop(state, refresh);

const instance = render(
  <ThemeProvider name={settings.theme}>
    <App loop={loop} />
  </ThemeProvider>,
  { stdin: stdinStream, exitOnCtrlC: false },
);

await instance.waitUntilExit();
loop.stop();
await admin.close();
process.exit(0);
