#!/usr/bin/env node

/**
 * CLI entry point for droidctl
 * Wraps adb for common Android device tasks and analyzes captured logs
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { CLIManager } from './cli-manager';
import { ConfigManager, GlobalFlags } from './config-manager';
import { ExitCode } from '../interfaces/common';
import { exitCodeFor } from '../errors';
import { version } from '../../package.json';

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parseInt(value, 10);
}

function parseNonNegativeInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 0) {
    throw new InvalidArgumentError('Must not be negative.');
  }
  return parsed;
}

function parsePositiveInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

function parsePort(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 1 || parsed > 65535) {
    throw new InvalidArgumentError('Must be between 1 and 65535.');
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

/**
 * "app start" for the app start command, "" for the program itself
 */
export function commandPath(command: Command): string {
  const names: string[] = [];
  for (let current: Command | null = command; current && current.parent; current = current.parent) {
    names.unshift(current.name());
  }
  return names.join(' ');
}

/**
 * Build the command tree; every action delegates to the CLI manager
 */
export function createProgram(cliManager: CLIManager): Command {
  const program = new Command();

  program
    .name('droidctl')
    .description('Android device helper built on adb, with a logcat analyzer')
    .version(version)
    .option('--adb <path>', 'adb binary or platform-tools directory')
    .option('-s, --serial <serial>', 'target device serial')
    .option('--timeout <seconds>', 'per-command timeout in seconds', parsePositiveInteger)
    .option('--dry-run', 'print adb commands instead of running them')
    .option('--verbose', 'show adb commands and debug output')
    .option('--quiet', 'only print errors and command output')
    .option('-c, --config <path>', 'path to configuration file')
    .exitOverride()
    .hook('preAction', async (thisCommand, actionCommand) => {
      const path = commandPath(actionCommand);
      const flags: GlobalFlags = thisCommand.opts();
      await cliManager.initialize(flags, {
        command: path,
        tolerateConfigErrors: path.startsWith('config ')
      });
    });

  program
    .command('devices')
    .description('List connected devices')
    .option('-j, --json', 'output in JSON format')
    .action(async (options) => {
      await cliManager.handleDevices(options);
    });

  program
    .command('install')
    .description('Install an APK')
    .argument('<apk>', 'path to the APK')
    .option('-r, --replace', 'replace an existing installation')
    .option('-d, --downgrade', 'allow a version downgrade')
    .option('-g, --grant-all', 'grant all runtime permissions')
    .action(async (apk: string, options) => {
      await cliManager.handleInstall(apk, options);
    });

  program
    .command('uninstall')
    .description('Uninstall a package')
    .requiredOption('-p, --package <package>', 'package name')
    .option('-k, --keep-data', 'keep data and cache directories')
    .action(async (options) => {
      await cliManager.handleUninstall(options);
    });

  program
    .command('screenshot')
    .description('Capture the screen to a PNG file')
    .option('-o, --out <file>', 'output file')
    .action(async (options) => {
      await cliManager.handleScreenshot(options);
    });

  program
    .command('record')
    .description('Record the screen to an MP4 file')
    .option('--duration <seconds>', 'recording length, 1 to 180 seconds', parsePositiveInteger)
    .option('--bitrate <mbps>', 'bit rate in Mbps', parsePositiveNumber)
    .option('-o, --out <file>', 'output file')
    .action(async (options) => {
      await cliManager.handleRecord(options);
    });

  program
    .command('logcat')
    .description('Capture logcat output to a file')
    .option('-o, --out <file>', 'output file')
    .option('--since <when>', 'only entries since 5m, 2h, 1d or an ISO date')
    .option('--filter <tag:level>', 'logcat filter such as ActivityManager:I (repeatable)', collect, [])
    .option('--clear', 'clear the log buffer first')
    .option('--duration <seconds>', 'stop after this many seconds', parsePositiveInteger)
    .action(async (options) => {
      await cliManager.handleLogcat(options);
    });

  program
    .command('analyze-logs')
    .description('Summarize a captured logcat file')
    .requiredOption('-f, --file <path>', 'log file to analyze')
    .option('-j, --json', 'output in JSON format')
    .option('--top <n>', 'number of tags and offenders to list', parsePositiveInteger)
    .action(async (options) => {
      await cliManager.handleAnalyzeLogs(options);
    });

  const appCmd = program
    .command('app')
    .description('Application management commands');

  appCmd
    .command('start')
    .description('Start an activity or send an intent')
    .option('-p, --package <package>', 'package name')
    .option('-a, --activity <activity>', 'activity, e.g. .MainActivity or pkg/.MainActivity')
    .option('--action <action>', 'intent action')
    .option('--data <uri>', 'intent data URI')
    .option('--extra <key=value>', 'string extra (repeatable)', collect, [])
    .action(async (options) => {
      await cliManager.handleAppStart(options);
    });

  appCmd
    .command('stop')
    .description('Force-stop an application')
    .requiredOption('-p, --package <package>', 'package name')
    .action(async (options) => {
      await cliManager.handleAppStop(options);
    });

  appCmd
    .command('clear')
    .description('Clear application data')
    .requiredOption('-p, --package <package>', 'package name')
    .action(async (options) => {
      await cliManager.handleAppClear(options);
    });

  appCmd
    .command('grant-perms')
    .description('Grant runtime permissions')
    .requiredOption('-p, --package <package>', 'package name')
    .requiredOption('--perms <permission...>', 'permissions to grant')
    .action(async (options) => {
      await cliManager.handleAppGrantPerms(options);
    });

  appCmd
    .command('info')
    .description('Show package details as JSON')
    .requiredOption('-p, --package <package>', 'package name')
    .action(async (options) => {
      await cliManager.handleAppInfo(options);
    });

  const inputCmd = program
    .command('input')
    .description('Send input events');

  inputCmd
    .command('tap')
    .description('Tap at a screen position')
    .argument('<x>', 'x coordinate', parseNonNegativeInteger)
    .argument('<y>', 'y coordinate', parseNonNegativeInteger)
    .action(async (x: number, y: number) => {
      await cliManager.handleInputTap(x, y);
    });

  inputCmd
    .command('text')
    .description('Type text')
    .argument('<text>', 'text to type')
    .action(async (text: string) => {
      await cliManager.handleInputText(text);
    });

  inputCmd
    .command('key')
    .description('Send a key event')
    .argument('<key>', 'key code or name, e.g. 3 or KEYCODE_HOME')
    .action(async (key: string) => {
      await cliManager.handleInputKey(key);
    });

  inputCmd
    .command('swipe')
    .description('Swipe between two screen positions')
    .argument('<x1>', 'start x', parseNonNegativeInteger)
    .argument('<y1>', 'start y', parseNonNegativeInteger)
    .argument('<x2>', 'end x', parseNonNegativeInteger)
    .argument('<y2>', 'end y', parseNonNegativeInteger)
    .option('--duration <ms>', 'swipe duration in milliseconds', parsePositiveInteger)
    .action(async (x1: number, y1: number, x2: number, y2: number, options) => {
      await cliManager.handleInputSwipe(x1, y1, x2, y2, options);
    });

  program
    .command('shell')
    .description('Run a shell command on the device')
    .argument('<command...>', 'command and its arguments')
    .option('--root', 'run through su -c')
    .allowUnknownOption()
    .action(async (command: string[], options) => {
      await cliManager.handleShell(command, options);
    });

  program
    .command('pull')
    .description('Copy a file from the device')
    .requiredOption('--remote <path>', 'path on the device')
    .option('-o, --out <path>', 'local destination', '.')
    .action(async (options) => {
      await cliManager.handlePull(options);
    });

  program
    .command('push')
    .description('Copy a file to the device')
    .requiredOption('--src <path>', 'local file or directory')
    .requiredOption('--remote <path>', 'path on the device')
    .action(async (options) => {
      await cliManager.handlePush(options);
    });

  program
    .command('device-info')
    .description('Show device properties, battery, storage and memory')
    .option('-j, --json', 'output in JSON format')
    .action(async (options) => {
      await cliManager.handleDeviceInfo(options);
    });

  const tcpipCmd = program
    .command('tcpip')
    .description('adb over the network');

  tcpipCmd
    .command('enable')
    .description('Restart adbd on the device listening on a TCP port')
    .option('--port <port>', 'TCP port', parsePort)
    .action(async (options) => {
      await cliManager.handleTcpipEnable(options);
    });

  tcpipCmd
    .command('connect')
    .description('Connect to a device over the network')
    .requiredOption('--host <host>', 'device address')
    .option('--port <port>', 'TCP port', parsePort)
    .action(async (options) => {
      await cliManager.handleTcpipConnect(options);
    });

  tcpipCmd
    .command('disable')
    .description('Restart adbd on the device in USB mode')
    .action(async () => {
      await cliManager.handleTcpipDisable();
    });

  const screenCmd = program
    .command('screen')
    .description('Display settings');

  screenCmd
    .command('size')
    .description('Show or override the screen size')
    .option('--set <size>', 'WIDTHxHEIGHT or reset')
    .action(async (options) => {
      await cliManager.handleScreenSize(options);
    });

  screenCmd
    .command('density')
    .description('Show or override the screen density')
    .option('--set <dpi>', 'density in dpi', parsePositiveInteger)
    .action(async (options) => {
      await cliManager.handleScreenDensity(options);
    });

  screenCmd
    .command('rotate')
    .description('Lock or unlock the screen orientation')
    .addOption(new Option('--landscape', 'lock to landscape').conflicts(['portrait', 'unlock']))
    .addOption(new Option('--portrait', 'lock to portrait').conflicts(['landscape', 'unlock']))
    .addOption(new Option('--unlock', 'enable auto-rotation').conflicts(['landscape', 'portrait']))
    .action(async (options) => {
      await cliManager.handleScreenRotate(options);
    });

  const configCmd = program
    .command('config')
    .description('Configuration management commands');

  configCmd
    .command('show')
    .description('Show the effective configuration')
    .option('-j, --json', 'output in JSON format')
    .action(async (options) => {
      await cliManager.handleConfigShow(options);
    });

  configCmd
    .command('init')
    .description('Initialize configuration file')
    .option('-f, --force', 'overwrite existing configuration')
    .action(async (options) => {
      await cliManager.handleConfigInit(options);
    });

  configCmd
    .command('validate')
    .description('Validate configuration file')
    .option('--file <path>', 'configuration file to validate')
    .action(async (options: { file?: string }) => {
      await cliManager.handleConfigValidate({ config: options.file });
    });

  return program;
}

/**
 * Parse user arguments, run the command and map the outcome to an exit code
 */
export async function main(argv: string[], cliManager: CLIManager = new CLIManager(new ConfigManager())): Promise<ExitCode> {
  const program = createProgram(cliManager);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return ExitCode.Success;
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander already printed usage or help
      return error.exitCode === 0 ? ExitCode.Success : ExitCode.InvalidArguments;
    }
    cliManager.reportError(error);
    return exitCodeFor(error);
  } finally {
    await cliManager.cleanup();
  }
}

// Only run main if this file is executed directly
if (require.main === module) {
  const cliManager = new CLIManager(new ConfigManager());

  const shutdown = (signal: NodeJS.Signals): void => {
    console.error(`\nReceived ${signal}, stopping...`);
    cliManager.cleanup().then(
      () => process.exit(ExitCode.GenericError),
      () => process.exit(ExitCode.GenericError)
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  main(process.argv.slice(2), cliManager).then(
    (code) => {
      process.exitCode = code;
    },
    (error) => {
      console.error('Fatal error:', error);
      process.exitCode = ExitCode.GenericError;
    }
  );
}
