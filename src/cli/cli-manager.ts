/**
 * CLI Manager - Handles all CLI command logic and interactions
 */

import { promises as fs } from 'fs';
import { dirname, join, resolve } from 'path';
import type { Logger } from 'pino';
import { ConfigManager, GlobalFlags } from './config-manager';
import { OutputFormatter } from './output-formatter';
import { AdbRunner } from '../adb/adb-runner';
import { DeviceSelector } from '../adb/device-selector';
import {
  buildComponent,
  buildStringExtras,
  fileStamp,
  parseBattery,
  parsePackageDump,
  parseProperties,
  parseSince,
  sanitizeInputText
} from '../adb/parsers';
import { LogAnalyzer } from '../analysis/log-analyzer';
import { buildReport, renderTextReport, reportToJson } from '../analysis/log-report';
import { createLogger, levelFor, silentLogger } from '../logging/logger';
import { CommandResult, Settings } from '../interfaces/common';
import {
  DroidctlError,
  ExternalCommandFailedError,
  InvalidArgumentsError,
  OperationTimeoutError,
  errorMessage
} from '../errors';

export interface InitializeOptions {
  /** Command path being run, e.g. "app start" */
  command?: string;
  /** Keep going with an empty configuration when the config file cannot be loaded */
  tolerateConfigErrors?: boolean;
}

export interface DevicesOptions {
  json?: boolean;
}

export interface InstallOptions {
  replace?: boolean;
  downgrade?: boolean;
  grantAll?: boolean;
}

export interface UninstallOptions {
  package: string;
  keepData?: boolean;
}

export interface ScreenshotOptions {
  out?: string;
}

export interface RecordOptions {
  /** Seconds, clamped to 1..RECORD_MAX_SECONDS */
  duration?: number;
  /** Mbps */
  bitrate?: number;
  out?: string;
}

export interface LogcatOptions {
  out?: string;
  since?: string;
  filter?: string[];
  clear?: boolean;
  /** Seconds; without it logcat runs until interrupted */
  duration?: number;
}

export interface AnalyzeLogsOptions {
  file: string;
  json?: boolean;
  top?: number;
}

export interface AppStartOptions {
  package?: string;
  activity?: string;
  action?: string;
  data?: string;
  extra?: string[];
}

export interface PackageOptions {
  package: string;
}

export interface GrantPermsOptions {
  package: string;
  perms: string[];
}

export interface SwipeOptions {
  duration?: number;
}

export interface ShellOptions {
  root?: boolean;
}

export interface PullOptions {
  remote: string;
  out?: string;
}

export interface PushOptions {
  src: string;
  remote: string;
}

export interface DeviceInfoOptions {
  json?: boolean;
}

export interface TcpipEnableOptions {
  port?: number;
}

export interface TcpipConnectOptions {
  host: string;
  port?: number;
}

export interface ScreenSizeOptions {
  set?: string;
}

export interface ScreenDensityOptions {
  set?: number;
}

export interface RotateOptions {
  landscape?: boolean;
  portrait?: boolean;
  unlock?: boolean;
}

export interface ConfigShowOptions {
  json?: boolean;
}

export interface ConfigInitOptions {
  force?: boolean;
}

export interface ConfigValidateOptions {
  config?: string;
}

export const RECORD_DEFAULT_SECONDS = 30;
export const RECORD_MAX_SECONDS = 180;
export const RECORD_DEFAULT_BITRATE_MBPS = 4;
export const INSTALL_MIN_TIMEOUT_MS = 120_000;
export const DEFAULT_TCPIP_PORT = 5555;

const SCREEN_SIZE = /^(\d+x\d+|reset)$/;

/**
 * Manages CLI operations and coordinates the adb runner and device selection
 */
export class CLIManager {
  private runner: AdbRunner | null = null;
  private selector: DeviceSelector | null = null;
  private settings: Settings | null = null;
  private logger: Logger = silentLogger;
  private closeLogger: () => Promise<void> = () => Promise.resolve();
  private configPathFlag: string | undefined;
  private initialized = false;

  constructor(private configManager: ConfigManager, private outputFormatter: OutputFormatter = new OutputFormatter()) {}

  /**
   * Load configuration, resolve settings and set up logging and the adb runner
   */
  async initialize(flags: GlobalFlags, options: InitializeOptions = {}): Promise<void> {
    if (this.initialized) {
      return;
    }

    this.configPathFlag = flags.config;
    try {
      await this.configManager.loadConfig(flags.config);
    } catch (error) {
      if (!options.tolerateConfigErrors) {
        throw error;
      }
      this.outputFormatter.warn(errorMessage(error));
    }

    const settings = this.configManager.resolveSettings(flags);
    this.outputFormatter.setVerbosity(settings);

    const appLogger = createLogger({
      level: levelFor(settings),
      file: settings.logFile,
      onError: error => this.outputFormatter.warn(`Cannot write log file ${settings.logFile}, file logging disabled: ${error.message}`)
    });
    this.logger = appLogger.logger;
    this.closeLogger = appLogger.close;

    this.runner = new AdbRunner({
      adbPath: settings.adbPath,
      timeoutMs: settings.timeoutSeconds * 1000,
      dryRun: settings.dryRun,
      logger: this.logger,
      onCommand: line => this.outputFormatter.debug(`$ ${line}`),
      onDryRun: line => this.outputFormatter.plain(line)
    });
    this.selector = new DeviceSelector(this.runner, this.logger);
    this.settings = settings;
    this.initialized = true;

    this.logger.info({ command: options.command, dryRun: settings.dryRun }, 'droidctl started');
  }

  async handleDevices(options: DevicesOptions = {}): Promise<void> {
    const devices = await this.requireSelector().listDevices({ withProperties: true });
    if (options.json) {
      this.outputFormatter.json(devices);
    } else {
      this.outputFormatter.displayDevices(devices);
    }
  }

  async handleInstall(apk: string, options: InstallOptions = {}): Promise<void> {
    const runner = this.requireRunner();
    const apkPath = await this.requireExisting(apk, 'APK', true);

    const args = ['install'];
    if (options.replace) args.push('-r');
    if (options.downgrade) args.push('-d');
    if (options.grantAll) args.push('-g');
    args.push(apkPath);

    const serial = await this.pickDevice();
    const result = await runner.run(args, {
      serial,
      timeoutMs: Math.max(runner.defaultTimeoutMs, INSTALL_MIN_TIMEOUT_MS)
    });
    // pm reports some failures with exit code 0
    if (result.exitCode !== 0 || result.stdout.includes('Failure')) {
      throw new ExternalCommandFailedError('Install failed', result);
    }

    this.logger.info({ apk: apkPath, serial }, 'Installed package');
    this.done(`Installed ${apkPath}`);
  }

  async handleUninstall(options: UninstallOptions): Promise<void> {
    const args = ['uninstall'];
    if (options.keepData) args.push('-k');
    args.push(options.package);

    const serial = await this.pickDevice();
    const result = await this.requireRunner().runChecked(args, 'Uninstall failed', { serial });
    this.outputFormatter.plain(result.stdout.trim());
  }

  async handleScreenshot(options: ScreenshotOptions = {}): Promise<void> {
    const runner = this.requireRunner();
    const serial = await this.pickDevice();
    const outPath = resolve(options.out ?? join(this.requireSettings().screenshotsDir, `${serial ?? 'device'}_${fileStamp()}.png`));

    await this.prepareOutput(outPath);
    const result = await runner.runToFile(['exec-out', 'screencap', '-p'], outPath, { serial });
    if (runner.dryRun) {
      return;
    }
    if (result.exitCode !== 0) {
      throw new ExternalCommandFailedError('screencap failed', { stdout: '', stderr: result.stderr, exitCode: result.exitCode });
    }
    if (result.bytes === 0) {
      throw new ExternalCommandFailedError('screencap returned no image data', { stdout: '', stderr: result.stderr, exitCode: result.exitCode });
    }

    this.logger.info({ file: outPath, bytes: result.bytes }, 'Saved screenshot');
    this.outputFormatter.success(`Screenshot saved: ${outPath}`);
  }

  async handleRecord(options: RecordOptions = {}): Promise<void> {
    const runner = this.requireRunner();
    const duration = Math.min(Math.max(Math.round(options.duration ?? RECORD_DEFAULT_SECONDS), 1), RECORD_MAX_SECONDS);
    const bitrate = Math.round((options.bitrate ?? RECORD_DEFAULT_BITRATE_MBPS) * 1_000_000);
    const serial = await this.pickDevice();
    const remote = `/sdcard/droidctl_record_${Math.floor(Date.now() / 1000)}.mp4`;
    const outPath = resolve(options.out ?? join(this.requireSettings().screenshotsDir, `${serial ?? 'device'}_${fileStamp()}.mp4`));

    await this.prepareOutput(outPath);
    this.outputFormatter.info(`Recording for ${duration}s...`);
    await runner.runChecked(
      ['shell', 'screenrecord', `--time-limit=${duration}`, `--bit-rate=${bitrate}`, remote],
      'screenrecord failed',
      { serial, timeoutMs: Math.max(runner.defaultTimeoutMs, (duration + 5) * 1000) }
    );
    await runner.runChecked(['pull', remote, outPath], 'Failed to pull the recording', { serial });

    const cleanup = await runner.run(['shell', 'rm', '-f', remote], { serial });
    if (cleanup.exitCode !== 0) {
      this.logger.warn({ remote, stderr: cleanup.stderr }, 'Could not remove the recording from the device');
    }

    this.done(`Video saved: ${outPath}`);
  }

  async handleLogcat(options: LogcatOptions = {}): Promise<void> {
    const runner = this.requireRunner();
    const args = ['logcat'];
    if (options.since) {
      args.push('-T', parseSince(options.since));
    }
    args.push(...(options.filter ?? []));

    const serial = await this.pickDevice();
    if (options.clear) {
      await runner.runChecked(['logcat', '-c'], 'Failed to clear the log buffer', { serial });
    }

    const outPath = resolve(options.out ?? join(this.requireSettings().logsDir, `${serial ?? 'device'}_${fileStamp()}.log`));
    await this.prepareOutput(outPath);

    this.outputFormatter.info(options.duration
      ? `Capturing logcat for ${options.duration}s...`
      : 'Capturing logcat, press Ctrl+C to stop...');
    const result = await runner.runToFile(args, outPath, {
      serial,
      timeoutMs: 0,
      durationMs: options.duration ? options.duration * 1000 : undefined
    });
    if (runner.dryRun) {
      return;
    }
    if (result.exitCode !== 0 && !result.stopped) {
      throw new ExternalCommandFailedError('logcat failed', { stdout: '', stderr: result.stderr, exitCode: result.exitCode });
    }

    this.logger.info({ file: outPath, bytes: result.bytes }, 'Saved logcat output');
    this.outputFormatter.success(`Logs saved: ${outPath} (${result.bytes} bytes)`);
  }

  async handleAnalyzeLogs(options: AnalyzeLogsOptions): Promise<void> {
    const analyzer = new LogAnalyzer({ top: options.top });
    const summary = await analyzer.analyzeFile(options.file);

    this.logger.info({ file: options.file, lines: summary.totalLines }, 'Analyzed log file');
    if (summary.unstructuredLines > 0) {
      this.logger.debug({ unstructured: summary.unstructuredLines }, 'Lines without a recognizable header');
    }

    const report = buildReport(options.file, summary);
    if (options.json) {
      this.outputFormatter.json(reportToJson(report));
    } else {
      this.outputFormatter.lines(renderTextReport(report));
    }
  }

  async handleAppStart(options: AppStartOptions): Promise<void> {
    if (!options.package && !options.activity && !options.action) {
      throw new InvalidArgumentsError('Specify --package, --activity or --action');
    }

    const args = ['shell', 'am', 'start', '-W'];
    if (options.action) args.push('-a', options.action);
    if (options.data) args.push('-d', options.data);
    args.push(...buildStringExtras(options.extra ?? []));
    if (options.activity) {
      args.push('-n', buildComponent(options.activity, options.package));
    } else if (options.package) {
      if (!options.action) {
        args.push('-a', 'android.intent.action.MAIN', '-c', 'android.intent.category.LAUNCHER');
      }
      args.push('-p', options.package);
    }

    const serial = await this.pickDevice();
    const result = await this.requireRunner().runChecked(args, 'am start failed', { serial });
    // am prints "Error:" with exit code 0 on older releases
    if (result.stdout.includes('Error:')) {
      throw new ExternalCommandFailedError('am start failed', result);
    }
    this.outputFormatter.plain(result.stdout.trim());
  }

  async handleAppStop(options: PackageOptions): Promise<void> {
    const serial = await this.pickDevice();
    await this.requireRunner().runChecked(['shell', 'am', 'force-stop', options.package], 'force-stop failed', { serial });
    this.done(`Stopped ${options.package}`);
  }

  async handleAppClear(options: PackageOptions): Promise<void> {
    const serial = await this.pickDevice();
    const result = await this.requireRunner().runChecked(['shell', 'pm', 'clear', options.package], 'pm clear failed', { serial });
    this.outputFormatter.plain(result.stdout.trim());
  }

  /**
   * Grant each permission separately; one failure does not stop the others
   */
  async handleAppGrantPerms(options: GrantPermsOptions): Promise<void> {
    const runner = this.requireRunner();
    const serial = await this.pickDevice();
    const rows: string[][] = [];
    let lastFailure: CommandResult | undefined;
    let failures = 0;

    for (const permission of options.perms) {
      const result = await runner.run(['shell', 'pm', 'grant', options.package, permission], { serial });
      if (result.exitCode === 0) {
        rows.push([permission, 'OK']);
      } else {
        failures++;
        lastFailure = result;
        rows.push([permission, `FAIL - ${(result.stderr || result.stdout).trim()}`]);
      }
    }

    this.outputFormatter.displayTable(['PERMISSION', 'RESULT'], rows);
    if (lastFailure) {
      throw new ExternalCommandFailedError(`Failed to grant ${failures} of ${options.perms.length} permission(s)`, lastFailure);
    }
  }

  async handleAppInfo(options: PackageOptions): Promise<void> {
    const runner = this.requireRunner();
    const serial = await this.pickDevice();
    const dump = await runner.runChecked(['shell', 'dumpsys', 'package', options.package], 'dumpsys package failed', { serial });
    const pmPath = await runner.run(['shell', 'pm', 'path', options.package], { serial });

    this.outputFormatter.json(parsePackageDump(options.package, dump.stdout, pmPath.exitCode === 0 ? pmPath.stdout : ''));
  }

  async handleInputTap(x: number, y: number): Promise<void> {
    await this.input(['tap', String(x), String(y)]);
  }

  async handleInputText(text: string): Promise<void> {
    await this.input(['text', sanitizeInputText(text)]);
  }

  async handleInputKey(key: string): Promise<void> {
    await this.input(['keyevent', key]);
  }

  async handleInputSwipe(x1: number, y1: number, x2: number, y2: number, options: SwipeOptions = {}): Promise<void> {
    const args = ['swipe', String(x1), String(y1), String(x2), String(y2)];
    if (options.duration !== undefined) {
      args.push(String(options.duration));
    }
    await this.input(args);
  }

  async handleShell(command: string[], options: ShellOptions = {}): Promise<void> {
    if (command.length === 0) {
      throw new InvalidArgumentsError('No shell command given');
    }

    const args = options.root ? ['shell', 'su', '-c', command.join(' ')] : ['shell', ...command];
    const serial = await this.pickDevice();
    const result = await this.requireRunner().run(args, { serial });

    this.outputFormatter.raw(result.stdout);
    if (result.exitCode !== 0) {
      throw new ExternalCommandFailedError('Shell command failed', result);
    }
  }

  async handlePull(options: PullOptions): Promise<void> {
    const serial = await this.pickDevice();
    const result = await this.requireRunner().runChecked(['pull', options.remote, options.out ?? '.'], 'Pull failed', { serial });
    this.outputFormatter.plain((result.stdout || result.stderr).trim());
  }

  async handlePush(options: PushOptions): Promise<void> {
    const source = await this.requireExisting(options.src, 'Source', false);
    const serial = await this.pickDevice();
    const result = await this.requireRunner().runChecked(['push', source, options.remote], 'Push failed', { serial });
    this.outputFormatter.plain((result.stdout || result.stderr).trim());
  }

  async handleDeviceInfo(options: DeviceInfoOptions = {}): Promise<void> {
    const serial = await this.pickDevice();
    const props = parseProperties(await this.shellText(['getprop'], serial));
    const id = await this.shellText(['id'], serial);
    const battery = parseBattery(await this.shellText(['dumpsys', 'battery'], serial));
    const storage = (await this.shellText(['df', '-h', '/data'], serial)).split(/\s+/).filter(Boolean).join(' ');
    const memory = (await this.shellText(['dumpsys', 'meminfo', '-c'], serial)).split('\n')[0].trim();

    const info: Record<string, string> = {
      serial: serial ?? '',
      model: props['ro.product.model'] ?? '',
      brand: props['ro.product.brand'] ?? '',
      android: props['ro.build.version.release'] ?? '',
      sdk: props['ro.build.version.sdk'] ?? '',
      abi: props['ro.product.cpu.abi'] ?? '',
      root: id.includes('uid=0') ? 'yes' : 'no',
      battery,
      storage,
      memory
    };

    if (options.json) {
      this.outputFormatter.json(info);
    } else {
      this.outputFormatter.displayRecord(info);
    }
  }

  async handleTcpipEnable(options: TcpipEnableOptions = {}): Promise<void> {
    const serial = await this.pickDevice();
    const port = options.port ?? DEFAULT_TCPIP_PORT;
    const result = await this.requireRunner().runChecked(['tcpip', String(port)], 'adb tcpip failed', { serial });
    this.outputFormatter.plain(result.stdout.trim());
  }

  /**
   * Connect over the network; needs no device to be attached
   */
  async handleTcpipConnect(options: TcpipConnectOptions): Promise<void> {
    const target = `${options.host}:${options.port ?? DEFAULT_TCPIP_PORT}`;
    const result = await this.requireRunner().runChecked(['connect', target], 'adb connect failed');
    // adb connect exits 0 when the connection is refused
    if (/failed|cannot|unable/i.test(result.stdout)) {
      throw new ExternalCommandFailedError(`Could not connect to ${target}`, result);
    }
    this.outputFormatter.plain(result.stdout.trim());
  }

  /**
   * Switch back to USB; uses --serial as given without querying devices
   */
  async handleTcpipDisable(): Promise<void> {
    const result = await this.requireRunner().runChecked(['usb'], 'adb usb failed', { serial: this.requireSettings().serial });
    this.outputFormatter.plain(result.stdout.trim());
  }

  async handleScreenSize(options: ScreenSizeOptions = {}): Promise<void> {
    if (options.set !== undefined && !SCREEN_SIZE.test(options.set)) {
      throw new InvalidArgumentsError(`Invalid size "${options.set}": expected WIDTHxHEIGHT or reset`);
    }
    await this.windowManager(['size', ...(options.set !== undefined ? [options.set] : [])]);
  }

  async handleScreenDensity(options: ScreenDensityOptions = {}): Promise<void> {
    await this.windowManager(['density', ...(options.set !== undefined ? [String(options.set)] : [])]);
  }

  async handleScreenRotate(options: RotateOptions): Promise<void> {
    const chosen = [options.landscape, options.portrait, options.unlock].filter(Boolean).length;
    if (chosen !== 1) {
      throw new InvalidArgumentsError('Choose exactly one of --landscape, --portrait or --unlock');
    }

    const serial = await this.pickDevice();
    if (options.unlock) {
      await this.putSystemSetting('accelerometer_rotation', '1', serial);
      this.done('Auto-rotation enabled');
      return;
    }

    await this.putSystemSetting('accelerometer_rotation', '0', serial);
    await this.putSystemSetting('user_rotation', options.landscape ? '1' : '0', serial);
    this.done(`Screen locked to ${options.landscape ? 'landscape' : 'portrait'}`);
  }

  async handleConfigShow(options: ConfigShowOptions = {}): Promise<void> {
    const settings = this.requireSettings();
    if (options.json) {
      this.outputFormatter.json({
        configPath: this.configManager.getConfigPath(),
        config: this.configManager.getConfig(),
        settings
      });
    } else {
      this.outputFormatter.displaySettings(settings, this.configManager.getConfigPath());
    }
  }

  async handleConfigInit(options: ConfigInitOptions = {}): Promise<void> {
    const configPath = await this.configManager.initializeConfig(this.configPathFlag, { force: options.force });
    this.outputFormatter.success(`Configuration file created: ${configPath}`);
  }

  async handleConfigValidate(options: ConfigValidateOptions = {}): Promise<void> {
    const configPath = resolve(options.config ?? this.configPathFlag ?? this.configManager.getConfigPath());
    const validation = await this.configManager.validateConfig(configPath);

    if (!validation.valid) {
      throw new Error(`Configuration is invalid: ${configPath}: ${validation.error ?? 'unknown error'}`);
    }
    this.outputFormatter.success(`Configuration is valid: ${configPath}`);
  }

  /**
   * Print a failure for the user and record it in the log file
   */
  reportError(error: unknown): void {
    const message = errorMessage(error);
    if (error instanceof OperationTimeoutError) {
      this.outputFormatter.plain(error.partial.stdout.trim());
    }
    this.outputFormatter.error(message);
    if (error instanceof DroidctlError && error.suggestion) {
      this.outputFormatter.info(`Suggestion: ${error.suggestion}`);
    }
    this.logger.error(
      { err: error, code: error instanceof DroidctlError ? error.code : undefined },
      message
    );
  }

  /**
   * Stop running adb processes and flush the log file
   */
  async cleanup(): Promise<void> {
    if (this.runner) {
      this.runner.terminateAll();
      await this.runner.settle();
    }
    const close = this.closeLogger;
    this.closeLogger = () => Promise.resolve();
    await close();
  }

  private requireRunner(): AdbRunner {
    if (!this.runner) {
      throw new Error('CLI not initialized');
    }
    return this.runner;
  }

  private requireSelector(): DeviceSelector {
    if (!this.selector) {
      throw new Error('CLI not initialized');
    }
    return this.selector;
  }

  private requireSettings(): Settings {
    if (!this.settings) {
      throw new Error('CLI not initialized');
    }
    return this.settings;
  }

  private pickDevice(): Promise<string | undefined> {
    return this.requireSelector().pick(this.requireSettings().serial);
  }

  /**
   * Success line that would be a lie under dry-run
   */
  private done(message: string): void {
    if (!this.requireRunner().dryRun) {
      this.outputFormatter.success(message);
    }
  }

  private async requireExisting(path: string, what: string, fileOnly: boolean): Promise<string> {
    const fullPath = resolve(path);
    let found = false;
    try {
      const stats = await fs.stat(fullPath);
      found = fileOnly ? stats.isFile() : true;
    } catch (error) {
      this.logger.debug({ path: fullPath, error: errorMessage(error) }, 'stat failed');
    }
    if (!found) {
      throw new InvalidArgumentsError(`${what} not found: ${path}`);
    }
    return fullPath;
  }

  private async prepareOutput(file: string): Promise<void> {
    if (!this.requireRunner().dryRun) {
      await fs.mkdir(dirname(file), { recursive: true });
    }
  }

  private async input(args: string[]): Promise<void> {
    const serial = await this.pickDevice();
    await this.requireRunner().runChecked(['shell', 'input', ...args], `input ${args[0]} failed`, { serial });
  }

  private async shellText(command: string[], serial: string | undefined): Promise<string> {
    const result = await this.requireRunner().run(['shell', ...command], { serial });
    return result.stdout.trim();
  }

  private async windowManager(args: string[]): Promise<void> {
    const serial = await this.pickDevice();
    const result = await this.requireRunner().runChecked(['shell', 'wm', ...args], `wm ${args[0]} failed`, { serial });
    this.outputFormatter.plain(result.stdout.trim());
  }

  private async putSystemSetting(name: string, value: string, serial: string | undefined): Promise<void> {
    await this.requireRunner().runChecked(
      ['shell', 'settings', 'put', 'system', name, value],
      `Failed to set ${name}`,
      { serial }
    );
  }
}
