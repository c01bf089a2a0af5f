/**
 * Common types and interfaces used across droidctl
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type DeviceState = 'device' | 'offline' | 'unauthorized';

/**
 * Process exit codes reported by the CLI
 */
export enum ExitCode {
  Success = 0,
  GenericError = 1,
  BinaryNotFound = 2,
  DeviceSelection = 3,
  InvalidArguments = 4,
  Timeout = 5
}

export interface DeviceInfo {
  serial: string;
  state: DeviceState;
  model?: string;
  product?: string;
  device?: string;
  transportId?: string;
  android?: string;
  sdk?: string;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Where a resolved setting came from
 */
export type SettingSource = 'flag' | 'env' | 'config' | 'default';

export interface Settings {
  adbPath?: string;
  serial?: string;
  timeoutSeconds: number;
  logsDir: string;
  screenshotsDir: string;
  logFile: string;
  dryRun: boolean;
  verbose: boolean;
  quiet: boolean;
  sources: {
    adbPath?: SettingSource;
    serial?: SettingSource;
    timeoutSeconds: SettingSource;
    logsDir: SettingSource;
    screenshotsDir: SettingSource;
    logFile: SettingSource;
  };
}
