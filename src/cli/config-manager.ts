/**
 * Configuration Manager - loads the optional config file and resolves the
 * effective settings from flags, environment, config file and defaults
 */

import { promises as fs } from 'fs';
import { join, resolve } from 'path';
import { homedir } from 'os';
import { Settings, SettingSource } from '../interfaces/common';
import { errnoCode, errorMessage } from '../errors';

export interface DroidctlConfig {
  /** adb binary or platform-tools directory */
  adbPath?: string;
  defaultSerial?: string;
  /** Seconds */
  defaultTimeout?: number;
  logsDir?: string;
  screenshotsDir?: string;
  logFile?: string;
}

/**
 * Global options as commander hands them over
 */
export interface GlobalFlags {
  adb?: string;
  serial?: string;
  timeout?: number;
  dryRun?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
}

export interface ConfigInitOptions {
  force?: boolean;
}

export interface ConfigValidation {
  valid: boolean;
  error?: string;
}

export const CONFIG_FILE_NAME = '.droidctl.json';

export const DEFAULTS = {
  timeoutSeconds: 30,
  logsDir: 'logs',
  screenshotsDir: 'screenshots',
  logFile: 'droidctl.log'
} as const;

export const ENV_VARS = {
  adbPath: 'DROIDCTL_ADB_PATH',
  serial: 'DROIDCTL_SERIAL',
  timeout: 'DROIDCTL_TIMEOUT',
  logsDir: 'DROIDCTL_LOGS_DIR',
  screenshotsDir: 'DROIDCTL_SCREENSHOTS_DIR',
  logFile: 'DROIDCTL_LOG_FILE'
} as const;

/**
 * Template written by `config init`
 */
const CONFIG_TEMPLATE: DroidctlConfig = {
  defaultTimeout: DEFAULTS.timeoutSeconds,
  logsDir: DEFAULTS.logsDir,
  screenshotsDir: DEFAULTS.screenshotsDir,
  logFile: DEFAULTS.logFile
};

const STRING_KEYS = ['adbPath', 'defaultSerial', 'logsDir', 'screenshotsDir', 'logFile'] as const;

export function defaultConfigPath(): string {
  return join(homedir(), CONFIG_FILE_NAME);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a positive integer number of seconds, or undefined when the text is not one
 */
export function parseSeconds(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) {
    return undefined;
  }
  const seconds = parseInt(value, 10);
  return seconds > 0 ? seconds : undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

/**
 * Pick the first defined candidate, in priority order, and remember its source
 */
function firstOf<T>(candidates: Array<[T | undefined, SettingSource]>): [T, SettingSource] | undefined {
  for (const [value, source] of candidates) {
    if (value !== undefined) {
      return [value, source];
    }
  }
  return undefined;
}

/**
 * Manages the config file and the layered settings lookup
 */
export class ConfigManager {
  private config: DroidctlConfig = {};
  private configPath: string = '';

  /**
   * Load configuration from file; a missing file means an empty configuration
   */
  async loadConfig(configPath: string = defaultConfigPath()): Promise<DroidctlConfig> {
    this.configPath = resolve(configPath);

    try {
      const configContent = await fs.readFile(this.configPath, 'utf-8');
      const parsedConfig: unknown = JSON.parse(configContent);

      this.validateConfigObject(parsedConfig);

      this.config = { ...parsedConfig };
      return this.getConfig();
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        this.config = {};
        return this.getConfig();
      } else if (error instanceof SyntaxError) {
        throw new Error(`Invalid JSON in configuration file: ${this.configPath}`);
      } else {
        throw new Error(`Failed to load configuration: ${errorMessage(error)}`);
      }
    }
  }

  getConfig(): DroidctlConfig {
    return { ...this.config };
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Effective settings: CLI flag > environment variable > config file > default
   */
  resolveSettings(flags: GlobalFlags, env: NodeJS.ProcessEnv = process.env): Settings {
    const config = this.config;

    const adbPath = firstOf<string>([
      [nonEmpty(flags.adb), 'flag'],
      [nonEmpty(env[ENV_VARS.adbPath]), 'env'],
      [nonEmpty(config.adbPath), 'config']
    ]);
    const serial = firstOf<string>([
      [nonEmpty(flags.serial), 'flag'],
      [nonEmpty(env[ENV_VARS.serial]), 'env'],
      [nonEmpty(config.defaultSerial), 'config']
    ]);
    const timeout = firstOf<number>([
      [flags.timeout, 'flag'],
      [parseSeconds(env[ENV_VARS.timeout]), 'env'],
      [config.defaultTimeout, 'config'],
      [DEFAULTS.timeoutSeconds, 'default']
    ]);
    const logsDir = firstOf<string>([
      [nonEmpty(env[ENV_VARS.logsDir]), 'env'],
      [nonEmpty(config.logsDir), 'config'],
      [DEFAULTS.logsDir, 'default']
    ]);
    const screenshotsDir = firstOf<string>([
      [nonEmpty(env[ENV_VARS.screenshotsDir]), 'env'],
      [nonEmpty(config.screenshotsDir), 'config'],
      [DEFAULTS.screenshotsDir, 'default']
    ]);
    const logFile = firstOf<string>([
      [nonEmpty(env[ENV_VARS.logFile]), 'env'],
      [nonEmpty(config.logFile), 'config'],
      [DEFAULTS.logFile, 'default']
    ]);

    return {
      adbPath: adbPath?.[0],
      serial: serial?.[0],
      timeoutSeconds: timeout?.[0] ?? DEFAULTS.timeoutSeconds,
      logsDir: logsDir?.[0] ?? DEFAULTS.logsDir,
      screenshotsDir: screenshotsDir?.[0] ?? DEFAULTS.screenshotsDir,
      logFile: logFile?.[0] ?? DEFAULTS.logFile,
      dryRun: flags.dryRun === true,
      verbose: flags.verbose === true,
      quiet: flags.quiet === true,
      sources: {
        adbPath: adbPath?.[1],
        serial: serial?.[1],
        timeoutSeconds: timeout?.[1] ?? 'default',
        logsDir: logsDir?.[1] ?? 'default',
        screenshotsDir: screenshotsDir?.[1] ?? 'default',
        logFile: logFile?.[1] ?? 'default'
      }
    };
  }

  /**
   * Initialize configuration file
   */
  async initializeConfig(configPath: string = defaultConfigPath(), options: ConfigInitOptions = {}): Promise<string> {
    const fullPath = resolve(configPath);

    try {
      if (!options.force) {
        try {
          await fs.access(fullPath);
          throw new Error(`Configuration file already exists: ${fullPath}. Use --force to overwrite.`);
        } catch (error) {
          if (errnoCode(error) !== 'ENOENT') {
            throw error;
          }
        }
      }

      const configContent = JSON.stringify(CONFIG_TEMPLATE, null, 2);
      await fs.writeFile(fullPath, `${configContent}\n`, 'utf-8');

      this.config = { ...CONFIG_TEMPLATE };
      this.configPath = fullPath;
      return fullPath;
    } catch (error) {
      throw new Error(`Failed to initialize configuration: ${errorMessage(error)}`);
    }
  }

  /**
   * Validate configuration file
   */
  async validateConfig(configPath?: string): Promise<ConfigValidation> {
    const pathToValidate = configPath ? resolve(configPath) : this.configPath || defaultConfigPath();

    try {
      const configContent = await fs.readFile(pathToValidate, 'utf-8');
      const parsedConfig: unknown = JSON.parse(configContent);

      this.validateConfigObject(parsedConfig);

      return { valid: true };
    } catch (error) {
      return { valid: false, error: errorMessage(error) };
    }
  }

  /**
   * Validate configuration object structure and values
   */
  private validateConfigObject(config: unknown): asserts config is DroidctlConfig {
    if (!isRecord(config)) {
      throw new Error('Configuration must be an object');
    }

    for (const key of STRING_KEYS) {
      const value = config[key];
      if (value !== undefined && typeof value !== 'string') {
        throw new Error(`${key} must be a string`);
      }
    }

    const timeout = config.defaultTimeout;
    if (timeout !== undefined && (typeof timeout !== 'number' || !Number.isInteger(timeout) || timeout <= 0)) {
      throw new Error('defaultTimeout must be a positive integer (seconds)');
    }
  }
}
