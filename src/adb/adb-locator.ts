import { promises as fs, constants as fsConstants } from 'fs';
import { delimiter, join, resolve } from 'path';
import { homedir, platform } from 'os';
import { BinaryNotFoundError } from '../errors';

export interface AdbLocatorOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  home?: string;
}

/**
 * Finds the adb executable: an explicit path first, then PATH, then the
 * platform-tools directory of the Android SDK.
 */
export class AdbLocator {
  private readonly env: NodeJS.ProcessEnv;
  private readonly platformType: NodeJS.Platform;
  private readonly home: string;

  constructor(options: AdbLocatorOptions = {}) {
    this.env = options.env ?? process.env;
    this.platformType = options.platform ?? platform();
    this.home = options.home ?? homedir();
  }

  get executableName(): string {
    return this.platformType === 'win32' ? 'adb.exe' : 'adb';
  }

  /**
   * Resolve the adb binary, accepting either the binary itself or the
   * platform-tools directory that holds it
   */
  async locate(explicitPath?: string): Promise<string> {
    if (explicitPath) {
      const fullPath = resolve(explicitPath);
      const kind = await this.kindOf(fullPath);
      if (kind === 'directory') {
        const candidate = join(fullPath, this.executableName);
        if ((await this.kindOf(candidate)) === 'file') {
          return candidate;
        }
      } else if (kind === 'file') {
        return fullPath;
      }
      throw new BinaryNotFoundError(explicitPath);
    }

    for (const dir of this.pathDirectories()) {
      const candidate = join(dir, this.executableName);
      if (await this.isExecutable(candidate)) {
        return candidate;
      }
    }

    for (const sdkPath of this.sdkCandidates()) {
      const candidate = join(sdkPath, 'platform-tools', this.executableName);
      if (await this.isExecutable(candidate)) {
        return candidate;
      }
    }

    throw new BinaryNotFoundError();
  }

  private pathDirectories(): string[] {
    const pathValue = this.env.PATH ?? this.env.Path ?? '';
    return pathValue.split(delimiter).filter(dir => dir.length > 0);
  }

  /**
   * SDK roots from the environment, then common install locations by platform
   */
  private sdkCandidates(): string[] {
    const home = this.home;
    const commonPaths = {
      darwin: [
        join(home, 'Library/Android/sdk'),
        join(home, 'Android/sdk'),
        '/usr/local/android-sdk'
      ],
      linux: [
        join(home, 'Android/Sdk'),
        join(home, 'android-sdk'),
        '/opt/android-sdk',
        '/usr/local/android-sdk'
      ],
      win32: [
        join(home, 'AppData/Local/Android/Sdk'),
        'C:/Android/sdk',
        'C:/Program Files/Android/sdk',
        'C:/Program Files (x86)/Android/sdk'
      ]
    };

    const fromEnv = [this.env.ANDROID_HOME, this.env.ANDROID_SDK_ROOT].filter(
      (value): value is string => typeof value === 'string' && value.length > 0
    );
    const platformPaths = this.platformType === 'darwin' || this.platformType === 'win32'
      ? commonPaths[this.platformType]
      : commonPaths.linux;

    return [...fromEnv, ...platformPaths];
  }

  private async kindOf(path: string): Promise<'file' | 'directory' | 'missing'> {
    try {
      const stats = await fs.stat(path);
      return stats.isDirectory() ? 'directory' : 'file';
    } catch {
      return 'missing';
    }
  }

  private async isExecutable(path: string): Promise<boolean> {
    try {
      await fs.access(path, this.platformType === 'win32' ? fsConstants.F_OK : fsConstants.X_OK);
      return true;
    } catch {
      return false;
    }
  }
}
