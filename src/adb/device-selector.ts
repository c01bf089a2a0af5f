import type { Logger } from 'pino';
import { AdbRunner } from './adb-runner';
import { parseDevicesOutput } from './parsers';
import { DeviceInfo } from '../interfaces/common';
import { AmbiguousDeviceSelectionError, NoDeviceSelectedError, errorMessage } from '../errors';

export interface ListDevicesOptions {
  /** Also query Android release and SDK level of each online device */
  withProperties?: boolean;
}

/**
 * Lists connected devices and decides which one a command targets
 */
export class DeviceSelector {
  constructor(private readonly runner: AdbRunner, private readonly logger: Logger) {}

  async listDevices(options: ListDevicesOptions = {}): Promise<DeviceInfo[]> {
    const result = await this.runner.runChecked(['devices', '-l'], 'adb devices failed');
    const devices = parseDevicesOutput(result.stdout);

    if (options.withProperties) {
      for (const device of devices) {
        if (device.state !== 'device') {
          continue;
        }
        try {
          device.android = await this.getProp(device.serial, 'ro.build.version.release');
          device.sdk = await this.getProp(device.serial, 'ro.build.version.sdk');
        } catch (error) {
          this.logger.debug({ serial: device.serial, error: errorMessage(error) }, 'Could not read device properties');
        }
      }
    }

    return devices;
  }

  /**
   * Resolve the serial to target. A requested serial must be online; without
   * one there must be exactly one online device. Under dry-run no device is
   * queried and the requested serial (possibly none) is used as given.
   */
  async pick(preferredSerial?: string): Promise<string | undefined> {
    if (this.runner.dryRun) {
      return preferredSerial;
    }

    const online = (await this.listDevices()).filter(d => d.state === 'device');

    if (preferredSerial) {
      if (online.some(d => d.serial === preferredSerial)) {
        return preferredSerial;
      }
      throw new NoDeviceSelectedError(preferredSerial);
    }

    if (online.length === 0) {
      throw new NoDeviceSelectedError();
    }

    if (online.length > 1) {
      throw new AmbiguousDeviceSelectionError(online);
    }

    this.logger.debug({ serial: online[0].serial }, 'Selected the only online device');
    return online[0].serial;
  }

  private async getProp(serial: string, name: string): Promise<string | undefined> {
    const result = await this.runner.run(['shell', 'getprop', name], { serial });
    const value = result.stdout.trim();
    return result.exitCode === 0 && value ? value : undefined;
  }
}
