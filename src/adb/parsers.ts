/**
 * Parsing of adb output and building of adb arguments
 */

import { DeviceInfo, DeviceState } from '../interfaces/common';
import { InvalidArgumentsError } from '../errors';

const DEVICE_STATES: readonly DeviceState[] = ['device', 'offline', 'unauthorized'];

function isDeviceState(value: string): value is DeviceState {
  return (DEVICE_STATES as readonly string[]).includes(value);
}

/**
 * Parse `adb devices -l`. The header, daemon notices and devices in other
 * states (recovery, sideload...) are skipped.
 */
export function parseDevicesOutput(output: string): DeviceInfo[] {
  const devices: DeviceInfo[] = [];

  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.toLowerCase().startsWith('list of devices') || trimmed.startsWith('*')) {
      continue;
    }

    const parts = trimmed.split(/\s+/);
    const [serial, state] = parts;
    if (parts.length < 2 || !isDeviceState(state)) {
      continue;
    }

    const device: DeviceInfo = { serial, state };

    for (const part of parts.slice(2)) {
      const separator = part.indexOf(':');
      if (separator <= 0) {
        continue;
      }
      const key = part.slice(0, separator);
      const value = part.slice(separator + 1);
      switch (key) {
        case 'product':
          device.product = value;
          break;
        case 'model':
          device.model = value;
          break;
        case 'device':
          device.device = value;
          break;
        case 'transport_id':
          device.transportId = value;
          break;
      }
    }

    devices.push(device);
  }

  return devices;
}

/**
 * Parse `getprop` output (`[key]: [value]` per line)
 */
export function parseProperties(output: string): Record<string, string> {
  const properties: Record<string, string> = {};

  for (const line of output.split('\n')) {
    const match = line.trim().match(/^\[([^\]]+)\]: \[([^\]]*)\]$/);
    if (match) {
      properties[match[1]] = match[2];
    }
  }

  return properties;
}

export interface AppInfo {
  package: string;
  versionName: string;
  versionCode: string;
  uid: string;
  grantedPermissions: string[];
  path: string;
  mainActivity: string;
}

/**
 * Extract the interesting fields of `dumpsys package <pkg>` and `pm path <pkg>`
 */
export function parsePackageDump(packageName: string, dumpsys: string, pmPath = ''): AppInfo {
  const info: AppInfo = {
    package: packageName,
    versionName: '',
    versionCode: '',
    uid: '',
    grantedPermissions: [],
    path: pmPath.trim().split('\n')[0].replace(/^package:/, '').trim(),
    mainActivity: ''
  };

  for (const line of dumpsys.split('\n')) {
    const versionName = line.match(/versionName=(\S+)/);
    if (versionName && !info.versionName) {
      info.versionName = versionName[1];
    }
    const versionCode = line.match(/versionCode=(\d+)/);
    if (versionCode && !info.versionCode) {
      info.versionCode = versionCode[1];
    }
    const userId = line.match(/userId=(\d+)/);
    if (userId && !info.uid) {
      info.uid = userId[1];
    }
    const permission = line.trim().match(/^(android\.permission\.[\w.]+): granted=true/);
    if (permission && !info.grantedPermissions.includes(permission[1])) {
      info.grantedPermissions.push(permission[1]);
    }
    if (!info.mainActivity && line.includes('android.intent.action.MAIN') && line.includes('LAUNCHER')) {
      const component = line.match(/cmp=(\S+)/);
      if (component) {
        info.mainActivity = component[1];
      }
    }
  }

  return info;
}

/**
 * Summarize `dumpsys battery` as "<level>% (status=<n>)"
 */
export function parseBattery(output: string): string {
  const level = output.match(/level: (\d+)/);
  const status = output.match(/status: (\d+)/);
  if (level && status) {
    return `${level[1]}% (status=${status[1]})`;
  }
  const compact = output.trim();
  return compact.length > 60 ? `${compact.slice(0, 60)}...` : compact;
}

const SINCE_RELATIVE = /^(\d+)([smhd])$/;
const UNIT_MS: Record<string, number> = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000
};

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local time in the layout `logcat -T` expects: YYYY-MM-DD HH:MM:SS.mmm
 */
export function formatLogcatTime(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.000`;
}

/**
 * Local timestamp for output file names: YYYYMMDD-HHMMSS
 */
export function fileStamp(date: Date = new Date()): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Turn `--since` ("5m", "2h", "30s", "1d" or an ISO-8601 date) into a
 * `logcat -T` argument
 */
export function parseSince(value: string, now: Date = new Date()): string {
  const trimmed = value.trim();
  const relative = trimmed.match(SINCE_RELATIVE);
  if (relative) {
    const amount = parseInt(relative[1], 10);
    return formatLogcatTime(new Date(now.getTime() - amount * UNIT_MS[relative[2]]));
  }

  const absolute = new Date(trimmed);
  if (trimmed.length === 0 || Number.isNaN(absolute.getTime())) {
    throw new InvalidArgumentsError(`Invalid --since value "${value}": use 5m, 2h or an ISO date like 2025-09-04T12:00:00`);
  }
  return formatLogcatTime(absolute);
}

const INPUT_TEXT_ESCAPES: Record<string, string> = {
  ' ': '%s',
  '&': '\\&',
  '<': '\\<',
  '>': '\\>',
  '(': '\\(',
  ')': '\\)',
  ';': '\\;',
  '|': '\\|',
  '*': '\\*',
  '~': '\\~',
  "'": "\\'",
  '"': '\\"',
  '#': '\\#',
  '%': '\\%',
  '!': '\\!',
  '?': '\\?',
  ':': '\\:',
  '/': '\\/',
  '\\': '\\\\'
};

/**
 * Escape text for `adb shell input text`: spaces become %s and shell
 * metacharacters are backslash-escaped
 */
export function sanitizeInputText(text: string): string {
  return Array.from(text).map(ch => INPUT_TEXT_ESCAPES[ch] ?? ch).join('');
}

/**
 * Component name for `am start -n`: ".Main" and "Main" are resolved against
 * the package, "pkg/.Main" is taken as-is
 */
export function buildComponent(activity: string, packageName?: string): string {
  if (activity.includes('/')) {
    return activity;
  }
  if (!packageName) {
    throw new InvalidArgumentsError(`Activity "${activity}" needs --package or the form package/.Activity`);
  }
  return `${packageName}/${activity}`;
}

/**
 * Convert key=value pairs into `--es key value` intent extras
 */
export function buildStringExtras(extras: string[]): string[] {
  const args: string[] = [];
  for (const extra of extras) {
    const separator = extra.indexOf('=');
    if (separator <= 0) {
      throw new InvalidArgumentsError(`Invalid --extra "${extra}": expected key=value`);
    }
    args.push('--es', extra.slice(0, separator), extra.slice(separator + 1));
  }
  return args;
}
