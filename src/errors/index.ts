import { CommandResult, DeviceInfo, ExitCode } from '../interfaces/common';

export type ErrorCode =
  | 'BINARY_NOT_FOUND'
  | 'NO_DEVICE_SELECTED'
  | 'AMBIGUOUS_DEVICE_SELECTION'
  | 'INVALID_ARGUMENTS'
  | 'OPERATION_TIMEOUT'
  | 'EXTERNAL_COMMAND_FAILED'
  | 'PARSE_ERROR';

/**
 * Base class for every failure the CLI reports with a dedicated exit code
 */
export class DroidctlError extends Error {
  readonly code: ErrorCode;
  readonly exitCode: ExitCode;
  readonly details?: Record<string, unknown>;
  readonly suggestion?: string;

  constructor(
    code: ErrorCode,
    exitCode: ExitCode,
    message: string,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'DroidctlError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;
    this.suggestion = suggestion;
  }
}

export class BinaryNotFoundError extends DroidctlError {
  constructor(searched?: string) {
    super(
      'BINARY_NOT_FOUND',
      ExitCode.BinaryNotFound,
      searched ? `adb not found at: ${searched}` : 'adb not found in PATH or the Android SDK',
      searched ? { searched } : undefined,
      'Install Android SDK Platform Tools or point --adb at the adb binary'
    );
    this.name = 'BinaryNotFoundError';
  }
}

export class NoDeviceSelectedError extends DroidctlError {
  constructor(serial?: string) {
    super(
      'NO_DEVICE_SELECTED',
      ExitCode.DeviceSelection,
      serial
        ? `Device ${serial} not found or not in 'device' state`
        : "No connected devices in 'device' state",
      serial ? { serial } : undefined,
      'Connect a device and authorize USB debugging, then run "droidctl devices"'
    );
    this.name = 'NoDeviceSelectedError';
  }
}

export class AmbiguousDeviceSelectionError extends DroidctlError {
  readonly devices: DeviceInfo[];

  constructor(devices: DeviceInfo[]) {
    const list = devices.map(d => `- ${d.serial} (${d.model || 'n/a'})`).join('\n');
    super(
      'AMBIGUOUS_DEVICE_SELECTION',
      ExitCode.DeviceSelection,
      `Several devices connected, pick one with --serial:\n${list}`,
      { serials: devices.map(d => d.serial) }
    );
    this.name = 'AmbiguousDeviceSelectionError';
    this.devices = devices;
  }
}

export class InvalidArgumentsError extends DroidctlError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_ARGUMENTS', ExitCode.InvalidArguments, message, details);
    this.name = 'InvalidArgumentsError';
  }
}

export class OperationTimeoutError extends DroidctlError {
  /** Output captured before the process was killed */
  readonly partial: Pick<CommandResult, 'stdout' | 'stderr'>;

  constructor(commandLine: string, timeoutMs: number, partial: Pick<CommandResult, 'stdout' | 'stderr'>) {
    super(
      'OPERATION_TIMEOUT',
      ExitCode.Timeout,
      `Command timed out after ${timeoutMs / 1000}s: ${commandLine}`,
      { commandLine, timeoutMs },
      'Raise the limit with --timeout'
    );
    this.name = 'OperationTimeoutError';
    this.partial = partial;
  }
}

export class ExternalCommandFailedError extends DroidctlError {
  readonly result: CommandResult;

  constructor(description: string, result: CommandResult) {
    const output = result.stderr.trim() || result.stdout.trim();
    super(
      'EXTERNAL_COMMAND_FAILED',
      ExitCode.GenericError,
      output ? `${description} (exit ${result.exitCode}): ${output}` : `${description} (exit ${result.exitCode})`,
      { exitCode: result.exitCode }
    );
    this.name = 'ExternalCommandFailedError';
    this.result = result;
  }
}

export class ParseError extends DroidctlError {
  constructor(file: string, reason: string) {
    super('PARSE_ERROR', ExitCode.GenericError, `Cannot read log file ${file}: ${reason}`, { file });
    this.name = 'ParseError';
  }
}

/**
 * Exit code for any thrown value
 */
export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof DroidctlError ? error.exitCode : ExitCode.GenericError;
}

/**
 * Message of any thrown value; Node's fs errors may come from another realm, so
 * `message` is read structurally rather than through `instanceof Error`
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * `code` of a Node system error (ENOENT, EACCES, ...), if it has one
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
