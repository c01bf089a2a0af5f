import { spawn, ChildProcess } from 'child_process';
import { createWriteStream } from 'fs';
import { StringDecoder } from 'string_decoder';
import type { Logger } from 'pino';
import { AdbLocator } from './adb-locator';
import { CommandResult } from '../interfaces/common';
import {
  BinaryNotFoundError,
  ExternalCommandFailedError,
  OperationTimeoutError,
  errorMessage
} from '../errors';

export interface AdbRunnerOptions {
  /** Explicit adb binary or platform-tools directory */
  adbPath?: string;
  /** Default per-invocation timeout; 0 disables it */
  timeoutMs: number;
  dryRun?: boolean;
  logger: Logger;
  locator?: AdbLocator;
  /** Receives the command line of every invocation */
  onCommand?: (commandLine: string) => void;
  /** Receives the `[DRY-RUN]` lines */
  onDryRun?: (line: string) => void;
}

export interface RunOptions {
  serial?: string;
  timeoutMs?: number;
  input?: string;
}

export interface StreamOptions {
  serial?: string;
  timeoutMs?: number;
  /** Stop the process with SIGINT after this many milliseconds */
  durationMs?: number;
}

export interface StreamResult {
  exitCode: number;
  stderr: string;
  bytes: number;
  /** True when the process was stopped because durationMs elapsed */
  stopped: boolean;
}

/**
 * Quote an argument for display when it would not survive a shell as-is
 */
function quoteArg(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function formatCommandLine(binary: string, args: string[]): string {
  return [binary, ...args].map(quoteArg).join(' ');
}

/**
 * Runs adb as a child process: one invocation at a time, with a timeout,
 * dry-run support and capture of stdout and stderr
 */
export class AdbRunner {
  private binary: string | undefined;
  private readonly locator: AdbLocator;
  private readonly running = new Set<ChildProcess>();
  private readonly streams = new Set<Promise<StreamResult>>();

  constructor(private readonly options: AdbRunnerOptions) {
    this.locator = options.locator ?? new AdbLocator();
  }

  get dryRun(): boolean {
    return this.options.dryRun === true;
  }

  get defaultTimeoutMs(): number {
    return this.options.timeoutMs;
  }

  /**
   * Locate adb once and remember it
   */
  async resolveBinary(): Promise<string> {
    if (!this.binary) {
      this.binary = await this.locator.locate(this.options.adbPath);
      this.options.logger.debug({ adb: this.binary }, 'Resolved adb binary');
    }
    return this.binary;
  }

  buildArgs(args: string[], serial?: string): string[] {
    return serial ? ['-s', serial, ...args] : [...args];
  }

  /**
   * Run adb and collect its output. A non-zero exit code is returned, not thrown.
   */
  async run(args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const binary = await this.resolveBinary();
    const fullArgs = this.buildArgs(args, options.serial);
    const commandLine = formatCommandLine(binary, fullArgs);
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;

    this.announce(commandLine);
    if (this.dryRun) {
      this.printDryRun(commandLine);
      return { stdout: '', stderr: '', exitCode: 0 };
    }

    const result = await new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(binary, fullArgs, {
        stdio: ['pipe', 'pipe', 'pipe']
      });
      this.running.add(child);

      // Chunks can split a multi-byte character
      const stdoutDecoder = new StringDecoder('utf8');
      const stderrDecoder = new StringDecoder('utf8');
      let stdout = '';
      let stderr = '';
      let settled = false;
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const finish = (): boolean => {
        if (timeoutId) {
          clearTimeout(timeoutId);
        }
        this.running.delete(child);
        if (settled) {
          return false;
        }
        settled = true;
        return true;
      };

      if (timeoutMs > 0) {
        timeoutId = setTimeout(() => {
          child.kill('SIGTERM');
          if (finish()) {
            reject(new OperationTimeoutError(commandLine, timeoutMs, { stdout, stderr }));
          }
        }, timeoutMs);
      }

      child.stdout.on('data', (data: Buffer) => {
        stdout += stdoutDecoder.write(data);
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += stderrDecoder.write(data);
      });

      child.on('close', (code: number | null) => {
        if (finish()) {
          stdout += stdoutDecoder.end();
          stderr += stderrDecoder.end();
          resolve({ stdout, stderr, exitCode: code === null ? 1 : code });
        }
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (finish()) {
          reject(error.code === 'ENOENT'
            ? new BinaryNotFoundError(binary)
            : new Error(`Failed to execute adb: ${error.message}`));
        }
      });

      if (options.input !== undefined) {
        child.stdin.write(options.input);
      }
      child.stdin.end();
    });

    this.options.logger.debug({ exitCode: result.exitCode }, 'adb finished');
    return result;
  }

  /**
   * Run adb and throw ExternalCommandFailedError on a non-zero exit code
   */
  async runChecked(args: string[], description: string, options: RunOptions = {}): Promise<CommandResult> {
    const result = await this.run(args, options);
    if (result.exitCode !== 0) {
      throw new ExternalCommandFailedError(description, result);
    }
    return result;
  }

  /**
   * Run adb with stdout written straight to a file. Bytes already written are
   * kept when the process is stopped or times out.
   */
  async runToFile(args: string[], file: string, options: StreamOptions = {}): Promise<StreamResult> {
    const binary = await this.resolveBinary();
    const fullArgs = this.buildArgs(args, options.serial);
    const commandLine = formatCommandLine(binary, fullArgs);
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;

    this.announce(commandLine);
    if (this.dryRun) {
      this.printDryRun(`${commandLine} > ${file}`);
      return { exitCode: 0, stderr: '', bytes: 0, stopped: false };
    }

    const streaming = this.streamToFile(binary, fullArgs, commandLine, file, timeoutMs, options.durationMs);
    this.streams.add(streaming);
    try {
      return await streaming;
    } finally {
      this.streams.delete(streaming);
    }
  }

  private streamToFile(
    binary: string,
    fullArgs: string[],
    commandLine: string,
    file: string,
    timeoutMs: number,
    durationMs: number | undefined
  ): Promise<StreamResult> {
    return new Promise<StreamResult>((resolve, reject) => {
      const out = createWriteStream(file);
      const child = spawn(binary, fullArgs, {
        stdio: ['pipe', 'pipe', 'pipe']
      });
      this.running.add(child);

      const stderrDecoder = new StringDecoder('utf8');
      let stderr = '';
      let bytes = 0;
      let stopped = false;
      let settled = false;
      let timeoutId: ReturnType<typeof setTimeout> | undefined;
      let durationId: ReturnType<typeof setTimeout> | undefined;

      const finish = (): boolean => {
        if (timeoutId) {
          clearTimeout(timeoutId);
        }
        if (durationId) {
          clearTimeout(durationId);
        }
        this.running.delete(child);
        if (settled) {
          return false;
        }
        settled = true;
        return true;
      };

      const fail = (error: Error): void => {
        if (finish()) {
          out.end(() => reject(error));
        }
      };

      if (timeoutMs > 0) {
        timeoutId = setTimeout(() => {
          child.kill('SIGTERM');
          fail(new OperationTimeoutError(commandLine, timeoutMs, { stdout: '', stderr }));
        }, timeoutMs);
      }

      if (durationMs !== undefined && durationMs > 0) {
        durationId = setTimeout(() => {
          stopped = true;
          child.kill(process.platform === 'win32' ? 'SIGTERM' : 'SIGINT');
        }, durationMs);
      }

      out.on('error', (error: Error) => {
        child.kill('SIGTERM');
        fail(new Error(`Failed to write ${file}: ${errorMessage(error)}`));
      });

      // pipe pauses adb's stdout while the file stream is full
      child.stdout.pipe(out, { end: false });
      child.stdout.on('data', (data: Buffer) => {
        bytes += data.length;
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += stderrDecoder.write(data);
      });

      child.on('close', (code: number | null) => {
        if (finish()) {
          stderr += stderrDecoder.end();
          out.end(() => resolve({ exitCode: code === null ? 1 : code, stderr, bytes, stopped }));
        }
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        fail(error.code === 'ENOENT'
          ? new BinaryNotFoundError(binary)
          : new Error(`Failed to execute adb: ${error.message}`));
      });

      child.stdin.end();
    });
  }

  /**
   * Kill every adb process still running, e.g. on SIGINT
   */
  terminateAll(): void {
    for (const child of this.running) {
      this.options.logger.debug({ pid: child.pid }, 'Terminating adb process');
      child.kill('SIGTERM');
    }
    this.running.clear();
  }

  /**
   * Wait until file captures have flushed what they received, at most waitMs
   */
  async settle(waitMs = 5000): Promise<void> {
    if (this.streams.size === 0) {
      return;
    }
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, waitMs);
    });
    await Promise.race([Promise.allSettled([...this.streams]), timeout]);
    clearTimeout(timer);
  }

  private announce(commandLine: string): void {
    this.options.logger.debug({ command: commandLine }, 'adb command');
    this.options.onCommand?.(commandLine);
  }

  private printDryRun(commandLine: string): void {
    const line = `[DRY-RUN] ${commandLine}`;
    if (this.options.onDryRun) {
      this.options.onDryRun(line);
    } else {
      console.log(line);
    }
  }
}
