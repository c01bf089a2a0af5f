import pino, { DestinationStream, Logger } from 'pino';
import { createStream, RotatingFileStream } from 'rotating-file-stream';
import { basename, dirname, resolve } from 'path';
import { LogLevel } from '../interfaces/common';

export const LOG_MAX_SIZE = '1M';
export const LOG_MAX_FILES = 5;

export interface LoggerOptions {
  level: LogLevel;
  /** Log file path; rotated at LOG_MAX_SIZE, LOG_MAX_FILES kept */
  file: string;
  /** Write somewhere else instead of the rotating file */
  destination?: DestinationStream;
  /** Called once if the log file cannot be written; logging then goes nowhere */
  onError?: (error: Error) => void;
}

export interface AppLogger {
  logger: Logger;
  close(): Promise<void>;
}

/**
 * Logger that drops everything, used until the CLI is initialized
 */
export const silentLogger: Logger = pino({ level: 'silent' });

export function createRotatingStream(file: string): RotatingFileStream {
  const fullPath = resolve(file);
  return createStream(basename(fullPath), {
    path: dirname(fullPath),
    size: LOG_MAX_SIZE,
    maxFiles: LOG_MAX_FILES
  });
}

/**
 * Verbose wins over the default, quiet wins over both
 */
export function levelFor(options: { verbose?: boolean; quiet?: boolean }): LogLevel {
  if (options.quiet) {
    return 'warn';
  }
  return options.verbose ? 'debug' : 'info';
}

function warnToStderr(file: string): (error: Error) => void {
  return (error) => {
    process.stderr.write(`⚠ Cannot write log file ${file}, file logging disabled: ${error.message}\n`);
  };
}

export function createLogger(options: LoggerOptions): AppLogger {
  let rotating: RotatingFileStream | undefined;
  let failed = false;
  let destination: DestinationStream;
  if (options.destination) {
    destination = options.destination;
  } else {
    const stream = createRotatingStream(options.file);
    const onError = options.onError ?? warnToStderr(options.file);
    stream.on('error', (error: Error) => {
      if (!failed) {
        failed = true;
        onError(error);
      }
    });
    rotating = stream;
    destination = {
      write: (msg: string) => {
        if (!failed) {
          stream.write(msg);
        }
      }
    };
  }

  const logger = pino(
    {
      level: options.level,
      formatters: {
        level: (label) => {
          return { level: label.toUpperCase() };
        }
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      base: {
        service: 'droidctl',
        pid: process.pid
      }
    },
    destination
  );

  return {
    logger,
    close: () =>
      new Promise<void>((resolvePromise) => {
        if (!rotating || failed) {
          resolvePromise();
          return;
        }
        const stream = rotating;
        stream.once('error', () => resolvePromise());
        stream.end(() => resolvePromise());
      })
  };
}
