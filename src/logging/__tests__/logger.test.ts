import { Writable } from 'stream';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createStream } from 'rotating-file-stream';
import { createLogger, createRotatingStream, levelFor } from '../logger';

// Record the options while still writing real files
jest.mock('rotating-file-stream', () => {
  const actual = jest.requireActual<typeof import('rotating-file-stream')>('rotating-file-stream');
  return { ...actual, createStream: jest.fn(actual.createStream) };
});
const mockCreateStream = createStream as jest.MockedFunction<typeof createStream>;

class MemoryStream extends Writable {
  lines: string[] = [];

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.lines.push(...chunk.toString().split('\n').filter(line => line.length > 0));
    callback();
  }
}

describe('levelFor', () => {
  it('should default to info', () => {
    expect(levelFor({})).toBe('info');
  });

  it('should use debug when verbose', () => {
    expect(levelFor({ verbose: true })).toBe('debug');
  });

  it('should let quiet win', () => {
    expect(levelFor({ verbose: true, quiet: true })).toBe('warn');
  });
});

describe('createLogger', () => {
  it('should write JSON lines with an uppercase level', () => {
    const destination = new MemoryStream();
    const { logger } = createLogger({ level: 'info', file: 'unused.log', destination });

    logger.debug('hidden');
    logger.info({ serial: 'emulator-5554' }, 'hello');

    expect(destination.lines).toHaveLength(1);
    const entry: unknown = JSON.parse(destination.lines[0]);
    expect(entry).toMatchObject({
      level: 'INFO',
      service: 'droidctl',
      pid: process.pid,
      serial: 'emulator-5554',
      msg: 'hello'
    });
    expect(entry).toHaveProperty('time', expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/));
  });

  it('should disable file logging once when the log file cannot be created', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'droidctl-logger-'));
    try {
      writeFileSync(join(dir, 'blocker'), '');
      let reportFailure: (error: Error) => void = () => undefined;
      const failure = new Promise<Error>((resolveFailure) => {
        reportFailure = resolveFailure;
      });
      const onError = jest.fn((error: Error) => reportFailure(error));
      const appLogger = createLogger({ level: 'info', file: join(dir, 'blocker', 'sub', 'droidctl.log'), onError });

      appLogger.logger.info('before failure');
      await expect(failure).resolves.toHaveProperty('message');

      appLogger.logger.info('after failure');
      await appLogger.close();
      expect(onError).toHaveBeenCalledTimes(1);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should append to the log file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'droidctl-logger-'));
    try {
      const file = join(dir, 'droidctl.log');
      const appLogger = createLogger({ level: 'debug', file });

      appLogger.logger.warn('to file');
      await appLogger.close();

      expect(readFileSync(file, 'utf-8')).toContain('"msg":"to file"');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('createRotatingStream', () => {
  it('should rotate at 1M and keep 5 files', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'droidctl-rotate-'));
    try {
      const stream = createRotatingStream(join(dir, 'droidctl.log'));
      await new Promise<void>((resolveEnd) => stream.end(() => resolveEnd()));

      expect(mockCreateStream).toHaveBeenLastCalledWith('droidctl.log', { path: dir, size: '1M', maxFiles: 5 });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
