import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { delimiter, join } from 'path';
import { AdbLocator } from '../adb-locator';
import { BinaryNotFoundError } from '../../errors';

function writeExecutable(dir: string, mode = 0o755): string {
  mkdirSync(dir, { recursive: true });
  const file = join(dir, 'adb');
  writeFileSync(file, '#!/bin/sh\n');
  chmodSync(file, mode);
  return file;
}

describe('AdbLocator', () => {
  let root: string;
  let home: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'droidctl-locator-'));
    home = join(root, 'home');
    mkdirSync(home);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should use the platform executable name', () => {
    expect(new AdbLocator({ platform: 'win32' }).executableName).toBe('adb.exe');
    expect(new AdbLocator({ platform: 'linux' }).executableName).toBe('adb');
  });

  describe('explicit path', () => {
    it('should accept the binary itself', async () => {
      const adb = writeExecutable(join(root, 'tools'));
      const locator = new AdbLocator({ env: {}, platform: 'linux', home });

      await expect(locator.locate(adb)).resolves.toBe(adb);
    });

    it('should accept the directory holding adb', async () => {
      const adb = writeExecutable(join(root, 'platform-tools'));
      const locator = new AdbLocator({ env: {}, platform: 'linux', home });

      await expect(locator.locate(join(root, 'platform-tools'))).resolves.toBe(adb);
    });

    it('should not fall back to PATH when the explicit path is wrong', async () => {
      writeExecutable(join(root, 'bin'));
      const locator = new AdbLocator({ env: { PATH: join(root, 'bin') }, platform: 'linux', home });

      await expect(locator.locate('/nowhere/adb')).rejects.toThrow(BinaryNotFoundError);
      await expect(locator.locate('/nowhere/adb')).rejects.toThrow('adb not found at: /nowhere/adb');
    });
  });

  it('should search PATH in order', async () => {
    const empty = join(root, 'empty');
    mkdirSync(empty);
    const adb = writeExecutable(join(root, 'bin'));
    const locator = new AdbLocator({ env: { PATH: [empty, join(root, 'bin')].join(delimiter) }, platform: 'linux', home });

    await expect(locator.locate()).resolves.toBe(adb);
  });

  it('should skip files without the execute bit', async () => {
    writeExecutable(join(root, 'plain'), 0o644);
    const adb = writeExecutable(join(root, 'bin'));
    const locator = new AdbLocator({
      env: { PATH: [join(root, 'plain'), join(root, 'bin')].join(delimiter) },
      platform: 'linux',
      home
    });

    await expect(locator.locate()).resolves.toBe(adb);
  });

  it('should look in ANDROID_HOME platform-tools', async () => {
    const sdk = join(root, 'sdk');
    const adb = writeExecutable(join(sdk, 'platform-tools'));
    const locator = new AdbLocator({ env: { PATH: '', ANDROID_HOME: sdk }, platform: 'linux', home });

    await expect(locator.locate()).resolves.toBe(adb);
  });

  it('should look in the usual SDK location under home', async () => {
    const adb = writeExecutable(join(home, 'Android/Sdk', 'platform-tools'));
    const locator = new AdbLocator({ env: { PATH: '' }, platform: 'linux', home });

    await expect(locator.locate()).resolves.toBe(adb);
  });

  it('should raise BinaryNotFoundError when nothing is found', async () => {
    const locator = new AdbLocator({ env: { PATH: join(root, 'missing') }, platform: 'linux', home });

    await expect(locator.locate()).rejects.toThrow('adb not found in PATH or the Android SDK');
  });
});
