import { AdbRunner } from '../adb-runner';
import { DeviceSelector } from '../device-selector';
import { silentLogger } from '../../logging/logger';
import { AmbiguousDeviceSelectionError, NoDeviceSelectedError } from '../../errors';

const ok = (stdout: string) => ({ stdout, stderr: '', exitCode: 0 });

describe('DeviceSelector', () => {
  let runner: AdbRunner;
  let selector: DeviceSelector;

  const attached = (lines: string[]): void => {
    jest.spyOn(runner, 'runChecked').mockResolvedValue(ok(`List of devices attached\n${lines.join('\n')}\n`));
  };

  beforeEach(() => {
    runner = new AdbRunner({ timeoutMs: 0, logger: silentLogger });
    selector = new DeviceSelector(runner, silentLogger);
  });

  describe('pick', () => {
    it('should pick the only online device', async () => {
      attached(['emulator-5554\tdevice model:Pixel_7', 'emulator-5556\toffline']);

      await expect(selector.pick()).resolves.toBe('emulator-5554');
      expect(runner.runChecked).toHaveBeenCalledWith(['devices', '-l'], 'adb devices failed');
    });

    it('should accept a requested serial that is online', async () => {
      attached(['emulator-5554\tdevice', 'emulator-5556\tdevice']);

      await expect(selector.pick('emulator-5556')).resolves.toBe('emulator-5556');
    });

    it('should reject a requested serial that is not online', async () => {
      attached(['emulator-5554\tdevice', 'R58M123ABC\tunauthorized']);

      await expect(selector.pick('R58M123ABC')).rejects.toThrow(NoDeviceSelectedError);
      await expect(selector.pick('R58M123ABC')).rejects.toThrow("Device R58M123ABC not found or not in 'device' state");
    });

    it('should fail when no device is online', async () => {
      attached(['emulator-5554\toffline']);

      await expect(selector.pick()).rejects.toThrow("No connected devices in 'device' state");
    });

    it('should refuse to guess between several devices', async () => {
      attached(['emulator-5554\tdevice model:Pixel_7', 'emulator-5556\tdevice']);

      await expect(selector.pick()).rejects.toThrow(AmbiguousDeviceSelectionError);
      await expect(selector.pick()).rejects.toThrow(
        'Several devices connected, pick one with --serial:\n- emulator-5554 (Pixel_7)\n- emulator-5556 (n/a)'
      );
    });

    it('should not query devices under dry-run', async () => {
      runner = new AdbRunner({ timeoutMs: 0, logger: silentLogger, dryRun: true });
      selector = new DeviceSelector(runner, silentLogger);
      const runChecked = jest.spyOn(runner, 'runChecked');

      await expect(selector.pick('abc')).resolves.toBe('abc');
      await expect(selector.pick()).resolves.toBeUndefined();
      expect(runChecked).not.toHaveBeenCalled();
    });
  });

  describe('listDevices', () => {
    it('should add release and SDK level for online devices', async () => {
      attached(['emulator-5554\tdevice', 'emulator-5556\toffline']);
      const run = jest.spyOn(runner, 'run').mockImplementation(async (args) =>
        ok(args[2] === 'ro.build.version.release' ? '14\n' : '34\n')
      );

      const devices = await selector.listDevices({ withProperties: true });

      expect(devices).toEqual([
        { serial: 'emulator-5554', state: 'device', android: '14', sdk: '34' },
        { serial: 'emulator-5556', state: 'offline' }
      ]);
      expect(run).toHaveBeenCalledWith(['shell', 'getprop', 'ro.build.version.release'], { serial: 'emulator-5554' });
      expect(run).toHaveBeenCalledTimes(2);
    });

    it('should keep listing when a property cannot be read', async () => {
      attached(['emulator-5554\tdevice']);
      jest.spyOn(runner, 'run').mockRejectedValue(new Error('device offline'));

      await expect(selector.listDevices({ withProperties: true })).resolves.toEqual([
        { serial: 'emulator-5554', state: 'device' }
      ]);
    });
  });
});
