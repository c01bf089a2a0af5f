/**
 * Tests for Output Formatter
 */

import { OutputFormatter } from '../output-formatter';

describe('OutputFormatter', () => {
  let formatter: OutputFormatter;

  beforeEach(() => {
    formatter = new OutputFormatter(false);
  });

  describe('messages', () => {
    it('should prefix status lines', () => {
      formatter.success('done');
      formatter.info('note');
      formatter.warn('careful');
      formatter.error('bad');

      expect(console.log).toHaveBeenCalledWith('✓ done');
      expect(console.log).toHaveBeenCalledWith('ℹ note');
      expect(console.warn).toHaveBeenCalledWith('⚠ careful');
      expect(console.error).toHaveBeenCalledWith('✗ bad');
    });

    it('should hide success and info when quiet', () => {
      formatter.setVerbosity({ quiet: true });

      formatter.success('done');
      formatter.info('note');
      formatter.plain('output');
      formatter.error('bad');

      expect(console.log).toHaveBeenCalledTimes(1);
      expect(console.log).toHaveBeenCalledWith('output');
      expect(console.error).toHaveBeenCalledWith('✗ bad');
    });

    it('should print debug lines only when verbose', () => {
      formatter.debug('hidden');
      formatter.setVerbosity({ verbose: true });
      formatter.debug('shown');

      expect(console.error).toHaveBeenCalledTimes(1);
      expect(console.error).toHaveBeenCalledWith('shown');
    });

    it('should skip empty plain output', () => {
      formatter.plain('');

      expect(console.log).not.toHaveBeenCalled();
    });

    it('should keep blank lines in a block', () => {
      formatter.lines(['a', '', 'b']);

      expect(console.log).toHaveBeenCalledWith('a\n\nb');
    });

    it('should print indented JSON', () => {
      formatter.json({ serial: 'abc' });

      expect(console.log).toHaveBeenCalledWith('{\n  "serial": "abc"\n}');
    });
  });

  describe('displayTable', () => {
    it('should align columns', () => {
      formatter.displayTable(['PERMISSION', 'RESULT'], [
        ['android.permission.CAMERA', 'OK'],
        ['android.permission.X', 'FAIL - no']
      ]);

      expect((console.log as jest.Mock).mock.calls.map(call => call[0])).toEqual([
        'PERMISSION                | RESULT   ',
        '──────────────────────────┼──────────',
        'android.permission.CAMERA | OK       ',
        'android.permission.X      | FAIL - no'
      ]);
    });

    it('should note an empty table', () => {
      formatter.displayTable(['A'], []);

      expect(console.log).toHaveBeenCalledWith('ℹ (empty)');
    });
  });

  describe('displayDevices', () => {
    it('should list devices with a total', () => {
      formatter.displayDevices([
        { serial: 'emulator-5554', state: 'device', model: 'Pixel_7', android: '14', sdk: '34', transportId: '1' }
      ]);

      expect((console.log as jest.Mock).mock.calls.map(call => call[0])).toEqual([
        'SERIAL        | STATE  | MODEL   | ANDROID | SDK | TRANSPORT',
        '──────────────┼────────┼─────────┼─────────┼─────┼──────────',
        'emulator-5554 | device | Pixel_7 | 14      | 34  | 1        ',
        'Total: 1 device(s)'
      ]);
    });

    it('should say when there are no devices', () => {
      formatter.displayDevices([]);

      expect(console.log).toHaveBeenCalledWith('ℹ No devices found');
    });
  });

  it('should display a record as aligned pairs', () => {
    formatter.displayRecord({ model: 'Pixel 7', sdk: '34' });

    expect(console.log).toHaveBeenCalledWith('model  Pixel 7');
    expect(console.log).toHaveBeenCalledWith('sdk    34');
  });
});
