import {
  buildComponent,
  buildStringExtras,
  fileStamp,
  formatLogcatTime,
  parseBattery,
  parseDevicesOutput,
  parsePackageDump,
  parseProperties,
  parseSince,
  sanitizeInputText
} from '../parsers';
import { InvalidArgumentsError } from '../../errors';

describe('parseDevicesOutput', () => {
  it('should list devices with their long-form details', () => {
    const output = `* daemon not running; starting now at tcp:5037
* daemon started successfully
List of devices attached
emulator-5554	device product:sdk_gphone64_x86_64 model:sdk_gphone64_x86_64 device:emu64x transport_id:1
R58M123ABC	unauthorized usb:1-1 transport_id:2
192.168.1.20:5555	offline
0123456789	recovery
`;

    expect(parseDevicesOutput(output)).toEqual([
      {
        serial: 'emulator-5554',
        state: 'device',
        product: 'sdk_gphone64_x86_64',
        model: 'sdk_gphone64_x86_64',
        device: 'emu64x',
        transportId: '1'
      },
      { serial: 'R58M123ABC', state: 'unauthorized', transportId: '2' },
      { serial: '192.168.1.20:5555', state: 'offline' }
    ]);
  });

  it('should return nothing for an empty list', () => {
    expect(parseDevicesOutput('List of devices attached\n\n')).toEqual([]);
  });
});

describe('parseProperties', () => {
  it('should read getprop lines', () => {
    const output = '[ro.product.model]: [Pixel 7]\n[ro.build.version.sdk]: [34]\n[empty.prop]: []\nnoise\n';

    expect(parseProperties(output)).toEqual({
      'ro.product.model': 'Pixel 7',
      'ro.build.version.sdk': '34',
      'empty.prop': ''
    });
  });
});

describe('parsePackageDump', () => {
  const dumpsys = `Activity Resolver Table:
  Non-Data Actions:
      android.intent.action.MAIN:
        5d1c2e0 com.example.app/.MainActivity filter 8a7b6c5
          Action: "android.intent.action.MAIN"
          Category: "android.intent.category.LAUNCHER"
Packages:
  Package [com.example.app] (3f2e1d0):
    userId=10123
    versionCode=42 minSdk=24 targetSdk=34
    versionName=1.4.2
    runtime permissions:
      android.permission.CAMERA: granted=true
      android.permission.RECORD_AUDIO: granted=false
      android.permission.ACCESS_FINE_LOCATION: granted=true
`;

  it('should pick out version, uid, permissions and path', () => {
    const info = parsePackageDump('com.example.app', dumpsys, 'package:/data/app/com.example.app-1/base.apk\n');

    expect(info).toEqual({
      package: 'com.example.app',
      versionName: '1.4.2',
      versionCode: '42',
      uid: '10123',
      grantedPermissions: ['android.permission.CAMERA', 'android.permission.ACCESS_FINE_LOCATION'],
      path: '/data/app/com.example.app-1/base.apk',
      mainActivity: ''
    });
  });

  it('should read the launcher component from a resolver line', () => {
    const line = 'Intent { act=android.intent.action.MAIN cat=[android.intent.category.LAUNCHER] cmp=com.example.app/.MainActivity }';

    expect(parsePackageDump('com.example.app', line).mainActivity).toBe('com.example.app/.MainActivity');
  });
});

describe('parseBattery', () => {
  it('should summarize level and status', () => {
    expect(parseBattery('Current Battery Service state:\n  status: 2\n  level: 87\n')).toBe('87% (status=2)');
  });

  it('should truncate unknown output', () => {
    expect(parseBattery('x'.repeat(70))).toBe(`${'x'.repeat(60)}...`);
  });
});

describe('time helpers', () => {
  const moment = new Date(2025, 8, 4, 12, 30, 5);

  it('should format logcat -T times', () => {
    expect(formatLogcatTime(moment)).toBe('2025-09-04 12:30:05.000');
  });

  it('should format file stamps', () => {
    expect(fileStamp(moment)).toBe('20250904-123005');
  });

  it('should resolve relative --since values', () => {
    expect(parseSince('5m', moment)).toBe('2025-09-04 12:25:05.000');
    expect(parseSince('2h', moment)).toBe('2025-09-04 10:30:05.000');
    expect(parseSince('30s', moment)).toBe('2025-09-04 12:29:35.000');
  });

  it('should accept an ISO date', () => {
    expect(parseSince('2025-09-04T08:00:00', moment)).toBe('2025-09-04 08:00:00.000');
  });

  it('should reject anything else', () => {
    expect(() => parseSince('yesterday', moment)).toThrow(InvalidArgumentsError);
  });
});

describe('sanitizeInputText', () => {
  it('should encode spaces and escape shell characters', () => {
    expect(sanitizeInputText('hello world')).toBe('hello%sworld');
    expect(sanitizeInputText('a&b')).toBe('a\\&b');
    expect(sanitizeInputText("it's")).toBe("it\\'s");
  });
});

describe('buildComponent', () => {
  it('should join a relative activity with the package', () => {
    expect(buildComponent('.MainActivity', 'com.example.app')).toBe('com.example.app/.MainActivity');
  });

  it('should keep a full component', () => {
    expect(buildComponent('com.example.app/.MainActivity')).toBe('com.example.app/.MainActivity');
  });

  it('should need a package for a bare activity', () => {
    expect(() => buildComponent('.MainActivity')).toThrow(InvalidArgumentsError);
  });
});

describe('buildStringExtras', () => {
  it('should turn pairs into --es arguments', () => {
    expect(buildStringExtras(['user=alice', 'query=a=b'])).toEqual(['--es', 'user', 'alice', '--es', 'query', 'a=b']);
  });

  it('should reject an entry without a key', () => {
    expect(() => buildStringExtras(['=value'])).toThrow('Invalid --extra "=value": expected key=value');
  });
});
