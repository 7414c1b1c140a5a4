import { describe, expect, test } from 'vitest';

import { ConfigValidationError, validateConfig } from '../validate';

describe('validateConfig', () => {
  test('accepts an empty config', () => {
    expect(() => validateConfig({})).not.toThrow();
  });

  test('accepts a complete config', () => {
    expect(() =>
      validateConfig({
        deviceName: 'generic',
        hostOs: 'linux_glibc',
        targets: { android: [{ arch: 'arm64' }, { arch: 'arm', nativeBridge: true }] },
        artApexJars: ['com.android.art:core-oj'],
        bootJars: ['com.android.art:core-oj', 'framework'],
        systemServerJars: ['services'],
        logLevel: 'debug',
      }),
    ).not.toThrow();
  });

  test('rejects a config that is not an object', () => {
    expect(() => validateConfig([])).toThrow(
      'Invalid config: config must be an object, but received array',
    );
    expect(() => validateConfig('generic')).toThrow(ConfigValidationError);
  });

  test('rejects non-string fields', () => {
    expect(() => validateConfig({ deviceName: 42 })).toThrow(
      'Invalid config: `deviceName` must be a string, but received number',
    );
  });

  test('rejects an empty device name', () => {
    expect(() => validateConfig({ deviceName: '  ' })).toThrow(
      'Invalid config: `deviceName` must not be empty',
    );
  });

  test('requires the host OS to be a host', () => {
    expect(() => validateConfig({ hostOs: 'android' })).toThrow(
      'Invalid config: `hostOs` must be a host OS, but received android',
    );
  });

  test('rejects unknown log levels', () => {
    expect(() => validateConfig({ logLevel: 'loud' })).toThrow(
      'Invalid config: `logLevel` must be one of silent, error, warn, info, debug, but received loud',
    );
  });

  test('rejects unknown OSes and architectures in the target matrix', () => {
    expect(() => validateConfig({ targets: { fuchsia: [] } })).toThrow(
      'Invalid config: `targets` key must be one of android, linux_glibc, linux_bionic, darwin, windows, but received fuchsia',
    );
    expect(() => validateConfig({ targets: { android: [{ arch: 'mips' }] } })).toThrow(
      'Invalid config: `targets.android[0].arch` must be one of arm, arm64, x86, x86_64, but received mips',
    );
    expect(() =>
      validateConfig({ targets: { android: [{ arch: 'arm', nativeBridge: 'yes' }] } }),
    ).toThrow('Invalid config: `targets.android[0].nativeBridge` must be a boolean, but received string');
  });

  test('rejects malformed jar entries', () => {
    expect(() => validateConfig({ bootJars: 'framework' })).toThrow(
      'Invalid config: `bootJars` must be an array, but received string',
    );
    expect(() => validateConfig({ artApexJars: [1] })).toThrow(
      'Invalid config: `artApexJars[0]` must be a string, but received number',
    );
    expect(() => validateConfig({ updatableBootJars: ['com.android.conscrypt:'] })).toThrow(
      'Invalid config: `updatableBootJars[0]` must be an `apex:jar` pair, but received "com.android.conscrypt:"',
    );
  });

  test('rejects apex pairs in the system server jar names', () => {
    expect(() => validateConfig({ systemServerJars: ['platform:services'] })).toThrow(
      'Invalid config: `systemServerJars[0]` must be a jar name, but received "platform:services"',
    );
  });
});
