import { getDefaultConfig, mergeConfig } from '../config';
import type { BootplanConfig, ResolvedConfig } from '../config';
import { createDexpreoptContext } from '../context';
import type { DexpreoptContext } from '../context';

/**
 * A device with two ART jars, two framework jars, one updatable boot jar and one updatable
 * system server jar, built for an arm64 device and an x86_64 Linux host.
 */
export const SAMPLE_CONFIG: BootplanConfig = {
  deviceName: 'generic',
  outDir: 'out',
  targets: {
    android: [{ arch: 'arm64' }],
    linux_glibc: [{ arch: 'x86_64' }],
  },
  artApexJars: ['com.android.art:core-oj', 'com.android.art:core-libart'],
  bootJars: [
    'com.android.art:core-oj',
    'com.android.art:core-libart',
    'platform:framework',
    'platform:services',
  ],
  updatableBootJars: ['com.android.conscrypt:conscrypt'],
  systemServerJars: ['services', 'ethernet-service'],
  updatableSystemServerJars: ['com.android.permission:service-permission'],
};

export function sampleConfig(overrides: BootplanConfig = {}): ResolvedConfig {
  return mergeConfig(getDefaultConfig('/project'), SAMPLE_CONFIG, overrides);
}

export function sampleContext(overrides: BootplanConfig = {}): DexpreoptContext {
  return createDexpreoptContext(sampleConfig(overrides));
}
