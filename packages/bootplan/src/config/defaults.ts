/**
 * Default configuration values
 */

import type { TargetMatrix } from '../targets/types';
import type { ResolvedConfig } from './types';

/**
 * Default target matrix: a 64-bit device with its 32-bit secondary arch, and a Linux host
 */
export const DEFAULT_TARGETS: TargetMatrix = {
  android: [{ arch: 'arm64' }, { arch: 'arm' }],
  linux_glibc: [{ arch: 'x86_64' }, { arch: 'x86' }],
};

/**
 * Get default configuration
 */
export default function getDefaultConfig(root: string = process.cwd()): ResolvedConfig {
  return {
    root,
    deviceName: 'generic',
    outDir: 'out',
    hostOs: 'linux_glibc',
    hostPrebuiltTag: 'linux-x86',
    targets: { ...DEFAULT_TARGETS },
    artApexJars: [],
    bootJars: [],
    updatableBootJars: [],
    systemServerJars: [],
    updatableSystemServerJars: [],
    logLevel: 'info',
  };
}

export { getDefaultConfig };
