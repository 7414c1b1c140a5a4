/**
 * Dexpreopt target resolution
 */

import type { OsType, Target, TargetConfig, TargetMatrix } from './types';

function toTarget(os: OsType, config: TargetConfig): Target {
  return { os, arch: config.arch, nativeBridge: config.nativeBridge ?? false };
}

/**
 * Targets relevant to dexpreopting.
 *
 * Device targets supported only through native bridge are skipped. Host targets
 * come last: host-side tests need images of their own.
 */
export function dexpreoptTargets(matrix: TargetMatrix, hostOs: OsType): Target[] {
  const targets: Target[] = [];

  for (const config of matrix.android ?? []) {
    if (!config.nativeBridge) {
      targets.push(toTarget('android', config));
    }
  }

  for (const config of matrix[hostOs] ?? []) {
    targets.push(toTarget(hostOs, config));
  }

  return targets;
}

export function targetName(target: Target): string {
  return `${target.os}_${target.arch}`;
}
