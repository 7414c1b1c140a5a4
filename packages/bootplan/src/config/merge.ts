/**
 * Configuration merger
 */

import type { BootplanConfig, ResolvedConfig } from './types';

/**
 * Merge user configs over the defaults, later configs winning.
 *
 * Jar lists are replaced, never concatenated: their order is the classpath order.
 * The target matrix merges per OS.
 */
export function mergeConfig(
  defaults: ResolvedConfig,
  ...userConfigs: (BootplanConfig | undefined)[]
): ResolvedConfig {
  let merged: ResolvedConfig = { ...defaults, targets: { ...defaults.targets } };

  for (const userConfig of userConfigs) {
    if (!userConfig) continue;

    merged = {
      root: userConfig.root ?? merged.root,
      deviceName: userConfig.deviceName ?? merged.deviceName,
      outDir: userConfig.outDir ?? merged.outDir,
      hostOs: userConfig.hostOs ?? merged.hostOs,
      hostPrebuiltTag: userConfig.hostPrebuiltTag ?? merged.hostPrebuiltTag,
      targets: { ...merged.targets, ...userConfig.targets },
      artApexJars: userConfig.artApexJars ?? merged.artApexJars,
      bootJars: userConfig.bootJars ?? merged.bootJars,
      updatableBootJars: userConfig.updatableBootJars ?? merged.updatableBootJars,
      systemServerJars: userConfig.systemServerJars ?? merged.systemServerJars,
      updatableSystemServerJars:
        userConfig.updatableSystemServerJars ?? merged.updatableSystemServerJars,
      logLevel: userConfig.logLevel ?? merged.logLevel,
    };
  }

  return merged;
}
