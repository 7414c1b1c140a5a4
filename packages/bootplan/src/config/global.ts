/**
 * Global dexpreopt configuration
 */

import { ConfiguredJarList } from '../jars/configured-jar-list';
import type { DexpreoptConfig, ResolvedConfig } from './types';

/**
 * Parse the jar lists of a resolved config. The result is frozen. Repeated system server jars
 * are kept once, in first-seen order, as jar lists drop repeated pairs.
 */
export function toDexpreoptConfig(config: ResolvedConfig): DexpreoptConfig {
  return Object.freeze({
    deviceName: config.deviceName,
    outDir: config.outDir,
    hostOs: config.hostOs,
    hostPrebuiltTag: config.hostPrebuiltTag,
    targets: config.targets,
    artApexJars: ConfiguredJarList.parse(config.artApexJars),
    bootJars: ConfiguredJarList.parse(config.bootJars),
    updatableBootJars: ConfiguredJarList.parse(config.updatableBootJars),
    systemServerJars: Object.freeze([...new Set(config.systemServerJars)]),
    updatableSystemServerJars: ConfiguredJarList.parse(config.updatableSystemServerJars),
  });
}
