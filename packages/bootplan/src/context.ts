/**
 * Derivation context
 *
 * One context per build invocation. It carries the parsed global config, the memoization cache
 * every derivation goes through, and the logger. Nothing is shared between contexts.
 */

import { createHash } from 'crypto';

import { OnceCache } from './cache/once-cache';
import { toDexpreoptConfig } from './config/global';
import type { DexpreoptConfig, ResolvedConfig } from './config/types';
import { silentLogger } from './logger';
import { OS_TYPES } from './targets/types';
import type { OsType } from './targets/types';
import type { Logger } from './logger';

export interface DexpreoptContext {
  readonly config: DexpreoptConfig;
  readonly cache: OnceCache;
  readonly logger: Logger;
}

/**
 * Stable identity of a global config: equal configs give equal fingerprints.
 * Targets are hashed in OS order and with `nativeBridge` spelled out, so the key order of the
 * target matrix does not matter.
 */
export function fingerprintConfig(config: DexpreoptConfig): string {
  const targets: [OsType, { arch: string; nativeBridge: boolean }[]][] = [];
  for (const os of OS_TYPES) {
    const configured = config.targets[os];
    if (configured === undefined) continue;
    targets.push([
      os,
      configured.map((target) => ({ arch: target.arch, nativeBridge: target.nativeBridge === true })),
    ]);
  }

  const hash = createHash('sha256');
  hash.update(
    JSON.stringify({
      deviceName: config.deviceName,
      outDir: config.outDir,
      hostOs: config.hostOs,
      hostPrebuiltTag: config.hostPrebuiltTag,
      targets,
      artApexJars: config.artApexJars.copyOfApexJarPairs(),
      bootJars: config.bootJars.copyOfApexJarPairs(),
      updatableBootJars: config.updatableBootJars.copyOfApexJarPairs(),
      systemServerJars: config.systemServerJars,
      updatableSystemServerJars: config.updatableSystemServerJars.copyOfApexJarPairs(),
    }),
  );
  return hash.digest('hex');
}

export function createDexpreoptContext(
  config: DexpreoptConfig | ResolvedConfig,
  logger: Logger = silentLogger,
): DexpreoptContext {
  const global = isDexpreoptConfig(config) ? config : toDexpreoptConfig(config);
  return Object.freeze({
    config: global,
    cache: new OnceCache(fingerprintConfig(global)),
    logger,
  });
}

function isDexpreoptConfig(config: DexpreoptConfig | ResolvedConfig): config is DexpreoptConfig {
  return !Array.isArray(config.bootJars);
}
