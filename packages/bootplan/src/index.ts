/**
 * Bootplan - boot image and classpath planning for dexpreopt
 *
 * @packageDocumentation
 */

export { VERSION } from './version';

// Re-export config
export type {
  BootplanConfig,
  ResolvedConfig,
  DexpreoptConfig,
  LogLevel,
  LoadConfigOptions,
} from './config';
export {
  loadConfig,
  resolveConfig,
  getDefaultConfig,
  mergeConfig,
  validateConfig,
  defineConfig,
  toDexpreoptConfig,
  ConfigValidationError,
  DEFAULT_TARGETS,
} from './config';

// Re-export targets
export { dexpreoptTargets, targetName, osClass } from './targets';
export type { ArchType, OsType, OsClass, Target, TargetConfig, TargetMatrix } from './targets';

// Re-export jars
export { ConfiguredJarList, PLATFORM_APEX, moduleStem, splitApexJarPair } from './jars';
export type { ApexJarPair, HostPathsConfig } from './jars';

// Re-export cache
export { OnceCache, createOnceKey, deepFreeze } from './cache';
export type { OnceKey } from './cache';

// Re-export boot images
export {
  ART_BOOT_IMAGE_NAME,
  FRAMEWORK_BOOT_IMAGE_NAME,
  artBootImageConfig,
  defaultBootImageConfig,
  expandVariants,
  genBootImageConfigs,
  getAnyAndroidVariant,
  getUpdatableBootConfig,
} from './bootimage';
export type {
  BootImageConfig,
  BootImageConfigs,
  BootImageVariant,
  DexpreoptBootClasspath,
  UpdatableBootConfig,
} from './bootimage';

// Re-export classpaths
export { bcpForDexpreopt, nonUpdatableSystemServerJars, systemServerClasspath } from './classpath';

export { createDexpreoptContext, fingerprintConfig } from './context';
export type { DexpreoptContext } from './context';
export { ConfigInvariantError, isConfigInvariantError } from './errors';
export { createLogger, silentLogger } from './logger';
export type { Logger, LoggerOptions } from './logger';
export { makeVars, formatMakeVars } from './makevars';
export type { MakeVars } from './makevars';
