/**
 * Bootplan Configuration Types
 */

import type { ConfiguredJarList } from '../jars/configured-jar-list';
import type { OsType, TargetMatrix } from '../targets/types';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/**
 * Main Bootplan configuration
 *
 * Jar entries are `apex:jar` strings; `platform` is the apex of jars installed on the
 * system partition, and a bare jar name is read as `platform:<jar>`.
 */
export interface BootplanConfig {
  /** Project root directory */
  root?: string;
  /** Device name, used to namespace the output directories */
  deviceName?: string;
  /** Top-level build output directory */
  outDir?: string;
  /** OS the build runs on */
  hostOs?: OsType;
  /** Prebuilt tag of the host, e.g. `linux-x86` */
  hostPrebuiltTag?: string;
  /** Configured targets per OS */
  targets?: TargetMatrix;
  /** Jars of the ART apex, the primary boot image */
  artApexJars?: string[];
  /** All non-updatable boot jars, ART jars included */
  bootJars?: string[];
  /** Boot jars from updatable apexes; never part of a boot image */
  updatableBootJars?: string[];
  /** System server jar names */
  systemServerJars?: string[];
  /** System server jars supplied by updatable apexes */
  updatableSystemServerJars?: string[];
  /** Log level */
  logLevel?: LogLevel;
}

/**
 * Resolved configuration (with defaults applied)
 */
export type ResolvedConfig = Required<BootplanConfig>;

/**
 * Global dexpreopt configuration, with jar lists parsed
 */
export interface DexpreoptConfig {
  readonly deviceName: string;
  readonly outDir: string;
  readonly hostOs: OsType;
  readonly hostPrebuiltTag: string;
  readonly targets: TargetMatrix;
  readonly artApexJars: ConfiguredJarList;
  readonly bootJars: ConfiguredJarList;
  readonly updatableBootJars: ConfiguredJarList;
  readonly systemServerJars: readonly string[];
  readonly updatableSystemServerJars: ConfiguredJarList;
}
