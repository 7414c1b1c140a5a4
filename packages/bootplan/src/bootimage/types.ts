/**
 * Boot image types
 */

import type { ConfiguredJarList } from '../jars/configured-jar-list';
import type { Target } from '../targets/types';

/**
 * One layer of the boot image
 */
export interface BootImageConfig {
  /** Config name, unique within a derivation */
  readonly name: string;
  /** Base name of the image files */
  readonly stem: string;
  /** Name of the config this one extends, if any */
  readonly extends: string | null;
  /** Subdirectory of the image on host, relative to the OS directory */
  readonly installDirOnHost: string;
  /** Jars compiled into this layer */
  readonly modules: ConfiguredJarList;
  /** Staging directory */
  readonly dir: string;
  /** Unstripped output directory */
  readonly symbolsDir: string;
  /** Archive of all variants */
  readonly zip: string;
  /** Image file name: `<stem>.art`, or `<stem>-<first jar>.art` for an extension */
  readonly imageName: string;
  /** Predefined build paths of this layer's jars */
  readonly dexPaths: readonly string[];
  /** Build paths of this layer's jars and those of every layer below */
  readonly dexPathsDeps: readonly string[];
  /** Device locations of this layer's jars */
  readonly dexLocations: readonly string[];
  /** Device locations of this layer's jars and those of every layer below */
  readonly dexLocationsDeps: readonly string[];
  /** One variant per dexpreopt target, in target order */
  readonly variants: readonly BootImageVariant[];
}

/**
 * A boot image config instantiated for one target
 */
export interface BootImageVariant {
  /** Name of the owning config */
  readonly configName: string;
  readonly target: Target;
  readonly imagePathOnHost: string;
  /** Image, compiled code and vdex files of every jar */
  readonly imagesDeps: readonly string[];
  readonly dexLocations: readonly string[];
  readonly dexLocationsDeps: readonly string[];
  /** Image path of the matching variant of the extended config */
  readonly primaryImages: string | null;
}

/**
 * Boot image configs of a derivation, keyed by name
 */
export type BootImageConfigs = Readonly<Record<string, BootImageConfig>>;

/**
 * Build and install paths of the updatable boot jars.
 *
 * Known before the jar modules are processed; the jars are copied to these paths later.
 */
export interface UpdatableBootConfig {
  readonly modules: ConfiguredJarList;
  readonly dexPaths: readonly string[];
  readonly dexLocations: readonly string[];
}

/**
 * Boot classpath passed to dex2oat
 */
export interface DexpreoptBootClasspath {
  readonly dexPaths: readonly string[];
  readonly dexLocations: readonly string[];
}
