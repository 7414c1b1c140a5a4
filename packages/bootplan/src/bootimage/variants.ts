/**
 * Per-target expansion of boot image configs
 */

import { posix } from 'path';

import type { HostPathsConfig } from '../jars/configured-jar-list';
import { moduleStem } from '../jars/configured-jar-list';
import type { Target } from '../targets/types';
import type { BootImageConfig, BootImageVariant } from './types';

export const IMAGE_EXTENSIONS = ['.art', '.oat', '.vdex'] as const;

type ImageLayout = Pick<BootImageConfig, 'stem' | 'extends' | 'modules'>;

/**
 * Name of the image files compiled from the jar at `index`.
 *
 * The first jar of a primary image gets the bare stem; every other jar, and every jar of an
 * extension, gets `<stem>-<jar>`.
 */
export function moduleName(config: ImageLayout, index: number): string {
  if (index === 0 && config.extends === null) {
    return config.stem;
  }
  return `${config.stem}-${moduleStem(config.modules.jar(index))}`;
}

export function firstModuleNameOrStem(config: ImageLayout): string {
  return config.modules.len() > 0 ? moduleName(config, 0) : config.stem;
}

/**
 * Files under `dir` for every jar and extension
 */
export function moduleFiles(
  config: ImageLayout,
  dir: string,
  extensions: readonly string[] = IMAGE_EXTENSIONS,
): string[] {
  const files: string[] = [];
  for (let i = 0; i < config.modules.len(); i++) {
    const name = moduleName(config, i);
    for (const extension of extensions) {
      files.push(posix.join(dir, name + extension));
    }
  }
  return files;
}

type ExpandableConfig = Pick<
  BootImageConfig,
  'name' | 'stem' | 'extends' | 'modules' | 'dir' | 'installDirOnHost' | 'imageName'
>;

/**
 * One variant per target, in target order.
 *
 * Knows nothing about other configs: a variant's `dexLocationsDeps` are its own locations and
 * `primaryImages` is unset until the caller wires the layers together.
 */
export function expandVariants(
  config: ExpandableConfig,
  targets: readonly Target[],
  hostPaths: HostPathsConfig,
): BootImageVariant[] {
  return targets.map((target) => {
    const imageDir = posix.join(config.dir, target.os, config.installDirOnHost, target.arch);
    const dexLocations = config.modules.devicePaths(hostPaths, target.os);
    return {
      configName: config.name,
      target,
      imagePathOnHost: posix.join(imageDir, config.imageName),
      imagesDeps: moduleFiles(config, imageDir),
      dexLocations,
      dexLocationsDeps: dexLocations,
      primaryImages: null,
    };
  });
}
