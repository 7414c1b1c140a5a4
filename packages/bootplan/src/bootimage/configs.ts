/**
 * Boot image configs
 *
 * Two layers: the ART image holding the core libraries, and the framework image extending it.
 * Both are derived once per context, before any jar is compiled, so that every dexpreopt rule
 * can refer to the image paths up front.
 */

import { posix } from 'path';

import { createOnceKey } from '../cache/once-cache';
import type { DexpreoptConfig } from '../config/types';
import type { DexpreoptContext } from '../context';
import { ConfigInvariantError } from '../errors';
import type { ConfiguredJarList } from '../jars/configured-jar-list';
import { dexpreoptTargets, targetName } from '../targets/resolve';
import type { Target } from '../targets/types';
import type { BootImageConfig, BootImageConfigs, BootImageVariant } from './types';
import { expandVariants, firstModuleNameOrStem } from './variants';

export const ART_BOOT_IMAGE_NAME = 'art';
export const FRAMEWORK_BOOT_IMAGE_NAME = 'boot';

const bootImageConfigsKey = createOnceKey<BootImageConfigs>('bootImageConfigs');

/**
 * What distinguishes one layer from another; everything else is derived
 */
interface BootImageLayer {
  name: string;
  stem: string;
  extends: string | null;
  installDirOnHost: string;
  modules: ConfiguredJarList;
}

/**
 * Output directory of the device, e.g. `out/dexpreopt/generic`
 */
export function deviceOutDir(config: DexpreoptConfig): string {
  return posix.join(config.outDir, 'dexpreopt', config.deviceName);
}

function buildLayer(
  layer: BootImageLayer,
  parent: BootImageConfig | null,
  targets: readonly Target[],
  global: DexpreoptConfig,
): BootImageConfig {
  const deviceDir = deviceOutDir(global);
  const dir = posix.join(deviceDir, `dex_${layer.name}jars`);
  const imageName = `${firstModuleNameOrStem(layer)}.art`;

  // Build paths are fixed before the jars are built; a later rule copies the jars there.
  const dexPaths = layer.modules.buildPaths(posix.join(deviceDir, `dex_${layer.name}jars_input`));
  const dexLocations = layer.modules.devicePaths(global, 'android');

  const expanded = expandVariants({ ...layer, dir, imageName }, targets, global);
  const variants: BootImageVariant[] = parent
    ? expanded.map((variant, i) => {
        const primary = parent.variants[i];
        return {
          ...variant,
          primaryImages: primary.imagePathOnHost,
          dexLocationsDeps: [...primary.dexLocationsDeps, ...variant.dexLocations],
        };
      })
    : expanded;

  return {
    ...layer,
    dir,
    symbolsDir: posix.join(deviceDir, `dex_${layer.name}jars_unstripped`),
    zip: posix.join(dir, `${layer.name}.zip`),
    imageName,
    dexPaths,
    dexPathsDeps: parent ? [...parent.dexPathsDeps, ...dexPaths] : dexPaths,
    dexLocations,
    dexLocationsDeps: parent ? [...parent.dexLocationsDeps, ...dexLocations] : dexLocations,
    variants,
  };
}

function buildBootImageConfigs(ctx: DexpreoptContext): BootImageConfigs {
  const global = ctx.config;
  const targets = dexpreoptTargets(global.targets, global.hostOs);

  const artModules = global.artApexJars;
  const frameworkModules = global.bootJars.removeList(artModules);

  const total = artModules.len() + frameworkModules.len();
  if (total !== global.bootJars.len()) {
    throw new ConfigInvariantError('boot image jars', global.bootJars.len(), total);
  }

  ctx.logger.debug(
    `Deriving boot images for ${targets.length} targets: ${targets.map(targetName).join(', ')}`,
  );

  // Parents come before the layers extending them.
  const layers: BootImageLayer[] = [
    {
      name: ART_BOOT_IMAGE_NAME,
      stem: 'boot',
      extends: null,
      installDirOnHost: 'apex/art_boot_images/javalib',
      modules: artModules,
    },
    {
      name: FRAMEWORK_BOOT_IMAGE_NAME,
      stem: 'boot',
      extends: ART_BOOT_IMAGE_NAME,
      installDirOnHost: 'system/framework',
      modules: frameworkModules,
    },
  ];

  const configs: Record<string, BootImageConfig> = {};
  for (const layer of layers) {
    const parent = layer.extends === null ? null : configs[layer.extends];
    configs[layer.name] = buildLayer(layer, parent, targets, global);
  }
  return configs;
}

/**
 * All boot image configs of the context, keyed by name
 */
export function genBootImageConfigs(ctx: DexpreoptContext): BootImageConfigs {
  return ctx.cache.once(bootImageConfigsKey, () => buildBootImageConfigs(ctx));
}

/**
 * Primary boot image, the ART apex jars
 */
export function artBootImageConfig(ctx: DexpreoptContext): BootImageConfig {
  return genBootImageConfigs(ctx)[ART_BOOT_IMAGE_NAME];
}

/**
 * Framework boot image extension
 */
export function defaultBootImageConfig(ctx: DexpreoptContext): BootImageConfig {
  return genBootImageConfigs(ctx)[FRAMEWORK_BOOT_IMAGE_NAME];
}

/**
 * First device variant. Device locations are the same for every device variant.
 */
export function getAnyAndroidVariant(config: BootImageConfig): BootImageVariant | undefined {
  return config.variants.find((variant) => variant.target.os === 'android');
}
