/**
 * Updatable boot config
 *
 * Gives access to the build and install paths of the updatable boot jars without registering
 * dependencies on their modules.
 */

import { posix } from 'path';

import { createOnceKey } from '../cache/once-cache';
import type { DexpreoptContext } from '../context';
import { deviceOutDir } from './configs';
import type { UpdatableBootConfig } from './types';

const updatableBootConfigKey = createOnceKey<UpdatableBootConfig>('updatableBootConfig');

export function getUpdatableBootConfig(ctx: DexpreoptContext): UpdatableBootConfig {
  return ctx.cache.once(updatableBootConfigKey, () => {
    const global = ctx.config;
    const modules = global.updatableBootJars;
    ctx.logger.debug(`Deriving paths of ${modules.len()} updatable boot jars`);

    return {
      modules,
      dexPaths: modules.buildPaths(posix.join(deviceOutDir(global), 'updatable_bootjars')),
      dexLocations: modules.devicePaths(global, 'android'),
    };
  });
}
