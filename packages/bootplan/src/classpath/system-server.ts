/**
 * System server classpath
 */

import { posix } from 'path';

import { createOnceKey } from '../cache/once-cache';
import type { DexpreoptConfig } from '../config/types';
import type { DexpreoptContext } from '../context';
import { ConfigInvariantError } from '../errors';

export const SYSTEM_FRAMEWORK_DIR = '/system/framework';

const systemServerClasspathKey = createOnceKey<readonly string[]>('systemServerClasspath');

/**
 * System server jars that no updatable apex supplies
 */
export function nonUpdatableSystemServerJars(config: DexpreoptConfig): string[] {
  return config.systemServerJars.filter(
    (jar) => !config.updatableSystemServerJars.containsJar(jar),
  );
}

/**
 * On-device locations of the system server classpath: non-updatable jars first, then the jars
 * from updatable apexes.
 */
export function systemServerClasspath(ctx: DexpreoptContext): readonly string[] {
  return ctx.cache.once(systemServerClasspathKey, () => {
    const global = ctx.config;
    const locations = nonUpdatableSystemServerJars(global).map((jar) =>
      posix.join(SYSTEM_FRAMEWORK_DIR, `${jar}.jar`),
    );
    locations.push(...global.updatableSystemServerJars.devicePaths(global, 'android'));

    const expected = global.systemServerJars.length + global.updatableSystemServerJars.len();
    if (locations.length !== expected) {
      throw new ConfigInvariantError('system server jars', expected, locations.length);
    }

    ctx.logger.debug(`Derived system server classpath of ${locations.length} jars`);
    return locations;
  });
}
