/**
 * Boot classpath for dexpreopt
 */

import { defaultBootImageConfig } from '../bootimage/configs';
import type { DexpreoptBootClasspath } from '../bootimage/types';
import { getUpdatableBootConfig } from '../bootimage/updatable';
import type { DexpreoptContext } from '../context';

/**
 * Paths and locations of the boot jars, for dex2oat's `-Xbootclasspath` and
 * `-Xbootclasspath-locations`.
 *
 * Non-updatable jars, the ones in the boot image, always come first. Updatable boot jars are
 * used when compiling against the boot classpath but are never part of the image.
 */
export function bcpForDexpreopt(ctx: DexpreoptContext, withUpdatable: boolean): DexpreoptBootClasspath {
  const bootImage = defaultBootImageConfig(ctx);
  if (!withUpdatable) {
    return { dexPaths: bootImage.dexPathsDeps, dexLocations: bootImage.dexLocationsDeps };
  }

  const updatable = getUpdatableBootConfig(ctx);
  return {
    dexPaths: [...bootImage.dexPathsDeps, ...updatable.dexPaths],
    dexLocations: [...bootImage.dexLocationsDeps, ...updatable.dexLocations],
  };
}
