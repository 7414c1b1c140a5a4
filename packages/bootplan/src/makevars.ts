/**
 * Build variables exported to legacy makefiles
 */

import { defaultBootImageConfig } from './bootimage/configs';
import type { DexpreoptContext } from './context';

export type MakeVars = Readonly<Record<string, string>>;

export function makeVars(ctx: DexpreoptContext): MakeVars {
  return {
    DEXPREOPT_BOOT_JARS_MODULES: defaultBootImageConfig(ctx).modules.copyOfApexJarPairs().join(':'),
  };
}

/**
 * `NAME := value` lines, sorted by name
 */
export function formatMakeVars(vars: MakeVars): string {
  return Object.keys(vars)
    .sort()
    .map((name) => `${name} := ${vars[name]}`)
    .join('\n');
}
