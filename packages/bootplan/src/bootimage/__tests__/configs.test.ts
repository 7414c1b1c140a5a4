import { describe, expect, test } from 'vitest';

import { sampleContext } from '../../__tests__/helpers';
import { ConfigInvariantError } from '../../errors';
import { dexpreoptTargets } from '../../targets/resolve';
import {
  artBootImageConfig,
  defaultBootImageConfig,
  genBootImageConfigs,
  getAnyAndroidVariant,
} from '../configs';

describe('genBootImageConfigs', () => {
  test('derives the ART config', () => {
    const art = artBootImageConfig(sampleContext());

    expect(art.name).toBe('art');
    expect(art.extends).toBeNull();
    expect(art.modules.copyOfJars()).toEqual(['core-oj', 'core-libart']);
    expect(art.dir).toBe('out/dexpreopt/generic/dex_artjars');
    expect(art.symbolsDir).toBe('out/dexpreopt/generic/dex_artjars_unstripped');
    expect(art.zip).toBe('out/dexpreopt/generic/dex_artjars/art.zip');
    expect(art.imageName).toBe('boot.art');
    expect(art.dexPaths).toEqual([
      'out/dexpreopt/generic/dex_artjars_input/core-oj.jar',
      'out/dexpreopt/generic/dex_artjars_input/core-libart.jar',
    ]);
    expect(art.dexPathsDeps).toEqual(art.dexPaths);
    expect(art.dexLocations).toEqual([
      '/apex/com.android.art/javalib/core-oj.jar',
      '/apex/com.android.art/javalib/core-libart.jar',
    ]);
  });

  test('derives the framework extension from the remaining boot jars', () => {
    const ctx = sampleContext();
    const art = artBootImageConfig(ctx);
    const boot = defaultBootImageConfig(ctx);

    expect(boot.name).toBe('boot');
    expect(boot.extends).toBe('art');
    expect(boot.modules.copyOfApexJarPairs()).toEqual(['platform:framework', 'platform:services']);
    expect(boot.dir).toBe('out/dexpreopt/generic/dex_bootjars');
    expect(boot.zip).toBe('out/dexpreopt/generic/dex_bootjars/boot.zip');
    expect(boot.imageName).toBe('boot-framework.art');

    const shared = art.modules.pairs().filter(({ apex, jar }) => boot.modules.has(apex, jar));
    expect(shared).toEqual([]);
    expect(art.modules.append(boot.modules).copyOfApexJarPairs()).toEqual(
      ctx.config.bootJars.copyOfApexJarPairs(),
    );
  });

  test('extension lists include the ART lists first', () => {
    const ctx = sampleContext();
    const art = artBootImageConfig(ctx);
    const boot = defaultBootImageConfig(ctx);

    expect(boot.dexPathsDeps).toEqual([...art.dexPathsDeps, ...boot.dexPaths]);
    expect(boot.dexLocationsDeps).toEqual([
      '/apex/com.android.art/javalib/core-oj.jar',
      '/apex/com.android.art/javalib/core-libart.jar',
      '/system/framework/framework.jar',
      '/system/framework/services.jar',
    ]);
  });

  test('creates one variant per target, in target order', () => {
    const ctx = sampleContext();
    const targets = dexpreoptTargets(ctx.config.targets, ctx.config.hostOs);

    for (const config of Object.values(genBootImageConfigs(ctx))) {
      expect(config.variants).toHaveLength(targets.length);
      expect(config.variants.map((variant) => variant.target)).toEqual(targets);
      expect(config.variants.every((variant) => variant.configName === config.name)).toBe(true);
    }
  });

  test('wires extension variants to the matching ART variant', () => {
    const ctx = sampleContext();
    const art = artBootImageConfig(ctx);
    const boot = defaultBootImageConfig(ctx);

    expect(boot.variants).toHaveLength(2);
    expect(boot.variants[0].target).toEqual({ os: 'android', arch: 'arm64', nativeBridge: false });
    expect(boot.variants[0].primaryImages).toBe(art.variants[0].imagePathOnHost);
    expect(boot.variants[0].primaryImages).toBe(
      'out/dexpreopt/generic/dex_artjars/android/apex/art_boot_images/javalib/arm64/boot.art',
    );
    expect(boot.variants[1].primaryImages).toBe(
      'out/dexpreopt/generic/dex_artjars/linux_glibc/apex/art_boot_images/javalib/x86_64/boot.art',
    );
    expect(art.variants.every((variant) => variant.primaryImages === null)).toBe(true);
  });

  test('extension variant locations include the ART locations first', () => {
    const ctx = sampleContext();
    const art = artBootImageConfig(ctx);
    const boot = defaultBootImageConfig(ctx);

    boot.variants.forEach((variant, i) => {
      expect(variant.dexLocationsDeps).toEqual([
        ...art.variants[i].dexLocations,
        ...variant.dexLocations,
      ]);
    });
    expect(boot.variants[1].dexLocationsDeps).toEqual([
      'out/host/linux-x86/apex/com.android.art/javalib/core-oj.jar',
      'out/host/linux-x86/apex/com.android.art/javalib/core-libart.jar',
      'out/host/linux-x86/system/framework/framework.jar',
      'out/host/linux-x86/system/framework/services.jar',
    ]);
  });

  test('is computed once per context and frozen', () => {
    const ctx = sampleContext();
    const configs = genBootImageConfigs(ctx);

    expect(genBootImageConfigs(ctx)).toBe(configs);
    expect(defaultBootImageConfig(ctx)).toBe(configs.boot);
    expect(Object.isFrozen(configs.boot.variants[0])).toBe(true);
    expect(Object.isFrozen(configs.art.dexPaths)).toBe(true);
    expect(genBootImageConfigs(sampleContext())).not.toBe(configs);
  });

  test('uses the device name for the output directory', () => {
    const art = artBootImageConfig(sampleContext({ deviceName: 'walleye', outDir: 'build/out' }));
    expect(art.dir).toBe('build/out/dexpreopt/walleye/dex_artjars');
  });

  test('handles an empty target matrix', () => {
    const ctx = sampleContext({ targets: { android: [], linux_glibc: [] } });
    expect(defaultBootImageConfig(ctx).variants).toEqual([]);
    expect(defaultBootImageConfig(ctx).dexLocationsDeps).toHaveLength(4);
  });

  test('fails when ART jars are not all boot jars', () => {
    const ctx = sampleContext({
      artApexJars: ['com.android.art:core-oj', 'com.android.art:okhttp'],
    });

    expect(() => genBootImageConfigs(ctx)).toThrow(ConfigInvariantError);
    expect(() => genBootImageConfigs(ctx)).toThrow(
      'wrong number of boot image jars, got 5, expected 4',
    );
  });
});

describe('getAnyAndroidVariant', () => {
  test('returns the first device variant', () => {
    const boot = defaultBootImageConfig(sampleContext());
    expect(getAnyAndroidVariant(boot)).toBe(boot.variants[0]);
  });

  test('returns undefined for a host-only config', () => {
    const boot = defaultBootImageConfig(sampleContext({ targets: { android: [] } }));
    expect(boot.variants).toHaveLength(1);
    expect(getAnyAndroidVariant(boot)).toBeUndefined();
  });
});
