import { describe, expect, test } from 'vitest';

import { sampleContext } from '../../__tests__/helpers';
import { getUpdatableBootConfig } from '../updatable';

describe('getUpdatableBootConfig', () => {
  test('derives build paths and device locations of the updatable boot jars', () => {
    const config = getUpdatableBootConfig(sampleContext());

    expect(config.modules.copyOfApexJarPairs()).toEqual(['com.android.conscrypt:conscrypt']);
    expect(config.dexPaths).toEqual(['out/dexpreopt/generic/updatable_bootjars/conscrypt.jar']);
    expect(config.dexLocations).toEqual(['/apex/com.android.conscrypt/javalib/conscrypt.jar']);
  });

  test('is shared by every caller of the context', () => {
    const ctx = sampleContext();
    expect(getUpdatableBootConfig(ctx)).toBe(getUpdatableBootConfig(ctx));
  });

  test('is empty without updatable boot jars', () => {
    const config = getUpdatableBootConfig(sampleContext({ updatableBootJars: [] }));
    expect(config.dexPaths).toEqual([]);
    expect(config.dexLocations).toEqual([]);
  });
});
