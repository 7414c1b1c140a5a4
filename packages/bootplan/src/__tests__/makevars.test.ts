import { describe, expect, test } from 'vitest';

import { formatMakeVars, makeVars } from '../makevars';
import { sampleContext } from './helpers';

describe('makeVars', () => {
  test('exports the apex:jar pairs of the framework boot image', () => {
    expect(makeVars(sampleContext())).toEqual({
      DEXPREOPT_BOOT_JARS_MODULES: 'platform:framework:platform:services',
    });
  });

  test('is empty when every boot jar is an ART jar', () => {
    const vars = makeVars(sampleContext({ bootJars: ['com.android.art:core-oj', 'com.android.art:core-libart'] }));
    expect(vars.DEXPREOPT_BOOT_JARS_MODULES).toBe('');
  });
});

describe('formatMakeVars', () => {
  test('prints sorted assignments', () => {
    expect(formatMakeVars({ B: '2', A: '1' })).toBe('A := 1\nB := 2');
  });
});
