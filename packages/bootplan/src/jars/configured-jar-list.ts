/**
 * Ordered list of (apex, jar) pairs
 */

import { posix } from 'path';

import { osClass } from '../targets/types';
import type { OsType } from '../targets/types';

/** Pseudo-apex for jars installed on the system partition */
export const PLATFORM_APEX = 'platform';

export interface ApexJarPair {
  readonly apex: string;
  readonly jar: string;
}

/**
 * Settings needed to place host-side copies of device jars
 */
export interface HostPathsConfig {
  outDir: string;
  hostPrebuiltTag: string;
}

/**
 * Install stem of a jar module. `framework-minus-apex` installs as `framework.jar`.
 */
export function moduleStem(jar: string): string {
  return jar === 'framework-minus-apex' ? 'framework' : jar;
}

/**
 * Split an `apex:jar` entry. A bare jar name belongs to the platform.
 */
export function splitApexJarPair(entry: string): ApexJarPair {
  const index = entry.indexOf(':');
  if (index === -1) {
    return { apex: PLATFORM_APEX, jar: entry };
  }
  return { apex: entry.slice(0, index), jar: entry.slice(index + 1) };
}

function pairKey(apex: string, jar: string): string {
  return `${apex}:${jar}`;
}

export class ConfiguredJarList {
  private readonly _pairs: readonly ApexJarPair[];
  private readonly _keys: ReadonlySet<string>;

  constructor(pairs: Iterable<ApexJarPair> = []) {
    const kept: ApexJarPair[] = [];
    const keys = new Set<string>();
    for (const { apex, jar } of pairs) {
      const key = pairKey(apex, jar);
      if (keys.has(key)) continue;
      keys.add(key);
      kept.push(Object.freeze({ apex, jar }));
    }
    this._pairs = Object.freeze(kept);
    this._keys = keys;
    Object.freeze(this);
  }

  static parse(entries: readonly string[]): ConfiguredJarList {
    return new ConfiguredJarList(entries.map(splitApexJarPair));
  }

  static empty(): ConfiguredJarList {
    return new ConfiguredJarList();
  }

  len(): number {
    return this._pairs.length;
  }

  apex(index: number): string {
    return this.pairAt(index).apex;
  }

  jar(index: number): string {
    return this.pairAt(index).jar;
  }

  pairs(): readonly ApexJarPair[] {
    return this._pairs;
  }

  has(apex: string, jar: string): boolean {
    return this._keys.has(pairKey(apex, jar));
  }

  containsJar(jar: string): boolean {
    return this.indexOfJar(jar) !== -1;
  }

  indexOfJar(jar: string): number {
    return this._pairs.findIndex((pair) => pair.jar === jar);
  }

  /**
   * This list followed by the pairs of `other` it does not already hold
   */
  append(other: ConfiguredJarList): ConfiguredJarList {
    return new ConfiguredJarList([...this._pairs, ...other._pairs]);
  }

  /**
   * Pairs of this list that `other` does not hold, in their original order
   */
  removeList(other: ConfiguredJarList): ConfiguredJarList {
    return new ConfiguredJarList(this._pairs.filter(({ apex, jar }) => !other.has(apex, jar)));
  }

  /**
   * Build paths of the jars under `dir`
   */
  buildPaths(dir: string): string[] {
    return this._pairs.map(({ jar }) => posix.join(dir, `${moduleStem(jar)}.jar`));
  }

  /**
   * Locations the runtime loads the jars from on `os`.
   *
   * Host locations mirror the device layout under the host prebuilt output directory.
   */
  devicePaths(config: HostPathsConfig, os: OsType): string[] {
    const host = osClass(os) === 'host';
    return this._pairs.map(({ apex, jar }) => {
      const name = `${moduleStem(jar)}.jar`;
      const subdir = apex === PLATFORM_APEX ? 'system/framework' : posix.join('apex', apex, 'javalib');
      if (host) {
        return posix.join(config.outDir, 'host', config.hostPrebuiltTag, subdir, name);
      }
      return posix.join('/', subdir, name);
    });
  }

  copyOfJars(): string[] {
    return this._pairs.map(({ jar }) => jar);
  }

  copyOfApexJarPairs(): string[] {
    return this._pairs.map(({ apex, jar }) => pairKey(apex, jar));
  }

  toJSON(): string[] {
    return this.copyOfApexJarPairs();
  }

  private pairAt(index: number): ApexJarPair {
    const pair = this._pairs[index];
    if (pair === undefined) {
      throw new RangeError(`Jar index ${index} out of range for list of ${this._pairs.length}`);
    }
    return pair;
  }
}
