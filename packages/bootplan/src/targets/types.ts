/**
 * Build target types
 */

export type OsClass = 'device' | 'host';

export type OsType = 'android' | 'linux_glibc' | 'linux_bionic' | 'darwin' | 'windows';

export type ArchType = 'arm' | 'arm64' | 'x86' | 'x86_64';

export const OS_TYPES: readonly OsType[] = ['android', 'linux_glibc', 'linux_bionic', 'darwin', 'windows'];

export const ARCH_TYPES: readonly ArchType[] = ['arm', 'arm64', 'x86', 'x86_64'];

/**
 * Target as written in the config file
 */
export interface TargetConfig {
  arch: ArchType;
  /** Architecture is only reachable through native-bridge emulation */
  nativeBridge?: boolean;
}

/**
 * One (architecture, OS) pair images are built for
 */
export interface Target {
  readonly os: OsType;
  readonly arch: ArchType;
  readonly nativeBridge: boolean;
}

/**
 * Configured target matrix, keyed by OS
 */
export type TargetMatrix = Partial<Record<OsType, readonly TargetConfig[]>>;

export function osClass(os: OsType): OsClass {
  return os === 'android' ? 'device' : 'host';
}

export function isOsType(value: unknown): value is OsType {
  return OS_TYPES.some((os) => os === value);
}

export function isArchType(value: unknown): value is ArchType {
  return ARCH_TYPES.some((arch) => arch === value);
}
