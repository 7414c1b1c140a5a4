/**
 * Configuration validation
 */

import { ARCH_TYPES, OS_TYPES, isArchType, isOsType, osClass } from '../targets/types';
import type { BootplanConfig, LogLevel } from './types';

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

const JAR_LIST_KEYS = [
  'artApexJars',
  'bootJars',
  'updatableBootJars',
  'updatableSystemServerJars',
] as const;

const APEX_JAR_PATTERN = /^(?:[^\s:]+:)?[^\s:]+$/;

function validateString(name: string, value: unknown): void {
  if (value !== undefined && typeof value !== 'string') {
    throw new ConfigValidationError(
      `Invalid config: \`${name}\` must be a string, but received ${typeof value}`,
    );
  }
}

function validateStringArray(name: string, value: unknown): value is unknown[] {
  if (value === undefined) return false;
  if (!Array.isArray(value)) {
    throw new ConfigValidationError(
      `Invalid config: \`${name}\` must be an array, but received ${typeof value}`,
    );
  }
  value.forEach((entry: unknown, index) => {
    if (typeof entry !== 'string') {
      throw new ConfigValidationError(
        `Invalid config: \`${name}[${index}]\` must be a string, but received ${typeof entry}`,
      );
    }
  });
  return true;
}

function validateTargets(targets: unknown): void {
  if (typeof targets !== 'object' || targets === null || Array.isArray(targets)) {
    throw new ConfigValidationError(
      `Invalid config: \`targets\` must be an object, but received ${typeof targets}`,
    );
  }

  for (const [os, value] of Object.entries(targets)) {
    const list: unknown = value;
    if (!isOsType(os)) {
      throw new ConfigValidationError(
        `Invalid config: \`targets\` key must be one of ${OS_TYPES.join(', ')}, but received ${os}`,
      );
    }
    if (list === undefined) continue;
    if (!Array.isArray(list)) {
      throw new ConfigValidationError(
        `Invalid config: \`targets.${os}\` must be an array, but received ${typeof list}`,
      );
    }
    list.forEach((target: unknown, index) => {
      const at = `targets.${os}[${index}]`;
      if (typeof target !== 'object' || target === null) {
        throw new ConfigValidationError(
          `Invalid config: \`${at}\` must be an object, but received ${typeof target}`,
        );
      }
      const arch: unknown = Reflect.get(target, 'arch');
      if (!isArchType(arch)) {
        throw new ConfigValidationError(
          `Invalid config: \`${at}.arch\` must be one of ${ARCH_TYPES.join(', ')}, but received ${String(arch)}`,
        );
      }
      const nativeBridge: unknown = Reflect.get(target, 'nativeBridge');
      if (nativeBridge !== undefined && typeof nativeBridge !== 'boolean') {
        throw new ConfigValidationError(
          `Invalid config: \`${at}.nativeBridge\` must be a boolean, but received ${typeof nativeBridge}`,
        );
      }
    });
  }
}

/**
 * Validate Bootplan configuration
 */
export function validateConfig(config: unknown): asserts config is BootplanConfig {
  if (typeof config !== 'object' || config === null || Array.isArray(config)) {
    throw new ConfigValidationError(
      `Invalid config: config must be an object, but received ${Array.isArray(config) ? 'array' : typeof config}`,
    );
  }

  const source: object = config;
  const field = (name: keyof BootplanConfig): unknown => Reflect.get(source, name);

  validateString('root', field('root'));
  validateString('deviceName', field('deviceName'));
  validateString('outDir', field('outDir'));
  validateString('hostPrebuiltTag', field('hostPrebuiltTag'));

  const deviceName = field('deviceName');
  if (typeof deviceName === 'string' && deviceName.trim() === '') {
    throw new ConfigValidationError('Invalid config: `deviceName` must not be empty');
  }

  const hostOs = field('hostOs');
  if (hostOs !== undefined && (!isOsType(hostOs) || osClass(hostOs) !== 'host')) {
    throw new ConfigValidationError(
      `Invalid config: \`hostOs\` must be a host OS, but received ${String(hostOs)}`,
    );
  }

  const logLevel = field('logLevel');
  if (logLevel !== undefined && !LOG_LEVELS.some((level) => level === logLevel)) {
    throw new ConfigValidationError(
      `Invalid config: \`logLevel\` must be one of ${LOG_LEVELS.join(', ')}, but received ${String(logLevel)}`,
    );
  }

  const targets = field('targets');
  if (targets !== undefined) {
    validateTargets(targets);
  }

  for (const key of JAR_LIST_KEYS) {
    const list = field(key);
    if (!validateStringArray(key, list)) continue;
    list.forEach((entry, index) => {
      if (typeof entry === 'string' && !APEX_JAR_PATTERN.test(entry)) {
        throw new ConfigValidationError(
          `Invalid config: \`${key}[${index}]\` must be an \`apex:jar\` pair, but received "${entry}"`,
        );
      }
    });
  }

  const systemServerJars = field('systemServerJars');
  if (validateStringArray('systemServerJars', systemServerJars)) {
    systemServerJars.forEach((jar, index) => {
      if (typeof jar === 'string' && (jar.includes(':') || jar.trim() === '')) {
        throw new ConfigValidationError(
          `Invalid config: \`systemServerJars[${index}]\` must be a jar name, but received "${jar}"`,
        );
      }
    });
  }
}
