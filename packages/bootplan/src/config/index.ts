/**
 * Configuration module
 */

import type { BootplanConfig } from './types';

export * from './types';
export { getDefaultConfig, DEFAULT_TARGETS } from './defaults';
export { loadConfig, resolveConfig, CONFIG_FILE_NAMES } from './load';
export type { LoadConfigOptions } from './load';
export { mergeConfig } from './merge';
export { validateConfig, ConfigValidationError } from './validate';
export { toDexpreoptConfig } from './global';

/**
 * Define configuration with type safety
 */
export function defineConfig(config: BootplanConfig): BootplanConfig {
  return config;
}
