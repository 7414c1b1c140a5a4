/**
 * Configuration loader
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';

import { getDefaultConfig } from './defaults';
import { mergeConfig } from './merge';
import type { BootplanConfig, ResolvedConfig } from './types';
import { validateConfig } from './validate';

export interface LoadConfigOptions {
  config?: string;
  cwd?: string;
}

export const CONFIG_FILE_NAMES = ['bootplan.config.js', 'bootplan.config.json'] as const;

/**
 * Wrap a config loading failure with the file it came from
 */
function formatConfigLoadError(configPath: string, error: unknown): Error {
  const errorName = error instanceof Error ? error.constructor.name : 'Error';
  const errorMessage = error instanceof Error ? error.message : String(error);

  let detailedMessage = `Failed to load config file: ${configPath}\n`;
  detailedMessage += `Error Type: ${errorName}\n`;
  detailedMessage += `Error Message: ${errorMessage}`;

  if (error instanceof SyntaxError && configPath.endsWith('.json')) {
    detailedMessage += `\n\nThe file is not valid JSON.`;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new Error(detailedMessage, { cause });
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

/**
 * Evaluate a JS config module: an object, a promise of one, or a function of the defaults
 */
async function loadModuleConfig(configPath: string): Promise<unknown> {
  const loaded: unknown = await import(configPath);
  let config: unknown =
    typeof loaded === 'object' && loaded !== null && 'default' in loaded ? loaded.default : loaded;

  if (config instanceof Promise) {
    config = await config;
  }
  if (typeof config === 'function') {
    config = await config(getDefaultConfig(dirname(configPath)));
  }
  return config;
}

async function loadConfigFile(configPath: string): Promise<BootplanConfig> {
  try {
    const config = configPath.endsWith('.json')
      ? readJson(configPath)
      : await loadModuleConfig(configPath);
    validateConfig(config);
    return config;
  } catch (error) {
    throw formatConfigLoadError(configPath, error);
  }
}

/**
 * Load configuration from file
 * loadConfig({ config: path }) or loadConfig({ cwd: dir })
 */
export async function loadConfig(options: LoadConfigOptions | string = {}): Promise<BootplanConfig> {
  let root: string;
  let explicitConfigPath: string | undefined;

  if (typeof options === 'string') {
    root = options;
  } else {
    root = options.cwd || process.cwd();
    explicitConfigPath = options.config;
  }

  if (explicitConfigPath) {
    const configPath = resolve(root, explicitConfigPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return loadConfigFile(configPath);
  }

  for (const fileName of CONFIG_FILE_NAMES) {
    const configPath = join(root, fileName);
    if (existsSync(configPath)) {
      return loadConfigFile(configPath);
    }
  }

  // Fall back to the "bootplan" field of package.json
  const packageJsonPath = join(root, 'package.json');
  if (existsSync(packageJsonPath)) {
    let packageJson: unknown;
    try {
      packageJson = readJson(packageJsonPath);
    } catch (error) {
      throw formatConfigLoadError(packageJsonPath, error);
    }
    if (typeof packageJson === 'object' && packageJson !== null && 'bootplan' in packageJson) {
      const config: unknown = packageJson.bootplan;
      try {
        validateConfig(config);
      } catch (error) {
        throw formatConfigLoadError(packageJsonPath, error);
      }
      return config;
    }
  }

  return {};
}

/**
 * Resolve configuration with defaults
 */
export function resolveConfig(
  userConfig: BootplanConfig,
  root: string = process.cwd(),
): ResolvedConfig {
  validateConfig(userConfig);

  const defaults = getDefaultConfig(root);
  return mergeConfig(defaults, userConfig);
}
