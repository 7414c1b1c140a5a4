/**
 * Bootplan CLI Implementation
 */

import { dirname, resolve } from 'path';
import { parseArgs } from 'util';

import { genBootImageConfigs } from './bootimage/configs';
import { bcpForDexpreopt } from './classpath/bootclasspath';
import { systemServerClasspath } from './classpath/system-server';
import { loadConfig, resolveConfig } from './config';
import type { BootplanConfig } from './config/types';
import { createDexpreoptContext } from './context';
import type { DexpreoptContext } from './context';
import { isConfigInvariantError } from './errors';
import { createLogger } from './logger';
import { formatMakeVars, makeVars } from './makevars';
import { VERSION } from './version';

const HELP = `
bootplan v${VERSION} - boot image and classpath planning for dexpreopt

Usage:
  bootplan <command> [options]

Commands:
  images           Print the boot image configs as JSON
  classpath        Print the dexpreopt boot classpath as JSON
  system-server    Print the system server classpath, one location per line
  vars             Print the exported build variables

Options:
  -h, --help           Show this help message
  -v, --version        Show version number
  -c, --config         Path to config file
  --root               Project root directory
  --device             Device name
  --with-updatable     Include updatable boot jars in the classpath
  --verbose            Log derivation steps

Examples:
  bootplan images --device generic_arm64
  bootplan classpath --with-updatable
  bootplan vars --config ./bootplan.config.json
`;

const COMMANDS: Record<string, (ctx: DexpreoptContext, withUpdatable: boolean) => string> = {
  images: (ctx) => JSON.stringify(genBootImageConfigs(ctx), null, 2),
  classpath: (ctx, withUpdatable) => JSON.stringify(bcpForDexpreopt(ctx, withUpdatable), null, 2),
  'system-server': (ctx) => systemServerClasspath(ctx).join('\n'),
  vars: (ctx) => formatMakeVars(makeVars(ctx)),
};

/**
 * Run the CLI and return its exit code
 */
export async function runCli(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
      config: { type: 'string', short: 'c' },
      root: { type: 'string' },
      device: { type: 'string' },
      'with-updatable': { type: 'boolean' },
      verbose: { type: 'boolean' },
    },
    allowPositionals: true,
  });

  const command = positionals[0];

  if (values.version) {
    console.log(`bootplan v${VERSION}`);
    return 0;
  }

  if (values.help || !command) {
    console.log(HELP);
    return 0;
  }

  const run = COMMANDS[command];
  if (run === undefined) {
    console.error(`Unknown command: ${command}`);
    return 1;
  }

  // Determine project root
  const projectRoot = values.root
    ? resolve(values.root)
    : values.config
      ? resolve(dirname(values.config))
      : process.cwd();

  const fileConfig: BootplanConfig = values.config
    ? await loadConfig({ config: resolve(values.config), cwd: projectRoot })
    : await loadConfig({ cwd: projectRoot });

  // CLI options override file config
  const cliConfig: BootplanConfig = { root: projectRoot };
  if (values.device !== undefined) cliConfig.deviceName = values.device;
  if (values.verbose) cliConfig.logLevel = 'debug';

  const resolvedConfig = resolveConfig({ ...fileConfig, ...cliConfig }, projectRoot);
  const logger = createLogger({ level: resolvedConfig.logLevel });
  const ctx = createDexpreoptContext(resolvedConfig, logger);
  logger.debug(`Config fingerprint ${ctx.cache.fingerprint}`);

  try {
    console.log(run(ctx, values['with-updatable'] ?? false));
    return 0;
  } catch (error) {
    if (isConfigInvariantError(error)) {
      // Reported whatever the log level: the build cannot go on.
      console.error(`Invalid dexpreopt configuration: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
