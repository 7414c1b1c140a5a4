#!/usr/bin/env node
/**
 * Bootplan CLI
 */

import { runCli } from './cli-impl';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
