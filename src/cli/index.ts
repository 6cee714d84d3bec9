#!/usr/bin/env node
/**
 * mllp-send CLI
 *
 * Usage: mllp-send [options] [command]
 *
 * Run `mllp-send --help` for detailed usage information.
 */

import 'dotenv/config';
import chalk from 'chalk';
import { createProgram } from './program.js';
import { shutdownLogging } from '../logging/index.js';

async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main()
  .catch((error: unknown) => {
    console.error(chalk.red('Fatal error:'), error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  })
  .finally(() => shutdownLogging());
