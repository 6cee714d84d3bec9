/**
 * Builds the mllp-send command tree.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { registerSendCommand } from './commands/send.js';
import { registerCheckCommand } from './commands/check.js';
import { registerConfigCommands } from './commands/config.js';
import { LogLevel, setGlobalLevel } from '../logging/index.js';
import { GlobalOptions } from './types/index.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('mllp-send')
    .description('Send an HL7 message over MLLP and print the response')
    .version(VERSION, '-V, --version', 'Output the version number')
    // -h is the host flag
    .helpOption('--help', 'Display help for command')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Log connection details to stderr');

  program.hook('preAction', (thisCommand) => {
    if (thisCommand.opts<GlobalOptions>().verbose) {
      setGlobalLevel(LogLevel.DEBUG);
    }
  });

  registerSendCommand(program);
  registerCheckCommand(program);
  registerConfigCommands(program);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# Send a message file to a local listener')}
  $ mllp-send -p 6661 -m adt-a01.hl7

  ${chalk.gray('# Send to another host with a 5 second timeout')}
  $ mllp-send send -h hl7.example.org -p 2575 -m oru-r01.hl7 -t 5

  ${chalk.gray('# Check that a listener is up')}
  $ mllp-send check -p 6661

  ${chalk.gray('# Change the default host')}
  $ mllp-send config set host hl7.example.org
`
  );

  return program;
}
