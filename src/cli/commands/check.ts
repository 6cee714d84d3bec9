/**
 * Check Command
 *
 * Reports whether a listener accepts TCP connections. Nothing is sent.
 */

import { Command } from 'commander';
import ora from 'ora';
import { probe } from '../../connectors/mllp/MllpProbe.js';
import { isMllpError } from '../../connectors/mllp/MllpError.js';
import { OutputFormatter } from '../lib/OutputFormatter.js';
import { ConfigManager } from '../lib/ConfigManager.js';
import { parsePort, parseTimeoutSeconds } from '../lib/OptionParsers.js';
import { CheckCommandOptions, GlobalOptions } from '../types/index.js';

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Check whether an MLLP listener is accepting connections')
    .helpOption('--help', 'Display help for command')
    .option('-h, --host <host>', 'Host address of the HL7 server (default: configured host)')
    .requiredOption('-p, --port <port>', 'Port number of the HL7 server', parsePort)
    .option('-t, --timeout <seconds>', 'Connect timeout in seconds (default: configured timeout)', parseTimeoutSeconds)
    .action(async (options: CheckCommandOptions, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      const formatter = new OutputFormatter(globalOpts.json);

      const defaults = ConfigManager.getClientProperties();
      const host = options.host ?? defaults.host;
      const timeoutSeconds = options.timeout ?? defaults.timeoutSeconds;

      const spinner = ora(`Connecting to ${host}:${options.port}...`).start();
      try {
        const reachable = await probe(host, options.port, timeoutSeconds * 1000);
        spinner.stop();

        formatter.checkResult(host, options.port, reachable);
        if (!reachable) {
          process.exitCode = 1;
        }
      } catch (error) {
        spinner.stop();
        if (!isMllpError(error)) {
          throw error;
        }
        formatter.error(`Cannot check ${host}:${options.port}: ${error.message}`);
        process.exitCode = 1;
      }
    });
}

export default registerCheckCommand;
