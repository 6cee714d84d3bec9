/**
 * Send Command
 *
 * mllp-send send -p <port> -m <file> [-h <host>] [-t <seconds>]
 */

import { Command } from 'commander';
import ora from 'ora';
import { sendMessage } from '../lib/MessageSender.js';
import { readMessageFile } from '../lib/MessageReader.js';
import { OutputFormatter } from '../lib/OutputFormatter.js';
import { ConfigManager } from '../lib/ConfigManager.js';
import { parsePort, parseTimeoutSeconds } from '../lib/OptionParsers.js';
import { toExchangeRequest } from '../../connectors/mllp/MllpClientProperties.js';
import { GlobalOptions, SendCommandOptions } from '../types/index.js';

/**
 * Register the send command. It is the program's default command, so
 * `mllp-send -p 6661 -m adt.hl7` works without naming it.
 */
export function registerSendCommand(program: Command): void {
  program
    .command('send', { isDefault: true })
    .description('Send an HL7 message file over MLLP and print the response')
    .helpOption('--help', 'Display help for command')
    .option('-h, --host <host>', 'Host address of the HL7 server (default: configured host)')
    .requiredOption('-p, --port <port>', 'Port number of the HL7 server', parsePort)
    .requiredOption('-m, --message <file>', 'Path to the HL7 message file')
    .option('-t, --timeout <seconds>', 'Timeout in seconds (default: configured timeout)', parseTimeoutSeconds)
    .action(async (options: SendCommandOptions, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      const formatter = new OutputFormatter(globalOpts.json);

      let message: string;
      try {
        message = readMessageFile(options.message);
      } catch (error) {
        formatter.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
        return;
      }

      const defaults = ConfigManager.getClientProperties();
      const request = toExchangeRequest(
        {
          host: options.host ?? defaults.host,
          timeoutSeconds: options.timeout ?? defaults.timeoutSeconds,
        },
        options.port,
        message
      );

      const spinner = ora(`Sending to ${request.host}:${request.port}...`).start();
      const result = await sendMessage(request, (_state, detail) => {
        spinner.text = detail;
      }).finally(() => spinner.stop());

      formatter.sendResult(result);
      if (!result.success) {
        process.exitCode = 1;
      }
    });
}

export default registerSendCommand;
