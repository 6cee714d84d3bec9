/**
 * Configuration Commands
 *
 * View or change the defaults used when -h/--host or -t/--timeout is omitted.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigManager } from '../lib/ConfigManager.js';
import { OutputFormatter } from '../lib/OutputFormatter.js';
import { parseTimeoutSeconds } from '../lib/OptionParsers.js';
import { CliConfig, GlobalOptions } from '../types/index.js';

const CONFIG_DESCRIPTIONS: Record<keyof CliConfig, string> = {
  host: 'Default destination host',
  timeout: 'Default read/write timeout in seconds',
};

function isConfigKey(key: string): key is keyof CliConfig {
  return Object.prototype.hasOwnProperty.call(CONFIG_DESCRIPTIONS, key);
}

/**
 * Validate a raw value and store it under `key`.
 */
export function applyConfigValue(key: keyof CliConfig, rawValue: string): void {
  switch (key) {
    case 'host': {
      const host = rawValue.trim();
      if (host === '') {
        throw new Error('Host must not be empty.');
      }
      ConfigManager.set('host', host);
      break;
    }
    case 'timeout':
      ConfigManager.set('timeout', parseTimeoutSeconds(rawValue));
      break;
  }
}

export function registerConfigCommands(program: Command): void {
  const configCmd = program
    .command('config')
    .description('View or manage default host and timeout');

  // ==========================================================================
  // config (no args) - show effective settings
  // ==========================================================================
  configCmd.action((_options, cmd: Command) => {
    const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
    const formatter = new OutputFormatter(globalOpts.json);
    const effective = ConfigManager.getClientProperties();
    const configPath = ConfigManager.getPath();

    const lines = [
      chalk.bold('Configuration') + chalk.gray(` (${configPath})`),
      `  ${chalk.cyan('host')}     ${effective.host}  ${chalk.gray(CONFIG_DESCRIPTIONS.host)}`,
      `  ${chalk.cyan('timeout')}  ${effective.timeoutSeconds}  ${chalk.gray(CONFIG_DESCRIPTIONS.timeout)}`,
    ];

    formatter.output(lines.join('\n'), {
      path: configPath,
      config: { host: effective.host, timeout: effective.timeoutSeconds },
    });
  });

  // ==========================================================================
  // config get <key>
  // ==========================================================================
  configCmd
    .command('get <key>')
    .description('Get a configuration value')
    .action((key: string, _options, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      const formatter = new OutputFormatter(globalOpts.json);

      if (!isConfigKey(key)) {
        formatter.error(`Unknown configuration key: ${key}`);
        process.exitCode = 1;
        return;
      }

      const effective = ConfigManager.getClientProperties();
      const value = key === 'host' ? effective.host : effective.timeoutSeconds;
      formatter.output(String(value), { [key]: value });
    });

  // ==========================================================================
  // config set <key> <value>
  // ==========================================================================
  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value')
    .action((key: string, value: string, _options, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      const formatter = new OutputFormatter(globalOpts.json);

      if (!isConfigKey(key)) {
        formatter.error(`Unknown configuration key: ${key}. Valid keys: ${Object.keys(CONFIG_DESCRIPTIONS).join(', ')}`);
        process.exitCode = 1;
        return;
      }

      try {
        applyConfigValue(key, value);
      } catch (error) {
        formatter.error(`Invalid value for ${key}: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
        return;
      }

      formatter.success(`Set ${key} = ${ConfigManager.get(key)}`);
    });

  // ==========================================================================
  // config reset
  // ==========================================================================
  configCmd
    .command('reset')
    .description('Restore the built-in defaults')
    .action((_options, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      ConfigManager.reset();
      new OutputFormatter(globalOpts.json).success('Configuration reset to defaults');
    });

  // ==========================================================================
  // config path
  // ==========================================================================
  configCmd
    .command('path')
    .description('Show the configuration file path')
    .action(() => {
      console.log(ConfigManager.getPath());
    });
}

export default registerConfigCommands;
