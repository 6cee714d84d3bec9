/**
 * Configuration Manager
 *
 * Persists the CLI's default host and timeout with the 'conf' package.
 *
 * The config file is stored at:
 * - macOS: ~/Library/Preferences/mllp-send-nodejs/config.json
 * - Windows: %APPDATA%/mllp-send-nodejs/Config/config.json
 * - Linux: ~/.config/mllp-send-nodejs/config.json
 *
 * MLLP_SEND_CONFIG_DIR moves it to another directory.
 */

import Conf from 'conf';
import { CliConfig } from '../types/index.js';
import {
  getDefaultMllpClientProperties,
  MllpClientProperties,
} from '../../connectors/mllp/MllpClientProperties.js';

let store: Conf<CliConfig> | null = null;

/**
 * Opened on first use so that importing the CLI never touches the filesystem.
 */
function getStore(): Conf<CliConfig> {
  if (!store) {
    store = new Conf<CliConfig>({
      projectName: 'mllp-send',
      cwd: process.env['MLLP_SEND_CONFIG_DIR'] || undefined,
      schema: {
        host: { type: 'string', minLength: 1 },
        timeout: { type: 'integer', minimum: 1 },
      },
    });
  }
  return store;
}

/**
 * ConfigManager provides typed access to CLI configuration
 */
export const ConfigManager = {
  get<K extends keyof CliConfig>(key: K): CliConfig[K] {
    return getStore().get(key);
  },

  /**
   * Set a configuration value. Throws when the value fails the schema.
   */
  set<K extends keyof CliConfig>(key: K, value: NonNullable<CliConfig[K]>): void {
    getStore().set(key, value);
  },

  reset(): void {
    getStore().clear();
  },

  getPath(): string {
    return getStore().path;
  },

  /**
   * Built-in defaults overlaid with the persisted values.
   */
  getClientProperties(): MllpClientProperties {
    const defaults = getDefaultMllpClientProperties();
    const saved = getStore().store;
    return {
      host: saved.host ?? defaults.host,
      timeoutSeconds: saved.timeout ?? defaults.timeoutSeconds,
    };
  },
};

export default ConfigManager;
