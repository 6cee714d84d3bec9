/**
 * Commander argument parsers for the numeric options.
 * Throwing InvalidArgumentError lets commander report the bad value and exit.
 */

import { InvalidArgumentError } from 'commander';
import { MAX_PORT } from '../../connectors/mllp/MllpClientProperties.js';

function parseWholeNumber(value: string): number | null {
  return /^\d+$/.test(value.trim()) ? parseInt(value, 10) : null;
}

/**
 * Port number, 0-65535
 */
export function parsePort(value: string): number {
  const port = parseWholeNumber(value);
  if (port === null || port > MAX_PORT) {
    throw new InvalidArgumentError(`Port must be an integer between 0 and ${MAX_PORT}.`);
  }
  return port;
}

/**
 * Timeout in whole seconds, at least 1
 */
export function parseTimeoutSeconds(value: string): number {
  const seconds = parseWholeNumber(value);
  if (seconds === null || seconds < 1) {
    throw new InvalidArgumentError('Timeout must be a positive number of seconds.');
  }
  return seconds;
}
