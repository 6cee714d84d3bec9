/**
 * Configuration for the MLLP client
 *
 * Defaults are an explicit value handed to each exchange rather than
 * process-wide state.
 */

import { MllpError, MllpErrorKind } from './MllpError.js';

export const DEFAULT_HOST = 'localhost';

/** Default read/write timeout in seconds */
export const DEFAULT_TIMEOUT_SECONDS = 30;

export const MAX_PORT = 65535;

/** Largest delay a Node.js timer accepts */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface MllpClientProperties {
  /** Remote host to connect to */
  host: string;
  /** Read/write timeout in seconds */
  timeoutSeconds: number;
}

/**
 * A single connect-send-receive round trip.
 */
export type ExchangeRequest = Readonly<{
  host: string;
  port: number;
  message: string;
  /** Applied to the connect attempt and to both socket directions */
  timeoutMs: number;
}>;

export function getDefaultMllpClientProperties(): MllpClientProperties {
  return {
    host: DEFAULT_HOST,
    timeoutSeconds: DEFAULT_TIMEOUT_SECONDS,
  };
}

/**
 * Build the immutable request for one exchange.
 */
export function toExchangeRequest(
  properties: MllpClientProperties,
  port: number,
  message: string
): ExchangeRequest {
  return Object.freeze({
    host: properties.host,
    port,
    message,
    timeoutMs: properties.timeoutSeconds * 1000,
  });
}

/**
 * Reject an endpoint or timeout that no socket could use.
 * The timeout must be a whole number of milliseconds; zero is rejected
 * rather than read as "wait forever".
 */
export function validateEndpoint(endpoint: Pick<ExchangeRequest, 'host' | 'port' | 'timeoutMs'>): void {
  if (endpoint.host.trim() === '') {
    throw new MllpError(MllpErrorKind.INVALID_INPUT, 'Host must not be empty');
  }
  if (!Number.isInteger(endpoint.port) || endpoint.port < 0 || endpoint.port > MAX_PORT) {
    throw new MllpError(MllpErrorKind.INVALID_INPUT, `Invalid port: ${endpoint.port}`);
  }
  if (!Number.isInteger(endpoint.timeoutMs) || endpoint.timeoutMs <= 0 || endpoint.timeoutMs > MAX_TIMEOUT_MS) {
    throw new MllpError(
      MllpErrorKind.INVALID_INPUT,
      `Timeout must be a positive duration, got ${endpoint.timeoutMs}ms`
    );
  }
}
