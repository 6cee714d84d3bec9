/**
 * Message Sender
 *
 * Runs one MLLP exchange for the CLI and turns the outcome into a SendResult,
 * so commands print results instead of handling exchange errors themselves.
 */

import { exchange, ExchangeStateListener } from '../../connectors/mllp/MllpExchange.js';
import { isMllpError } from '../../connectors/mllp/MllpError.js';
import type { ExchangeRequest } from '../../connectors/mllp/MllpClientProperties.js';
import { getLogger } from '../../logging/index.js';
import { SendResult } from '../types/index.js';

const logger = getLogger('cli');

export async function sendMessage(
  request: ExchangeRequest,
  onStateChange?: ExchangeStateListener
): Promise<SendResult> {
  const { host, port } = request;
  const startTime = Date.now();

  try {
    const response = await exchange(request, { onStateChange });
    return {
      success: true,
      host,
      port,
      duration: Date.now() - startTime,
      response,
    };
  } catch (error) {
    const duration = Date.now() - startTime;

    if (isMllpError(error)) {
      logger.debug(`Exchange with ${host}:${port} failed (${error.kind})`, {
        cause: error.cause instanceof Error ? error.cause.message : error.cause,
      });
      return { success: false, host, port, duration, error: error.message, kind: error.kind };
    }

    throw error;
  }
}
