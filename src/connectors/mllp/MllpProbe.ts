/**
 * Check whether an MLLP listener is accepting connections.
 * Opens a TCP connection and closes it straight away; nothing is sent.
 */

import * as net from 'net';
import { validateEndpoint } from './MllpClientProperties.js';
import { MLLP_CLIENT_COMPONENT } from './MllpExchange.js';
import { getLogger } from '../../logging/index.js';
import type { Logger } from '../../logging/index.js';

export async function probe(
  host: string,
  port: number,
  timeoutMs: number,
  logger: Logger = getLogger(MLLP_CLIENT_COMPONENT).child('probe')
): Promise<boolean> {
  validateEndpoint({ host, port, timeoutMs });

  return new Promise((resolve) => {
    const socket = new net.Socket();
    let settled = false;

    const finish = (reachable: boolean, reason: string) => {
      if (settled) return;
      settled = true;
      logger.debug(`${host}:${port} ${reachable ? 'is' : 'is not'} accepting connections (${reason})`);
      socket.destroy();
      resolve(reachable);
    };

    socket.on('error', (error: Error) => finish(false, error.message));
    socket.once('timeout', () => finish(false, `no connection after ${timeoutMs}ms`));
    socket.setTimeout(timeoutMs);
    socket.connect({ host, port }, () => finish(true, 'connected'));
  });
}
