/**
 * MLLP Exchange
 *
 * One round trip over one TCP connection:
 * connect -> frame -> write -> read until END / peer close / idle timeout -> deframe -> decode.
 *
 * Key behaviors:
 * - The request timeout is the socket idle timeout, so it bounds the connect
 *   attempt, the write and every wait for response data alike
 * - An idle timeout or peer close while reading ends the read loop; it is not an error
 * - An empty response after the loop is reported as TIMED_OUT whatever ended the loop
 * - Strict UTF-8 decoding, no replacement characters
 * - The socket is destroyed on every exit path
 */

import * as net from 'net';
import { TextDecoder } from 'util';
import { frameMessage, hasCompleteMessage, unframeMessage } from './MllpFrame.js';
import { MllpError, MllpErrorKind } from './MllpError.js';
import { validateEndpoint } from './MllpClientProperties.js';
import type { ExchangeRequest } from './MllpClientProperties.js';
import { getLogger } from '../../logging/index.js';
import type { Logger } from '../../logging/index.js';

export const MLLP_CLIENT_COMPONENT = 'mllp-client';

/**
 * Lifecycle of a single exchange. Transitions only move forward.
 */
export enum ExchangeState {
  IDLE = 'IDLE',
  CONNECTING = 'CONNECTING',
  SENDING = 'SENDING',
  RECEIVING = 'RECEIVING',
  DECODING = 'DECODING',
  SUCCESS = 'SUCCESS',
  FAILED = 'FAILED',
}

export type ExchangeStateListener = (state: ExchangeState, detail: string) => void;

export interface ExchangeOptions {
  /** Defaults to the "mllp-client" component logger */
  logger?: Logger;
  /** Called on every state transition */
  onStateChange?: ExchangeStateListener;
}

const UTF8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Send one message and return the decoded reply.
 *
 * @throws MllpError with the kind of the first failure encountered
 */
export async function exchange(request: ExchangeRequest, options: ExchangeOptions = {}): Promise<string> {
  validateEndpoint(request);
  return new MllpExchange(request, options).run();
}

class MllpExchange {
  private state = ExchangeState.IDLE;
  private readonly socket = new net.Socket();
  private readonly logger: Logger;
  private readonly onStateChange?: ExchangeStateListener;

  /** Set by the socket-wide error listener; checked when a phase starts */
  private socketError: Error | null = null;

  constructor(
    private readonly request: ExchangeRequest,
    options: ExchangeOptions
  ) {
    this.logger = options.logger ?? getLogger(MLLP_CLIENT_COMPONENT);
    this.onStateChange = options.onStateChange;
  }

  async run(): Promise<string> {
    // Stays attached until the socket is gone, so an error raised between
    // phases (or while destroying) always has a listener.
    this.socket.on('error', (error: Error) => {
      this.socketError ??= error;
      this.logger.debug(`Socket error in state ${this.state}: ${error.message}`);
    });
    this.socket.setTimeout(this.request.timeoutMs);

    try {
      await this.connect();
      await this.send(frameMessage(this.request.message));

      const response = await this.receive();
      if (response.length === 0) {
        throw new MllpError(MllpErrorKind.TIMED_OUT, 'Read timed out');
      }

      const text = this.decode(response);
      this.transition(ExchangeState.SUCCESS, `Received ${response.length} bytes`);
      return text;
    } catch (error) {
      this.transition(ExchangeState.FAILED, error instanceof Error ? error.message : String(error));
      throw error;
    } finally {
      this.socket.destroy();
    }
  }

  private connect(): Promise<void> {
    const { host, port, timeoutMs } = this.request;
    this.transition(ExchangeState.CONNECTING, `Trying to connect on ${host}:${port}...`);

    return new Promise((resolve, reject) => {
      const onConnect = () => {
        cleanup();
        resolve();
      };
      const onError = (error: Error) => {
        cleanup();
        reject(
          new MllpError(
            MllpErrorKind.CONNECTION_ERROR,
            `Failed to connect to ${host}:${port}: ${error.message}`,
            error
          )
        );
      };
      const onTimeout = () => {
        cleanup();
        reject(
          new MllpError(
            MllpErrorKind.CONNECTION_ERROR,
            `Timed out connecting to ${host}:${port} after ${timeoutMs}ms`
          )
        );
      };
      const cleanup = () => {
        this.socket.removeListener('connect', onConnect);
        this.socket.removeListener('error', onError);
        this.socket.removeListener('timeout', onTimeout);
      };

      this.socket.once('connect', onConnect);
      this.socket.once('error', onError);
      this.socket.once('timeout', onTimeout);
      this.socket.connect({ host, port });
    });
  }

  private send(frame: Buffer): Promise<void> {
    const { timeoutMs } = this.request;
    this.transition(
      ExchangeState.SENDING,
      `${this.socket.localAddress}:${this.socket.localPort} -> ${this.socket.remoteAddress}:${this.socket.remotePort}`
    );

    return new Promise((resolve, reject) => {
      let settled = false;

      const settle = (error?: MllpError) => {
        if (settled) return;
        settled = true;
        this.socket.removeListener('error', onError);
        this.socket.removeListener('timeout', onTimeout);
        if (error) {
          reject(error);
        } else {
          this.logger.debug(`Sent ${frame.length} bytes`);
          resolve();
        }
      };
      const writeError = (error: Error) =>
        new MllpError(MllpErrorKind.WRITE_ERROR, `Failed to write message: ${error.message}`, error);
      const onError = (error: Error) => settle(writeError(error));
      const onTimeout = () =>
        settle(new MllpError(MllpErrorKind.TIMED_OUT, `Write timed out after ${timeoutMs}ms`));

      if (this.socketError) {
        settle(writeError(this.socketError));
        return;
      }

      this.socket.on('error', onError);
      this.socket.on('timeout', onTimeout);
      this.socket.write(frame, (error?: Error | null) => settle(error ? writeError(error) : undefined));
    });
  }

  /**
   * Accumulate response bytes until the buffer ends with the END sequence,
   * the peer closes, or no data arrives within the timeout.
   */
  private receive(): Promise<Buffer> {
    const { timeoutMs } = this.request;
    this.transition(
      ExchangeState.RECEIVING,
      `Waiting for response from ${this.socket.remoteAddress}:${this.socket.remotePort} (Timeout: ${timeoutMs} ms)...`
    );

    return new Promise((resolve, reject) => {
      let buffer = Buffer.alloc(0);
      let settled = false;

      const cleanup = () => {
        this.socket.removeListener('data', onData);
        this.socket.removeListener('end', onEnd);
        this.socket.removeListener('close', onClose);
        this.socket.removeListener('timeout', onTimeout);
        this.socket.removeListener('error', onError);
      };
      const finish = (reason: string) => {
        if (settled) return;
        settled = true;
        cleanup();
        this.logger.debug(`Read loop ended (${reason}) with ${buffer.length} bytes`);
        resolve(buffer);
      };
      const fail = (error: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(new MllpError(MllpErrorKind.READ_ERROR, `Failed to read response: ${error.message}`, error));
      };

      const onData = (chunk: Buffer) => {
        buffer = Buffer.concat([buffer, chunk]);
        this.logger.trace(`Read ${chunk.length} bytes (${buffer.length} total)`);
        if (hasCompleteMessage(buffer)) {
          finish('end of frame');
        }
      };
      const onEnd = () => finish('peer closed the connection');
      const onClose = () => finish('socket closed');
      const onTimeout = () => finish(`no data for ${timeoutMs}ms`);
      const onError = (error: Error) => fail(error);

      if (this.socketError) {
        fail(this.socketError);
        return;
      }
      if (this.socket.readableEnded || this.socket.destroyed) {
        finish('peer closed the connection');
        return;
      }

      this.socket.on('data', onData);
      this.socket.on('end', onEnd);
      this.socket.on('close', onClose);
      this.socket.on('timeout', onTimeout);
      this.socket.on('error', onError);
    });
  }

  private decode(response: Buffer): string {
    const payload = unframeMessage(response);
    this.transition(ExchangeState.DECODING, `Decoding ${payload.length} bytes`);

    try {
      return UTF8.decode(payload);
    } catch (error) {
      throw new MllpError(
        MllpErrorKind.INVALID_DATA,
        'Response is not valid UTF-8',
        error
      );
    }
  }

  private transition(state: ExchangeState, detail: string): void {
    this.state = state;
    this.logger.debug(`${state}: ${detail}`);
    this.onStateChange?.(state, detail);
  }
}
